import { v4 as uuidv4 } from 'uuid';
import { LedgerStore } from './persistence.js';
import { CommitResult, LedgerRecord, SubmissionPayload } from './types.js';

/**
 * Writes accepted submissions to the ledger.
 *
 * Each call draws a new id. A caller that retries after STORE_ERROR therefore
 * never collides with a row a previous attempt may have written.
 * No retry happens here.
 */
export class LedgerWriter {
  private store: LedgerStore;
  private generateId: () => string;

  constructor(store: LedgerStore, generateId: () => string = () => uuidv4()) {
    this.store = store;
    this.generateId = generateId;
  }

  async commit(payload: SubmissionPayload): Promise<CommitResult> {
    const record: LedgerRecord = {
      id: this.generateId(),
      task_id: payload.task_id,
      miner_id: payload.miner_id,
      performance: payload.performance,
      hyperparameters: payload.hyperparameters,
      artifact_hash: payload.artifact_hash,
      timestamp: payload.timestamp,
    };

    try {
      await this.store.insert(record);
      return { type: 'COMMITTED', recordId: record.id };
    } catch (err) {
      return { type: 'STORE_ERROR', error: err instanceof Error ? err : new Error(String(err)) };
    }
  }
}
