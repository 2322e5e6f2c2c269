/**
 * PostgreSQL Submission Persistence
 *
 * Implements the durable-store interfaces over a shared pg Pool.
 *
 * Guarantees:
 * - Ledger rows are insert-only: no UPDATE or DELETE is ever issued
 * - Ledger timestamp stored as timestamptz via to_timestamp(seconds)
 * - Miner directory is read-only from here
 *
 * Schema: migrations/001_init.sql
 */

import { Pool } from 'pg';
import type {
  LedgerRecord,
  LedgerStore,
  MinerKeyStore,
  TaskDescriptor,
} from '../../submission/index.js';
import type { TaskDirectory } from '../../services/task-directory.js';

// =============================================================================
// MINER DIRECTORY
// =============================================================================

export class PostgresMinerKeyStore implements MinerKeyStore {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  async findPublicKey(minerId: number): Promise<string | null> {
    const query = `
      SELECT public_key
      FROM miners
      WHERE miner_id = $1
    `;

    const result = await this.pool.query<{ public_key: string }>(query, [minerId]);

    if (result.rows.length === 0) {
      return null;
    }

    return result.rows[0].public_key;
  }
}

// =============================================================================
// LEDGER
// =============================================================================

export class PostgresLedgerStore implements LedgerStore {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  /**
   * Insert one accepted submission.
   * A duplicate id surfaces as an error, never as success.
   */
  async insert(record: LedgerRecord): Promise<void> {
    const query = `
      INSERT INTO ledger (
        id, task_id, miner_id, performance,
        hyperparameters, artifact_hash, timestamp
      ) VALUES (
        $1, $2, $3, $4,
        $5, $6, to_timestamp($7)
      )
    `;

    const values = [
      record.id,
      record.task_id,
      record.miner_id,
      record.performance,
      JSON.stringify(record.hyperparameters),
      record.artifact_hash,
      record.timestamp,
    ];

    try {
      await this.pool.query(query, values);
    } catch (error: unknown) {
      if (error instanceof Error && error.message.includes('duplicate key')) {
        throw new Error(`Ledger record ${record.id} already exists`);
      }
      throw error;
    }
  }
}

// =============================================================================
// TASKS
// =============================================================================

interface TaskRow {
  task_id: string;
  performance_threshold: string | number;
  validation_data_hash: string;
}

export class PostgresTaskDirectory implements TaskDirectory {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  /**
   * Most recently created active task.
   */
  async current(): Promise<TaskDescriptor | null> {
    const query = `
      SELECT task_id, performance_threshold, validation_data_hash
      FROM tasks
      WHERE active = TRUE
      ORDER BY created_at DESC
      LIMIT 1
    `;
    const result = await this.pool.query<TaskRow>(query);
    return result.rows.length > 0 ? this.rowToTask(result.rows[0]) : null;
  }

  async get(taskId: string): Promise<TaskDescriptor | null> {
    const query = `
      SELECT task_id, performance_threshold, validation_data_hash
      FROM tasks
      WHERE task_id = $1
    `;
    const result = await this.pool.query<TaskRow>(query, [taskId]);
    return result.rows.length > 0 ? this.rowToTask(result.rows[0]) : null;
  }

  // ===========================================================================
  // PRIVATE: Row mapping
  // ===========================================================================

  private rowToTask(row: TaskRow): TaskDescriptor {
    return {
      task_id: row.task_id,
      // NUMERIC columns come back as strings
      performance_threshold: Number(row.performance_threshold),
      validation_data_hash: row.validation_data_hash,
    };
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export interface PostgresStores {
  minerKeys: PostgresMinerKeyStore;
  ledger: PostgresLedgerStore;
  tasks: PostgresTaskDirectory;
}

export function createPostgresStoresFromPool(pool: Pool): PostgresStores {
  return {
    minerKeys: new PostgresMinerKeyStore(pool),
    ledger: new PostgresLedgerStore(pool),
    tasks: new PostgresTaskDirectory(pool),
  };
}

export async function registerMiner(pool: Pool, minerId: number, publicKeyHex: string): Promise<void> {
  const query = `
    INSERT INTO miners (miner_id, public_key)
    VALUES ($1, $2)
    ON CONFLICT (miner_id) DO UPDATE SET public_key = EXCLUDED.public_key
  `;
  await pool.query(query, [minerId, publicKeyHex]);
}
