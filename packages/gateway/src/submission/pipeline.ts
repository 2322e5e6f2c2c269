/**
 * Submission Pipeline
 *
 * Orchestrates verification of one envelope and returns an accept/reject
 * decision.
 *
 * Stage order (fixed):
 *   REPLAY → FRESHNESS → INTEGRITY → KEY_LOOKUP → SIGNATURE → COMMIT
 *
 * Design invariants:
 * - Replay claim runs before any costly work
 * - Nothing reaches the ledger before the signature verifies
 * - First failing stage ends the run; later stages have no side effects
 * - Every submission ends in exactly one logged decision
 * - Infrastructure failures are rejections (redis_error / db_error), not throws
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Clock,
  PipelineStage,
  RejectionReason,
  SubmissionDecision,
  SubmissionEnvelope,
  SubmissionPayload,
  VerificationWindows,
} from './types.js';
import { LedgerStore, MinerKeyStore, ReplayStore } from './persistence.js';
import { decodePayload } from './payload.js';
import { ReplayGuard, replayTokenFor } from './replay-guard.js';
import { FreshnessChecker } from './freshness.js';
import { IntegrityChecker } from './integrity.js';
import { KeyDirectory } from './key-directory.js';
import { SignatureVerifier } from './signature.js';
import { LedgerWriter } from './ledger.js';
import type { Logger } from '../utils/index.js';

// =============================================================================
// CONTEXT
// =============================================================================

/**
 * Everything the pipeline shares across submissions. Built once at startup.
 */
export interface PipelineContext {
  readonly replayStore: ReplayStore;
  readonly minerKeys: MinerKeyStore;
  readonly ledger: LedgerStore;
  readonly windows: Readonly<VerificationWindows>;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly generateRecordId?: () => string;
}

export function createPipelineContext(context: PipelineContext): PipelineContext {
  return Object.freeze({ ...context, windows: Object.freeze({ ...context.windows }) });
}

// =============================================================================
// EVENTS
// =============================================================================

export type PipelineEvent =
  | { type: 'SUBMISSION_RECEIVED'; submissionId: string }
  | { type: 'STAGE_PASSED'; submissionId: string; stage: PipelineStage }
  | {
      type: 'SUBMISSION_ACCEPTED';
      submissionId: string;
      recordId: string;
      minerId: number;
      taskId: string;
      durationMs: number;
    }
  | {
      type: 'SUBMISSION_REJECTED';
      submissionId: string;
      reason: RejectionReason;
      stage?: PipelineStage;
      durationMs: number;
    };

export type PipelineEventListener = (event: PipelineEvent) => void;

// =============================================================================
// PIPELINE
// =============================================================================

export interface RejectionDetail {
  stage?: PipelineStage;
  payload?: SubmissionPayload;
  infrastructure?: boolean;
  [key: string]: unknown;
}

export class SubmissionPipeline {
  private context: PipelineContext;
  private replayGuard: ReplayGuard;
  private freshness: FreshnessChecker;
  private integrity: IntegrityChecker;
  private keys: KeyDirectory;
  private signatures: SignatureVerifier;
  private ledgerWriter: LedgerWriter;
  private listeners: PipelineEventListener[] = [];

  constructor(context: PipelineContext) {
    this.context = context;
    const { windows, logger } = context;
    this.replayGuard = new ReplayGuard(
      context.replayStore,
      windows.replayTtlSeconds,
      logger.child({ component: 'replay-guard' })
    );
    this.freshness = new FreshnessChecker(windows.maxSkewSeconds, windows.maxAgeSeconds);
    this.integrity = new IntegrityChecker();
    this.keys = new KeyDirectory(context.minerKeys);
    this.signatures = new SignatureVerifier();
    this.ledgerWriter = new LedgerWriter(context.ledger, context.generateRecordId);
  }

  onEvent(listener: PipelineEventListener): void {
    this.listeners.push(listener);
  }

  /**
   * Reject an envelope before it reaches the pipeline (transport-level
   * failures such as an oversize artifact). Still logged and emitted.
   */
  rejectEnvelope(reason: RejectionReason, detail: RejectionDetail = {}): SubmissionDecision {
    const submissionId = uuidv4();
    this.emit({ type: 'SUBMISSION_RECEIVED', submissionId });
    return this.reject(submissionId, Date.now(), reason, detail);
  }

  async process(envelope: SubmissionEnvelope): Promise<SubmissionDecision> {
    const submissionId = uuidv4();
    const startedAt = Date.now();
    this.emit({ type: 'SUBMISSION_RECEIVED', submissionId });

    const { payload: payloadBytes, signature, artifact } = envelope;
    if (payloadBytes === undefined || signature === undefined || artifact === undefined) {
      return this.reject(submissionId, startedAt, 'missing_fields', {
        hasPayload: payloadBytes !== undefined,
        hasSignature: signature !== undefined,
        hasArtifact: artifact !== undefined,
      });
    }

    const decoded = decodePayload(payloadBytes);
    if (decoded.type === 'INVALID') {
      return this.reject(submissionId, startedAt, 'invalid_payload', {
        error: decoded.error.message,
      });
    }
    const payload = decoded.payload;

    // 1) Replay
    const claim = await this.replayGuard.claim(replayTokenFor(signature));
    switch (claim.type) {
      case 'ALREADY_CLAIMED':
        return this.reject(submissionId, startedAt, 'replay', { stage: 'REPLAY', payload });
      case 'STORE_UNAVAILABLE':
        return this.reject(submissionId, startedAt, 'redis_error', {
          stage: 'REPLAY',
          payload,
          infrastructure: true,
          error: claim.error,
        });
    }
    this.emit({ type: 'STAGE_PASSED', submissionId, stage: 'REPLAY' });

    // 2) Freshness
    const now = this.context.clock();
    const fresh = this.freshness.check(payload.timestamp, now);
    if (fresh.type !== 'FRESH') {
      return this.reject(submissionId, startedAt, 'stale_timestamp', {
        stage: 'FRESHNESS',
        payload,
        freshness: fresh.type,
        claimedTimestamp: payload.timestamp,
        now,
      });
    }
    this.emit({ type: 'STAGE_PASSED', submissionId, stage: 'FRESHNESS' });

    // 3) Integrity
    const integrity = this.integrity.verify(artifact, payload.artifact_hash);
    if (integrity.type === 'MISMATCH') {
      return this.reject(submissionId, startedAt, 'artifact_hash_mismatch', {
        stage: 'INTEGRITY',
        payload,
        claimed: payload.artifact_hash,
        computed: integrity.computed,
        artifactBytes: artifact.length,
      });
    }
    this.emit({ type: 'STAGE_PASSED', submissionId, stage: 'INTEGRITY' });

    // 4) Authenticity: key lookup, then signature over the received bytes
    const key = await this.keys.lookup(payload.miner_id);
    switch (key.type) {
      case 'NOT_FOUND':
        return this.reject(submissionId, startedAt, 'unknown_miner', { stage: 'KEY_LOOKUP', payload });
      case 'INVALID_KEY':
        return this.reject(submissionId, startedAt, 'invalid_pubkey', { stage: 'KEY_LOOKUP', payload });
      case 'BAD_KEY':
        return this.reject(submissionId, startedAt, 'bad_pubkey', { stage: 'KEY_LOOKUP', payload });
      case 'STORE_ERROR':
        return this.reject(submissionId, startedAt, 'db_error', {
          stage: 'KEY_LOOKUP',
          payload,
          infrastructure: true,
          error: key.error,
        });
    }
    this.emit({ type: 'STAGE_PASSED', submissionId, stage: 'KEY_LOOKUP' });

    const verdict = await this.signatures.verify(payloadBytes, signature, key.publicKey);
    if (verdict.type === 'MALFORMED') {
      return this.reject(submissionId, startedAt, verdict.reason, { stage: 'SIGNATURE', payload });
    }
    if (verdict.type === 'INVALID') {
      return this.reject(submissionId, startedAt, 'bad_signature', { stage: 'SIGNATURE', payload });
    }
    this.emit({ type: 'STAGE_PASSED', submissionId, stage: 'SIGNATURE' });

    // 5) Commit
    const commit = await this.ledgerWriter.commit(payload);
    if (commit.type === 'STORE_ERROR') {
      return this.reject(submissionId, startedAt, 'db_error', {
        stage: 'COMMIT',
        payload,
        infrastructure: true,
        error: commit.error,
      });
    }
    this.emit({ type: 'STAGE_PASSED', submissionId, stage: 'COMMIT' });

    const durationMs = Date.now() - startedAt;
    this.context.logger.info(
      {
        submissionId,
        recordId: commit.recordId,
        minerId: payload.miner_id,
        taskId: payload.task_id,
        performance: payload.performance,
        durationMs,
      },
      'Submission accepted'
    );
    this.emit({
      type: 'SUBMISSION_ACCEPTED',
      submissionId,
      recordId: commit.recordId,
      minerId: payload.miner_id,
      taskId: payload.task_id,
      durationMs,
    });

    return { status: 'accepted', recordId: commit.recordId };
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private reject(
    submissionId: string,
    startedAt: number,
    reason: RejectionReason,
    detail: RejectionDetail
  ): SubmissionDecision {
    const { stage, payload, infrastructure, ...rest } = detail;
    const durationMs = Date.now() - startedAt;
    const ctx = {
      submissionId,
      reason,
      stage,
      minerId: payload?.miner_id,
      taskId: payload?.task_id,
      durationMs,
      ...rest,
    };

    if (infrastructure) {
      this.context.logger.error(ctx, 'Submission rejected: dependency unavailable');
    } else {
      this.context.logger.warn(ctx, 'Submission rejected');
    }

    this.emit({ type: 'SUBMISSION_REJECTED', submissionId, reason, stage, durationMs });
    return { status: 'rejected', reason };
  }

  private emit(event: PipelineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.context.logger.error({ event: event.type, error: err }, 'Pipeline event listener failed');
      }
    }
  }
}
