/**
 * Submission Intake Types
 *
 * Type definitions for the verification pipeline: the wire envelope, the
 * decoded payload, per-stage outcomes and the final decision.
 */

// =============================================================================
// WIRE MODEL (untrusted)
// =============================================================================

/**
 * Hyperparameters are stored verbatim and never interpreted.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface SubmissionPayload {
  task_id: string;
  miner_id: number;
  performance: number;
  artifact_hash: string;      // lowercase hex sha256 of the artifact
  hyperparameters: JsonValue;
  timestamp: number;          // Unix seconds
  nonce: number;              // advisory, never read by verification
}

/**
 * The three independent parts of one POST /submit request.
 * A part that did not arrive is undefined.
 */
export interface SubmissionEnvelope {
  payload?: Buffer;           // exact bytes as received, these are what was signed
  signature?: string;         // hex
  artifact?: Buffer;
}

// =============================================================================
// DECISION
// =============================================================================

export type RejectionReason =
  | 'missing_fields'
  | 'invalid_payload'
  | 'replay'
  | 'redis_error'
  | 'stale_timestamp'
  | 'artifact_hash_mismatch'
  | 'unknown_miner'
  | 'invalid_pubkey'
  | 'bad_pubkey'
  | 'signature_parse_error'
  | 'bad_signature'
  | 'db_error'
  | 'artifact_too_large'
  | 'malformed_request';

export type SubmissionDecision =
  | { status: 'accepted'; recordId: string }
  | { status: 'rejected'; reason: RejectionReason };

export interface SubmissionResponse {
  status: 'accepted' | 'rejected';
  reason: RejectionReason | null;
}

// =============================================================================
// PIPELINE STAGES (fixed order)
// =============================================================================

export type PipelineStage =
  | 'REPLAY'
  | 'FRESHNESS'
  | 'INTEGRITY'
  | 'KEY_LOOKUP'
  | 'SIGNATURE'
  | 'COMMIT';

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  'REPLAY',
  'FRESHNESS',
  'INTEGRITY',
  'KEY_LOOKUP',
  'SIGNATURE',
  'COMMIT',
];

// =============================================================================
// STAGE OUTCOMES
// =============================================================================

export type ClaimResult =
  | { type: 'CLAIMED'; ttlApplied: boolean }
  | { type: 'ALREADY_CLAIMED' }
  | { type: 'STORE_UNAVAILABLE'; error: Error };

export type FreshnessResult =
  | { type: 'FRESH' }
  | { type: 'TOO_FAR_FUTURE'; aheadBy: number }
  | { type: 'TOO_STALE'; age: number };

export type IntegrityResult =
  | { type: 'MATCH' }
  | { type: 'MISMATCH'; computed: string };

export type KeyLookupResult =
  | { type: 'FOUND'; publicKey: Uint8Array }
  | { type: 'NOT_FOUND' }
  | { type: 'INVALID_KEY' }   // stored text is not hex
  | { type: 'BAD_KEY' }       // decodes, but is not an Ed25519 point
  | { type: 'STORE_ERROR'; error: Error };

export type SignatureResult =
  | { type: 'VALID' }
  | { type: 'INVALID' }
  | { type: 'MALFORMED'; reason: 'bad_signature' | 'signature_parse_error' };

export type CommitResult =
  | { type: 'COMMITTED'; recordId: string }
  | { type: 'STORE_ERROR'; error: Error };

// =============================================================================
// RECORDS (persisted)
// =============================================================================

export interface MinerRecord {
  miner_id: number;
  public_key: string;         // hex
}

export interface LedgerRecord {
  id: string;                 // UUID v4
  task_id: string;
  miner_id: number;
  performance: number;
  hyperparameters: JsonValue;
  artifact_hash: string;
  timestamp: number;          // Unix seconds; stored as timestamptz
}

export interface TaskDescriptor {
  task_id: string;
  performance_threshold: number;
  validation_data_hash: string;
}

// =============================================================================
// DEFAULTS
// =============================================================================

export interface VerificationWindows {
  maxSkewSeconds: number;
  maxAgeSeconds: number;
  replayTtlSeconds: number;
}

export const DEFAULT_VERIFICATION_WINDOWS: VerificationWindows = {
  maxSkewSeconds: 60,
  maxAgeSeconds: 300,
  replayTtlSeconds: 300,
};

/**
 * Seconds since the Unix epoch.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
