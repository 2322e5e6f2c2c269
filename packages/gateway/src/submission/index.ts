/**
 * Submission Verification
 *
 * Intake gate for miner performance claims.
 *
 * Implements:
 * - Payload decoding over the exact received bytes
 * - Replay suppression keyed on the signature
 * - Timestamp freshness
 * - Artifact digest binding
 * - Ed25519 authenticity against the registered miner key
 * - At-most-once ledger commit
 *
 * Design invariants:
 * - Stage order is fixed: cheap checks first, no durable write before
 *   authenticity is proven
 * - Rejections are values, never thrown
 */

// Type-only exports
export type {
  JsonValue,
  SubmissionPayload,
  SubmissionEnvelope,
  RejectionReason,
  SubmissionDecision,
  SubmissionResponse,
  PipelineStage,
  ClaimResult,
  FreshnessResult,
  IntegrityResult,
  KeyLookupResult,
  SignatureResult,
  CommitResult,
  MinerRecord,
  LedgerRecord,
  TaskDescriptor,
  VerificationWindows,
  Clock,
} from './types.js';

// Value exports from types
export { PIPELINE_STAGES, DEFAULT_VERIFICATION_WINDOWS, systemClock } from './types.js';

// Stores
export type { ReplayStore, MinerKeyStore, LedgerStore } from './persistence.js';
export { InMemoryReplayStore, InMemoryMinerKeyStore, InMemoryLedgerStore } from './persistence.js';

// Stages
export { decodePayload, PayloadError, MAX_HYPERPARAMETERS_DEPTH } from './payload.js';
export type { DecodePayloadResult } from './payload.js';
export { ReplayGuard, replayTokenFor, REPLAY_KEY_PREFIX } from './replay-guard.js';
export { FreshnessChecker } from './freshness.js';
export { IntegrityChecker, computeArtifactDigest } from './integrity.js';
export { KeyDirectory } from './key-directory.js';
export {
  SignatureVerifier,
  isValidPublicKey,
  generateMinerKeypair,
  keypairFromPrivateKey,
  signPayload,
  PUBLIC_KEY_LENGTH,
  SIGNATURE_LENGTH,
} from './signature.js';
export type { MinerKeypair } from './signature.js';
export { LedgerWriter } from './ledger.js';

// Pipeline
export { SubmissionPipeline, createPipelineContext } from './pipeline.js';
export type {
  PipelineContext,
  PipelineEvent,
  PipelineEventListener,
  RejectionDetail,
} from './pipeline.js';
