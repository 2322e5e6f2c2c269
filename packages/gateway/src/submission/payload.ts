/**
 * Payload decoding.
 *
 * Turns the received payload bytes into a typed SubmissionPayload. The bytes
 * themselves are kept by the caller for signature verification; nothing here
 * re-serializes them.
 */

import { JsonValue, SubmissionPayload } from './types.js';

export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadError';
  }
}

export type DecodePayloadResult =
  | { type: 'OK'; payload: SubmissionPayload }
  | { type: 'INVALID'; error: PayloadError };

function requireString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new PayloadError(`${fieldName} must be a string`);
  }
  return value;
}

function requireInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new PayloadError(`${fieldName} must be an integer`);
  }
  return value;
}

/**
 * Above 2^53 the parsed number is no longer the one in the signed text.
 */
function requireSafeInteger(value: unknown, fieldName: string): number {
  const n = requireInteger(value, fieldName);
  if (!Number.isSafeInteger(n)) {
    throw new PayloadError(`${fieldName} is out of range`);
  }
  return n;
}

function requireNonNegativeInteger(value: unknown, fieldName: string): number {
  const n = requireInteger(value, fieldName);
  if (n < 0) {
    throw new PayloadError(`${fieldName} must be a non-negative integer`);
  }
  return n;
}

function requireFiniteNumber(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new PayloadError(`${fieldName} must be a number`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const MAX_HYPERPARAMETERS_DEPTH = 64;

/**
 * Iterative walk over a parsed JSON value. Returns false past `maxDepth`
 * levels of nesting.
 */
function isJsonValue(value: unknown, maxDepth: number): value is JsonValue {
  const pending: Array<{ node: unknown; depth: number }> = [{ node: value, depth: 0 }];

  for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
    const { node, depth } = item;
    if (node === null) continue;
    switch (typeof node) {
      case 'string':
      case 'number':
      case 'boolean':
        continue;
      case 'object': {
        if (depth >= maxDepth) return false;
        const children = Array.isArray(node) ? node : Object.values(node);
        for (const child of children) {
          pending.push({ node: child, depth: depth + 1 });
        }
        continue;
      }
      default:
        return false;
    }
  }
  return true;
}

export function decodePayload(bytes: Buffer): DecodePayloadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytes.toString('utf8'));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { type: 'INVALID', error: new PayloadError(`payload is not valid JSON: ${detail}`) };
  }

  try {
    if (!isRecord(parsed)) {
      throw new PayloadError('payload must be a JSON object');
    }
    if (!('hyperparameters' in parsed)) {
      throw new PayloadError('hyperparameters must be present');
    }
    if (!isJsonValue(parsed.hyperparameters, MAX_HYPERPARAMETERS_DEPTH)) {
      throw new PayloadError(`hyperparameters nested deeper than ${MAX_HYPERPARAMETERS_DEPTH} levels`);
    }

    const payload: SubmissionPayload = {
      task_id: requireString(parsed.task_id, 'task_id'),
      miner_id: requireSafeInteger(parsed.miner_id, 'miner_id'),
      performance: requireFiniteNumber(parsed.performance, 'performance'),
      artifact_hash: requireString(parsed.artifact_hash, 'artifact_hash'),
      hyperparameters: parsed.hyperparameters,
      timestamp: requireNonNegativeInteger(requireSafeInteger(parsed.timestamp, 'timestamp'), 'timestamp'),
      nonce: requireNonNegativeInteger(parsed.nonce, 'nonce'),
    };
    return { type: 'OK', payload };
  } catch (err) {
    if (err instanceof PayloadError) {
      return { type: 'INVALID', error: err };
    }
    const detail = err instanceof Error ? err.message : String(err);
    return { type: 'INVALID', error: new PayloadError(`payload could not be decoded: ${detail}`) };
  }
}
