/**
 * ReplayGuard
 *
 * Claims a single-use token derived from the submission signature. Runs first
 * in the pipeline so a replayed request never reaches signature verification.
 *
 * Two cache operations: SET NX, then EXPIRE. Only the first decides the claim.
 * If EXPIRE fails the token lives until evicted, which errs towards rejecting
 * more, so it is logged and the claim stands.
 */

import { ReplayStore } from './persistence.js';
import { ClaimResult } from './types.js';
import type { Logger } from '../utils/index.js';

export const REPLAY_KEY_PREFIX = 'nonce:';

/**
 * Hex case does not change the signature bytes, so it must not change the token.
 */
export function replayTokenFor(signatureHex: string): string {
  return REPLAY_KEY_PREFIX + signatureHex.toLowerCase();
}

export class ReplayGuard {
  private store: ReplayStore;
  private ttlSeconds: number;
  private logger: Logger;

  constructor(store: ReplayStore, ttlSeconds: number, logger: Logger) {
    this.store = store;
    this.ttlSeconds = ttlSeconds;
    this.logger = logger;
  }

  async claim(token: string): Promise<ClaimResult> {
    let created: boolean;
    try {
      created = await this.store.setIfAbsent(token);
    } catch (err) {
      return { type: 'STORE_UNAVAILABLE', error: toError(err) };
    }

    if (!created) {
      return { type: 'ALREADY_CLAIMED' };
    }

    try {
      await this.store.expire(token, this.ttlSeconds);
      return { type: 'CLAIMED', ttlApplied: true };
    } catch (err) {
      this.logger.warn(
        { token, ttlSeconds: this.ttlSeconds, error: toError(err) },
        'Replay token claimed but expiry not set'
      );
      return { type: 'CLAIMED', ttlApplied: false };
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
