import { FreshnessResult } from './types.js';

/**
 * Bounded-skew, bounded-staleness timestamp check. Both bounds inclusive:
 * accept iff `claimed <= now + maxSkew` and `now - claimed <= maxAge`.
 */
export class FreshnessChecker {
  private maxSkewSeconds: number;
  private maxAgeSeconds: number;

  constructor(maxSkewSeconds: number, maxAgeSeconds: number) {
    this.maxSkewSeconds = maxSkewSeconds;
    this.maxAgeSeconds = maxAgeSeconds;
  }

  check(claimedTimestamp: number, now: number): FreshnessResult {
    if (claimedTimestamp > now + this.maxSkewSeconds) {
      return { type: 'TOO_FAR_FUTURE', aheadBy: claimedTimestamp - now };
    }
    const age = now - claimedTimestamp;
    if (age > this.maxAgeSeconds) {
      return { type: 'TOO_STALE', age };
    }
    return { type: 'FRESH' };
  }
}
