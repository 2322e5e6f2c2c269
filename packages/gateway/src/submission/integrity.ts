import { createHash } from 'node:crypto';
import { IntegrityResult } from './types.js';

/**
 * Lowercase hex SHA-256 over the full artifact.
 */
export function computeArtifactDigest(artifact: Uint8Array): string {
  return createHash('sha256').update(artifact).digest('hex');
}

/**
 * Binds the artifact to the signed payload. The claimed digest must equal the
 * lowercase encoding exactly; an uppercase claim is a mismatch.
 */
export class IntegrityChecker {
  verify(artifact: Uint8Array, claimedDigestHex: string): IntegrityResult {
    const computed = computeArtifactDigest(artifact);
    if (computed !== claimedDigestHex) {
      return { type: 'MISMATCH', computed };
    }
    return { type: 'MATCH' };
  }
}
