import { MinerKeyStore } from './persistence.js';
import { KeyLookupResult } from './types.js';
import { isValidPublicKey } from './signature.js';
import { decodeHex } from '../utils/index.js';

/**
 * Resolves a miner id to its registered Ed25519 key. Every failure mode is an
 * outcome, none escape as a throw.
 */
export class KeyDirectory {
  private store: MinerKeyStore;

  constructor(store: MinerKeyStore) {
    this.store = store;
  }

  async lookup(minerId: number): Promise<KeyLookupResult> {
    let publicKeyHex: string | null;
    try {
      publicKeyHex = await this.store.findPublicKey(minerId);
    } catch (err) {
      return { type: 'STORE_ERROR', error: err instanceof Error ? err : new Error(String(err)) };
    }

    if (publicKeyHex === null) {
      return { type: 'NOT_FOUND' };
    }

    const publicKey = decodeHex(publicKeyHex);
    if (!publicKey) {
      return { type: 'INVALID_KEY' };
    }
    if (!isValidPublicKey(publicKey)) {
      return { type: 'BAD_KEY' };
    }

    return { type: 'FOUND', publicKey };
  }
}
