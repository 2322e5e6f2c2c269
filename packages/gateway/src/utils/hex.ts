import { hexToBytes } from '@noble/hashes/utils';

/**
 * Strict hex decoding. Returns null on odd length or any non-hex character.
 */
export function decodeHex(value: string): Uint8Array | null {
  try {
    return hexToBytes(value);
  } catch {
    return null;
  }
}
