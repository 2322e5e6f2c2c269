/**
 * Ed25519 signatures over the exact payload bytes.
 *
 * Verification never sees a parsed-and-reserialized payload: JSON
 * serialization is not byte-stable, so the signer's bytes are the only
 * message that can be checked.
 */

import * as ed from '@noble/ed25519';
import { bytesToHex } from '@noble/hashes/utils';
import { SignatureResult } from './types.js';
import { decodeHex } from '../utils/index.js';

export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

/**
 * True if the bytes are a 32-byte encoding of a point on the curve.
 */
export function isValidPublicKey(bytes: Uint8Array): boolean {
  if (bytes.length !== PUBLIC_KEY_LENGTH) return false;
  try {
    ed.ExtendedPoint.fromHex(bytes, false);
    return true;
  } catch {
    return false;
  }
}

export class SignatureVerifier {
  async verify(
    message: Uint8Array,
    signatureHex: string,
    publicKey: Uint8Array
  ): Promise<SignatureResult> {
    const signature = decodeHex(signatureHex);
    if (!signature) {
      return { type: 'MALFORMED', reason: 'bad_signature' };
    }
    if (signature.length !== SIGNATURE_LENGTH) {
      return { type: 'MALFORMED', reason: 'signature_parse_error' };
    }

    try {
      const ok = await ed.verifyAsync(signature, Uint8Array.from(message), publicKey);
      return ok ? { type: 'VALID' } : { type: 'INVALID' };
    } catch {
      // noble throws on inputs it cannot parse rather than returning false
      return { type: 'INVALID' };
    }
  }
}

// =============================================================================
// SIGNER SIDE (miner tooling, tests)
// =============================================================================

export interface MinerKeypair {
  privateKey: Uint8Array;
  publicKey: Uint8Array;
  publicKeyHex: string;
}

export async function generateMinerKeypair(): Promise<MinerKeypair> {
  const privateKey = ed.utils.randomPrivateKey();
  return keypairFromPrivateKey(privateKey);
}

export async function keypairFromPrivateKey(privateKey: Uint8Array): Promise<MinerKeypair> {
  const publicKey = await ed.getPublicKeyAsync(privateKey);
  return { privateKey, publicKey, publicKeyHex: bytesToHex(publicKey) };
}

/**
 * Sign the payload bytes exactly as they will be sent. Returns lowercase hex.
 */
export async function signPayload(payloadBytes: Uint8Array, privateKey: Uint8Array): Promise<string> {
  const signature = await ed.signAsync(Uint8Array.from(payloadBytes), privateKey);
  return bytesToHex(signature);
}
