import { secp256k1 } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha256';
import type { PriceUpdatePayload } from '@epo/types';
import { serializeIntentMessage } from './intent-message.js';

export const COMPACT_SIGNATURE_LENGTH = 64;

/**
 * Digest an enclave signs for a price update: SHA-256 over the canonical
 * intent message.
 */
export function intentDigest(
  intentScope: number,
  timestampMs: bigint,
  payload: PriceUpdatePayload,
): Uint8Array {
  return sha256(serializeIntentMessage({ intentScope, timestampMs, payload }));
}

/**
 * Verifies compact (r || s) ECDSA-secp256k1 signatures over intent messages.
 *
 * Keys must be SEC1 points (33-byte compressed or 65-byte uncompressed); a
 * 32-byte key from another scheme is never valid here. Malformed input is
 * reported as an invalid signature, never thrown.
 */
export class SignatureVerifier {
  verify(
    signature: Uint8Array,
    publicKey: Uint8Array,
    intentScope: number,
    timestampMs: bigint,
    payload: PriceUpdatePayload,
  ): boolean {
    if (signature.length !== COMPACT_SIGNATURE_LENGTH) return false;
    if (publicKey.length !== 33 && publicKey.length !== 65) return false;

    let digest: Uint8Array;
    try {
      digest = intentDigest(intentScope, timestampMs, payload);
    } catch {
      // Out-of-range fields cannot have been signed
      return false;
    }

    try {
      // High-S signatures are accepted: not every enclave signer normalizes S
      return secp256k1.verify(signature, digest, publicKey, { lowS: false, format: 'compact' });
    } catch {
      // r or s out of range, or a key that is not a curve point
      return false;
    }
  }
}
