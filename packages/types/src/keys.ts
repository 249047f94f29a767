import { bytesToHex } from '@noble/hashes/utils';

/**
 * Canonical enclave public key: 33-byte compressed secp256k1 or a 32-byte raw
 * key of another scheme. Only produced by the key normalizer.
 */
export type PublicKey = Uint8Array & { readonly __brand: 'PublicKey' };

export function createPublicKey(bytes: Uint8Array): PublicKey {
  return bytes as PublicKey;
}

export const RAW_KEY_LENGTH = 32;
export const COMPRESSED_KEY_LENGTH = 33;
export const UNCOMPRESSED_XY_LENGTH = 64;
export const UNCOMPRESSED_KEY_LENGTH = 65;

/** Lowercase hex form, used as the registry map key */
export function publicKeyToHex(key: Uint8Array): string {
  return bytesToHex(key);
}
