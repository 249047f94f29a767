import type { PublicKey } from './keys.js';

/** The four code measurements an oracle pins, by PCR index */
export interface PcrQuadruple {
  /** Enclave image file */
  readonly pcr0: Uint8Array;
  /** Kernel and bootstrap */
  readonly pcr1: Uint8Array;
  /** Application */
  readonly pcr2: Uint8Array;
  readonly pcr16: Uint8Array;
}

export type PcrField = keyof PcrQuadruple;

export const PCR_INDICES: Readonly<Record<PcrField, number>> = {
  pcr0: 0,
  pcr1: 1,
  pcr2: 2,
  pcr16: 16,
};

/** PCR values are SHA-384 digests */
export const PCR_LENGTH = 48;

export interface PcrEntry {
  readonly index: number;
  readonly value: Uint8Array;
}

/**
 * An attestation document whose certificate chain and signature were already
 * checked by the host before it reaches the registry.
 */
export interface VerifiedAttestationDocument {
  publicKey(): Uint8Array | undefined;
  pcrs(): readonly PcrEntry[];
}

export interface RegistryEntry {
  readonly publicKey: PublicKey;
  readonly pcrs: PcrQuadruple;
  readonly registeredAt: number;
}

/** Read side of the registry, as the trust gate sees it */
export interface RegistryReader {
  findPcrs(publicKey: Uint8Array): PcrQuadruple | undefined;
}
