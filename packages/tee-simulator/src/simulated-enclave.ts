import { secp256k1 } from '@noble/curves/secp256k1';
import type { PcrEntry, PcrQuadruple, SignedPriceReport } from '@epo/types';
import { PCR_INDICES, PRICE_INTENT_SCOPE } from '@epo/types';
import { intentDigest, type IEnclaveSigner } from '@epo/tee-core';
import { SimulatedAttestationDocument } from './simulated-attestation.js';
import { DEFAULT_MEASUREMENT, simulatePcrs } from './measurement.js';

/** How the enclave reports its public key in attestation documents */
export type KeyEncoding = 'compressed' | 'uncompressed' | 'uncompressed-xy';

export interface SimulatedEnclaveOptions {
  /** Label of the simulated image; enclaves with the same label share PCRs */
  measurement?: string;
  /** 32-byte secp256k1 private key; random when omitted */
  privateKey?: Uint8Array;
  keyEncoding?: KeyEncoding;
}

/**
 * Simulated price-signing enclave for development and testing.
 * Holds a secp256k1 key in process memory and signs prices the way a real
 * enclave does.
 */
export class SimulatedEnclave implements IEnclaveSigner {
  readonly measurement: string;
  private readonly privateKey: Uint8Array;
  private readonly keyEncoding: KeyEncoding;
  private readonly pcrEntries: PcrEntry[];
  private destroyed = false;

  constructor(options: SimulatedEnclaveOptions = {}) {
    this.measurement = options.measurement ?? DEFAULT_MEASUREMENT;
    this.privateKey = options.privateKey?.slice() ?? secp256k1.utils.randomPrivateKey();
    this.keyEncoding = options.keyEncoding ?? 'compressed';
    this.pcrEntries = simulatePcrs(this.measurement);
  }

  getPublicKey(): Uint8Array {
    this.assertAlive();
    switch (this.keyEncoding) {
      case 'compressed':
        return secp256k1.getPublicKey(this.privateKey, true);
      case 'uncompressed':
        return secp256k1.getPublicKey(this.privateKey, false);
      case 'uncompressed-xy':
        return secp256k1.getPublicKey(this.privateKey, false).slice(1);
    }
  }

  /** Canonical 33-byte compressed key, as the registry stores it */
  getCompressedPublicKey(): Uint8Array {
    this.assertAlive();
    return secp256k1.getPublicKey(this.privateKey, true);
  }

  getAttestationDocument(): SimulatedAttestationDocument {
    return new SimulatedAttestationDocument(this.getPublicKey(), this.pcrEntries);
  }

  /** PCRs 0, 1, 2 and 16 of this enclave, for configuring an oracle */
  getPcrs(): PcrQuadruple {
    const valueAt = (index: number) =>
      this.pcrEntries.find((entry) => entry.index === index)?.value.slice() ?? new Uint8Array(0);

    return {
      pcr0: valueAt(PCR_INDICES.pcr0),
      pcr1: valueAt(PCR_INDICES.pcr1),
      pcr2: valueAt(PCR_INDICES.pcr2),
      pcr16: valueAt(PCR_INDICES.pcr16),
    };
  }

  signPrice(price: bigint, timestampMs: bigint): SignedPriceReport {
    this.assertAlive();
    const digest = intentDigest(PRICE_INTENT_SCOPE, timestampMs, { price });
    const signature = secp256k1.sign(digest, this.privateKey).toCompactRawBytes();
    return { price, timestampMs, signature };
  }

  /** Wipe the signing key; the enclave is unusable afterwards */
  destroy(): void {
    this.privateKey.fill(0);
    this.destroyed = true;
  }

  private assertAlive(): void {
    if (this.destroyed) {
      throw new Error('Simulated enclave has been destroyed');
    }
  }
}
