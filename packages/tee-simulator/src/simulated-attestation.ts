import type { PcrEntry, VerifiedAttestationDocument } from '@epo/types';

/**
 * Stand-in for an attestation document the host has already verified.
 * Hands out copies so callers cannot alter it after the fact.
 */
export class SimulatedAttestationDocument implements VerifiedAttestationDocument {
  private readonly key?: Uint8Array;
  private readonly pcrEntries: readonly PcrEntry[];

  constructor(publicKey: Uint8Array | undefined, pcrs: readonly PcrEntry[]) {
    this.key = publicKey?.slice();
    this.pcrEntries = pcrs.map((entry) => ({ index: entry.index, value: entry.value.slice() }));
  }

  publicKey(): Uint8Array | undefined {
    return this.key?.slice();
  }

  pcrs(): readonly PcrEntry[] {
    return this.pcrEntries.map((entry) => ({ index: entry.index, value: entry.value.slice() }));
  }
}
