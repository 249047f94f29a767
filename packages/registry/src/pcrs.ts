import { bytesToHex } from '@noble/hashes/utils';
import type { HexPcrs, PcrEntry, PcrField, PcrQuadruple } from '@epo/types';
import { PCR_INDICES, PCR_LENGTH } from '@epo/types';

const PCR_FIELDS: readonly PcrField[] = ['pcr0', 'pcr1', 'pcr2', 'pcr16'];

/** All-zero placeholder an oracle holds before it is configured */
export function zeroPcrs(): PcrQuadruple {
  return {
    pcr0: new Uint8Array(PCR_LENGTH),
    pcr1: new Uint8Array(PCR_LENGTH),
    pcr2: new Uint8Array(PCR_LENGTH),
    pcr16: new Uint8Array(PCR_LENGTH),
  };
}

/**
 * Pick PCRs 0, 1, 2 and 16 out of an attestation document's PCR list.
 * Absent indices become empty; a repeated index keeps its first value.
 */
export function pcrsFromEntries(entries: readonly PcrEntry[]): PcrQuadruple {
  const byIndex = new Map<number, Uint8Array>();
  for (const entry of entries) {
    if (!byIndex.has(entry.index)) {
      byIndex.set(entry.index, entry.value);
    }
  }

  const pick = (field: PcrField) => (byIndex.get(PCR_INDICES[field]) ?? new Uint8Array(0)).slice();

  return {
    pcr0: pick('pcr0'),
    pcr1: pick('pcr1'),
    pcr2: pick('pcr2'),
    pcr16: pick('pcr16'),
  };
}

export function copyPcrs(pcrs: PcrQuadruple): PcrQuadruple {
  return {
    pcr0: pcrs.pcr0.slice(),
    pcr1: pcrs.pcr1.slice(),
    pcr2: pcrs.pcr2.slice(),
    pcr16: pcrs.pcr16.slice(),
  };
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Exact equality over all four fields */
export function pcrsEqual(a: PcrQuadruple, b: PcrQuadruple): boolean {
  return PCR_FIELDS.every((field) => bytesEqual(a[field], b[field]));
}

/** Fields whose values differ, in index order */
export function diffPcrs(a: PcrQuadruple, b: PcrQuadruple): PcrField[] {
  return PCR_FIELDS.filter((field) => !bytesEqual(a[field], b[field]));
}

export function pcrsToHex(pcrs: PcrQuadruple): HexPcrs {
  return {
    pcr0: bytesToHex(pcrs.pcr0),
    pcr1: bytesToHex(pcrs.pcr1),
    pcr2: bytesToHex(pcrs.pcr2),
    pcr16: bytesToHex(pcrs.pcr16),
  };
}
