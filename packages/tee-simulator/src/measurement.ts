import { sha384 } from '@noble/hashes/sha512';
import type { PcrEntry } from '@epo/types';

/** PCR indices a Nitro-style enclave reports */
export const SIMULATED_PCR_INDICES: readonly number[] = [0, 1, 2, 3, 4, 8, 16];

/** Image label used when an enclave is created without one */
export const DEFAULT_MEASUREMENT = 'simulated-enclave';

/**
 * Derive one 48-byte PCR value per index from a measurement string.
 * Same measurement, same PCRs.
 */
export function simulatePcrs(
  measurement: string,
  indices: readonly number[] = SIMULATED_PCR_INDICES,
): PcrEntry[] {
  return indices.map((index) => ({
    index,
    value: sha384(new TextEncoder().encode(`pcr${index}:${measurement}`)),
  }));
}
