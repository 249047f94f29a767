import { z } from 'zod';
import { hexToBytes } from '@noble/hashes/utils';

/** Hex byte string, with or without a 0x prefix */
export const HexBytes = z
  .string()
  .regex(/^(0x)?([0-9a-fA-F]{2})*$/, 'Expected an even-length hex string')
  .transform((v) => hexToBytes(v.startsWith('0x') ? v.slice(2) : v));

/** Unsigned integer sent as a decimal string (or a safe JSON number) */
export const UnsignedInteger = z
  .union([z.string().regex(/^\d+$/, 'Expected a decimal integer string'), z.number().int().nonnegative().safe()])
  .transform((v) => BigInt(v));

export const RegisterEnclaveSchema = z.object({
  publicKey: HexBytes.optional(),
  pcrs: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      value: HexBytes,
    }),
  ),
});

export const ExpectedPcrsSchema = z.object({
  pcr0: HexBytes,
  pcr1: HexBytes,
  pcr2: HexBytes,
  pcr16: HexBytes,
});

export const PriceUpdateSchema = z.object({
  enclavePublicKey: HexBytes,
  price: UnsignedInteger,
  timestampMs: UnsignedInteger,
  signature: HexBytes,
});

export const EventTypeSchema = z
  .enum(['oracle-created', 'registry-entry-created', 'expected-pcrs-changed', 'price-updated'])
  .optional();
