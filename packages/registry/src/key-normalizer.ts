import type { PublicKey } from '@epo/types';
import {
  OracleError,
  createPublicKey,
  RAW_KEY_LENGTH,
  COMPRESSED_KEY_LENGTH,
  UNCOMPRESSED_XY_LENGTH,
  UNCOMPRESSED_KEY_LENGTH,
} from '@epo/types';

const UNCOMPRESSED_PREFIX = 0x04;
const EVEN_Y_PREFIX = 0x02;
const ODD_Y_PREFIX = 0x03;

/**
 * Canonicalize a public key as emitted by an attestation or signing stack.
 *
 *   65 bytes, 0x04 prefix  -> strip prefix, then compress
 *   64 bytes (X || Y)      -> 33-byte compressed, prefix from Y parity
 *   33 bytes, 0x02/0x03    -> unchanged
 *   32 bytes               -> unchanged (raw key of another scheme)
 *
 * No curve-membership check is made; an off-curve key fails later, at
 * signature verification.
 */
export function normalizePublicKey(raw: Uint8Array): PublicKey {
  let bytes = raw;

  if (bytes.length === UNCOMPRESSED_KEY_LENGTH) {
    if (bytes[0] !== UNCOMPRESSED_PREFIX) {
      throw new OracleError(
        'InvalidUncompressedPrefix',
        `65-byte key must start with 0x04, got 0x${hexByte(bytes[0])}`,
      );
    }
    bytes = bytes.subarray(1);
  }

  switch (bytes.length) {
    case UNCOMPRESSED_XY_LENGTH:
      return compress(bytes);
    case COMPRESSED_KEY_LENGTH: {
      const prefix = bytes[0];
      if (prefix !== EVEN_Y_PREFIX && prefix !== ODD_Y_PREFIX) {
        throw new OracleError(
          'InvalidCompressedPrefix',
          `33-byte key must start with 0x02 or 0x03, got 0x${hexByte(prefix)}`,
        );
      }
      return createPublicKey(bytes.slice());
    }
    case RAW_KEY_LENGTH:
      return createPublicKey(bytes.slice());
    default:
      throw new OracleError(
        'InvalidPublicKeyLength',
        `Unsupported public key length: ${raw.length} bytes`,
      );
  }
}

function compress(xy: Uint8Array): PublicKey {
  const lastY = xy[UNCOMPRESSED_XY_LENGTH - 1] ?? 0;
  const out = new Uint8Array(COMPRESSED_KEY_LENGTH);
  out[0] = lastY % 2 === 0 ? EVEN_Y_PREFIX : ODD_Y_PREFIX;
  out.set(xy.subarray(0, 32), 1);
  return createPublicKey(out);
}

function hexByte(value: number | undefined): string {
  return (value ?? 0).toString(16).padStart(2, '0');
}
