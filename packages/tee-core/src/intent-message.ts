import type { IntentMessage, PriceUpdatePayload } from '@epo/types';
import { OracleError } from '@epo/types';

/**
 * Canonical byte layout of a signed price update, shared by every enclave
 * signer and the oracle verifier:
 *
 *   intentScope  u8
 *   timestampMs  u64 little-endian
 *   price        u64 little-endian
 *
 * Fields in declared order, no padding, no length prefixes. Any change here
 * invalidates every signature already issued and must bump the version.
 */
export const INTENT_MESSAGE_LAYOUT_VERSION = 1;

export const PRICE_INTENT_MESSAGE_LENGTH = 1 + 8 + 8;

const U8_MAX = 0xff;
const U64_MAX = (1n << 64n) - 1n;

export function assertU8(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > U8_MAX) {
    throw new OracleError('ValueOutOfRange', `${field} must be a u8, got ${value}`);
  }
}

export function assertU64(value: bigint, field: string): void {
  if (value < 0n || value > U64_MAX) {
    throw new OracleError('ValueOutOfRange', `${field} must be a u64, got ${value}`);
  }
}

export function serializeIntentMessage(
  message: IntentMessage<PriceUpdatePayload>,
): Uint8Array {
  assertU8(message.intentScope, 'intentScope');
  assertU64(message.timestampMs, 'timestampMs');
  assertU64(message.payload.price, 'price');

  const bytes = new Uint8Array(PRICE_INTENT_MESSAGE_LENGTH);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, message.intentScope);
  view.setBigUint64(1, message.timestampMs, true);
  view.setBigUint64(9, message.payload.price, true);
  return bytes;
}
