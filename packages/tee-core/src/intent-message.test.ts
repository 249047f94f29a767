import { describe, it, expect } from 'vitest';
import { bytesToHex } from '@noble/hashes/utils';
import { isOracleError } from '@epo/types';
import { serializeIntentMessage, PRICE_INTENT_MESSAGE_LENGTH } from './intent-message.js';

describe('serializeIntentMessage', () => {
  it('should lay out u8 scope then little-endian u64 timestamp and price', () => {
    const bytes = serializeIntentMessage({
      intentScope: 0,
      timestampMs: 1700000000000n,
      payload: { price: 1250000n },
    });

    expect(bytes.length).toBe(PRICE_INTENT_MESSAGE_LENGTH);
    expect(bytesToHex(bytes)).toBe('000068e5cf8b010000d012130000000000');
  });

  it('should encode the scope byte first', () => {
    const bytes = serializeIntentMessage({
      intentScope: 7,
      timestampMs: 1n,
      payload: { price: 2n },
    });

    expect(bytesToHex(bytes)).toBe('070100000000000000' + '0200000000000000');
  });

  it('should encode u64 maximum values', () => {
    const max = (1n << 64n) - 1n;
    const bytes = serializeIntentMessage({
      intentScope: 255,
      timestampMs: max,
      payload: { price: max },
    });

    expect(bytes.every((b) => b === 0xff)).toBe(true);
  });

  it('should reject values outside u64', () => {
    const overflow = () =>
      serializeIntentMessage({ intentScope: 0, timestampMs: 1n << 64n, payload: { price: 1n } });
    const negative = () =>
      serializeIntentMessage({ intentScope: 0, timestampMs: 1n, payload: { price: -1n } });

    expect(overflow).toThrow('timestampMs must be a u64');
    expect(negative).toThrow('price must be a u64');
  });

  it('should reject a scope that is not a u8', () => {
    try {
      serializeIntentMessage({ intentScope: 256, timestampMs: 1n, payload: { price: 1n } });
      expect.unreachable();
    } catch (err) {
      expect(isOracleError(err, 'ValueOutOfRange')).toBe(true);
    }
  });
});
