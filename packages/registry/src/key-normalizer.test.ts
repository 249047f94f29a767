import { describe, it, expect } from 'vitest';
import { isOracleError, type OracleErrorCode } from '@epo/types';
import { normalizePublicKey } from './key-normalizer.js';

function bytes(length: number, fill = 0xab): Uint8Array {
  return new Uint8Array(length).fill(fill);
}

function expectCode(fn: () => unknown, code: OracleErrorCode): void {
  try {
    fn();
    expect.unreachable(`expected ${code}`);
  } catch (err) {
    expect(isOracleError(err, code)).toBe(true);
  }
}

describe('normalizePublicKey', () => {
  it('should compress a 64-byte key with even final byte to prefix 0x02', () => {
    const xy = new Uint8Array(64);
    for (let i = 0; i < 64; i++) xy[i] = i;
    xy[63] = 0x10;

    const key = normalizePublicKey(xy);

    expect(key.length).toBe(33);
    expect(key[0]).toBe(0x02);
    expect(key.slice(1)).toEqual(xy.slice(0, 32));
  });

  it('should compress a 64-byte key with odd final byte to prefix 0x03', () => {
    const xy = bytes(64, 0x44);
    xy[63] = 0x11;

    const key = normalizePublicKey(xy);

    expect(key[0]).toBe(0x03);
    expect(key.slice(1)).toEqual(xy.slice(0, 32));
  });

  it('should strip the 0x04 prefix of a 65-byte key and compress', () => {
    const raw = bytes(65, 0x21);
    raw[0] = 0x04;
    raw[64] = 0x20;

    const key = normalizePublicKey(raw);

    expect(key.length).toBe(33);
    expect(key[0]).toBe(0x02);
    expect(key.slice(1)).toEqual(raw.slice(1, 33));
  });

  it('should pass compressed keys through unchanged', () => {
    const even = bytes(33);
    even[0] = 0x02;
    const odd = bytes(33);
    odd[0] = 0x03;

    expect(normalizePublicKey(even)).toEqual(even);
    expect(normalizePublicKey(odd)).toEqual(odd);
  });

  it('should pass 32-byte raw keys through unchanged', () => {
    const raw = bytes(32, 0x7f);

    expect(normalizePublicKey(raw)).toEqual(raw);
  });

  it('should not alias the input buffer', () => {
    const raw = bytes(33);
    raw[0] = 0x02;

    const key = normalizePublicKey(raw);
    raw[1] = 0x00;

    expect(key[1]).toBe(0xab);
  });

  it('should reject a compressed key with a bad prefix', () => {
    const raw = bytes(33);
    raw[0] = 0x04;

    expectCode(() => normalizePublicKey(raw), 'InvalidCompressedPrefix');
  });

  it('should reject a 65-byte key without the 0x04 prefix', () => {
    const raw = bytes(65);
    raw[0] = 0x02;

    expectCode(() => normalizePublicKey(raw), 'InvalidUncompressedPrefix');
  });

  it.each([0, 1, 31, 34, 63, 66, 128])('should reject length %i', (length) => {
    expectCode(() => normalizePublicKey(bytes(length, 0x02)), 'InvalidPublicKeyLength');
  });
});
