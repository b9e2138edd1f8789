import { describe, it, expect } from 'vitest';
import { decodeBase64Permissive, encodeBase64 } from '../src/base64.js';

const decoded = (value: string) => {
  const data = decodeBase64Permissive(value);
  return data === undefined ? undefined : new TextDecoder().decode(data);
};

describe('base64', () => {
  it('encodes bytes', () => {
    expect(encodeBase64(new TextEncoder().encode('BASE64'))).toBe('QkFTRTY0');
  });

  it('encodes a view into a larger buffer', () => {
    const backing = new TextEncoder().encode('xxspcxx');
    expect(encodeBase64(backing.subarray(2, 5))).toBe('c3Bj');
  });

  it('skips line breaks and indentation when decoding', () => {
    expect(decoded('  QkFT\r\n\tRTY0  ')).toBe('BASE64');
  });

  it('skips characters outside the standard alphabet', () => {
    expect(decoded('QkFT-RTY0')).toBe('BASE64');
    expect(decoded('Qk_FTRTY0')).toBe('BASE64');
  });

  it('decodes padded input', () => {
    expect(decoded('Y2s=')).toBe('ck');
  });

  it('decodes an empty payload to no bytes', () => {
    expect(decodeBase64Permissive('')?.length).toBe(0);
  });

  it('rejects padding in the middle', () => {
    expect(decodeBase64Permissive('QkFT=RTY0')).toBeUndefined();
  });

  it('rejects input that is not a whole number of quads', () => {
    expect(decodeBase64Permissive('QkFTRTY')).toBeUndefined();
  });
});
