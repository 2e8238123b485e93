import { describe, it, expect } from 'vitest';
import { alignedLength, concatBytes, padTo32, padding, paddingFor } from './align.js';

describe('alignment', () => {
  it('should pad lengths up to the next 32-byte boundary', () => {
    expect(paddingFor(0)).toBe(0);
    expect(paddingFor(1)).toBe(31);
    expect(paddingFor(32)).toBe(0);
    expect(paddingFor(33)).toBe(31);
    expect(paddingFor(52)).toBe(12);
    expect(alignedLength(88)).toBe(96);
    expect(alignedLength(96)).toBe(96);
  });

  it('should honour a custom boundary', () => {
    expect(paddingFor(5, 4)).toBe(3);
    expect(alignedLength(8, 4)).toBe(8);
  });

  it('should fill with 0xFF', () => {
    const padded = padTo32(new Uint8Array([1, 2, 3]));

    expect(padded.length).toBe(32);
    expect(Array.from(padded.subarray(0, 3))).toEqual([1, 2, 3]);
    expect(padded.subarray(3).every(byte => byte === 0xFF)).toBe(true);
    expect(Array.from(padding(30))).toEqual([0xFF, 0xFF]);
  });

  it('should leave aligned data the same length', () => {
    const data = new Uint8Array(64).fill(7);
    expect(padTo32(data)).toEqual(data);
    expect(padding(64).length).toBe(0);
  });

  it('should concatenate in order', () => {
    const joined = concatBytes([new Uint8Array([1]), new Uint8Array(0), new Uint8Array([2, 3])]);
    expect(Array.from(joined)).toEqual([1, 2, 3]);
  });
});
