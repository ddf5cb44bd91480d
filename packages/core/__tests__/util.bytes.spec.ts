import {
  base64Encode,
  concat,
  hexEncode,
} from '../src/util/bytes.js';

describe('util/bytes helpers', () => {
  const a = new Uint8Array([1, 2, 3]);
  const b = new Uint8Array([4, 5]);

  it('concats arbitrary Uint8Arrays', () => {
    expect(Array.from(concat(a, b))).toEqual([1, 2, 3, 4, 5]);
  });

  it('base64-encodes several chunks as one', () => {
    expect(base64Encode(a, b)).toBe('AQIDBAU=');
  });

  it('base64-encodes a view into a larger buffer by its own bytes only', () => {
    const view = new Uint8Array([9, 9, 1, 2, 3, 9]).subarray(2, 5);
    expect(base64Encode(view)).toBe('AQID');
  });

  it('hex-encodes with zero padding', () => {
    expect(hexEncode(new Uint8Array([0, 15, 16, 255]))).toBe('000f10ff');
  });
});
