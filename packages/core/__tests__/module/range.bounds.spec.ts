import { assertRange, assertSliceBounds } from '../../src/util/range.js';
import { InvalidRangeError } from '../../src/errors/index.js';

describe('range validation', () => {
  it('accepts empty and zero-based ranges', () => {
    expect(() => assertRange(0, 0)).not.toThrow();
    expect(() => assertSliceBounds(10, 10, 0)).not.toThrow();
  });

  it.each([
    [-1, 4],
    [0, -4],
    [0.5, 4],
    [0, Number.NaN],
    [Number.MAX_SAFE_INTEGER, 1],
  ])('rejects position=%s size=%s', (position, size) => {
    expect(() => assertRange(position, size)).toThrow(InvalidRangeError);
  });

  it('rejects slices running past the range', () => {
    expect(() => assertSliceBounds(10, 8, 3))
      .toThrow('slice [8, 11) exceeds range of 10 bytes');
  });
});
