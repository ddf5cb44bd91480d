import { InvalidRangeError } from '../errors/index.js';

function assertOffset(label: string, n: number): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new InvalidRangeError(`${label} must be a non-negative safe integer, got ${n}`);
  }
}

/** Validate a `(position, size)` pair describing a range in a source. */
export function assertRange(position: number, size: number): void {
  assertOffset('position', position);
  assertOffset('size', size);
  if (!Number.isSafeInteger(position + size)) {
    throw new InvalidRangeError('range end exceeds the safe integer limit');
  }
}

/** Validate `[offset, offset + len)` against a range of `total` bytes. */
export function assertSliceBounds(
  total: number,
  offset: number,
  len: number,
): void {
  assertOffset('offset', offset);
  assertOffset('count', len);
  if (offset + len > total) {
    throw new InvalidRangeError(
      `slice [${offset}, ${offset + len}) exceeds range of ${total} bytes`,
    );
  }
}

/** Per-read byte cap of a source: a positive integer, or unlimited. */
export function readCap(max: number = Number.POSITIVE_INFINITY): number {
  if (max === Number.POSITIVE_INFINITY || (Number.isSafeInteger(max) && max > 0)) return max;
  throw new InvalidRangeError(`maxReadSize must be a positive integer, got ${max}`);
}
