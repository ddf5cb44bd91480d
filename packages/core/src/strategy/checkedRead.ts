import type { RangeByteSource } from '../types/index.js';
import { SourceContractError } from '../errors/index.js';

/** Invoke `source.read` and enforce `0 <= bytesRead <= count`. */
export function checkedRead(
  source: RangeByteSource,
  target: Uint8Array,
  offset: number,
  count : number,
): number {
  const n = source.read(target, offset, count);
  if (!Number.isInteger(n) || n < 0 || n > count) {
    throw new SourceContractError(
      `source.read returned ${n} for a request of ${count} bytes`,
    );
  }
  return n;
}
