// packages/node-runtime/src/index.ts
import { LazyRangeBuffer } from '../../core/src/index.js';
import type { LazyRangeBufferOptions } from '../../core/src/index.js';
import { FileRangeSource, type FileRangeSourceOptions } from './FileRangeSource.js';

/**
 * Describe `size` bytes at `position` of an already opened file.
 * No I/O happens until the returned buffer is read.
 */
export function fileRange(
  source  : FileRangeSource,
  position: number,
  size    : number,
  cfg?    : LazyRangeBufferOptions,
): LazyRangeBuffer {
  return new LazyRangeBuffer(source, position, size, cfg);
}

export { FileRangeSource, type FileRangeSourceOptions };
export * from '../../core/src/index.js';
