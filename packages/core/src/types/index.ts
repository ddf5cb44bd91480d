import type { Logger, Verbosity } from '../util/logger.js';

/* ------------------------- Source contract --------------------------- */
/**
 * Seekable, read-only, synchronous byte source.
 *
 * `read` may return fewer than `count` bytes even when more data follows
 * (short read). `0` means nothing more is available at the current position.
 */
export interface RangeByteSource {
  read(buffer: Uint8Array, offset: number, count: number): number;
  /** Absolute byte offset of the next read. */
  position: number;
  /** False once the source is closed or disposed. */
  readonly isReadable: boolean;
  /** Total size, when the source knows it. */
  readonly length?: number;
}

/* ------------------------- Read strategies --------------------------- */
export interface ReadStrategy {
  readonly name: string;
  /**
   * Read up to `count` bytes from the source's current position into
   * `target[offset…]`. Returns the number of bytes filled.
   */
  fill(
    source: RangeByteSource,
    target: Uint8Array,
    offset: number,
    count : number,
    log   : Logger,
  ): number;
}

export type StrategyName = 'single' | 'accumulate';

/**
 * What happens when a source is exhausted before the range is filled:
 * `strict` throws IncompleteRangeError, `short` returns only the bytes read.
 */
export type CompletionMode = 'strict' | 'short';

/* ------------------------- Buffer options ---------------------------- */
export interface LazyRangeBufferOptions {
  /** Registered strategy name (built-ins: StrategyName); defaults to `accumulate` */
  strategy?   : string;
  /** Completion mode; defaults to `strict` */
  completion? : CompletionMode;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?    : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?     : (msg: string) => void;
}
