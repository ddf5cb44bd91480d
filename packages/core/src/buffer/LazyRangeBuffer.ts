// packages/core/src/buffer/LazyRangeBuffer.ts
import { DEFAULT_COMPLETION, DEFAULT_STRATEGY, isCompletionMode } from '../config/defaults.js';
import { StrategyRegistry } from '../config/StrategyRegistry.js';
import {
  ConfigurationError,
  IncompleteRangeError,
  SourceUnavailableError,
} from '../errors/index.js';
import { createLogger, type Logger } from '../util/logger.js';
import { assertRange, assertSliceBounds } from '../util/range.js';
import type {
  CompletionMode,
  LazyRangeBufferOptions,
  RangeByteSource,
  ReadStrategy,
} from '../types/index.js';

/**
 * Handle for `size` bytes starting at `position` in a seekable source.
 *
 * Construction performs no I/O. Bytes are read on every access and never
 * cached; each access seeks the source back to `position` first.
 *
 * The source is borrowed, not owned. Buffers sharing one source must be
 * accessed one at a time.
 */
export class LazyRangeBuffer {
  private readonly reader     : ReadStrategy;
  private readonly mode       : CompletionMode;
  private readonly log        : Logger;

  constructor(
    readonly source  : RangeByteSource,
    readonly position: number,
    readonly size    : number,
    private readonly opt: LazyRangeBufferOptions = {},
  ) {
    if (!source) throw new TypeError('LazyRangeBuffer: source is required');
    assertRange(position, size);

    const mode: string = opt.completion ?? DEFAULT_COMPLETION;
    if (!isCompletionMode(mode)) {
      throw new ConfigurationError(`Unknown completion mode: ${mode}`);
    }

    this.reader = StrategyRegistry.get(opt.strategy ?? DEFAULT_STRATEGY);
    this.mode   = mode;
    this.log    = createLogger(opt.verbose ?? 0, opt.logger);
  }

  /** Bytes are not held in memory. */
  get isMemory(): false { return false; }

  get strategy(): string { return this.reader.name; }

  get completion(): CompletionMode { return this.mode; }

  /**
   * Read the whole range. Under `strict` the result is always exactly
   * `size` bytes; under `short` it may be shorter, never zero-padded.
   */
  getData(): Uint8Array {
    return this.readSpan(0, this.size);
  }

  /** Read `[offset, offset + count)` relative to the start of this range. */
  getByteRange(offset: number, count: number): Uint8Array {
    assertSliceBounds(this.size, offset, count);
    return this.readSpan(offset, count);
  }

  /** Describe a nested range without touching the source. */
  subrange(offset: number, size: number): LazyRangeBuffer {
    assertSliceBounds(this.size, offset, size);
    return new LazyRangeBuffer(this.source, this.position + offset, size, this.opt);
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private readSpan(offset: number, count: number): Uint8Array {
    if (!this.source.isReadable) {
      this.log.log(0, `source not readable for range @${this.position}+${this.size}`);
      throw new SourceUnavailableError('cannot read from source - maybe closed');
    }

    const start = this.position + offset;
    this.log.log(3, `${this.reader.name}: reading ${count} bytes @${start}`);

    this.source.position = start;
    const data = new Uint8Array(count);
    if (count === 0) return data;

    const filled = this.reader.fill(this.source, data, 0, count, this.log);
    if (filled === count) return data;

    this.log.log(1, `${this.reader.name}: incomplete range, got ${filled} of ${count} bytes @${start}`);
    if (this.mode === 'strict') throw new IncompleteRangeError(filled, count);
    return data.slice(0, filled);
  }
}
