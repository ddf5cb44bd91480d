// packages/core/src/source/MemoryRangeSource.ts
import { InvalidRangeError, SourceUnavailableError } from '../errors/index.js';
import { readCap } from '../util/range.js';
import type { RangeByteSource } from '../types/index.js';

export interface MemoryRangeSourceOptions {
  /**
   * Cap on bytes returned by one `read` call. Emulates sources with an
   * internal chunk buffer (block devices, network frames).
   */
  maxReadSize?: number;
}

/**
 * Seekable source over an in-memory Uint8Array. Positions past the end
 * are allowed; reads there return 0.
 */
export class MemoryRangeSource implements RangeByteSource {
  #pos    = 0;
  #closed = false;
  readonly #maxReadSize: number;

  /** Physical read calls served so far. */
  reads = 0;

  constructor(
    private readonly bytes: Uint8Array,
    opt: MemoryRangeSourceOptions = {},
  ) {
    this.#maxReadSize = readCap(opt.maxReadSize);
  }

  get length(): number { return this.bytes.byteLength; }

  get isReadable(): boolean { return !this.#closed; }

  get position(): number { return this.#pos; }
  set position(p: number) {
    if (!Number.isSafeInteger(p) || p < 0) {
      throw new InvalidRangeError(`invalid seek position: ${p}`);
    }
    this.#pos = p;
  }

  read(buffer: Uint8Array, offset: number, count: number): number {
    if (this.#closed) throw new SourceUnavailableError('MemoryRangeSource: read after close');
    this.reads++;

    const remaining = Math.max(0, this.bytes.byteLength - this.#pos);
    const n = Math.min(count, remaining, this.#maxReadSize);
    if (n <= 0) return 0;

    buffer.set(this.bytes.subarray(this.#pos, this.#pos + n), offset);
    this.#pos += n;
    return n;
  }

  close(): void { this.#closed = true; }
}
