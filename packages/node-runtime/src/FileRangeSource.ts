// packages/node-runtime/src/FileRangeSource.ts
import { openSync, readSync, closeSync, fstatSync } from 'node:fs';
import { FilesystemError, InvalidRangeError } from '../../core/src/errors/index.js';
import type { RangeByteSource } from '../../core/src/types/index.js';
import { readCap } from '../../core/src/util/range.js';

export interface FileRangeSourceOptions {
  /** Cap on bytes per `readSync` call; unlimited by default */
  maxReadSize?: number;
}

/**
 * Seekable source over an open file descriptor. Reads go through
 * `readSync` with an explicit file position, so the descriptor's own
 * cursor is never used.
 */
export class FileRangeSource implements RangeByteSource {
  #fd  : number | null;
  #pos = 0;
  readonly #maxReadSize: number;

  private constructor(
    fd: number,
    readonly path: string,
    readonly length: number,
    opt: FileRangeSourceOptions,
  ) {
    this.#fd = fd;
    this.#maxReadSize = readCap(opt.maxReadSize);
  }

  static open(path: string, opt: FileRangeSourceOptions = {}): FileRangeSource {
    let fd: number;
    try {
      fd = openSync(path, 'r');
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new FilesystemError(`Cannot open ${path}: ${msg}`);
    }
    try {
      const stat = fstatSync(fd);
      if (!stat.isFile()) throw new FilesystemError(`Not a regular file: ${path}`);
      return new FileRangeSource(fd, path, stat.size, opt);
    } catch (err) {
      closeSync(fd);
      throw err;
    }
  }

  get isReadable(): boolean { return this.#fd !== null; }

  get position(): number { return this.#pos; }
  set position(p: number) {
    if (!Number.isSafeInteger(p) || p < 0) {
      throw new InvalidRangeError(`invalid seek position: ${p}`);
    }
    this.#pos = p;
  }

  read(buffer: Uint8Array, offset: number, count: number): number {
    if (this.#fd === null) throw new FilesystemError(`File closed: ${this.path}`);
    const want = Math.min(count, this.#maxReadSize);
    if (want <= 0) return 0;

    const n = readSync(this.#fd, buffer, offset, want, this.#pos);
    this.#pos += n;
    return n;
  }

  close(): void {
    if (this.#fd === null) return;
    const fd = this.#fd;
    this.#fd = null;
    closeSync(fd);
  }
}
