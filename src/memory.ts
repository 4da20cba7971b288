// In-memory source and sink.
//
// MemorySource behaves like a plain byte buffer: it knows nothing about record
// boundaries, so relative seeks simply move forward (the pipelines clamp them to
// the current record). `maxChunk` caps every read/write to exercise short I/O.

import type { ByteSink, ByteSource, IoResult, SeekResult } from "./io.js";

export interface MemoryIoOptions {
  /** Upper bound on bytes moved per read()/write() call. */
  maxChunk?: number;
}

export class MemorySource implements ByteSource {
  readonly #buf: Uint8Array;
  readonly #maxChunk: number;
  #pos = 0;
  #closeCount = 0;

  constructor(buf: Uint8Array, opts: MemoryIoOptions = {}) {
    this.#buf = buf;
    this.#maxChunk = opts.maxChunk ?? Number.POSITIVE_INFINITY;
  }

  get position(): number {
    return this.#pos;
  }

  get closeCount(): number {
    return this.#closeCount;
  }

  async read(p: Uint8Array): Promise<IoResult> {
    const available = this.#buf.byteLength - this.#pos;
    if (available <= 0) return { n: 0, status: "eof" };
    const n = Math.min(p.byteLength, available, this.#maxChunk);
    p.set(this.#buf.subarray(this.#pos, this.#pos + n));
    this.#pos += n;
    return { n, status: "ok" };
  }

  async seek(offset: number): Promise<SeekResult> {
    const moved = Math.min(offset, this.#buf.byteLength - this.#pos);
    this.#pos += moved;
    return { moved, status: "ok" };
  }

  async close(): Promise<void> {
    this.#closeCount++;
  }
}

export class MemorySink implements ByteSink {
  readonly #maxChunk: number;
  #buf = new Uint8Array(256);
  #pos = 0;
  #len = 0;
  #closeCount = 0;

  constructor(opts: MemoryIoOptions = {}) {
    this.#maxChunk = opts.maxChunk ?? Number.POSITIVE_INFINITY;
  }

  get closeCount(): number {
    return this.#closeCount;
  }

  /** Copy of everything written so far; skipped (seeked-over) ranges read as zeros. */
  bytes(): Uint8Array {
    return this.#buf.slice(0, this.#len);
  }

  async write(p: Uint8Array): Promise<IoResult> {
    const n = Math.min(p.byteLength, this.#maxChunk);
    this.#ensure(this.#pos + n);
    this.#buf.set(p.subarray(0, n), this.#pos);
    this.#pos += n;
    this.#len = Math.max(this.#len, this.#pos);
    return { n, status: "ok" };
  }

  async seek(offset: number): Promise<SeekResult> {
    this.#ensure(this.#pos + offset);
    this.#pos += offset;
    this.#len = Math.max(this.#len, this.#pos);
    return { moved: offset, status: "ok" };
  }

  async close(): Promise<void> {
    this.#closeCount++;
  }

  #ensure(size: number): void {
    if (size <= this.#buf.byteLength) return;
    const grown = new Uint8Array(Math.max(size, this.#buf.byteLength * 2));
    grown.set(this.#buf.subarray(0, this.#len));
    this.#buf = grown;
  }
}
