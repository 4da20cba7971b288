// Injected byte source / sink contract.
//
// The pipelines never touch a filesystem object themselves; whatever actually
// moves backup bytes (a platform backup API, a file holding a captured stream,
// an in-memory buffer) implements these interfaces.
//
//   read / write  → { n, status }   "ok" | "eof" | "error"
//   seek          → { moved, status } "ok" | "boundary" | "unseekable" | "error"
//
// Seeks are always relative and forward; nothing in the core asks for an
// absolute position.

import { EndOfInputError, ReadStalledError, RecordIoError, UnexpectedEndError } from "./errors.js";

/** Consecutive zero-byte "ok" answers a source may give before a read gives up. */
export const DEFAULT_MAX_EMPTY_READS = 16;

export type IoStatus = "ok" | "eof" | "error";

export interface IoResult {
  readonly n: number;
  readonly status: IoStatus;
  readonly error?: Error;
}

export type SeekStatus = "ok" | "boundary" | "unseekable" | "error";

export interface SeekResult {
  readonly moved: number;
  readonly status: SeekStatus;
  readonly error?: Error;
}

export interface Closer {
  close(): Promise<void>;
}

export interface ByteSource extends Closer {
  read(p: Uint8Array): Promise<IoResult>;
  seek(offset: number): Promise<SeekResult>;
}

export interface ByteSink extends Closer {
  write(p: Uint8Array): Promise<IoResult>;
  seek(offset: number): Promise<SeekResult>;
}

// ── Exact readers ─────────────────────────────────────────────────────────────

/**
 * Reads exactly `n` bytes or throws: {@link EndOfInputError} when nothing was
 * available, {@link UnexpectedEndError} when the input stopped part-way.
 */
export interface ExactReader {
  readFull(n: number): Promise<Uint8Array>;
}

/** ExactReader over an in-memory buffer; tracks how many bytes were taken. */
export class BufferReader implements ExactReader {
  readonly #buf: Uint8Array;
  #pos = 0;

  constructor(buf: Uint8Array) {
    this.#buf = buf;
  }

  get consumed(): number {
    return this.#pos;
  }

  async readFull(n: number): Promise<Uint8Array> {
    const available = this.#buf.byteLength - this.#pos;
    if (available === 0 && n > 0) throw new EndOfInputError();
    if (available < n) throw new UnexpectedEndError(n - available);
    const out = this.#buf.subarray(this.#pos, this.#pos + n);
    this.#pos += n;
    return out;
  }
}

/** ExactReader that loops over a ByteSource until the requested length is filled. */
export class SourceReader implements ExactReader {
  readonly #source: ByteSource;
  readonly #path: string;
  readonly #maxEmptyReads: number;

  constructor(source: ByteSource, path: string, maxEmptyReads = DEFAULT_MAX_EMPTY_READS) {
    this.#source = source;
    this.#path = path;
    this.#maxEmptyReads = maxEmptyReads;
  }

  async readFull(n: number): Promise<Uint8Array> {
    const out = new Uint8Array(n);
    let filled = 0;
    let empty = 0;
    while (filled < n) {
      const r = await this.#source.read(out.subarray(filled));
      filled += r.n;
      if (r.status === "error") throw new RecordIoError("read", this.#path, r.error ?? new Error("source error"));
      if (r.status === "eof" && filled < n) {
        if (filled === 0) throw new EndOfInputError();
        throw new UnexpectedEndError(n - filled);
      }
      if (r.n > 0) {
        empty = 0;
      } else if (++empty > this.#maxEmptyReads) {
        throw new ReadStalledError(empty, this.#path);
      }
    }
    return out;
  }
}

export function concatBytes(...bufs: Uint8Array[]): Uint8Array {
  const total = bufs.reduce((s, b) => s + b.byteLength, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const b of bufs) {
    out.set(b, o);
    o += b.byteLength;
  }
  return out;
}
