// BackupReader: forward pipeline.
//
// Walks a byte source record by record and exposes it as a flat read() stream.
// Every payload chunk goes through the record hook; while a record is active the
// hook also emits its header, so with the default hook the output is the input
// byte-for-byte.
//
//   read(p)
//     1. pending leftover from the previous call → copy, return
//     2. AwaitingHeader → decode (end of input here is end of stream → null)
//     3. InPayload      → read ≤ min(p, bytesLeft) bytes, hook, deliver
//
// When the caller's buffer is smaller than the remaining payload, the first read
// of a record shrinks by the header's encoded size so header + payload fit; if
// nothing is left after that, the header alone is delivered without a hook call.
// Hook output that does not fit into p is kept and handed out first next time.

import { EndOfInputError, ReadStalledError, UnexpectedEndError } from "./errors.js";
import { concatBytes, DEFAULT_MAX_EMPTY_READS, SourceReader, type ByteSource } from "./io.js";
import type { PipelineOptions } from "./options.js";
import { PipelineState, RecordPipeline } from "./pipeline.js";
import { streamTypeName } from "./stream-type.js";

const READ_ALL_CHUNK = 64 * 1024;

export class BackupReader extends RecordPipeline<ByteSource> {
  readonly #headerReader: SourceReader;
  #leftover: Uint8Array = new Uint8Array(0);
  #emptyReads = 0;

  constructor(source: ByteSource, opts: PipelineOptions = {}) {
    super(source, opts, "BackupReader");
    this.#headerReader = new SourceReader(source, this.path);
  }

  /**
   * Fills `p` with the next transformed bytes.
   *
   * @returns the number of bytes written into `p` (0 is possible when a hook
   *   swallowed a chunk), or `null` once the source ends on a record boundary.
   */
  async read(p: Uint8Array): Promise<number | null> {
    if (this.#leftover.byteLength > 0) return this.#deliver(p, this.#leftover);
    if (p.byteLength === 0) return 0;

    for (;;) {
      switch (this.state) {
        case PipelineState.AwaitingHeader:
          try {
            await this.header.fill(this.#headerReader);
          } catch (e) {
            if (e instanceof EndOfInputError) return null;
            throw e;
          }
          this.index++;
          this.left = this.header.size;
          this.state = PipelineState.InPayload;
          this.logger
            .Debug()
            .Str("path", this.path)
            .Int("index", this.index)
            .Str("type", streamTypeName(this.header.id))
            .Int("size", this.header.size)
            .Msg("record header");
          break;

        case PipelineState.InPayload:
          if (this.left === 0) {
            if (this.header.active) {
              // zero-length record: the hook still has to see (and emit) its header
              try {
                return this.#deliver(p, await this.transform(new Uint8Array(0), "read"));
              } finally {
                this.header.deactivate();
              }
            }
            this.state = PipelineState.AwaitingHeader;
            break;
          }
          try {
            return await this.#handleRead(p);
          } finally {
            this.header.deactivate();
          }
      }
    }
  }

  async #handleRead(p: Uint8Array): Promise<number> {
    let readSize = Math.min(p.byteLength, this.left);
    if (this.header.active && this.left > p.byteLength) {
      readSize -= this.header.encodedSize;
    }

    if (readSize <= 0) return this.#deliver(p, this.header.encode());

    const res = await this.io.read(p.subarray(0, readSize));
    this.observe(res.status, res.error);
    if (res.n === 0 && res.status === "eof") throw new UnexpectedEndError(this.left);
    if (res.n > 0) {
      this.#emptyReads = 0;
    } else if (++this.#emptyReads > DEFAULT_MAX_EMPTY_READS) {
      throw new ReadStalledError(this.#emptyReads, this.path);
    }

    const out = await this.transform(p.slice(0, res.n), "read");
    this.left -= res.n;
    return this.#deliver(p, out);
  }

  #deliver(p: Uint8Array, out: Uint8Array): number {
    const n = Math.min(p.byteLength, out.byteLength);
    p.set(out.subarray(0, n));
    this.#leftover = n < out.byteLength ? out.slice(n) : new Uint8Array(0);
    return n;
  }

  /** Reads until end of stream and returns everything delivered. */
  async readAll(chunkSize = READ_ALL_CHUNK): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    const buf = new Uint8Array(chunkSize);
    for (;;) {
      const n = await this.read(buf);
      if (n === null) break;
      if (n > 0) chunks.push(buf.slice(0, n));
    }
    return concatBytes(...chunks);
  }

  /** Reads until end of stream, discarding the output; returns the byte count delivered. */
  async drain(chunkSize = READ_ALL_CHUNK): Promise<number> {
    const buf = new Uint8Array(chunkSize);
    let total = 0;
    for (;;) {
      const n = await this.read(buf);
      if (n === null) return total;
      total += n;
    }
  }

  protected override async beforeClose(): Promise<void> {
    this.#leftover = new Uint8Array(0);
  }
}
