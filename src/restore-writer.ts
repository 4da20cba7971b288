// RestoreWriter: reverse pipeline.
//
// Accepts a flat backup stream through write() in chunks of any size and
// re-emits it record by record into a byte sink:
//
//   AwaitingHeader  input is appended to an assembly buffer until a full header
//                   decodes; running short is not an error, the call reports
//                   all input consumed and waits for more.
//   InPayload       up to min(input, bytesLeft) bytes → hook → sink. The first
//                   chunk of a record is hook-called with the header active, so
//                   the default hook writes header + payload.
//
// Input left over after a record's payload is the start of the next header and
// is processed in the same call.
//
// Sink writes are retried while they make progress. After every attempt the
// write-error hook decides whether to keep going; consecutive zero-byte writes
// are capped by `maxStalledWrites`.

import { BkupError, isInsufficientBytes, RecordIoError, WriteStalledError } from "./errors.js";
import { defaultWriteErrorHook } from "./hooks/default.js";
import type { WriteErrorHook } from "./hooks/types.js";
import { BufferReader, concatBytes, type ByteSink } from "./io.js";
import type { RestoreOptions } from "./options.js";
import { PipelineState, RecordPipeline } from "./pipeline.js";
import { streamTypeName } from "./stream-type.js";

export class RestoreWriter extends RecordPipeline<ByteSink> {
  readonly #writeErrorHook: WriteErrorHook;
  #assembly: Uint8Array = new Uint8Array(0);

  constructor(sink: ByteSink, opts: RestoreOptions = {}) {
    super(sink, opts, "RestoreWriter");
    this.#writeErrorHook = opts.writeErrorHook ?? defaultWriteErrorHook;
  }

  /** Header bytes received but not yet decodable. */
  get pendingHeaderBytes(): number {
    return this.#assembly.byteLength;
  }

  /**
   * Consumes `p`. Resolves to `p.byteLength` once every byte has been either
   * written through or buffered as part of an incomplete header.
   *
   * A {@link BkupError} thrown part-way carries `consumed`: the bytes of `p`
   * taken in before the failing step. The chunk in flight is not counted.
   */
  async write(p: Uint8Array): Promise<number> {
    let input = p;
    try {
      return await this.#consume(p, (rest) => (input = rest));
    } catch (e) {
      if (e instanceof BkupError && e.consumed === undefined) e.consumed = p.byteLength - input.byteLength;
      throw e;
    }
  }

  async #consume(p: Uint8Array, advance: (rest: Uint8Array) => void): Promise<number> {
    let input = p;

    while (input.byteLength > 0) {
      if (this.state === PipelineState.AwaitingHeader) {
        const buf = concatBytes(this.#assembly, input);
        const reader = new BufferReader(buf);
        try {
          await this.header.fill(reader);
        } catch (e) {
          this.#assembly = buf;
          if (isInsufficientBytes(e)) return p.byteLength;
          // the undecodable bytes stay buffered, so they count as taken
          advance(input.subarray(input.byteLength));
          throw e;
        }
        this.#assembly = new Uint8Array(0);
        input = buf.subarray(reader.consumed);
        advance(input);

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

        if (this.left === 0) {
          // zero-length record: emit its header now, nothing else will
          await this.#handleWrite(new Uint8Array(0));
          this.state = PipelineState.AwaitingHeader;
        }
        continue;
      }

      const take = Math.min(input.byteLength, this.left);
      await this.#handleWrite(input.subarray(0, take));
      this.left -= take;
      input = input.subarray(take);
      advance(input);
      if (this.left === 0) this.state = PipelineState.AwaitingHeader;
    }

    return p.byteLength;
  }

  async #handleWrite(chunk: Uint8Array): Promise<void> {
    let remaining = await this.transform(chunk, "write");
    this.header.deactivate();

    let stalled = 0;
    while (remaining.byteLength > 0) {
      const res = await this.io.write(remaining);
      this.observe(res.status, res.error);

      const abort = this.#writeErrorHook(this.lastError);
      if (abort) {
        if (abort === this.lastError) throw new RecordIoError("write", this.path, abort);
        throw abort;
      }

      if (res.n === 0) {
        stalled++;
        this.logger.Warn().Str("path", this.path).Int("attempt", stalled).Msg("sink accepted no bytes");
        if (stalled > this.settings.maxStalledWrites) throw new WriteStalledError(stalled, this.path);
        continue;
      }
      stalled = 0;
      remaining = remaining.subarray(res.n);
    }
  }

  // a header still waiting for its first payload byte has to reach the sink
  // before the sink skips ahead
  protected override async beforeSeek(): Promise<void> {
    if (this.header.active) await this.#handleWrite(new Uint8Array(0));
  }

  protected override async beforeClose(): Promise<void> {
    if (this.#assembly.byteLength > 0 || this.left > 0) {
      this.logger
        .Warn()
        .Str("path", this.path)
        .Int("pendingHeaderBytes", this.#assembly.byteLength)
        .Int("bytesLeft", this.left)
        .Msg("closing with an incomplete record");
    }
    this.#assembly = new Uint8Array(0);
  }
}
