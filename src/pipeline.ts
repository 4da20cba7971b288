// Shared state machine plumbing for BackupReader and RestoreWriter.
//
//   AwaitingHeader ──decode──▶ InPayload ──bytesLeft == 0──▶ AwaitingHeader
//
// A pipeline owns one RecordHeader, its state, and the injected source/sink.
// close() releases the source/sink exactly once; a FinalizationRegistry entry
// releases it for pipelines that become unreachable without being closed, and
// logs that it had to.

import type { Logger, Result } from "@adviser/cement";
import { BkupError, EndOfInputError, HookError, RecordIoError, SkipHeaderError, UnsupportedSeekError } from "./errors.js";
import { RecordHeader } from "./header.js";
import { defaultRecordHook } from "./hooks/default.js";
import type { RecordHook, TransformContext } from "./hooks/types.js";
import type { ByteSink, ByteSource, Closer, SeekResult } from "./io.js";
import { moduleLogger } from "./logger.js";
import { resolveSettings, type PipelineOptions, type ResolvedSettings } from "./options.js";

export const PipelineState = {
  AwaitingHeader: "awaiting-header",
  InPayload: "in-payload",
} as const;

export type PipelineStateValue = (typeof PipelineState)[keyof typeof PipelineState];

export interface SeekOutcome {
  /** "boundary": the current record's payload is exhausted and the next read/write starts a header. */
  readonly status: "ok" | "boundary";
  readonly moved: number;
}

// ── Leak backstop ─────────────────────────────────────────────────────────────

interface HeldResource {
  readonly resource: Closer;
  readonly logger: Logger;
  readonly path: string;
}

const leaks = new FinalizationRegistry<HeldResource>((held) => {
  held.logger.Warn().Str("path", held.path).Msg("pipeline was never closed; releasing its resource");
  void held.resource.close().catch((err: unknown) => {
    held.logger.Error().Err(err).Str("path", held.path).Msg("release of unclosed pipeline failed");
  });
});

// ── RecordPipeline ────────────────────────────────────────────────────────────

export abstract class RecordPipeline<IO extends ByteSource | ByteSink> {
  protected readonly io: IO;
  protected readonly header = new RecordHeader();
  protected readonly hook: RecordHook;
  protected readonly logger: Logger;
  protected readonly settings: ResolvedSettings;

  protected state: PipelineStateValue = PipelineState.AwaitingHeader;
  protected left = 0;
  protected lastError?: Error;
  protected index = -1;

  readonly #unregisterToken = {};
  #closing?: Promise<void>;

  protected constructor(io: IO, opts: PipelineOptions & { maxStalledWrites?: number }, module: string) {
    this.io = io;
    this.settings = resolveSettings(opts);
    this.hook = opts.hook ?? defaultRecordHook;
    this.logger = moduleLogger(module, opts.logger);
    leaks.register(this, { resource: io, logger: this.logger, path: this.settings.path }, this.#unregisterToken);
  }

  get path(): string {
    return this.settings.path;
  }

  get pipelineState(): PipelineStateValue {
    return this.state;
  }

  /** Payload bytes of the current record not yet consumed. */
  get bytesLeft(): number {
    return this.left;
  }

  get closed(): boolean {
    return this.#closing !== undefined;
  }

  protected context(): TransformContext {
    return { header: this.header, bytesLeft: this.left, lastError: this.lastError, index: this.index };
  }

  protected observe(status: "ok" | "eof" | "error", error?: Error): void {
    switch (status) {
      case "ok":
        this.lastError = undefined;
        break;
      case "eof":
        this.lastError = new EndOfInputError();
        break;
      case "error":
        this.lastError = error ?? new Error("unknown I/O error");
        break;
    }
  }

  /** Runs the hook; a source/sink error handed back by it is wrapped with op and path. */
  protected async transform(chunk: Uint8Array, op: "read" | "write"): Promise<Uint8Array> {
    let res: Result<Uint8Array>;
    try {
      res = await this.hook(this.context(), chunk);
    } catch (e) {
      throw new HookError(e);
    }
    if (res.isOk()) return res.Ok();
    const err = res.Err();
    if (this.lastError !== undefined && err === this.lastError) throw new RecordIoError(op, this.path, err);
    throw err instanceof BkupError ? err : new HookError(err);
  }

  // ── Seek ────────────────────────────────────────────────────────────────────

  /** Hook for subclasses that must flush pending header bytes before skipping payload. */
  protected async beforeSeek(): Promise<void> {
    // nothing by default
  }

  /**
   * Skips `offset` payload bytes of the current record. Never crosses into the
   * next header: the request is clamped to {@link bytesLeft}.
   */
  async seek(offset: number): Promise<SeekOutcome> {
    if (this.state === PipelineState.AwaitingHeader) throw new SkipHeaderError();
    if (!Number.isSafeInteger(offset) || offset < 0) throw new UnsupportedSeekError(offset);

    await this.beforeSeek();

    const request = Math.min(offset, this.left);
    const res: SeekResult = request > 0 ? await this.io.seek(request) : { moved: 0, status: "ok" };
    this.lastError = res.error;

    switch (res.status) {
      case "unseekable":
        throw new SkipHeaderError();
      case "error":
        throw new RecordIoError("seek", this.path, res.error ?? new Error("seek failed"));
      case "boundary": {
        const moved = this.left;
        this.#toBoundary();
        return { status: "boundary", moved };
      }
      case "ok":
        break;
    }

    this.left -= res.moved;
    this.logger.Debug().Str("path", this.path).Int("moved", res.moved).Int("bytesLeft", this.left).Msg("seek");
    if (this.left <= 0) {
      this.#toBoundary();
      return { status: "boundary", moved: res.moved };
    }
    return { status: "ok", moved: res.moved };
  }

  #toBoundary(): void {
    this.left = 0;
    this.header.deactivate();
    this.state = PipelineState.AwaitingHeader;
  }

  // ── Close ───────────────────────────────────────────────────────────────────

  /** Subclass cleanup that runs before the source/sink is released. */
  protected async beforeClose(): Promise<void> {
    // nothing by default
  }

  /**
   * Releases the source/sink. Safe to call any number of times; the release runs
   * once and every caller observes its outcome. Failures are collected into an
   * AggregateError.
   */
  close(): Promise<void> {
    this.#closing ??= this.#release();
    return this.#closing;
  }

  async #release(): Promise<void> {
    leaks.unregister(this.#unregisterToken);
    const errors: unknown[] = [];
    try {
      await this.beforeClose();
    } catch (e) {
      errors.push(e);
    }
    try {
      await this.io.close();
    } catch (e) {
      errors.push(e);
    }
    if (errors.length > 0) throw new AggregateError(errors, `close ${this.path}: ${errors.length} error(s)`);
  }
}
