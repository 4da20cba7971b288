// File-backed source and sink for captured backup streams (e.g. the raw output
// of a platform backup API saved to disk).
//
// Positions are tracked here rather than by the OS so that seeks stay relative
// and never move backwards.

import { open, type FileHandle } from "node:fs/promises";
import type { ByteSink, ByteSource, IoResult, SeekResult } from "./io.js";

function asError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export class FileSource implements ByteSource {
  readonly #handle: FileHandle;
  readonly #size: number;
  #pos = 0;
  #closed = false;

  static async open(path: string): Promise<FileSource> {
    const handle = await open(path, "r");
    try {
      const { size } = await handle.stat();
      return new FileSource(handle, size);
    } catch (e) {
      await handle.close();
      throw e;
    }
  }

  private constructor(handle: FileHandle, size: number) {
    this.#handle = handle;
    this.#size = size;
  }

  async read(p: Uint8Array): Promise<IoResult> {
    if (this.#pos >= this.#size || p.byteLength === 0) return { n: 0, status: this.#pos >= this.#size ? "eof" : "ok" };
    try {
      const { bytesRead } = await this.#handle.read(p, 0, p.byteLength, this.#pos);
      this.#pos += bytesRead;
      return { n: bytesRead, status: bytesRead === 0 ? "eof" : "ok" };
    } catch (e) {
      return { n: 0, status: "error", error: asError(e) };
    }
  }

  async seek(offset: number): Promise<SeekResult> {
    const moved = Math.min(offset, this.#size - this.#pos);
    this.#pos += moved;
    return { moved, status: "ok" };
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    await this.#handle.close();
  }
}

export interface FileSinkOptions {
  /** Replace an existing file; otherwise opening fails if the path exists. */
  overwrite?: boolean;
}

export class FileSink implements ByteSink {
  readonly #handle: FileHandle;
  #pos = 0;
  #len = 0;
  #closed = false;

  static async open(path: string, opts: FileSinkOptions = {}): Promise<FileSink> {
    return new FileSink(await open(path, opts.overwrite ? "w" : "wx"));
  }

  private constructor(handle: FileHandle) {
    this.#handle = handle;
  }

  async write(p: Uint8Array): Promise<IoResult> {
    try {
      const { bytesWritten } = await this.#handle.write(p, 0, p.byteLength, this.#pos);
      this.#pos += bytesWritten;
      this.#len = Math.max(this.#len, this.#pos);
      return { n: bytesWritten, status: "ok" };
    } catch (e) {
      return { n: 0, status: "error", error: asError(e) };
    }
  }

  async seek(offset: number): Promise<SeekResult> {
    this.#pos += offset;
    return { moved: offset, status: "ok" };
  }

  /** Extends a trailing skipped range, flushes and closes; all failures are reported together. */
  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    const errors: unknown[] = [];
    try {
      if (this.#pos > this.#len) await this.#handle.truncate(this.#pos);
      await this.#handle.sync();
    } catch (e) {
      errors.push(e);
    }
    try {
      await this.#handle.close();
    } catch (e) {
      errors.push(e);
    }
    if (errors.length > 0) throw new AggregateError(errors, `closing backup sink: ${errors.length} error(s)`);
  }
}
