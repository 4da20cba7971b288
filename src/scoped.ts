// Scoped acquisition: open a pipeline, run the caller, release on every exit path.

import { BackupReader } from "./backup-reader.js";
import { FileSink, FileSource, type FileSinkOptions } from "./file.js";
import type { ByteSink, ByteSource, Closer } from "./io.js";
import { resolveSettings, type PipelineOptions, type RestoreOptions } from "./options.js";
import { RestoreWriter } from "./restore-writer.js";

/** Closes `resource` and rethrows `err`, bundling a release failure with it instead of hiding either. */
export async function failWith(resource: Closer, err: unknown): Promise<never> {
  try {
    await resource.close();
  } catch (closeErr) {
    throw new AggregateError([err, closeErr], "operation failed and its resource could not be released");
  }
  throw err;
}

export async function scoped<R extends Closer, T>(resource: R, fn: (r: R) => Promise<T>): Promise<T> {
  let result: T;
  try {
    result = await fn(resource);
  } catch (e) {
    return failWith(resource, e);
  }
  await resource.close();
  return result;
}

export function withBackupReader<T>(
  source: ByteSource,
  opts: PipelineOptions,
  fn: (reader: BackupReader) => Promise<T>,
): Promise<T> {
  return scoped(new BackupReader(source, opts), fn);
}

export function withRestoreWriter<T>(
  sink: ByteSink,
  opts: RestoreOptions,
  fn: (writer: RestoreWriter) => Promise<T>,
): Promise<T> {
  return scoped(new RestoreWriter(sink, opts), fn);
}

// ── File-backed ───────────────────────────────────────────────────────────────

// Options are checked before the file is touched; once it is open, a failing
// constructor still releases the handle.

export async function openBackupReader(file: string, opts: PipelineOptions = {}): Promise<BackupReader> {
  const pipelineOpts = { path: file, ...opts };
  resolveSettings(pipelineOpts);
  const source = await FileSource.open(file);
  try {
    return new BackupReader(source, pipelineOpts);
  } catch (e) {
    return failWith(source, e);
  }
}

export async function openRestoreWriter(file: string, opts: RestoreOptions & FileSinkOptions = {}): Promise<RestoreWriter> {
  const pipelineOpts = { path: file, ...opts };
  resolveSettings(pipelineOpts);
  const sink = await FileSink.open(file, { overwrite: opts.overwrite });
  try {
    return new RestoreWriter(sink, pipelineOpts);
  } catch (e) {
    return failWith(sink, e);
  }
}
