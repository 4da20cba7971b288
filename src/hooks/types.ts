import type { Result } from "@adviser/cement";
import type { RecordHeaderView } from "../header.js";

/**
 * Snapshot handed to a {@link RecordHook} on every call.
 *
 * - `header`: the current record. `header.active` is true only on the call that
 *   delivers (backup) or receives (restore) the first bytes of the record, i.e.
 *   when the header itself must be emitted too.
 * - `bytesLeft`: payload bytes of this record not yet consumed, counted before
 *   the chunk passed alongside.
 * - `lastError`: last error reported by the source or sink, if any. End of input
 *   is reported as an `EndOfInputError`.
 * - `index`: zero-based position of the record in the stream.
 */
export interface TransformContext {
  readonly header: RecordHeaderView;
  readonly bytesLeft: number;
  readonly lastError?: Error;
  readonly index: number;
}

/**
 * Per-record transform. Receives each payload chunk (and an empty chunk for a
 * zero-length record) and returns the bytes to deliver in its place.
 *
 * While `ctx.header.active` is true the hook is responsible for emitting the
 * header bytes as well: {@link defaultRecordHook} prepends `header.encode()`.
 */
export type RecordHook = (ctx: TransformContext, chunk: Uint8Array) => Promise<Result<Uint8Array>>;

/**
 * Consulted after every sink write attempt on the restore path. Returning an
 * error aborts the write loop; returning undefined retries with the remaining bytes.
 */
export type WriteErrorHook = (err: Error | undefined) => Error | undefined;
