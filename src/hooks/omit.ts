import { Result } from "@adviser/cement";
import type { StreamTypeValue } from "../stream-type.js";
import { defaultRecordHook } from "./default.js";
import type { RecordHook } from "./types.js";

/**
 * Redaction hook: records whose type is listed are dropped entirely (header and
 * payload); everything else is handed to `next`.
 *
 * @example
 * // back up a file without its security descriptor
 * new BackupReader(source, { hook: omitStreamTypes([StreamType.SecurityData]) });
 */
export function omitStreamTypes(types: Iterable<StreamTypeValue>, next: RecordHook = defaultRecordHook): RecordHook {
  const omitted = new Set<number>(types);
  return async (ctx, chunk) => {
    if (omitted.has(ctx.header.id)) return Result.Ok<Uint8Array>(new Uint8Array(0));
    return next(ctx, chunk);
  };
}
