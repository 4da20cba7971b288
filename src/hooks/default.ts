// Built-in hooks.
//
//   defaultRecordHook      byte-exact pass-through, header (while active) + payload
//   payloadOnlyHook        payload bytes only, headers are dropped
//   defaultWriteErrorHook  aborts the restore write loop on any sink error

import { Result } from "@adviser/cement";
import { EndOfInputError } from "../errors.js";
import { concatBytes } from "../io.js";
import type { RecordHook, TransformContext, WriteErrorHook } from "./types.js";

function sourceFailure(ctx: TransformContext): Error | undefined {
  if (!ctx.lastError || ctx.lastError instanceof EndOfInputError) return undefined;
  return ctx.lastError;
}

export const defaultRecordHook: RecordHook = async (ctx, chunk) => {
  const failure = sourceFailure(ctx);
  if (failure) return Result.Err(failure);
  if (!ctx.header.active) return Result.Ok(chunk);
  try {
    return Result.Ok(concatBytes(ctx.header.encode(), chunk));
  } catch (e) {
    return Result.Err(e instanceof Error ? e : new Error(String(e)));
  }
};

export const payloadOnlyHook: RecordHook = async (ctx, chunk) => {
  const failure = sourceFailure(ctx);
  if (failure) return Result.Err(failure);
  return Result.Ok(chunk);
};

export const defaultWriteErrorHook: WriteErrorHook = (err) => err;
