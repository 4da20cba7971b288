import { Result } from "@adviser/cement";
import type { RecordHeaderView } from "../header.js";
import type { RecordHook, TransformContext } from "./types.js";

// Intermediate hooks of a chain only rewrite payload; the header is emitted once,
// by the last hook, so they see it as inactive.
function payloadView(h: RecordHeaderView): RecordHeaderView {
  return {
    id: h.id,
    attributes: h.attributes,
    size: h.size,
    name: h.name,
    sparseOffset: h.sparseOffset,
    encodedSize: h.encodedSize,
    active: false,
    encode: (): Uint8Array => h.encode(),
  };
}

/**
 * Composes hooks left-to-right: each receives the previous hook's output.
 * Only the last hook sees `header.active`, so e.g.
 * `chainHooks(redact, defaultRecordHook)` emits each header exactly once.
 */
export function chainHooks(...hooks: RecordHook[]): RecordHook {
  if (hooks.length === 0) throw new Error("chainHooks requires at least one hook");
  return async (ctx, chunk) => {
    const inner: TransformContext = { ...ctx, header: payloadView(ctx.header) };
    let data = chunk;
    for (let i = 0; i < hooks.length; i++) {
      const res = await hooks[i](i === hooks.length - 1 ? ctx : inner, data);
      if (res.isErr()) return res;
      data = res.Ok();
    }
    return Result.Ok(data);
  };
}
