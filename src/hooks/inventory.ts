// StreamInventory: owned map of alternate-stream name → payload size, filled by
// a single hook as records pass. Readers get snapshots, never the live map.

import { StreamType } from "../stream-type.js";
import { defaultRecordHook } from "./default.js";
import type { RecordHook } from "./types.js";

export class StreamInventory {
  readonly #sizes = new Map<string, number>();
  #hooked = false;
  #lastIndex = -1;

  /**
   * Returns the one hook allowed to write into this inventory. Calling it a
   * second time throws, which keeps the map single-writer.
   */
  hook(next: RecordHook = defaultRecordHook): RecordHook {
    if (this.#hooked) throw new Error("StreamInventory already has a writer hook");
    this.#hooked = true;
    return async (ctx, chunk) => {
      // keyed on the record index: a header delivered ahead of its payload
      // never reaches a hook while active
      if (ctx.index !== this.#lastIndex) {
        this.#lastIndex = ctx.index;
        if (ctx.header.id === StreamType.AlternateData) this.#sizes.set(ctx.header.name, ctx.header.size);
      }
      return next(ctx, chunk);
    };
  }

  snapshot(): ReadonlyMap<string, number> {
    return new Map(this.#sizes);
  }

  get size(): number {
    return this.#sizes.size;
  }
}
