// RecordLog: remembers the header of every record a pipeline walks over.
// Used by the CLI's `list` command; handy in tests to assert record sequences.

import type { RecordHeaderFields } from "../header.js";
import { attributeNames, headerVariant, streamTypeName, type StreamAttributeName, type StreamTypeName } from "../stream-type.js";
import { defaultRecordHook } from "./default.js";
import type { RecordHook } from "./types.js";

export interface RecordSummary extends RecordHeaderFields {
  readonly index: number;
  readonly type: StreamTypeName;
  readonly attributeNames: StreamAttributeName[];
  readonly encodedSize: number;
}

export class RecordLog {
  readonly #records: RecordSummary[] = [];

  hook(next: RecordHook = defaultRecordHook): RecordHook {
    return async (ctx, chunk) => {
      const last = this.#records.at(-1);
      if (last?.index !== ctx.index) {
        const h = ctx.header;
        const variant = headerVariant(h.id);
        this.#records.push({
          index: ctx.index,
          id: h.id,
          type: streamTypeName(h.id),
          attributes: h.attributes,
          attributeNames: attributeNames(h.attributes),
          size: h.size,
          encodedSize: h.encodedSize,
          ...(variant === "named" ? { name: h.name } : {}),
          ...(variant === "sparse" ? { sparseOffset: h.sparseOffset } : {}),
        });
      }
      return next(ctx, chunk);
    };
  }

  records(): RecordSummary[] {
    return [...this.#records];
  }
}
