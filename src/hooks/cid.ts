// RecordCIDCollector: wraps a RecordHook and computes a CIDv1 (raw codec,
// SHA2-256) over the payload bytes of every record that passes through it.
//
// Digests are taken over the hook's *input* chunks, i.e. the payload as it sits
// in the container, before any rewriting by `next`. A record's CID is final once
// its last payload byte has gone by (immediately, for zero-length records).
//
// Usage:
//   const cids = new RecordCIDCollector();
//   const reader = new BackupReader(source, { hook: cids.hook() });
//   await reader.readAll();
//   cids.results(); // [{ index: 0, id: 1, name: "", size: 5, cid: "bafkrei…" }, …]

import { sha256 } from "@noble/hashes/sha2.js";
import { CID } from "multiformats";
import { create as createDigest } from "multiformats/hashes/digest";
import * as raw from "multiformats/codecs/raw";
import type { StreamTypeValue } from "../stream-type.js";
import { defaultRecordHook } from "./default.js";
import type { RecordHook } from "./types.js";

const SHA2_256 = 0x12;

export interface RecordCID {
  readonly index: number;
  readonly id: StreamTypeValue;
  readonly name: string;
  readonly size: number;
  readonly cid: string;
}

export function payloadCID(bytes: Uint8Array): string {
  return CID.create(1, raw.code, createDigest(SHA2_256, sha256(bytes))).toString();
}

export class RecordCIDCollector {
  readonly #done: RecordCID[] = [];
  #current?: { index: number; hash: ReturnType<typeof sha256.create> };

  hook(next: RecordHook = defaultRecordHook): RecordHook {
    return async (ctx, chunk) => {
      if (this.#current?.index !== ctx.index) {
        this.#current = { index: ctx.index, hash: sha256.create() };
      }
      const current = this.#current;
      current.hash.update(chunk);
      if (ctx.bytesLeft - chunk.byteLength <= 0) {
        const digest = createDigest(SHA2_256, current.hash.digest());
        this.#done.push({
          index: ctx.index,
          id: ctx.header.id,
          name: ctx.header.name,
          size: ctx.header.size,
          cid: CID.create(1, raw.code, digest).toString(),
        });
        this.#current = undefined;
      }
      return next(ctx, chunk);
    };
  }

  /** CIDs of all completed records, in stream order. */
  results(): RecordCID[] {
    return [...this.#done];
  }
}
