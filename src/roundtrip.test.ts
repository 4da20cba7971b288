import { describe, it, expect } from "vitest";
import { BackupReader } from "./backup-reader.js";
import { chainHooks } from "./hooks/chain.js";
import { defaultRecordHook } from "./hooks/default.js";
import { StreamInventory } from "./hooks/inventory.js";
import { omitStreamTypes } from "./hooks/omit.js";
import { concatBytes } from "./io.js";
import { MemorySink, MemorySource } from "./memory.js";
import { RestoreWriter } from "./restore-writer.js";
import { StreamAttribute, StreamType } from "./stream-type.js";
import { payload, record, writeInChunks } from "./test-stream.js";

// A file with every header layout: security descriptor, main data, two named
// streams (one empty), a sparse extent and a reparse point.
function fullFile(): Uint8Array {
  return concatBytes(
    record({ id: StreamType.SecurityData, attributes: StreamAttribute.ContainsSecurity, size: 48 }),
    record({ id: StreamType.Data, attributes: StreamAttribute.Sparse, size: 300 }),
    record({ id: StreamType.AlternateData, attributes: 0, size: 26, name: "Zone.Identifier" }),
    record({ id: StreamType.AlternateData, attributes: 0, size: 0, name: "empty" }),
    record({ id: StreamType.SparseBlock, attributes: StreamAttribute.Sparse, size: 64, sparseOffset: 1n << 20n }),
    record({ id: StreamType.ReparseData, attributes: 0, size: 16 }),
  );
}

async function backupThenRestore(input: Uint8Array, readSize: number, writeSize: number): Promise<Uint8Array> {
  const backup = await new BackupReader(new MemorySource(input, { maxChunk: 11 })).readAll(readSize);
  const sink = new MemorySink({ maxChunk: 13 });
  await writeInChunks(new RestoreWriter(sink), backup, writeSize);
  return sink.bytes();
}

describe("backup → restore", () => {
  it("is byte-exact for every combination of chunk sizes", async () => {
    const input = fullFile();
    for (const readSize of [1, 7, 29, 64, 4096]) {
      for (const writeSize of [1, 3, 20, 100, 4096]) {
        expect(await backupThenRestore(input, readSize, writeSize)).toEqual(input);
      }
    }
  });

  it("round-trips the ads1/Data example", async () => {
    const input = concatBytes(
      record({ id: StreamType.AlternateData, attributes: 0, size: 10, name: "ads1" }, payload(10, 3)),
      record({ id: StreamType.Data, attributes: 0, size: 5 }, payload(5, 4)),
    );
    expect(input.byteLength).toBe(77);
    expect(await backupThenRestore(input, 7, 3)).toEqual(input);
  });

  it("redacts on the way out and restores the remainder", async () => {
    const kept = concatBytes(
      record({ id: StreamType.Data, attributes: 0, size: 12 }),
      record({ id: StreamType.AlternateData, attributes: 0, size: 4, name: "keep" }),
    );
    const input = concatBytes(record({ id: StreamType.SecurityData, attributes: 2, size: 30 }), kept);

    const inventory = new StreamInventory();
    const reader = new BackupReader(new MemorySource(input), {
      hook: chainHooks(inventory.hook(), omitStreamTypes([StreamType.SecurityData], defaultRecordHook)),
    });
    const sink = new MemorySink();
    await writeInChunks(new RestoreWriter(sink), await reader.readAll(256), 8);

    expect(sink.bytes()).toEqual(kept);
    expect(inventory.snapshot()).toEqual(new Map([["keep", 4]]));
  });
});
