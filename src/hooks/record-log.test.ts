import { describe, it, expect } from "vitest";
import { BackupReader } from "../backup-reader.js";
import { concatBytes } from "../io.js";
import { MemorySink, MemorySource } from "../memory.js";
import { RestoreWriter } from "../restore-writer.js";
import { StreamAttribute, StreamType } from "../stream-type.js";
import { record } from "../test-stream.js";
import { RecordLog } from "./record-log.js";

function streams(): Uint8Array {
  return concatBytes(
    record({ id: StreamType.SecurityData, attributes: StreamAttribute.ContainsSecurity, size: 4 }),
    record({ id: StreamType.AlternateData, attributes: 0, size: 2, name: "ads1" }),
    record({ id: StreamType.SparseBlock, attributes: StreamAttribute.Sparse, size: 6, sparseOffset: 512n }),
  );
}

const expected = [
  {
    index: 0,
    id: StreamType.SecurityData,
    type: "SecurityData",
    attributes: 2,
    attributeNames: ["ContainsSecurity"],
    size: 4,
    encodedSize: 20,
  },
  { index: 1, id: StreamType.AlternateData, type: "AlternateData", attributes: 0, attributeNames: [], size: 2, encodedSize: 42, name: "ads1" },
  {
    index: 2,
    id: StreamType.SparseBlock,
    type: "SparseBlock",
    attributes: 8,
    attributeNames: ["Sparse"],
    size: 6,
    encodedSize: 28,
    sparseOffset: 512n,
  },
];

describe("RecordLog", () => {
  it("records one summary per record on the backup path", async () => {
    const log = new RecordLog();
    await new BackupReader(new MemorySource(streams()), { hook: log.hook() }).drain(3);
    expect(log.records()).toEqual(expected);
  });

  it("records the same summaries on the restore path", async () => {
    const log = new RecordLog();
    const writer = new RestoreWriter(new MemorySink(), { hook: log.hook() });
    await writer.write(streams());
    expect(log.records()).toEqual(expected);
  });
});
