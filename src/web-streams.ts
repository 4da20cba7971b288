// WHATWG stream views of the two pipelines.
//
//   backupReaderStream   ReadableStream<Uint8Array> pulling from a BackupReader
//   restoreWriterStream  WritableStream<Uint8Array> pushing into a RestoreWriter
//
// Both take ownership: the pipeline is closed whenever the stream finishes,
// successfully or not.

import type { BackupReader } from "./backup-reader.js";
import type { RestoreWriter } from "./restore-writer.js";
import { failWith } from "./scoped.js";

export function backupReaderStream(reader: BackupReader, opts?: { chunkSize?: number }): ReadableStream<Uint8Array> {
  const chunkSize = opts?.chunkSize ?? 64 * 1024;
  return new ReadableStream<Uint8Array>({
    async pull(ctrl): Promise<void> {
      for (;;) {
        const buf = new Uint8Array(chunkSize);
        let n: number | null;
        try {
          n = await reader.read(buf);
        } catch (e) {
          return failWith(reader, e);
        }
        if (n === null) {
          await reader.close();
          ctrl.close();
          return;
        }
        if (n > 0) {
          ctrl.enqueue(buf.subarray(0, n));
          return;
        }
      }
    },
    async cancel(): Promise<void> {
      await reader.close();
    },
  });
}

export function restoreWriterStream(writer: RestoreWriter): WritableStream<Uint8Array> {
  return new WritableStream<Uint8Array>({
    async write(chunk): Promise<void> {
      try {
        await writer.write(chunk);
      } catch (e) {
        await failWith(writer, e);
      }
    },
    async close(): Promise<void> {
      await writer.close();
    },
    async abort(): Promise<void> {
      await writer.close();
    },
  });
}
