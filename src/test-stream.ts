// Builders for hand-made backup streams shared by the test files.

import { encodeRecordHeader, type RecordHeaderFields } from "./header.js";
import { concatBytes } from "./io.js";
import type { RestoreWriter } from "./restore-writer.js";
import { StreamType } from "./stream-type.js";

/** Deterministic filler bytes. */
export function payload(n: number, seed = 1): Uint8Array {
  const out = new Uint8Array(n);
  for (let i = 0; i < n; i++) out[i] = (seed + i * 7) & 0xff;
  return out;
}

export function record(fields: RecordHeaderFields, body: Uint8Array = payload(fields.size)): Uint8Array {
  return concatBytes(encodeRecordHeader(fields), body);
}

export function chunks(buf: Uint8Array, size: number): Uint8Array[] {
  const out: Uint8Array[] = [];
  for (let o = 0; o < buf.byteLength; o += size) out.push(buf.slice(o, o + size));
  return out;
}

/** Feeds `buf` to the writer `size` bytes at a time; returns what each write() reported. */
export async function writeInChunks(writer: RestoreWriter, buf: Uint8Array, size: number): Promise<number[]> {
  const results: number[] = [];
  for (const c of chunks(buf, size)) results.push(await writer.write(c));
  return results;
}

export const ADS1_PAYLOAD = payload(10, 0x41);
export const DATA_PAYLOAD = payload(5, 0x61);

/** An alternate stream "ads1" (42-byte header, 10 bytes) followed by a 5-byte data stream: 77 bytes. */
export function sampleStream(): Uint8Array {
  return concatBytes(
    record({ id: StreamType.AlternateData, attributes: 0, size: 10, name: "ads1" }, ADS1_PAYLOAD),
    record({ id: StreamType.Data, attributes: 0, size: 5 }, DATA_PAYLOAD),
  );
}
