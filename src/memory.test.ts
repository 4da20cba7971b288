import { describe, it, expect } from "vitest";
import { MemorySink, MemorySource } from "./memory.js";

describe("MemorySource", () => {
  it("reads up to maxChunk bytes and then reports eof", async () => {
    const src = new MemorySource(new Uint8Array([1, 2, 3, 4, 5]), { maxChunk: 2 });
    const p = new Uint8Array(4);
    expect(await src.read(p)).toEqual({ n: 2, status: "ok" });
    expect(Array.from(p.subarray(0, 2))).toEqual([1, 2]);
    expect(await src.read(p)).toEqual({ n: 2, status: "ok" });
    expect(await src.read(p)).toEqual({ n: 1, status: "ok" });
    expect(await src.read(p)).toEqual({ n: 0, status: "eof" });
    expect(src.position).toBe(5);
  });

  it("seeks forward no further than the end", async () => {
    const src = new MemorySource(new Uint8Array(10));
    expect(await src.seek(4)).toEqual({ moved: 4, status: "ok" });
    expect(await src.seek(40)).toEqual({ moved: 6, status: "ok" });
    expect(src.position).toBe(10);
  });
});

describe("MemorySink", () => {
  it("accepts up to maxChunk bytes per write", async () => {
    const sink = new MemorySink({ maxChunk: 3 });
    expect(await sink.write(new Uint8Array([1, 2, 3, 4]))).toEqual({ n: 3, status: "ok" });
    expect(Array.from(sink.bytes())).toEqual([1, 2, 3]);
  });

  it("fills skipped ranges with zeros", async () => {
    const sink = new MemorySink();
    await sink.write(new Uint8Array([1]));
    await sink.seek(2);
    await sink.write(new Uint8Array([4]));
    await sink.seek(1);
    expect(Array.from(sink.bytes())).toEqual([1, 0, 0, 4, 0]);
  });

  it("grows past its initial capacity", async () => {
    const sink = new MemorySink();
    const big = new Uint8Array(1000).fill(7);
    await sink.write(big);
    await sink.write(new Uint8Array([8]));
    const out = sink.bytes();
    expect(out.byteLength).toBe(1001);
    expect(out[999]).toBe(7);
    expect(out[1000]).toBe(8);
  });

  it("returns a copy", async () => {
    const sink = new MemorySink();
    await sink.write(new Uint8Array([1, 2]));
    const snap = sink.bytes();
    await sink.write(new Uint8Array([3]));
    expect(Array.from(snap)).toEqual([1, 2]);
  });
});
