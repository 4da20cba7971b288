import { describe, it, expect } from "vitest";
import { UnknownStreamTypeError } from "./errors.js";
import {
  StreamAttribute,
  StreamType,
  attributeNames,
  headerVariant,
  isStreamType,
  parseStreamType,
  streamTypeName,
  toStreamType,
} from "./stream-type.js";

describe("stream types", () => {
  it("knows ids 0 through 11", () => {
    expect(isStreamType(0)).toBe(true);
    expect(isStreamType(11)).toBe(true);
    expect(isStreamType(12)).toBe(false);
    expect(() => toStreamType(12)).toThrow(UnknownStreamTypeError);
  });

  it("names ids", () => {
    expect(streamTypeName(StreamType.AlternateData)).toBe("AlternateData");
    expect(streamTypeName(StreamType.SparseBlock)).toBe("SparseBlock");
  });

  it("picks the header layout per id", () => {
    expect(headerVariant(StreamType.AlternateData)).toBe("named");
    expect(headerVariant(StreamType.SparseBlock)).toBe("sparse");
    expect(headerVariant(StreamType.Data)).toBe("plain");
    expect(headerVariant(StreamType.SecurityData)).toBe("plain");
  });
});

describe("parseStreamType", () => {
  it("accepts full and short names in any case", () => {
    expect(parseStreamType("SecurityData")).toBe(StreamType.SecurityData);
    expect(parseStreamType("security")).toBe(StreamType.SecurityData);
    expect(parseStreamType("EA")).toBe(StreamType.EaData);
    expect(parseStreamType("alternate")).toBe(StreamType.AlternateData);
    expect(parseStreamType("data")).toBe(StreamType.Data);
    expect(parseStreamType("sparseblock")).toBe(StreamType.SparseBlock);
  });

  it("accepts numeric ids", () => {
    expect(parseStreamType("7")).toBe(StreamType.ObjectId);
    expect(() => parseStreamType("99")).toThrow(UnknownStreamTypeError);
  });

  it("rejects unknown names", () => {
    expect(() => parseStreamType("bogus")).toThrow("unknown stream type: bogus");
    expect(() => parseStreamType("0x3")).toThrow("unknown stream type: 0x3");
  });
});

describe("attributeNames", () => {
  it("lists the set bits in declaration order", () => {
    expect(attributeNames(StreamAttribute.Sparse | StreamAttribute.ContainsSecurity)).toEqual(["ContainsSecurity", "Sparse"]);
  });

  it("is empty for normal and unknown bits", () => {
    expect(attributeNames(StreamAttribute.Normal)).toEqual([]);
    expect(attributeNames(0x40)).toEqual([]);
  });
});
