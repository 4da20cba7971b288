// WIN32_STREAM_ID record header codec.
//
// Wire layout (little-endian):
//
//   offset 0   u32  StreamId
//   offset 4   u32  StreamAttributes
//   offset 8   i64  Size
//   offset 16  u32  StreamNameSize
//   offset 20  ...  StreamName   (AlternateData only, UTF-16LE ":name:$DATA")
//   offset 20  u64  SparseOffset (SparseBlock only; on-wire Size includes these 8 bytes)
//
// RecordHeader is mutable on purpose: a pipeline owns exactly one instance and
// refills it in place for every record it walks over.

import {
  EmptyStreamNameError,
  EndOfInputError,
  InvalidRecordSizeError,
  OddNameLengthError,
  StreamNameTooLongError,
  UnexpectedEndError,
} from "./errors.js";
import { BufferReader, concatBytes, type ExactReader } from "./io.js";
import { decodeUtf16le, encodeUtf16le, unwrapStreamName, wrapStreamName } from "./stream-name.js";
import { headerVariant, StreamType, toStreamType, type StreamTypeValue } from "./stream-type.js";

export const BASE_HEADER_SIZE = 20;
export const SPARSE_OFFSET_SIZE = 8;
// ":" + 255 UTF-16 units + ":$DATA"
export const MAX_NAME_SIZE = (1 + 255 + 6) * 2;

/** Logical identity of a record header, independent of its wire encoding. */
export interface RecordHeaderFields {
  readonly id: StreamTypeValue;
  readonly attributes: number;
  /** Payload length, excluding the sparse offset field. */
  readonly size: number;
  /** AlternateData only: the bare stream name. */
  readonly name?: string;
  /** SparseBlock only: offset of the extent within the file stream. */
  readonly sparseOffset?: bigint;
}

/** Read-only view handed to hooks. */
export interface RecordHeaderView extends Required<RecordHeaderFields> {
  readonly encodedSize: number;
  readonly active: boolean;
  encode(): Uint8Array;
}

export class RecordHeader implements RecordHeaderView {
  id: StreamTypeValue = StreamType.Invalid;
  attributes = 0;
  size = 0;
  name = "";
  sparseOffset = 0n;

  #encodedSize = 0;
  #active = false;

  static from(fields: RecordHeaderFields): RecordHeader {
    const hdr = new RecordHeader();
    hdr.id = fields.id;
    hdr.attributes = fields.attributes;
    hdr.size = fields.size;
    hdr.name = fields.name ?? "";
    hdr.sparseOffset = fields.sparseOffset ?? 0n;
    hdr.#encodedSize = BASE_HEADER_SIZE + extraSize(hdr);
    return hdr;
  }

  /** Size of the header on the wire, including name or sparse offset. */
  get encodedSize(): number {
    return this.#encodedSize;
  }

  /** True from decode until the first payload bytes of this record have been delivered. */
  get active(): boolean {
    return this.#active;
  }

  deactivate(): void {
    this.#active = false;
  }

  fields(): Required<RecordHeaderFields> {
    return { id: this.id, attributes: this.attributes, size: this.size, name: this.name, sparseOffset: this.sparseOffset };
  }

  reset(): void {
    this.name = "";
    this.sparseOffset = 0n;
    this.#active = false;
  }

  // ── Decode ──────────────────────────────────────────────────────────────────

  /**
   * Refills this header from `reader`. Only running out before the first byte
   * is EndOfInputError; anything shorter after that is UnexpectedEndError.
   */
  async fill(reader: ExactReader): Promise<void> {
    this.reset();

    const base = await reader.readFull(BASE_HEADER_SIZE);
    const dv = new DataView(base.buffer, base.byteOffset, base.byteLength);
    const id = toStreamType(dv.getUint32(0, true));
    const attributes = dv.getUint32(4, true);
    const wireSize = dv.getBigInt64(8, true);
    const nameSize = dv.getUint32(16, true);

    let size = checkedSize(wireSize);
    let encodedSize = BASE_HEADER_SIZE;

    switch (headerVariant(id)) {
      case "named": {
        if (nameSize === 0) throw new EmptyStreamNameError();
        if ((nameSize & 1) !== 0) throw new OddNameLengthError(nameSize);
        if (nameSize > MAX_NAME_SIZE) throw new StreamNameTooLongError(nameSize, MAX_NAME_SIZE);
        const name = unwrapStreamName(decodeUtf16le(await readTail(reader, nameSize)));
        if (name === "") throw new EmptyStreamNameError();
        this.name = name;
        encodedSize += nameSize;
        break;
      }
      case "sparse": {
        const raw = await readTail(reader, SPARSE_OFFSET_SIZE);
        this.sparseOffset = new DataView(raw.buffer, raw.byteOffset, raw.byteLength).getBigUint64(0, true);
        size -= SPARSE_OFFSET_SIZE;
        if (size < 0) throw new InvalidRecordSizeError(wireSize);
        encodedSize += SPARSE_OFFSET_SIZE;
        break;
      }
      case "plain":
        break;
    }

    this.id = id;
    this.attributes = attributes;
    this.size = size;
    this.#encodedSize = encodedSize;
    this.#active = true;
  }

  // ── Encode ──────────────────────────────────────────────────────────────────

  encode(): Uint8Array {
    let extra: Uint8Array = new Uint8Array(0);
    let wireSize = BigInt(this.size);

    switch (headerVariant(this.id)) {
      case "named":
        if (this.name === "") throw new EmptyStreamNameError();
        extra = encodeUtf16le(wrapStreamName(this.name));
        if (extra.byteLength > MAX_NAME_SIZE) throw new StreamNameTooLongError(extra.byteLength, MAX_NAME_SIZE);
        break;
      case "sparse":
        extra = new Uint8Array(SPARSE_OFFSET_SIZE);
        new DataView(extra.buffer).setBigUint64(0, this.sparseOffset, true);
        wireSize += BigInt(SPARSE_OFFSET_SIZE);
        break;
      case "plain":
        break;
    }

    const base = new Uint8Array(BASE_HEADER_SIZE);
    const dv = new DataView(base.buffer);
    dv.setUint32(0, this.id, true);
    dv.setUint32(4, this.attributes >>> 0, true);
    dv.setBigInt64(8, wireSize, true);
    dv.setUint32(16, headerVariant(this.id) === "named" ? extra.byteLength : 0, true);
    return concatBytes(base, extra);
  }
}

function extraSize(hdr: RecordHeader): number {
  switch (headerVariant(hdr.id)) {
    case "named":
      return wrapStreamName(hdr.name).length * 2;
    case "sparse":
      return SPARSE_OFFSET_SIZE;
    case "plain":
      return 0;
  }
}

// the base header is already in, so running dry here truncates a record
async function readTail(reader: ExactReader, n: number): Promise<Uint8Array> {
  try {
    return await reader.readFull(n);
  } catch (e) {
    if (e instanceof EndOfInputError) throw new UnexpectedEndError(n);
    throw e;
  }
}

function checkedSize(wire: bigint): number {
  if (wire < 0n || wire > BigInt(Number.MAX_SAFE_INTEGER)) throw new InvalidRecordSizeError(wire);
  return Number(wire);
}

// ── Buffer helpers ────────────────────────────────────────────────────────────

export function encodeRecordHeader(fields: RecordHeaderFields): Uint8Array {
  return RecordHeader.from(fields).encode();
}

export interface DecodeRecordHeaderResult {
  readonly header: RecordHeader;
  readonly bytesConsumed: number;
}

export async function decodeRecordHeader(buf: Uint8Array): Promise<DecodeRecordHeaderResult> {
  const reader = new BufferReader(buf);
  const header = new RecordHeader();
  await header.fill(reader);
  return { header, bytesConsumed: reader.consumed };
}
