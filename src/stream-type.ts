// Stream-type registry for WIN32_STREAM_ID records.
//
// Record ids and attribute bits follow [MS-BKUP] / winbase.h. Only two ids carry
// extra header fields after the 20-byte base:
//
//   AlternateData  StreamNameSize bytes of UTF-16LE ":name:$DATA"
//   SparseBlock    8-byte little-endian offset of the extent in the file

import { UnknownStreamTypeError } from "./errors.js";

export const StreamType = {
  Invalid: 0,
  Data: 1,
  EaData: 2,
  SecurityData: 3,
  AlternateData: 4,
  Link: 5,
  PropertyData: 6,
  ObjectId: 7,
  ReparseData: 8,
  SparseBlock: 9,
  TxfsData: 10,
  GhostedFileExtents: 11,
} as const;

export type StreamTypeValue = (typeof StreamType)[keyof typeof StreamType];
export type StreamTypeName = keyof typeof StreamType;

export const StreamAttribute = {
  Normal: 0,
  ModifiedWhenRead: 0x1,
  ContainsSecurity: 0x2,
  ContainsProperties: 0x4,
  Sparse: 0x8,
  ContainsGhostedFileExtents: 0x10,
} as const;

export type StreamAttributeName = keyof typeof StreamAttribute;

/** Header layout that follows the fixed 20-byte base for a given stream type. */
export type HeaderVariant = "plain" | "named" | "sparse";

function isStreamTypeName(name: string): name is StreamTypeName {
  return Object.hasOwn(StreamType, name);
}

function isAttributeName(name: string): name is StreamAttributeName {
  return Object.hasOwn(StreamAttribute, name);
}

const names = new Map<number, StreamTypeName>();
for (const [name, id] of Object.entries(StreamType)) {
  if (isStreamTypeName(name)) names.set(id, name);
}

export function isStreamType(id: number): id is StreamTypeValue {
  return names.has(id);
}

export function toStreamType(id: number): StreamTypeValue {
  if (!isStreamType(id)) throw new UnknownStreamTypeError(id);
  return id;
}

export function streamTypeName(id: StreamTypeValue): StreamTypeName {
  const name = names.get(id);
  if (!name) throw new UnknownStreamTypeError(id);
  return name;
}

/** Case-insensitive lookup used by the CLI, e.g. "security" or "SecurityData". */
export function parseStreamType(token: string): StreamTypeValue {
  const t = token.toLowerCase();
  for (const [id, name] of names) {
    const n = name.toLowerCase();
    if (n === t || n === `${t}data`) return toStreamType(id);
  }
  if (/^\d+$/.test(token)) return toStreamType(Number(token));
  throw new Error(`unknown stream type: ${token}`);
}

export function headerVariant(id: StreamTypeValue): HeaderVariant {
  switch (id) {
    case StreamType.AlternateData:
      return "named";
    case StreamType.SparseBlock:
      return "sparse";
    default:
      return "plain";
  }
}

/** Names of the attribute bits set in `attributes`, e.g. ["Sparse"]. Unknown bits are omitted. */
export function attributeNames(attributes: number): StreamAttributeName[] {
  const out: StreamAttributeName[] = [];
  for (const [name, bit] of Object.entries(StreamAttribute)) {
    if (bit !== 0 && (attributes & bit) === bit && isAttributeName(name)) out.push(name);
  }
  return out;
}
