// Alternate-stream names on the wire are UTF-16LE ":<name>:$DATA" with no NUL
// terminator. Enumeration APIs report other stream kinds too
// (":<name>:$INDEX_ALLOCATION", "::$BITMAP"); only $DATA streams carry a name
// that can appear in a backup record.

const PREFIX = ":";
const DATA_SUFFIX = ":$DATA";

export function wrapStreamName(name: string): string {
  return `${PREFIX}${name}${DATA_SUFFIX}`;
}

/** Inner name of ":<name>:$DATA", or "" if `wire` is not in that form. */
export function unwrapStreamName(wire: string): string {
  if (!wire.startsWith(PREFIX)) return "";
  if (wire.length < PREFIX.length + DATA_SUFFIX.length || !wire.endsWith(DATA_SUFFIX)) return "";
  return wire.slice(PREFIX.length, wire.length - DATA_SUFFIX.length);
}

/**
 * Parses the enumeration form ":<name>:$<type>" and returns `name` only when
 * `$<type>` is `$DATA`; index-allocation, bitmap and other kinds yield "".
 */
export function parseStreamDataName(entry: string): string {
  const fields = entry.split(":");
  if (fields.length !== 3 || fields[0] !== "") return "";
  const [, name, kind] = fields;
  return kind === "$DATA" ? name : "";
}

// ── UTF-16LE ──────────────────────────────────────────────────────────────────

const utf16le = new TextDecoder("utf-16le");

export function encodeUtf16le(s: string): Uint8Array {
  const out = new Uint8Array(s.length * 2);
  const dv = new DataView(out.buffer);
  for (let i = 0; i < s.length; i++) {
    dv.setUint16(i * 2, s.charCodeAt(i), true);
  }
  return out;
}

export function decodeUtf16le(buf: Uint8Array): string {
  return utf16le.decode(buf);
}
