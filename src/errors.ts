// Error taxonomy for the backup-stream codec.
//
//   malformed input   OddNameLength, EmptyStreamName, StreamNameTooLong, UnknownStreamType,
//                     InvalidRecordSize, SkipHeader, UnsupportedSeek
//   source / sink     RecordIo (op + logical path + cause), ReadStalled, WriteStalled
//   boundary signals  InsufficientBytes → EndOfInput | UnexpectedEnd
//   hooks             Hook (wraps whatever a transform hook returned)
//
// Every class carries a stable `code` so callers can branch without instanceof
// across package copies.

export class BkupError extends Error {
  readonly code: string;
  /**
   * Set by RestoreWriter.write when it fails part-way: how much of the caller's
   * buffer was taken in before the failing step. Resending from there resumes.
   */
  consumed?: number;

  constructor(code: string, message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = new.target.name;
    this.code = code;
  }
}

// ── Malformed input ───────────────────────────────────────────────────────────

export class OddNameLengthError extends BkupError {
  readonly nameSize: number;

  constructor(nameSize: number) {
    super("ODD_NAME_LENGTH", `alternate stream name length ${nameSize} is an odd number of bytes`);
    this.nameSize = nameSize;
  }
}

export class EmptyStreamNameError extends BkupError {
  constructor() {
    super("EMPTY_STREAM_NAME", "alternate data stream name is empty");
  }
}

export class StreamNameTooLongError extends BkupError {
  readonly nameSize: number;

  constructor(nameSize: number, limit: number) {
    super("STREAM_NAME_TOO_LONG", `alternate stream name length ${nameSize} exceeds ${limit} bytes`);
    this.nameSize = nameSize;
  }
}

export class UnknownStreamTypeError extends BkupError {
  readonly id: number;

  constructor(id: number) {
    super("UNKNOWN_STREAM_TYPE", `unknown backup stream id ${id}`);
    this.id = id;
  }
}

export class InvalidRecordSizeError extends BkupError {
  constructor(size: bigint | number) {
    super("INVALID_RECORD_SIZE", `record size ${size} is out of range`);
  }
}

export class SkipHeaderError extends BkupError {
  constructor() {
    super("SKIP_HEADER", "cannot seek while a stream header is pending");
  }
}

export class UnsupportedSeekError extends BkupError {
  constructor(offset: number) {
    super("UNSUPPORTED_SEEK", `only forward relative seeks are supported, got ${offset}`);
  }
}

// ── Boundary signals ──────────────────────────────────────────────────────────

// Base for "the bytes ran out". The restore path treats any of these as a request
// for more input; the backup path maps EndOfInputError to end-of-stream.
export class InsufficientBytesError extends BkupError {}

export class EndOfInputError extends InsufficientBytesError {
  constructor() {
    super("END_OF_INPUT", "end of input");
  }
}

export class UnexpectedEndError extends InsufficientBytesError {
  readonly missing: number;

  constructor(missing: number) {
    super("UNEXPECTED_END", `unexpected end of input: ${missing} more bytes expected`);
    this.missing = missing;
  }
}

export function isInsufficientBytes(err: unknown): err is InsufficientBytesError {
  return err instanceof InsufficientBytesError;
}

// ── Source / sink ─────────────────────────────────────────────────────────────

export class RecordIoError extends BkupError {
  readonly op: string;
  readonly path: string;

  constructor(op: string, path: string, cause: unknown) {
    super("RECORD_IO", `${op} ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.op = op;
    this.path = path;
  }
}

export class ReadStalledError extends BkupError {
  readonly attempts: number;

  constructor(attempts: number, path: string) {
    super("READ_STALLED", `read ${path}: source returned no bytes after ${attempts} attempts`);
    this.attempts = attempts;
  }
}

export class WriteStalledError extends BkupError {
  readonly attempts: number;

  constructor(attempts: number, path: string) {
    super("WRITE_STALLED", `write ${path}: sink accepted no bytes after ${attempts} attempts`);
    this.attempts = attempts;
  }
}

// ── Hooks ─────────────────────────────────────────────────────────────────────

export class HookError extends BkupError {
  constructor(cause: unknown) {
    super("HOOK", `record hook failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
