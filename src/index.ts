export {
  BkupError,
  OddNameLengthError,
  EmptyStreamNameError,
  StreamNameTooLongError,
  UnknownStreamTypeError,
  InvalidRecordSizeError,
  SkipHeaderError,
  UnsupportedSeekError,
  InsufficientBytesError,
  EndOfInputError,
  UnexpectedEndError,
  RecordIoError,
  ReadStalledError,
  WriteStalledError,
  HookError,
  isInsufficientBytes,
} from "./errors.js";
export {
  StreamType,
  StreamAttribute,
  isStreamType,
  toStreamType,
  streamTypeName,
  parseStreamType,
  headerVariant,
  attributeNames,
} from "./stream-type.js";
export type { StreamTypeValue, StreamTypeName, StreamAttributeName, HeaderVariant } from "./stream-type.js";
export { wrapStreamName, unwrapStreamName, parseStreamDataName, encodeUtf16le, decodeUtf16le } from "./stream-name.js";
export {
  BASE_HEADER_SIZE,
  SPARSE_OFFSET_SIZE,
  MAX_NAME_SIZE,
  RecordHeader,
  encodeRecordHeader,
  decodeRecordHeader,
} from "./header.js";
export type { RecordHeaderFields, RecordHeaderView, DecodeRecordHeaderResult } from "./header.js";
export { BufferReader, SourceReader, DEFAULT_MAX_EMPTY_READS, concatBytes } from "./io.js";
export type { ByteSource, ByteSink, Closer, ExactReader, IoResult, IoStatus, SeekResult, SeekStatus } from "./io.js";
export { DEFAULT_PATH, DEFAULT_MAX_STALLED_WRITES, PipelineSettings, resolveSettings } from "./options.js";
export type { PipelineOptions, RestoreOptions, ResolvedSettings } from "./options.js";
export { PipelineState, RecordPipeline } from "./pipeline.js";
export type { PipelineStateValue, SeekOutcome } from "./pipeline.js";
export { BackupReader } from "./backup-reader.js";
export { RestoreWriter } from "./restore-writer.js";
export type { RecordHook, WriteErrorHook, TransformContext } from "./hooks/types.js";
export { defaultRecordHook, payloadOnlyHook, defaultWriteErrorHook } from "./hooks/default.js";
export { chainHooks } from "./hooks/chain.js";
export { omitStreamTypes } from "./hooks/omit.js";
export { RecordCIDCollector, payloadCID } from "./hooks/cid.js";
export type { RecordCID } from "./hooks/cid.js";
export { StreamInventory } from "./hooks/inventory.js";
export { RecordLog } from "./hooks/record-log.js";
export type { RecordSummary } from "./hooks/record-log.js";
export { MemorySource, MemorySink } from "./memory.js";
export type { MemoryIoOptions } from "./memory.js";
export { FileSource, FileSink } from "./file.js";
export type { FileSinkOptions } from "./file.js";
export { scoped, failWith, withBackupReader, withRestoreWriter, openBackupReader, openRestoreWriter } from "./scoped.js";
export { backupReaderStream, restoreWriterStream } from "./web-streams.js";
export { moduleLogger } from "./logger.js";
export type { Logger } from "./logger.js";
