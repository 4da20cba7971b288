// Pipeline options.
//
// Plain-data settings are validated with arktype; hooks and the logger are
// passed through as-is.

import { type } from "arktype";
import type { Logger } from "@adviser/cement";
import type { RecordHook, WriteErrorHook } from "./hooks/types.js";

export const DEFAULT_PATH = "<backup-stream>";
export const DEFAULT_MAX_STALLED_WRITES = 16;

export const PipelineSettings = type({
  "path?": "string",
  "maxStalledWrites?": "number.integer >= 0",
});
export type PipelineSettings = typeof PipelineSettings.infer;

export interface PipelineOptions {
  /** Logical path of the filesystem object, used in error messages and logs. */
  path?: string;
  /** Per-record transform; defaults to {@link defaultRecordHook}. */
  hook?: RecordHook;
  logger?: Logger;
}

export interface RestoreOptions extends PipelineOptions {
  /** Consulted after every sink write attempt; defaults to aborting on any error. */
  writeErrorHook?: WriteErrorHook;
  /** Consecutive zero-byte sink writes tolerated before giving up. */
  maxStalledWrites?: number;
}

export interface ResolvedSettings {
  readonly path: string;
  readonly maxStalledWrites: number;
}

export function resolveSettings(opts: PipelineOptions & { maxStalledWrites?: number } = {}): ResolvedSettings {
  const checked = PipelineSettings({
    ...(opts.path !== undefined ? { path: opts.path } : {}),
    ...(opts.maxStalledWrites !== undefined ? { maxStalledWrites: opts.maxStalledWrites } : {}),
  });
  if (checked instanceof type.errors) throw new TypeError(`invalid pipeline options: ${checked.summary}`);
  return {
    path: checked.path ?? DEFAULT_PATH,
    maxStalledWrites: checked.maxStalledWrites ?? DEFAULT_MAX_STALLED_WRITES,
  };
}
