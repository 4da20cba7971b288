#!/usr/bin/env node
// bkup CLI: inspect and rewrite captured NT backup streams.
//
//   tsx src/cli.ts list    --src file.bkup [--cids] [--json]
//   tsx src/cli.ts extract --src file.bkup --out dir [--type data,alternate]
//   tsx src/cli.ts strip   --src file.bkup --out clean.bkup --omit security,ea [--overwrite]
//
// list     one line per record (index, type, attributes, size, name / sparse offset)
// extract  record<N>.<type>[.<name>].bin per record with the payload bytes
// strip    copies the stream, dropping whole records of the given types

import { command, subcommands, run, string, option, flag, optional } from "cmd-ts";
import { promises as fs } from "node:fs";
import { join } from "node:path";
import { Result } from "@adviser/cement";
import { RecordCIDCollector } from "./hooks/cid.js";
import { chainHooks } from "./hooks/chain.js";
import { omitStreamTypes } from "./hooks/omit.js";
import { RecordLog, type RecordSummary } from "./hooks/record-log.js";
import type { RecordHook } from "./hooks/types.js";
import { openBackupReader, openRestoreWriter, scoped } from "./scoped.js";
import { parseStreamType, streamTypeName, type StreamTypeValue } from "./stream-type.js";
import { backupReaderStream, restoreWriterStream } from "./web-streams.js";

// ── helpers ───────────────────────────────────────────────────────────────────

function parseTypes(list: string | undefined): StreamTypeValue[] {
  if (!list) return [];
  return list
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean)
    .map(parseStreamType);
}

function describe(r: RecordSummary): string {
  const parts = [`#${r.index}`, r.type, `size=${r.size}`, `header=${r.encodedSize}`];
  if (r.attributeNames.length) parts.push(`attrs=${r.attributeNames.join("|")}`);
  if (r.name !== undefined) parts.push(`name=${r.name}`);
  if (r.sparseOffset !== undefined) parts.push(`offset=${r.sparseOffset}`);
  return parts.join(" ");
}

// file names must not contain the characters NTFS stream names may carry
function safeName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, "_");
}

// ── list ──────────────────────────────────────────────────────────────────────

const listCmd = command({
  name: "list",
  description: "List the records of a backup stream",
  args: {
    src: option({ type: string, long: "src", short: "s", description: "Backup stream file" }),
    cids: flag({ long: "cids", description: "Also compute a CID per record payload" }),
    json: flag({ long: "json", description: "Print one JSON object per line" }),
  },
  handler: async ({ src, cids, json }): Promise<void> => {
    const log = new RecordLog();
    const digests = new RecordCIDCollector();
    const hook = cids ? log.hook(digests.hook()) : log.hook();

    const total = await scoped(await openBackupReader(src, { hook }), (reader) => reader.drain());
    const cidByIndex = new Map(digests.results().map((d) => [d.index, d.cid]));

    for (const r of log.records()) {
      const cid = cidByIndex.get(r.index);
      if (json) {
        console.log(
          JSON.stringify({ ...r, ...(r.sparseOffset !== undefined ? { sparseOffset: r.sparseOffset.toString() } : {}), ...(cid ? { cid } : {}) }),
        );
      } else {
        console.log(cid ? `${describe(r)} cid=${cid}` : describe(r));
      }
    }
    console.error(`[list] ${log.records().length} records, ${total} bytes`);
  },
});

// ── extract ───────────────────────────────────────────────────────────────────

const extractCmd = command({
  name: "extract",
  description: "Write each record's payload to its own file",
  args: {
    src: option({ type: string, long: "src", short: "s", description: "Backup stream file" }),
    out: option({ type: string, long: "out", short: "o", description: "Output directory (default: .)", defaultValue: () => "." }),
    types: option({ type: optional(string), long: "type", short: "t", description: "Comma-separated stream types to extract (default: all)" }),
  },
  handler: async ({ src, out, types }): Promise<void> => {
    await fs.mkdir(out, { recursive: true });
    const wanted = new Set<number>(parseTypes(types));
    const written = new Map<number, string>();

    const hook: RecordHook = async (ctx, chunk) => {
      if (wanted.size > 0 && !wanted.has(ctx.header.id)) return Result.Ok<Uint8Array>(new Uint8Array(0));
      let file = written.get(ctx.index);
      if (!file) {
        const suffix = ctx.header.name ? `.${safeName(ctx.header.name)}` : "";
        file = join(out, `record${ctx.index}.${streamTypeName(ctx.header.id).toLowerCase()}${suffix}.bin`);
        written.set(ctx.index, file);
        await fs.writeFile(file, chunk);
      } else {
        await fs.appendFile(file, chunk);
      }
      return Result.Ok<Uint8Array>(new Uint8Array(0));
    };

    await scoped(await openBackupReader(src, { hook }), (reader) => reader.drain());
    for (const file of written.values()) console.error(`[extract] wrote → ${file}`);
  },
});

// ── strip ─────────────────────────────────────────────────────────────────────

const stripCmd = command({
  name: "strip",
  description: "Copy a backup stream without the records of the given types",
  args: {
    src: option({ type: string, long: "src", short: "s", description: "Backup stream file" }),
    out: option({ type: string, long: "out", short: "o", description: "Output backup stream file" }),
    omit: option({ type: string, long: "omit", description: "Comma-separated stream types to drop (e.g. security,ea)" }),
    overwrite: flag({ long: "overwrite", description: "Replace the output file if it exists" }),
  },
  handler: async ({ src, out, omit, overwrite }): Promise<void> => {
    const omitted = parseTypes(omit);
    const log = new RecordLog();
    const reader = await openBackupReader(src, { hook: chainHooks(log.hook(), omitStreamTypes(omitted)) });
    const writer = await openRestoreWriter(out, { overwrite });

    await backupReaderStream(reader).pipeTo(restoreWriterStream(writer));

    const dropped = log.records().filter((r) => omitted.includes(r.id));
    console.error(`[strip] ${log.records().length} records read, ${dropped.length} dropped → ${out}`);
  },
});

// ── main ──────────────────────────────────────────────────────────────────────

const app = subcommands({
  name: "bkup",
  description: "Inspect and rewrite NT backup streams",
  cmds: { list: listCmd, extract: extractCmd, strip: stripCmd },
});

void run(app, process.argv.slice(2));
