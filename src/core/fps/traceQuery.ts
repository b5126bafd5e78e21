// src/core/fps/traceQuery.ts
//
// Trace-query collaborator: runs SQL against a pulled trace file. The default
// implementation shells out to Perfetto's trace_processor.

import { existsSync, accessSync, constants as fsConstants } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { runProcess } from "@/core/remote/process";
import { describeError } from "@/lib/errors";

export interface TraceQuery {
  query(tracePath: string, sql: string): Promise<string>;
}

export const TRACE_QUERY_TIMEOUT_MS = 20_000;

/** Older trace_processor builds only take a query file (`-q`). */
export function rejectsInlineQuery(err: unknown): boolean {
  const text = describeError(err).toLowerCase();
  return text.includes("unknown option") || text.includes("unrecognized");
}

export class TraceProcessorShell implements TraceQuery {
  constructor(
    readonly binary: string,
    private readonly timeoutMs = TRACE_QUERY_TIMEOUT_MS,
  ) {}

  async query(tracePath: string, sql: string): Promise<string> {
    try {
      return await runProcess(this.binary, [tracePath, "-Q", sql], { timeoutMs: this.timeoutMs });
    } catch (err) {
      if (!rejectsInlineQuery(err)) throw err;
    }

    const dir = await mkdtemp(path.join(tmpdir(), "perf-bridge-sql-"));
    const file = path.join(dir, "query.sql");
    try {
      await writeFile(file, sql, "utf8");
      return await runProcess(this.binary, [tracePath, "-q", file], { timeoutMs: this.timeoutMs });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

export function traceProcessorNames(platform: NodeJS.Platform = process.platform): string[] {
  return platform === "win32"
    ? ["trace_processor.exe", "trace_processor_shell.exe"]
    : ["trace_processor", "trace_processor_shell"];
}

export type ResolveOpts = {
  explicit?: string;
  envPath?: string;
  platform?: NodeJS.Platform;
  isExecutable?: (file: string) => boolean;
};

/** Explicit path (CLI/env) first, then `PATH`. Null when nothing executable is found. */
export function resolveTraceProcessor(opts: ResolveOpts = {}): string | null {
  const isExec = opts.isExecutable ?? isExecutableFile;
  const explicit = (opts.explicit ?? "").trim();
  if (explicit && isExec(explicit)) return explicit;

  const platform = opts.platform ?? process.platform;
  const sep = platform === "win32" ? ";" : ":";
  const dirs = (opts.envPath ?? process.env.PATH ?? "").split(sep).filter(Boolean);
  for (const dir of dirs) {
    for (const name of traceProcessorNames(platform)) {
      const candidate = path.join(dir, name);
      if (isExec(candidate)) return candidate;
    }
  }
  return null;
}

function isExecutableFile(file: string): boolean {
  if (!existsSync(file)) return false;
  try {
    accessSync(file, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}
