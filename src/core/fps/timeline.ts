// src/core/fps/timeline.ts
//
// Frame rate from a captured trace via SQL: frame-timeline tables when the
// capture produced them, otherwise a scan of generic slice markers.

import type { FrameRateReading } from "./types";
import type { TraceQuery } from "./traceQuery";

export const PREFERRED_TABLES = [
  "actual_frame_timeline_slice",
  "frame_timeline_slice",
  "android_frame_timeline_slice",
  "expected_frame_timeline_slice",
] as const;

export const SLICE_MARKERS = [
  "Choreographer#doFrame",
  "DrawFrame",
  "doFrame",
  "queueBuffer",
  "HIDL::IComposerClient::executeCommands_2_2",
] as const;

export const MAX_FILTER_CANDIDATES = 10;

const TABLES_SQL =
  "select name from sqlite_master " +
  "where (type='table' or type='view') and " +
  "(name like '%frame%timeline%' or name like '%frame_slice%' or name like '%android_frames%');";

export type TimelineOpts = {
  target: string;
  durationMs: number;
  layerHint?: string;
  layerCandidates?: readonly string[];
};

export type FrameStats = { count: number; minTs: number; maxTs: number };

type Filter = { where: string; label: string };

export async function fpsFromTrace(
  tq: TraceQuery,
  tracePath: string,
  opts: TimelineOpts,
): Promise<FrameRateReading> {
  const run = (sql: string) => tq.query(tracePath, sql);

  const tables = parseNameList(await run(TABLES_SQL));
  if (!tables.length) {
    const fallback = await sliceMarkerFps(run, opts.durationMs);
    if (fallback.fps !== null) return fallback;
    return { fps: null, detail: `no frame timeline table in trace (${fallback.detail})` };
  }

  const table = PREFERRED_TABLES.find((t) => tables.includes(t)) ?? tables[0] ?? "";
  const cols = parseColumns(await run(`pragma table_info(${table});`));
  const filters = buildFilters(cols, opts);

  const selectStats = cols.includes("ts")
    ? `select printf('%d|%d|%d', count(*), min(ts), max(ts)) from ${table}`
    : `select printf('%d|0|0', count(*)) from ${table}`;

  let unfiltered: FrameStats | null = null;
  for (const f of filters) {
    const stats = parseStats(await run(`${selectStats}${f.where};`));
    if (!stats) continue;
    if (!f.where) unfiltered = stats;
    if (stats.count <= 0) continue;

    const spanS = stats.maxTs > stats.minTs && stats.minTs > 0 ? (stats.maxTs - stats.minTs) / 1e9 : 0;
    if (spanS > 0) {
      return {
        fps: stats.count / spanS,
        detail: `table=${table} filter=${f.label} count=${stats.count} spanMs=${Math.trunc(spanS * 1000)}`,
      };
    }
    return {
      fps: (stats.count * 1000) / Math.max(1, Math.trunc(opts.durationMs)),
      detail: `table=${table} filter=${f.label} count=${stats.count} durMs=${opts.durationMs}`,
    };
  }

  if (unfiltered) return { fps: null, detail: `frame timeline count is 0 (unfiltered total=${unfiltered.count})` };
  return { fps: null, detail: "trace query returned no frame timeline stats" };
}

/** Exact layer matches, then LIKE on each layer, then LIKE on the target; always ends unfiltered. */
export function buildFilters(cols: readonly string[], opts: TimelineOpts): Filter[] {
  const target = (opts.target ?? "").trim();
  const filters: Filter[] = [];

  if (cols.includes("layer_name")) {
    const cands: string[] = [];
    for (const raw of [opts.layerHint, ...(opts.layerCandidates ?? [])]) {
      const s = (raw ?? "").trim();
      if (s && !cands.includes(s)) cands.push(s);
    }
    const limited = cands.slice(0, MAX_FILTER_CANDIDATES);
    for (const c of limited) filters.push({ where: ` where layer_name = ${sqlQuote(c)}`, label: `layer_eq=${c}` });
    for (const c of limited) {
      filters.push({ where: ` where layer_name like ${sqlQuote(`%${c}%`)}`, label: `layer_like=${c}` });
    }
    if (target) {
      filters.push({ where: ` where layer_name like ${sqlQuote(`%${target}%`)}`, label: `pkg_like=${target}` });
    }
  } else if (cols.includes("name") && target) {
    filters.push({ where: ` where name like ${sqlQuote(`%${target}%`)}`, label: `name_like=${target}` });
  }

  filters.push({ where: "", label: "unfiltered" });
  return filters;
}

async function sliceMarkerFps(
  run: (sql: string) => Promise<string>,
  durationMs: number,
): Promise<FrameRateReading> {
  try {
    const out = await run("select count(*) from sqlite_master where type='table' and name='slice';");
    const first = cleanLines(out).find((l) => /^\d+$/.test(l));
    if (first !== undefined && Number(first) === 0) return { fps: null, detail: "slice table missing" };
  } catch {
    return { fps: null, detail: "slice table query failed" };
  }

  for (const marker of SLICE_MARKERS) {
    let stats: FrameStats | null;
    try {
      stats = parseStats(
        await run(`select printf('%d|%d|%d', count(*), min(ts), max(ts)) from slice where name = '${marker}';`),
      );
    } catch {
      continue;
    }
    if (!stats || stats.count <= 1) continue;

    const spanS = stats.maxTs > stats.minTs ? (stats.maxTs - stats.minTs) / 1e9 : 0;
    const fps = spanS > 0 ? stats.count / spanS : (stats.count * 1000) / Math.max(1, durationMs);
    return { fps, detail: `ftrace_slice marker=${marker} count=${stats.count} spanS=${spanS.toFixed(2)}` };
  }
  return { fps: null, detail: "no frame markers in slice table" };
}

/* ───────────────────── output parsing ───────────────────── */

function cleanLines(out: string): string[] {
  return (out ?? "")
    .split(/\r?\n/)
    .map((l) => stripQuotes(l.trim()))
    .filter(Boolean);
}

function stripQuotes(s: string): string {
  return s.replace(/^["']+|["']+$/g, "").trim();
}

/** One name per line; drops the `name` header and `----` rulers. */
export function parseNameList(out: string): string[] {
  return cleanLines(out).filter((l) => l.toLowerCase() !== "name" && !l.startsWith("-"));
}

/** `pragma table_info` rows are `cid|name|type|…`; keeps column 2, skipping the header row. */
export function parseColumns(out: string): string[] {
  const cols: string[] = [];
  for (const line of (out ?? "").split(/\r?\n/)) {
    const parts = line.split("|").map((p) => stripQuotes(p.trim()));
    const name = parts[1];
    if (parts.length < 2 || !name || (parts[0] ?? "").toLowerCase() === "cid") continue;
    cols.push(name);
  }
  return cols;
}

export function parseStats(out: string): FrameStats | null {
  const m = /(\d+)\|(\d+)\|(\d+)/.exec(out ?? "");
  if (!m) return null;
  return { count: Number(m[1]), minTs: Number(m[2]), maxTs: Number(m[3]) };
}

export function sqlQuote(s: string): string {
  return `'${(s ?? "").replace(/'/g, "''")}'`;
}
