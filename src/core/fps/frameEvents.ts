// src/core/fps/frameEvents.ts
//
// Frame-boundary extraction from `atrace --async_dump` text.
//
// Line shapes (with or without the tgid column):
//   RenderThread-4321  (4300) [002] ...1  1234.567890: tracing_mark_write: B|4300|queueBuffer
//   surfaceflinger-612 [000] d..2  1234.570001: tracing_mark_write: B|612|doComposition

const MARK_RE =
  /^\s*\S+-\d+\s+(?:\(\s*\d+\s*\)\s+)?\[\d+\]\s+\S+\s+(\d+\.\d+):\s+tracing_mark_write:\s+[BC]\|(\d+)\|(.+)/gm;

const COMPOSITION_RE =
  /^\s*\S+-\d+\s+(?:\(\s*\d+\s*\)\s+)?\[\d+\]\s+\S+\s+(\d+\.\d+):\s+.*\b(?:HW_VSYNC_ON_0|doComposition|postComposition)\b/gm;

export const FRAME_MARKERS: ReadonlySet<string> = new Set([
  "queueBuffer",
  "eglSwapBuffers",
  "eglSwapBuffersWithDamageKHR",
]);

/** Events closer than this (seconds) are one frame. */
export const DEDUPE_WINDOW_S = 0.002;
/** Below this span (seconds) the batch is treated as one second's worth. */
export const MIN_SPAN_S = 0.05;

export type FrameEventMethod = "atrace_marker" | "atrace_vsync" | "no_events";

export type FrameEvents = {
  count: number;
  /** Seconds, trace clock. */
  minTs: number;
  maxTs: number;
  method: FrameEventMethod;
};

/**
 * Counts frame events strictly after `sinceTs`. App-side buffer markers are
 * preferred; SurfaceFlinger composition events are the fallback.
 */
export function parseFrameEvents(dump: string, sinceTs = 0): FrameEvents {
  const text = dump ?? "";
  let method: FrameEventMethod = "atrace_marker";
  let stamps: number[] = [];

  for (const m of text.matchAll(MARK_RE)) {
    const ts = Number(m[1]);
    const marker = (m[3] ?? "").trim();
    if (FRAME_MARKERS.has(marker) && ts > sinceTs) stamps.push(ts);
  }

  if (!stamps.length) {
    method = "atrace_vsync";
    stamps = [];
    for (const m of text.matchAll(COMPOSITION_RE)) {
      const ts = Number(m[1]);
      if (ts > sinceTs) stamps.push(ts);
    }
  }

  if (!stamps.length) return { count: 0, minTs: 0, maxTs: 0, method: "no_events" };

  const kept = dedupeTimestamps(stamps);
  return { count: kept.length, minTs: kept[0] ?? 0, maxTs: kept[kept.length - 1] ?? 0, method };
}

/** Sorts, then drops any stamp within DEDUPE_WINDOW_S of the previously kept one. */
export function dedupeTimestamps(stamps: readonly number[], windowS = DEDUPE_WINDOW_S): number[] {
  const sorted = [...stamps].sort((a, b) => a - b);
  const kept: number[] = [];
  for (const ts of sorted) {
    const last = kept[kept.length - 1];
    if (last === undefined || ts - last > windowS) kept.push(ts);
  }
  return kept;
}

/** `count / span` when the span exceeds MIN_SPAN_S, otherwise `count`. */
export function framesPerSecond(events: Pick<FrameEvents, "count" | "minTs" | "maxTs">): number {
  if (events.count <= 0) return 0;
  const span = events.maxTs - events.minTs;
  return span > MIN_SPAN_S ? events.count / span : events.count;
}
