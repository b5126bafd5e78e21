// src/core/fps/offline.ts
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { serialTag, type RemoteExecutor } from "@/core/remote/adb";
import type { Wait } from "@/lib/wait";
import { captureTrace } from "./capture";
import { fpsFromTrace } from "./timeline";
import type { TraceQuery } from "./traceQuery";
import type { FrameRateReading, FrameRateTarget } from "./types";

export const OFFLINE_CAPTURE_MS = 1_500;
export const PULL_TIMEOUT_MS = 12_000;

export type OfflineOpts = {
  exec: RemoteExecutor;
  /** Null when no trace processor could be resolved; every sample then reports why. */
  query: TraceQuery | null;
  /** Looked up again by `ensureQuery()` while `query` is null; the first hit is kept. */
  resolveQuery?: () => TraceQuery | null;
  localDir?: string;
  captureMs?: number;
  fileExists?: (file: string) => boolean;
  wait?: Wait;
};

/** Capture → pull → query, one frame-rate value per call. Throws on capture or pull failure. */
export class OfflineStrategy {
  private readonly exec: RemoteExecutor;
  private query: TraceQuery | null;
  private readonly resolveQuery?: () => TraceQuery | null;
  private readonly captureMs: number;
  private readonly fileExists: (file: string) => boolean;
  private readonly wait?: Wait;
  readonly remotePath: string;
  readonly localPath: string;

  constructor(opts: OfflineOpts) {
    this.exec = opts.exec;
    this.query = opts.query;
    this.resolveQuery = opts.resolveQuery;
    this.captureMs = opts.captureMs ?? OFFLINE_CAPTURE_MS;
    this.fileExists = opts.fileExists ?? existsSync;
    this.wait = opts.wait;

    const file = `pm_ft_${serialTag(opts.exec.serial)}.perfetto-trace`;
    this.remotePath = `/data/local/tmp/${file}`;
    this.localPath = path.join(opts.localDir ?? tmpdir(), file);
  }

  get available(): boolean {
    return this.query !== null;
  }

  /** Retries the resolver while no trace processor is known. */
  ensureQuery(): boolean {
    if (!this.query && this.resolveQuery) this.query = this.resolveQuery();
    return this.available;
  }

  async sampleOnce(target: FrameRateTarget): Promise<FrameRateReading> {
    if (!this.query) return { fps: null, detail: "trace processor unavailable" };

    const captured = await captureTrace(this.exec, this.remotePath, {
      durationMs: this.captureMs,
      wait: this.wait,
    });
    await this.exec.execute(["pull", captured.remotePath, this.localPath], { timeoutMs: PULL_TIMEOUT_MS });
    if (!this.fileExists(this.localPath)) return { fps: null, detail: "trace file missing after pull" };

    return fpsFromTrace(this.query, this.localPath, {
      target: target.target,
      durationMs: this.captureMs,
      layerHint: target.layerHint,
      layerCandidates: target.layerCandidates,
    });
  }
}
