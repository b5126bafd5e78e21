// src/core/fps/estimator.ts
//
// Long-lived frame-rate task. Tries the atrace stream once per monitoring
// session, falls back to offline perfetto captures when the stream is missing
// or dries up, and publishes into a single slot the sampler reads.

import type { RemoteExecutor } from "@/core/remote/adb";
import { describeError } from "@/lib/errors";
import { LOG_WINDOWS, type DiagnosticLog } from "@/lib/log/diagnostics";
import { sleep, timeout, type Wait } from "@/lib/wait";
import { OfflineStrategy } from "./offline";
import { StreamingStrategy } from "./streaming";
import type { TraceQuery } from "./traceQuery";
import {
  DISABLED_TARGET,
  EMPTY_LATEST,
  type EstimatorMode,
  type FrameRateTask,
  type FrameRateTarget,
  type LatestFrameRate,
} from "./types";

export const STREAM_INTERVAL_MS = 1_000;
export const IDLE_POLL_MS = 500;
export const OFFLINE_PAUSE_MS = 300;
export const OFFLINE_BACKOFF_MS = 2_000;
export const DEFAULT_JOIN_MS = 15_000;

export type EstimatorOpts = {
  exec: RemoteExecutor;
  log: DiagnosticLog;
  query: TraceQuery | null;
  resolveQuery?: () => TraceQuery | null;
  localDir?: string;
  now?: () => number;
  wait?: Wait;
  streaming?: StreamingStrategy;
  offline?: OfflineStrategy;
};

/** Streaming dumps at most once per second, and no faster than the sampler asks for values. */
export function streamPace(t: FrameRateTarget): number {
  return Math.max(STREAM_INTERVAL_MS, t.intervalMs);
}

export function isActiveTarget(t: FrameRateTarget): boolean {
  return t.enabled && Boolean(t.target.trim());
}

export class FrameRateEstimator implements FrameRateTask {
  private readonly log: DiagnosticLog;
  private readonly now: () => number;
  private readonly wait: Wait;
  private readonly streaming: StreamingStrategy;
  private readonly offline: OfflineStrategy;

  private target: FrameRateTarget = DISABLED_TARGET;
  private latest: LatestFrameRate = EMPTY_LATEST;
  private produced = 0;
  private phase: EstimatorMode = "idle";
  private streamingLive = false;
  private generation = 0;
  private seenGeneration = 0;

  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;

  constructor(opts: EstimatorOpts) {
    this.log = opts.log;
    this.now = opts.now ?? (() => Date.now());
    this.wait = opts.wait ?? sleep;
    this.streaming = opts.streaming ?? new StreamingStrategy(opts.exec, opts.log);
    this.offline =
      opts.offline ??
      new OfflineStrategy({
        exec: opts.exec,
        query: opts.query,
        resolveQuery: opts.resolveQuery,
        localDir: opts.localDir,
        wait: opts.wait,
      });
  }

  get mode(): EstimatorMode {
    return this.phase;
  }

  get sampleCount(): number {
    return this.produced;
  }

  get running(): boolean {
    return this.task !== null;
  }

  /** A disabled→enabled change starts a new session: the slot and counter are cleared and streaming is tried again. */
  configure(target: FrameRateTarget) {
    const next: FrameRateTarget = Object.freeze({ ...target, layerCandidates: [...target.layerCandidates] });
    if (isActiveTarget(next) && !isActiveTarget(this.target)) {
      this.generation++;
      this.latest = EMPTY_LATEST;
      this.produced = 0;
    }
    this.target = next;
  }

  readLatest(): LatestFrameRate {
    return this.latest;
  }

  start() {
    if (this.task) return;
    const controller = new AbortController();
    this.controller = controller;
    this.task = this.run(controller.signal).catch((err: unknown) => {
      this.log.failure("frame-rate task stopped", err);
    });
  }

  /** Resolves true when the task finished within `joinMs`. */
  async stop(joinMs = DEFAULT_JOIN_MS): Promise<boolean> {
    const task = this.task;
    this.controller?.abort();
    if (!task) return true;
    try {
      await timeout(task, joinMs);
      return true;
    } catch {
      this.log.line("WARN", `frame-rate task did not stop within ${joinMs}ms`);
      return false;
    } finally {
      this.task = null;
      this.controller = null;
    }
  }

  private async run(signal: AbortSignal) {
    try {
      while (!signal.aborted) {
        const delay = await this.step();
        if (!(await this.wait(delay, signal))) break;
      }
    } finally {
      await this.leaveStreaming();
    }
  }

  /** One iteration of the session loop; returns how long to wait before the next. */
  async step(): Promise<number> {
    const target = this.target;
    const generation = this.generation;

    if (this.seenGeneration !== generation) {
      this.seenGeneration = generation;
      await this.leaveStreaming();
      this.phase = "idle";
    }

    if (!isActiveTarget(target)) {
      await this.leaveStreaming();
      this.phase = "idle";
      return IDLE_POLL_MS;
    }

    switch (this.phase) {
      case "idle": {
        if (await this.streaming.start()) {
          this.phase = "streaming";
          this.streamingLive = true;
          this.log.line("OK", "frame rate: streaming from atrace");
        } else {
          this.phase = "offline";
          this.log.line("INFO", "frame rate: atrace unavailable, using offline perfetto captures");
        }
        return STREAM_INTERVAL_MS;
      }

      case "streaming": {
        const res = await this.streaming.poll();
        const pace = streamPace(target);
        if (res.kind === "frames") {
          this.publish(generation, res.fps, res.detail);
          this.log.throttled("fps", "OK", `FPS(atrace): ${res.fps.toFixed(1)} (${res.detail})`, LOG_WINDOWS.fps);
          return pace;
        }
        if (this.streaming.exhausted) {
          const why = res.kind === "failed" ? "keeps failing" : "has no frame events";
          this.log.line("INFO", `atrace ${why}, switching to offline perfetto captures`);
          await this.leaveStreaming();
          this.phase = "offline";
          return 0;
        }
        return pace;
      }

      case "offline":
        return this.offlineStep(target, generation);
    }
  }

  private async offlineStep(target: FrameRateTarget, generation: number): Promise<number> {
    if (!this.offline.ensureQuery()) {
      this.log.throttled("fps", "WARN", "frame rate unavailable: trace processor not found", LOG_WINDOWS.wait);
      return OFFLINE_BACKOFF_MS;
    }
    try {
      const reading = await this.offline.sampleOnce(target);
      if (reading.fps !== null && reading.fps >= 0) {
        this.publish(generation, reading.fps, reading.detail);
        this.log.throttled("fps", "OK", `FPS(perfetto): ${reading.fps.toFixed(1)} (${reading.detail})`, LOG_WINDOWS.fps);
      } else {
        this.log.throttled("fps", "WARN", `perfetto could not compute FPS: ${reading.detail}`, LOG_WINDOWS.fps);
      }
      return OFFLINE_PAUSE_MS;
    } catch (err) {
      this.log.throttled("fps", "ERR", `perfetto failed: ${describeError(err).slice(0, 200)}`, LOG_WINDOWS.error);
      return OFFLINE_BACKOFF_MS;
    }
  }

  /** Readings that straddle a session change are dropped. */
  private publish(generation: number, fps: number, detail: string) {
    if (generation !== this.generation) return;
    this.latest = Object.freeze({ fps, atMs: this.now(), detail });
    this.produced++;
  }

  private async leaveStreaming() {
    if (!this.streamingLive) return;
    this.streamingLive = false;
    await this.streaming.stop();
    this.streaming.reset();
  }
}
