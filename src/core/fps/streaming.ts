// src/core/fps/streaming.ts
//
// atrace async buffer, read incrementally. The dump is non-destructive, so each
// poll only counts events newer than the last consumed boundary.

import { attempt, type RemoteExecutor } from "@/core/remote/adb";
import { describeError } from "@/lib/errors";
import type { DiagnosticLog } from "@/lib/log/diagnostics";
import { framesPerSecond, parseFrameEvents } from "./frameEvents";

const ATRACE_ARGS = ["-b", "8192", "-c", "gfx", "view"];
const ATRACE_TIMEOUT_MS = 5_000;

export const MAX_DUMP_FAILURES = 5;
export const MAX_EMPTY_DUMPS = 10;

export type StreamPoll =
  | { kind: "frames"; fps: number; count: number; detail: string }
  | { kind: "empty" }
  | { kind: "failed"; error: unknown };

export class StreamingStrategy {
  private boundaryTs = 0;
  private failStreak = 0;
  private emptyStreak = 0;

  constructor(
    private readonly exec: RemoteExecutor,
    private readonly log: DiagnosticLog,
  ) {}

  /** True once the buffer has failed or stayed empty long enough to give up on it. */
  get exhausted(): boolean {
    return this.failStreak >= MAX_DUMP_FAILURES || this.emptyStreak >= MAX_EMPTY_DUMPS;
  }

  get boundary(): number {
    return this.boundaryTs;
  }

  async start(): Promise<boolean> {
    this.reset();
    try {
      await this.exec.execute(["shell", "atrace", "--async_start", ...ATRACE_ARGS], { timeoutMs: ATRACE_TIMEOUT_MS });
      return true;
    } catch (err) {
      this.log.line("WARN", `atrace --async_start failed: ${describeError(err)}`);
      return false;
    }
  }

  async poll(): Promise<StreamPoll> {
    let dump: string;
    try {
      dump = await this.exec.execute(["shell", "atrace", "--async_dump", ...ATRACE_ARGS], {
        timeoutMs: ATRACE_TIMEOUT_MS,
      });
    } catch (error) {
      this.failStreak++;
      this.log.throttled("fps", "WARN", `atrace dump failed: ${describeError(error)}`, 1_500);
      return { kind: "failed", error };
    }
    this.failStreak = 0;

    const events = parseFrameEvents(dump, this.boundaryTs);
    if (events.count <= 0) {
      this.emptyStreak++;
      return { kind: "empty" };
    }

    this.emptyStreak = 0;
    if (events.maxTs > 0) this.boundaryTs = events.maxTs;
    const span = events.maxTs - events.minTs;
    const spanText = span > 0 ? `${span.toFixed(3)}s` : "~1s";
    return {
      kind: "frames",
      fps: framesPerSecond(events),
      count: events.count,
      detail: `${events.method} frames=${events.count} span=${spanText}`,
    };
  }

  stop(): Promise<boolean> {
    return attempt(() =>
      this.exec.execute(["shell", "atrace", "--async_stop"], { timeoutMs: ATRACE_TIMEOUT_MS }),
    );
  }

  reset() {
    this.boundaryTs = 0;
    this.failStreak = 0;
    this.emptyStreak = 0;
  }
}
