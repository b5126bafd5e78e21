import { describe, it, expect } from "vitest";
import { ScriptedExecutor } from "@/core/remote/scripted";
import { DiagnosticLog } from "@/lib/log/diagnostics";
import { FrameRateEstimator, IDLE_POLL_MS, OFFLINE_BACKOFF_MS, OFFLINE_PAUSE_MS, STREAM_INTERVAL_MS } from "./estimator";
import { OfflineStrategy } from "./offline";
import type { TraceQuery } from "./traceQuery";
import { DISABLED_TARGET, type FrameRateTarget } from "./types";

const START = "shell atrace --async_start";
const DUMP = "shell atrace --async_dump";
const STOP = "shell atrace --async_stop";

const GAME: FrameRateTarget = {
  target: "com.game",
  layerHint: "",
  layerCandidates: ["com.game"],
  intervalMs: 1_000,
  enabled: true,
};

const frames = (from: number, n: number) =>
  Array.from(
    { length: n },
    (_, i) => `  RenderThread-77  (70) [001] ...1  ${(from + i * 0.1).toFixed(6)}: tracing_mark_write: B|70|queueBuffer`,
  ).join("\n");

const timeline: TraceQuery = {
  query: async (_path, sql) => {
    if (sql.includes("sqlite_master")) return "actual_frame_timeline_slice";
    if (sql.startsWith("pragma")) return "0|ts|INT\n1|layer_name|STRING";
    return "30|1000000000|2000000000";
  },
};

function setup(query: TraceQuery | null = null) {
  const exec = new ScriptedExecutor("emulator-5554").on(STOP, "");
  const lines: string[] = [];
  const log = new DiagnosticLog({ write: (l) => lines.push(l), stamp: () => "00:00:00" });
  const offline = new OfflineStrategy({ exec, query, localDir: "/tmp", fileExists: () => true, wait: async () => true });
  const est = new FrameRateEstimator({ exec, log, query, now: () => 50_000, offline });
  return { exec, lines, est };
}

describe("FrameRateEstimator.step", () => {
  it("idles without a target", async () => {
    const { exec, est } = setup();
    expect(await est.step()).toBe(IDLE_POLL_MS);
    est.configure({ ...GAME, enabled: false });
    expect(await est.step()).toBe(IDLE_POLL_MS);
    expect(est.mode).toBe("idle");
    expect(exec.calls).toEqual([]);
  });

  it("streams from atrace and publishes a frozen slot", async () => {
    const { exec, est } = setup();
    exec.on(START, "").on(DUMP, frames(10, 6));
    est.configure(GAME);

    expect(await est.step()).toBe(STREAM_INTERVAL_MS);
    expect(est.mode).toBe("streaming");
    expect(est.readLatest()).toEqual({ fps: null, atMs: 0, detail: "" });

    expect(await est.step()).toBe(STREAM_INTERVAL_MS);
    const latest = est.readLatest();
    expect(latest.fps).toBeCloseTo(12, 6);
    expect(latest.atMs).toBe(50_000);
    expect(latest.detail).toBe("atrace_marker frames=6 span=0.500s");
    expect(Object.isFrozen(latest)).toBe(true);
    expect(est.sampleCount).toBe(1);
  });

  it("does not count empty polls as samples", async () => {
    const { exec, est } = setup();
    exec.on(START, "").on(DUMP, frames(10, 6), frames(10, 6));
    est.configure(GAME);
    await est.step();
    await est.step();
    await est.step();
    expect(est.sampleCount).toBe(1);
  });

  it("moves to offline captures once the stream dries up", async () => {
    const { exec, est, lines } = setup();
    exec.on(START, "").on(DUMP, "# tracer: nop");
    est.configure(GAME);
    await est.step();

    const delays: number[] = [];
    for (let i = 0; i < 10; i++) delays.push(await est.step());
    expect(delays.slice(0, 9).every((d) => d === STREAM_INTERVAL_MS)).toBe(true);
    expect(delays[9]).toBe(0);
    expect(est.mode).toBe("offline");
    expect(exec.count(STOP)).toBe(1);
    expect(lines).toContain("00:00:00 [INFO] atrace has no frame events, switching to offline perfetto captures");

    expect(await est.step()).toBe(OFFLINE_BACKOFF_MS);
    expect(lines.at(-1)).toBe("00:00:00 [WARN] frame rate unavailable: trace processor not found");
  });

  it("falls back to offline when atrace cannot start", async () => {
    const { exec, est } = setup(timeline);
    exec
      .on(START, { fail: "not_found" })
      .on("shell rm -f", "")
      .on("shell getprop", "1")
      .on('shell sh -c "perfetto', "")
      .on("pull", "");
    est.configure(GAME);

    await est.step();
    expect(est.mode).toBe("offline");
    expect(await est.step()).toBe(OFFLINE_PAUSE_MS);
    expect(est.readLatest().fps).toBe(30);
    expect(est.readLatest().detail).toBe("table=actual_frame_timeline_slice filter=layer_eq=com.game count=30 spanMs=1000");
    expect(est.sampleCount).toBe(1);
  });

  it("backs off after a failed capture", async () => {
    const { exec, est, lines } = setup(timeline);
    exec
      .on(START, { fail: "not_found" })
      .on("shell rm -f", "")
      .on("shell getprop", "1")
      .on('shell sh -c "perfetto', { fail: "remote_failure", detail: "traced unavailable" });
    est.configure(GAME);
    await est.step();
    expect(await est.step()).toBe(OFFLINE_BACKOFF_MS);
    expect(lines.at(-1)).toBe(
      "00:00:00 [ERR] perfetto failed: traced unavailable\n\ncommand: adb -s emulator-5554 shell sh -c \"perfetto --txt -c - -o '/data/local/tmp/pm_ft_emulator-5554.perfetto-trace'\"",
    );
  });

  it("paces streaming polls to the sampling interval", async () => {
    const { exec, est } = setup();
    exec.on(START, "").on(DUMP, frames(10, 6), "# tracer: nop");
    est.configure({ ...GAME, intervalMs: 3_000 });
    expect(await est.step()).toBe(STREAM_INTERVAL_MS);
    expect(await est.step()).toBe(3_000);
    expect(await est.step()).toBe(3_000);

    est.configure({ ...GAME, intervalMs: 200 });
    expect(await est.step()).toBe(STREAM_INTERVAL_MS);
  });

  it("keeps looking for the trace processor until it appears", async () => {
    const exec = new ScriptedExecutor("emulator-5554")
      .on(START, { fail: "not_found" })
      .on("shell rm -f", "")
      .on("shell getprop", "1")
      .on('shell sh -c "perfetto', "")
      .on("pull", "");
    const log = new DiagnosticLog({ write: () => undefined });
    let lookups = 0;
    const resolveQuery = () => (++lookups >= 3 ? timeline : null);
    const offline = new OfflineStrategy({
      exec,
      query: null,
      resolveQuery,
      localDir: "/tmp",
      fileExists: () => true,
      wait: async () => true,
    });
    const est = new FrameRateEstimator({ exec, log, query: null, now: () => 50_000, offline });
    est.configure(GAME);

    await est.step();
    expect(await est.step()).toBe(OFFLINE_BACKOFF_MS);
    expect(await est.step()).toBe(OFFLINE_BACKOFF_MS);
    expect(exec.count('shell sh -c "perfetto')).toBe(0);

    expect(await est.step()).toBe(OFFLINE_PAUSE_MS);
    expect(est.readLatest().fps).toBe(30);
    await est.step();
    expect(lookups).toBe(3);
    expect(exec.count('shell sh -c "perfetto')).toBe(2);
  });

  it("starts a fresh session after being disabled", async () => {
    const { exec, est } = setup();
    exec.on(START, "").on(DUMP, frames(10, 6));
    est.configure(GAME);
    await est.step();
    await est.step();
    expect(est.sampleCount).toBe(1);

    est.configure(DISABLED_TARGET);
    est.configure(GAME);
    expect(est.sampleCount).toBe(0);
    expect(est.readLatest().fps).toBeNull();

    await est.step();
    expect(exec.count(STOP)).toBe(1);
    expect(exec.count(START)).toBe(2);
    expect(est.mode).toBe("streaming");
  });

  it("keeps the session while the target stays enabled", async () => {
    const { exec, est } = setup();
    exec.on(START, "").on(DUMP, frames(10, 6));
    est.configure(GAME);
    await est.step();
    await est.step();
    est.configure({ ...GAME, intervalMs: 500 });
    expect(est.sampleCount).toBe(1);
    await est.step();
    expect(exec.count(START)).toBe(1);
  });
});

describe("FrameRateEstimator lifecycle", () => {
  it("stops within the join window", async () => {
    const { est } = setup();
    est.start();
    expect(est.running).toBe(true);
    expect(await est.stop(1_000)).toBe(true);
    expect(est.running).toBe(false);
  });

  it("reports a task that outlives the join window", async () => {
    const exec = new ScriptedExecutor();
    const lines: string[] = [];
    const log = new DiagnosticLog({ write: (l) => lines.push(l), stamp: () => "00:00:00" });
    const est = new FrameRateEstimator({ exec, log, query: null, wait: () => new Promise<boolean>(() => undefined) });
    est.start();
    expect(await est.stop(20)).toBe(false);
    expect(lines).toEqual(["00:00:00 [WARN] frame-rate task did not stop within 20ms"]);
  });
});
