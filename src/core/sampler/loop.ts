// src/core/sampler/loop.ts
//
// Top-level cycle: read config → decide → fan out metric tasks → write the
// metrics file → pace. `idle ⇄ sampling`, `stopped` once the signal aborts.

import { BridgeNegotiator } from "@/core/bridge/negotiator";
import { configSignature, isSamplable } from "@/core/bridge/config";
import type { BridgeSettings } from "@/core/bridge/settings";
import { MetricCollector } from "@/core/collector/collector";
import type { MetricValues } from "@/core/collector/parsers";
import { FrameRateConsumer } from "@/core/fps/consumer";
import { GfxCounterStrategy } from "@/core/fps/legacy";
import { LayerTracker } from "@/core/fps/layers";
import { DEFAULT_JOIN_MS } from "@/core/fps/estimator";
import { DISABLED_TARGET, type FrameRateTask } from "@/core/fps/types";
import type { RemoteExecutor } from "@/core/remote/adb";
import { LOG_WINDOWS, type DiagnosticLog } from "@/lib/log/diagnostics";
import { sleep, type Wait } from "@/lib/wait";
import { LastGoodConfig } from "./lastGood";

export type SamplerState = "idle" | "sampling" | "stopped";

export type MetricSample = Readonly<{
  targetIdentifier: string;
  timestampMs: number;
  values: Readonly<MetricValues>;
}>;

export type CycleOutcome = {
  state: SamplerState;
  sample?: MetricSample;
  wrote: boolean;
  sleepMs: number;
};

export const IDLE_SLEEP_MS = 2_000;
export const MIN_SLEEP_MS = 50;

export type SamplerOpts = {
  exec: RemoteExecutor;
  settings: BridgeSettings;
  log: DiagnosticLog;
  estimator: FrameRateTask;
  now?: () => number;
  wait?: Wait;
  stopJoinMs?: number;
  collector?: MetricCollector;
};

export function serializeSample(sample: MetricSample): string {
  const v: MetricValues = {};
  for (const [k, n] of Object.entries(sample.values)) if (Number.isFinite(n)) v[k] = n;
  return JSON.stringify({ pkg: sample.targetIdentifier, t: sample.timestampMs, v });
}

export class SamplerLoop {
  readonly serial: string;
  private readonly log: DiagnosticLog;
  private readonly estimator: FrameRateTask;
  private readonly now: () => number;
  private readonly wait: Wait;
  private readonly stopJoinMs: number;

  private readonly negotiator: BridgeNegotiator;
  private readonly collector: MetricCollector;
  private readonly consumer: FrameRateConsumer;
  private readonly layers = new LayerTracker();
  private readonly lastGood = new LastGoodConfig();

  private phase: SamplerState = "idle";
  private lastSignature = "";

  constructor(opts: SamplerOpts) {
    const serial = opts.exec.serial.trim();
    if (!serial) throw new Error("invalid device serial: a non-empty adb serial is required");
    this.serial = serial;

    this.log = opts.log;
    this.estimator = opts.estimator;
    this.now = opts.now ?? (() => Date.now());
    this.wait = opts.wait ?? sleep;
    this.stopJoinMs = opts.stopJoinMs ?? DEFAULT_JOIN_MS;

    this.negotiator = new BridgeNegotiator(opts.exec, opts.settings, opts.log);
    this.collector = opts.collector ?? new MetricCollector(opts.exec);
    this.consumer = new FrameRateConsumer(opts.estimator, new GfxCounterStrategy(opts.exec, opts.log), this.wait);
  }

  get state(): SamplerState {
    return this.phase;
  }

  get paths() {
    return { config: this.negotiator.configPathMode, metrics: this.negotiator.metricsPathMode };
  }

  /** Runs until `signal` aborts, then stops the estimator within the join window. */
  async run(signal: AbortSignal): Promise<void> {
    await this.negotiator.prepare();
    await this.collector.prime();
    this.estimator.start();
    this.log.line("OK", `sampler started serial=${this.serial} (waiting for the device to start monitoring)`);

    try {
      while (!signal.aborted) {
        let sleepMs = IDLE_SLEEP_MS;
        try {
          sleepMs = (await this.cycle(signal)).sleepMs;
        } catch (err) {
          this.log.failure("sampling cycle failed", err);
        }
        if (!(await this.wait(sleepMs, signal))) break;
      }
    } finally {
      this.phase = "stopped";
      const joined = await this.estimator.stop(this.stopJoinMs);
      this.log.line(joined ? "OK" : "WARN", joined ? "sampler stopped" : "sampler stopped; frame-rate task still winding down");
    }
  }

  async cycle(signal?: AbortSignal): Promise<CycleOutcome> {
    const read = await this.negotiator.readConfig();
    const cfg = this.lastGood.accept(read.config);

    if (!isSamplable(cfg)) {
      this.enterIdle();
      this.log.throttled("state", "WAIT", "waiting for the device to start monitoring", LOG_WINDOWS.wait);
      return { state: "idle", wrote: false, sleepMs: IDLE_SLEEP_MS };
    }

    this.phase = "sampling";
    const startedAt = this.now();
    const target = cfg.targetIdentifier;
    const keys = [...cfg.wantedKeys].sort();

    const signature = configSignature(cfg);
    if (signature !== this.lastSignature) {
      this.lastSignature = signature;
      this.log.throttled("state", "CFG", `enabled=${cfg.enabled} pkg=${target} keys=${keys.join(",") || "-"}`, 200);
    }

    const layerHint = this.layers.hint;
    this.estimator.configure({
      target,
      layerHint,
      layerCandidates: this.layers.candidatesFor(target),
      intervalMs: cfg.intervalMs,
      enabled: true,
    });

    const { values, failed } = await this.collector.collect({
      target,
      wanted: cfg.wantedKeys,
      nowMs: startedAt,
      frameRate: () => this.consumer.read(target, startedAt, signal),
    });
    if (failed.length) {
      const summary = failed.map((f) => `${f.task} (${f.reason})`).join(", ");
      this.log.throttled("collector", "WARN", `metric tasks failed: ${summary}`, LOG_WINDOWS.error);
    }

    const got = Object.keys(values).sort();
    this.log.throttled(
      "sample",
      "SAMPLE",
      `pkg=${target} want=${keys.length} got=${got.length} gotKeys=${got.join(",") || "-"} ` +
        `wantFps=${cfg.wantedKeys.has("fps_app") ? 1 : 0} fpsSamples=${this.estimator.sampleCount}`,
      LOG_WINDOWS.sample,
    );

    const sample: MetricSample = Object.freeze({
      targetIdentifier: target,
      timestampMs: startedAt,
      values: Object.freeze({ ...values }),
    });
    const wrote = await this.negotiator.writeMetrics(serializeSample(sample));

    const elapsed = this.now() - startedAt;
    return { state: "sampling", sample, wrote, sleepMs: Math.max(MIN_SLEEP_MS, cfg.intervalMs - elapsed) };
  }

  private enterIdle() {
    this.phase = "idle";
    this.lastSignature = "";
    this.collector.reset();
    this.consumer.reset();
    this.layers.reset();
    this.estimator.configure(DISABLED_TARGET);
  }
}
