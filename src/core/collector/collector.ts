// src/core/collector/collector.ts
import type { RemoteExecutor } from "@/core/remote/adb";
import { describeError } from "@/lib/errors";
import {
  clampPct,
  parseBattery,
  parseCpuFreqs,
  parseCpuTotals,
  parseMeminfo,
  parseNetDev,
  parsePssKb,
  parseProcStatTicks,
  type MetricValues,
} from "./parsers";
import { WorkerPool, settle } from "./pool";

export const POOL_SIZE = 7;
export const TASK_RESULT_TIMEOUT_MS = 4_000;

export type TaskName = "cpu" | "pss" | "fps" | "battery" | "mem" | "cpu_sys" | "net";

export type CollectRequest = {
  target: string;
  wanted: ReadonlySet<string>;
  /** Cycle timestamp (epoch ms); every rate metric in the cycle is computed against it. */
  nowMs: number;
  frameRate?: () => Promise<number | null>;
};

export type CollectResult = {
  values: MetricValues;
  failed: Array<{ task: TaskName; reason: string }>;
};

type Counter = { value: number; atMs: number };
type CpuTotalState = { total: number; idle: number };
type NetState = { rx: number; tx: number; atMs: number };

/** Which tasks a set of wanted keys switches on. */
export function wantedTasks(wanted: ReadonlySet<string>): Set<TaskName> {
  const keys = [...wanted];
  const tasks = new Set<TaskName>();
  if (wanted.has("cpu_fg_app_pct")) tasks.add("cpu");
  if (wanted.has("app_pss_mb")) tasks.add("pss");
  if (wanted.has("fps_app")) tasks.add("fps");
  if (keys.some((k) => k.startsWith("battery_"))) tasks.add("battery");
  if (wanted.has("mem_total_mb") || wanted.has("mem_avail_mb")) tasks.add("mem");
  if (wanted.has("cpu_total_pct") || keys.some((k) => k.startsWith("cpu_freq_khz_"))) tasks.add("cpu_sys");
  if (wanted.has("net_rx_kbps") || wanted.has("net_tx_kbps")) tasks.add("net");
  return tasks;
}

export class MetricCollector {
  private readonly pool: WorkerPool;
  private hz = 100;
  private cores = 1;

  private appCpu: Counter | null = null;
  private cpuTotal: CpuTotalState | null = null;
  private net: NetState | null = null;
  /** Bumped by reset(); a task started under an older epoch leaves the baselines alone. */
  private epoch = 0;

  constructor(
    private readonly exec: RemoteExecutor,
    private readonly resultTimeoutMs = TASK_RESULT_TIMEOUT_MS,
    pool?: WorkerPool,
  ) {
    this.pool = pool ?? new WorkerPool(POOL_SIZE);
  }

  get clock(): { hz: number; cores: number } {
    return { hz: this.hz, cores: this.cores };
  }

  /** Reads CLK_TCK and the online core count; keeps 100 and 1 when either is unreadable. */
  async prime() {
    this.hz = await this.getconf("CLK_TCK", 100);
    this.cores = Math.max(1, await this.getconf("_NPROCESSORS_ONLN", 1));
  }

  /** Forgets every previous counter, so the next cycle yields no rate metrics. */
  reset() {
    this.epoch++;
    this.appCpu = null;
    this.cpuTotal = null;
    this.net = null;
  }

  async collect(req: CollectRequest): Promise<CollectResult> {
    const tasks = wantedTasks(req.wanted);
    const runners: Array<[TaskName, () => Promise<MetricValues>]> = [
      ["cpu", () => this.sampleAppCpu(req.target, req.nowMs)],
      ["pss", () => this.samplePss(req.target)],
      ["fps", () => this.sampleFps(req.frameRate)],
      ["battery", () => this.read(["dumpsys", "battery"], 3_000).then(parseBattery)],
      ["mem", () => this.read(["cat", "/proc/meminfo"], 2_500).then(parseMeminfo)],
      ["cpu_sys", () => this.sampleCpuSys(req.wanted)],
      ["net", () => this.sampleNet(req.nowMs)],
    ];

    const inflight = runners
      .filter(([name]) => tasks.has(name))
      .map(([name, fn]) => ({ name, result: settle(this.pool.submit(fn), this.resultTimeoutMs, `${name} task`) }));

    const values: MetricValues = {};
    const failed: CollectResult["failed"] = [];
    for (const { name, result } of inflight) {
      const r = await result;
      if (r.ok) Object.assign(values, r.value);
      else failed.push({ task: name, reason: describeError(r.error).split("\n")[0] ?? "" });
    }
    return { values, failed };
  }

  /* ───────────────────── tasks ───────────────────── */

  private async sampleAppCpu(target: string, nowMs: number): Promise<MetricValues> {
    const epoch = this.epoch;
    const pid = (await this.read(["pidof", target], 2_500)).trim().split(/\s+/)[0];
    if (!pid) return {};
    const stat = await this.read(["cat", `/proc/${pid}/stat`], 2_500);
    const ticks = parseProcStatTicks(stat.trim().split(/\r?\n/)[0] ?? "");
    if (ticks === null || epoch !== this.epoch) return {};

    const prev = this.appCpu;
    this.appCpu = { value: ticks, atMs: nowMs };
    if (!prev) return {};
    const wallS = Math.max(1, nowMs - prev.atMs) / 1000;
    const cpuS = Math.max(0, ticks - prev.value) / Math.max(1, this.hz);
    return { cpu_fg_app_pct: clampPct((cpuS / (wallS * this.cores)) * 100) };
  }

  private async samplePss(target: string): Promise<MetricValues> {
    const kb = parsePssKb(await this.read(["dumpsys", "meminfo", target], 3_000));
    return kb !== null && kb > 0 ? { app_pss_mb: kb / 1024 } : {};
  }

  private async sampleFps(frameRate?: () => Promise<number | null>): Promise<MetricValues> {
    if (!frameRate) return {};
    const fps = await frameRate();
    return fps !== null ? { fps_app: fps } : {};
  }

  private async sampleCpuSys(wanted: ReadonlySet<string>): Promise<MetricValues> {
    const epoch = this.epoch;
    const out: MetricValues = {};
    if (wanted.has("cpu_total_pct")) {
      const line = (await this.read(["head", "-1", "/proc/stat"], 2_500)).trim().split(/\r?\n/)[0] ?? "";
      const totals = parseCpuTotals(line);
      if (totals && epoch === this.epoch) {
        const prev = this.cpuTotal;
        this.cpuTotal = totals;
        const dTotal = prev ? totals.total - prev.total : 0;
        if (prev && dTotal > 0) {
          out.cpu_total_pct = clampPct((1 - (totals.idle - prev.idle) / dTotal) * 100);
        }
      }
    }
    if ([...wanted].some((k) => k.startsWith("cpu_freq_khz_"))) {
      Object.assign(out, parseCpuFreqs(await this.read(["cat", "/sys/devices/system/cpu/cpu*/cpufreq/scaling_cur_freq"], 2_500)));
    }
    return out;
  }

  private async sampleNet(nowMs: number): Promise<MetricValues> {
    const epoch = this.epoch;
    const totals = parseNetDev(await this.read(["cat", "/proc/net/dev"], 2_500));
    if (!totals || epoch !== this.epoch) return {};
    const prev = this.net;
    this.net = { rx: totals.rxBytes, tx: totals.txBytes, atMs: nowMs };
    if (!prev) return {};
    const dtS = Math.max(1, nowMs - prev.atMs) / 1000;
    return {
      net_rx_kbps: (Math.max(0, totals.rxBytes - prev.rx) / 1024 / dtS) * 8,
      net_tx_kbps: (Math.max(0, totals.txBytes - prev.tx) / 1024 / dtS) * 8,
    };
  }

  /* ───────────────────── helpers ───────────────────── */

  private read(shellArgs: string[], timeoutMs: number): Promise<string> {
    return this.exec.execute(["shell", ...shellArgs], { timeoutMs });
  }

  private async getconf(name: string, fallback: number): Promise<number> {
    try {
      const n = Number.parseInt((await this.read(["getconf", name], 3_000)).trim(), 10);
      return Number.isFinite(n) && n > 0 ? n : fallback;
    } catch {
      return fallback;
    }
  }
}
