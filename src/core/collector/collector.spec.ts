import { describe, it, expect } from "vitest";
import { ScriptedExecutor } from "@/core/remote/scripted";
import { MetricCollector, wantedTasks } from "./collector";

const netDev = (rx: number, tx: number) =>
  [
    "Inter-|   Receive  |  Transmit",
    " face |bytes    packets errs drop fifo frame compressed multicast|bytes",
    `  wlan0: ${rx} 1 0 0 0 0 0 0 ${tx} 1 0 0 0 0 0 0`,
  ].join("\n");

const procStat = (utime: number, stime: number) => `4242 (com.game) S 1 2 3 4 5 6 7 8 9 10 ${utime} ${stime} 0 0 20 0`;

const want = (...keys: string[]) => new Set(keys);

describe("wantedTasks", () => {
  it("switches tasks on by key", () => {
    expect([...wantedTasks(want("battery_temp_c", "cpu_freq_khz_3"))].sort()).toEqual(["battery", "cpu_sys"]);
    expect([...wantedTasks(want("fps_app", "net_tx_kbps", "mem_avail_mb"))].sort()).toEqual(["fps", "mem", "net"]);
    expect(wantedTasks(want()).size).toBe(0);
  });
});

describe("MetricCollector", () => {
  it("primes the clock and core count, keeping defaults on failure", async () => {
    const exec = new ScriptedExecutor().on("shell getconf CLK_TCK", "100\n").on("shell getconf _NPROCESSORS_ONLN", "4\n");
    const c = new MetricCollector(exec);
    await c.prime();
    expect(c.clock).toEqual({ hz: 100, cores: 4 });

    const broken = new MetricCollector(new ScriptedExecutor().on("shell getconf", { fail: "not_found" }));
    await broken.prime();
    expect(broken.clock).toEqual({ hz: 100, cores: 1 });
  });

  it("derives app CPU from consecutive tick counts", async () => {
    const exec = new ScriptedExecutor()
      .on("shell getconf CLK_TCK", "100")
      .on("shell getconf _NPROCESSORS_ONLN", "4")
      .on("shell pidof com.game", "4242\n")
      .on("shell cat /proc/4242/stat", procStat(800, 200), procStat(950, 250));
    const c = new MetricCollector(exec);
    await c.prime();

    const first = await c.collect({ target: "com.game", wanted: want("cpu_fg_app_pct"), nowMs: 10_000 });
    expect(first).toEqual({ values: {}, failed: [] });

    const second = await c.collect({ target: "com.game", wanted: want("cpu_fg_app_pct"), nowMs: 11_000 });
    expect(second.values).toEqual({ cpu_fg_app_pct: 50 });
  });

  it("reports system CPU within [0, 100] from the second cycle on", async () => {
    const exec = new ScriptedExecutor().on(
      "shell head -1 /proc/stat",
      "cpu  100 0 50 800 50 0 0 0 0 0\n",
      "cpu  200 0 100 1100 100 0 0 0 0 0\n",
    );
    const c = new MetricCollector(exec);
    expect((await c.collect({ target: "com.game", wanted: want("cpu_total_pct"), nowMs: 0 })).values).toEqual({});

    const { values } = await c.collect({ target: "com.game", wanted: want("cpu_total_pct"), nowMs: 1_000 });
    expect(values.cpu_total_pct).toBeCloseTo(40, 9);
  });

  it("reads frequencies only when a frequency key is wanted", async () => {
    const exec = new ScriptedExecutor()
      .on("shell head -1 /proc/stat", "cpu  100 0 50 800 50 0 0")
      .on("shell cat /sys/devices/system/cpu", "1800000\n2400000\n");
    const c = new MetricCollector(exec);
    const { values } = await c.collect({ target: "com.game", wanted: want("cpu_freq_khz_0"), nowMs: 0 });
    expect(values).toEqual({ cpu_freq_khz_0: 1800000, cpu_freq_khz_1: 2400000 });
    expect(exec.count("shell head -1 /proc/stat")).toBe(0);
  });

  it("turns byte counters into kbps", async () => {
    const exec = new ScriptedExecutor().on("shell cat /proc/net/dev", netDev(1_024_000, 512_000), netDev(1_126_400, 563_200));
    const c = new MetricCollector(exec);
    const wanted = want("net_rx_kbps", "net_tx_kbps");
    await c.collect({ target: "com.game", wanted, nowMs: 0 });
    const { values } = await c.collect({ target: "com.game", wanted, nowMs: 2_000 });
    expect(values).toEqual({ net_rx_kbps: 400, net_tx_kbps: 200 });
  });

  it("collects only the wanted sources", async () => {
    const exec = new ScriptedExecutor()
      .on("shell dumpsys battery", "  level: 64\n  temperature: 290\n  voltage: 3900")
      .on("shell dumpsys meminfo com.game", "TOTAL PSS: 204800");
    const c = new MetricCollector(exec);
    const { values } = await c.collect({ target: "com.game", wanted: want("battery_pct", "app_pss_mb"), nowMs: 0 });
    expect(values).toEqual({ battery_pct: 64, battery_temp_c: 29, battery_voltage_v: 3.9, app_pss_mb: 200 });
    expect(exec.lines().sort()).toEqual(["shell dumpsys battery", "shell dumpsys meminfo com.game"]);

    expect(await c.collect({ target: "com.game", wanted: want(), nowMs: 0 })).toEqual({ values: {}, failed: [] });
    expect(exec.calls).toHaveLength(2);
  });

  it("asks the frame-rate reader for fps_app", async () => {
    const c = new MetricCollector(new ScriptedExecutor());
    const wanted = want("fps_app");
    expect((await c.collect({ target: "com.game", wanted, nowMs: 0, frameRate: async () => 58.7 })).values).toEqual({
      fps_app: 58.7,
    });
    expect((await c.collect({ target: "com.game", wanted, nowMs: 0, frameRate: async () => null })).values).toEqual({});
  });

  it("lists failed and timed-out tasks without dropping the rest", async () => {
    const exec = new ScriptedExecutor()
      .on("shell dumpsys battery", () => new Promise<string>(() => undefined))
      .on("shell cat /proc/meminfo", { fail: "permission_denied", detail: "cat: /proc/meminfo: Permission denied" })
      .on("shell dumpsys meminfo com.game", "TOTAL PSS: 102400");
    const c = new MetricCollector(exec, 20);
    const res = await c.collect({
      target: "com.game",
      wanted: want("battery_pct", "mem_total_mb", "app_pss_mb"),
      nowMs: 0,
    });
    expect(res.values).toEqual({ app_pss_mb: 100 });
    expect(res.failed).toEqual([
      { task: "battery", reason: "battery task timed out after 20ms" },
      { task: "mem", reason: "cat: /proc/meminfo: Permission denied" },
    ]);
  });

  it("ignores a baseline that lands after reset", async () => {
    let release: (text: string) => void = () => undefined;
    const late = new Promise<string>((res) => {
      release = res;
    });
    const exec = new ScriptedExecutor().on("shell cat /proc/net/dev", () => late, netDev(2_048, 2_048), netDev(3_072, 3_072));
    const c = new MetricCollector(exec, 20);
    const wanted = want("net_rx_kbps", "net_tx_kbps");

    const timedOut = await c.collect({ target: "com.game", wanted, nowMs: 0 });
    expect(timedOut.failed.map((f) => f.task)).toEqual(["net"]);
    c.reset();
    release(netDev(1_024, 1_024));
    await new Promise((res) => setTimeout(res, 0));

    expect((await c.collect({ target: "com.game", wanted, nowMs: 1_000 })).values).toEqual({});
    expect((await c.collect({ target: "com.game", wanted, nowMs: 2_000 })).values).toEqual({
      net_rx_kbps: 8,
      net_tx_kbps: 8,
    });
  });

  it("reset drops every rate baseline", async () => {
    const exec = new ScriptedExecutor().on("shell cat /proc/net/dev", netDev(1_000, 1_000), netDev(2_000, 2_000));
    const c = new MetricCollector(exec);
    const wanted = want("net_rx_kbps");
    await c.collect({ target: "com.game", wanted, nowMs: 0 });
    c.reset();
    expect((await c.collect({ target: "com.game", wanted, nowMs: 1_000 })).values).toEqual({});
  });
});
