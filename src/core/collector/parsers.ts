// src/core/collector/parsers.ts
//
// Text parsers for the device-side sources. All of them are total: bad input
// yields null or an empty record.

export type MetricValues = Record<string, number>;

/** utime + stime from a `/proc/<pid>/stat` line; counted after the `)` closing the comm. */
export function parseProcStatTicks(line: string): number | null {
  const r = (line ?? "").lastIndexOf(")");
  if (r <= 0) return null;
  const parts = line.slice(r + 1).trim().split(/\s+/);
  if (parts.length <= 12) return null;
  const utime = Number(parts[11]);
  const stime = Number(parts[12]);
  if (!Number.isInteger(utime) || !Number.isInteger(stime)) return null;
  return utime + stime;
}

/** kB from `dumpsys meminfo <pkg>`: `TOTAL PSS:` on newer builds, the `TOTAL:` row otherwise. */
export function parsePssKb(dumpsys: string): number | null {
  const text = dumpsys ?? "";
  const pss = /TOTAL\s+PSS:\s*(\d+)/.exec(text);
  if (pss) return Number(pss[1]);
  const total = /\bTOTAL:\s*(\d+)/.exec(text);
  return total ? Number(total[1]) : null;
}

export function parseBattery(dumpsys: string): MetricValues {
  const out: MetricValues = {};
  for (const raw of (dumpsys ?? "").split(/\r?\n/)) {
    const line = raw.trim();
    const level = /^level:\s*(\d+)/.exec(line);
    if (level) out.battery_pct = Number(level[1]);
    const temp = /^temperature:\s*(\d+)/.exec(line);
    if (temp) out.battery_temp_c = Number(temp[1]) / 10;
    const volt = /^voltage:\s*(\d+)/.exec(line);
    if (volt) out.battery_voltage_v = Number(volt[1]) / 1000;
  }
  return out;
}

export function parseMeminfo(text: string): MetricValues {
  const out: MetricValues = {};
  for (const line of (text ?? "").split(/\r?\n/)) {
    const total = /^MemTotal:\s*(\d+)\s*kB/.exec(line);
    if (total) out.mem_total_mb = Number(total[1]) / 1024;
    const avail = /^MemAvailable:\s*(\d+)\s*kB/.exec(line);
    if (avail) out.mem_avail_mb = Number(avail[1]) / 1024;
  }
  return out;
}

export type CpuTotals = { total: number; idle: number };

/** Sum of the first seven counters of the aggregate `cpu` line; idle is the fourth. */
export function parseCpuTotals(statLine: string): CpuTotals | null {
  const parts = (statLine ?? "").trim().split(/\s+/);
  if (parts.length < 8 || parts[0] !== "cpu") return null;
  const vals = parts.slice(1, 8).map(Number);
  if (vals.some((v) => !Number.isInteger(v))) return null;
  return { total: vals.reduce((a, b) => a + b, 0), idle: vals[3] ?? 0 };
}

/** One kHz value per line, in core order; non-positive or non-numeric lines are skipped. */
export function parseCpuFreqs(text: string): MetricValues {
  const out: MetricValues = {};
  let idx = 0;
  for (const raw of (text ?? "").split(/\r?\n/)) {
    const line = raw.trim();
    if (!/^\d+$/.test(line)) continue;
    const khz = Number(line);
    if (khz > 0) out[`cpu_freq_khz_${idx++}`] = khz;
  }
  return out;
}

export type NetTotals = { rxBytes: number; txBytes: number };

/**
 * Sums rx/tx bytes over every interface but `lo`; null when both totals are zero.
 * Rows are split at the interface colon, since large rx counters touch it
 * (`wlan0:123456789`).
 */
export function parseNetDev(text: string): NetTotals | null {
  let rx = 0;
  let tx = 0;
  for (const raw of (text ?? "").split(/\r?\n/)) {
    const line = raw.trim();
    const colon = line.indexOf(":");
    if (colon <= 0 || line.startsWith("Inter") || line.startsWith("face")) continue;
    if (line.slice(0, colon).trim() === "lo") continue;
    const counters = line.slice(colon + 1).trim().split(/\s+/);
    if (counters.length < 9) continue;
    const r = Number(counters[0]);
    const t = Number(counters[8]);
    if (!Number.isFinite(r) || !Number.isFinite(t)) continue;
    rx += r;
    tx += t;
  }
  return rx > 0 || tx > 0 ? { rxBytes: rx, txBytes: tx } : null;
}

export function clampPct(v: number): number {
  return Math.max(0, Math.min(100, v));
}
