// src/core/fps/legacy.ts
//
// `dumpsys gfxinfo` cumulative frame counter. Only meaningful for apps on the
// HW renderer; engines drawing through Vulkan/GL directly never move it.

import type { RemoteExecutor } from "@/core/remote/adb";
import type { DiagnosticLog } from "@/lib/log/diagnostics";

export const MAX_GFX_FAILURES = 3;

export type GfxTotals = { total: number | null; janky: number | null };

export function parseGfxTotals(dumpsys: string): GfxTotals {
  const total = /Total\s+frames\s+rendered:\s*(\d+)/.exec(dumpsys ?? "");
  const janky = /Janky\s+frames:\s*(\d+)/.exec(dumpsys ?? "");
  return {
    total: total ? Number(total[1]) : null,
    janky: janky ? Number(janky[1]) : null,
  };
}

export class GfxCounterStrategy {
  private prevTotal: number | null = null;
  private prevAtMs: number | null = null;
  private failStreak = 0;
  private off = false;

  constructor(
    private readonly exec: RemoteExecutor,
    private readonly log: DiagnosticLog,
  ) {}

  get disabled(): boolean {
    return this.off;
  }

  /**
   * Frames per second since the previous reading, or null. Unparsable output,
   * remote errors and zero deltas all count toward disabling the counter.
   */
  async sample(target: string, nowMs: number): Promise<number | null> {
    if (this.off) return null;

    let fps: number | null = null;
    try {
      const out = await this.exec.execute(["shell", "dumpsys", "gfxinfo", target, "framestats"], {
        timeoutMs: 3_000,
      });
      const { total } = parseGfxTotals(out);
      if (total === null) {
        this.failStreak++;
      } else {
        if (this.prevTotal !== null && this.prevAtMs !== null) {
          const dtMs = Math.max(1, nowMs - this.prevAtMs);
          const delta = Math.max(0, total - this.prevTotal);
          if (delta > 0) {
            this.failStreak = 0;
            fps = (delta * 1000) / dtMs;
          } else {
            this.failStreak++;
          }
        }
        this.prevTotal = total;
        this.prevAtMs = nowMs;
      }
    } catch {
      this.failStreak++;
    }

    if (this.failStreak >= MAX_GFX_FAILURES) {
      this.off = true;
      this.log.line("INFO", "gfxinfo counter disabled after repeated failures (normal for Vulkan/GL engines)");
    }
    return fps;
  }

  reset() {
    this.prevTotal = null;
    this.prevAtMs = null;
    this.failStreak = 0;
    this.off = false;
  }
}
