// src/core/fps/consumer.ts
import { sleep, type Wait } from "@/lib/wait";
import type { GfxCounterStrategy } from "./legacy";
import type { FrameRateSource } from "./types";

export const CONSUMER_POLL_MS = 50;
export const CONSUMER_POLLS = 6;
/** The estimator counts as producing once it has published this many values. */
export const PRODUCING_AFTER = 2;

/**
 * Sampler-side view of the estimator. Before the estimator is producing, the
 * gfxinfo counter is tried first and only fresh estimator values are taken;
 * afterwards the legacy counter is skipped and a stale value is accepted once
 * the short wait runs out.
 */
export class FrameRateConsumer {
  private consumedAtMs = 0;
  private isProducing = false;

  constructor(
    private readonly source: FrameRateSource,
    private readonly legacy: GfxCounterStrategy,
    private readonly wait: Wait = sleep,
  ) {}

  get producing(): boolean {
    return this.isProducing;
  }

  get lastConsumedAtMs(): number {
    return this.consumedAtMs;
  }

  async read(target: string, nowMs: number, signal?: AbortSignal): Promise<number | null> {
    if (!this.isProducing && this.source.sampleCount >= PRODUCING_AFTER) this.isProducing = true;

    if (this.isProducing) {
      const fresh = await this.waitFresh(signal);
      if (fresh !== null) return fresh;
      const { fps } = this.source.readLatest();
      return fps !== null && fps >= 0 ? fps : null;
    }

    const counted = await this.legacy.sample(target, nowMs);
    if (counted !== null) return counted;
    return this.waitFresh(signal);
  }

  reset() {
    this.consumedAtMs = 0;
    this.isProducing = false;
    this.legacy.reset();
  }

  private takeFresh(): number | null {
    const { fps, atMs } = this.source.readLatest();
    if (fps === null || fps < 0 || atMs <= this.consumedAtMs) return null;
    this.consumedAtMs = atMs;
    return Math.max(0, fps);
  }

  private async waitFresh(signal?: AbortSignal): Promise<number | null> {
    const first = this.takeFresh();
    if (first !== null) return first;
    for (let i = 0; i < CONSUMER_POLLS; i++) {
      if (!(await this.wait(CONSUMER_POLL_MS, signal))) return null;
      const next = this.takeFresh();
      if (next !== null) return next;
    }
    return null;
  }
}
