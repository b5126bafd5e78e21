// src/core/sampler/lastGood.ts
import { isSamplable, type SampleConfig } from "@/core/bridge/config";

export const MAX_STALE_READS = 10;

/**
 * Bridges transient config read failures with the last valid config.
 *
 *   valid config             remembered and used
 *   config that is disabled  forgets the cached copy; the caller goes idle
 *   failed read (null)       cached copy for up to MAX_STALE_READS cycles,
 *                            dropped on the next one
 */
export class LastGoodConfig {
  private cached: SampleConfig | null = null;
  private stale = 0;

  constructor(private readonly maxStale = MAX_STALE_READS) {}

  get current(): SampleConfig | null {
    return this.cached;
  }

  get staleReads(): number {
    return this.stale;
  }

  accept(read: SampleConfig | null): SampleConfig | null {
    if (read) {
      this.stale = 0;
      this.cached = isSamplable(read) ? read : null;
      return read;
    }
    if (!this.cached) return null;

    this.stale++;
    if (this.stale <= this.maxStale) return this.cached;
    this.clear();
    return null;
  }

  clear() {
    this.cached = null;
    this.stale = 0;
  }
}
