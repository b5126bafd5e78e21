// src/core/collector/pool.ts
import { timeout, TimeoutError } from "@/lib/wait";

/** Bounded concurrency for async tasks; created once and reused every cycle. */
export class WorkerPool {
  private active = 0;
  private queue: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) throw new Error(`pool size must be a positive integer, got ${size}`);
  }

  get busy(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  submit<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const run = () => {
        this.active++;
        void Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.queue.shift()?.();
          });
      };
      if (this.active < this.size) run();
      else this.queue.push(run);
    });
  }
}

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/** Awaits `p` for at most `ms`. The task itself keeps running on timeout; only its result is abandoned. */
export async function settle<T>(p: Promise<T>, ms: number, label?: string): Promise<Settled<T>> {
  try {
    return { ok: true, value: await timeout(p, ms, new TimeoutError(ms, label)) };
  } catch (error) {
    return { ok: false, error };
  }
}
