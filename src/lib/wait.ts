// src/lib/wait.ts

/** Abortable sleep. Resolves true when the full delay elapsed, false when aborted. */
export type Wait = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const sleep: Wait = (ms, signal) =>
  new Promise<boolean>((res) => {
    if (signal?.aborted) return res(false);
    const onAbort = () => {
      clearTimeout(timer);
      res(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      res(true);
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export class TimeoutError extends Error {
  constructor(readonly ms: number, label = "operation") {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/** Races `p` against a timer; the timer is always cleared. */
export async function timeout<T>(p: Promise<T>, ms: number, err: Error = new TimeoutError(ms)): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      p,
      new Promise<T>((_, rej) => {
        timer = setTimeout(() => rej(err), ms);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}
