// src/core/fps/types.ts

/** Outcome of one strategy attempt. `fps: null` means "no usable value"; `detail` says why. */
export type FrameRateReading = {
  fps: number | null;
  detail: string;
};

/** The estimator's shared slot. Replaced as a whole, never mutated. */
export type LatestFrameRate = Readonly<{
  fps: number | null;
  /** Epoch ms when `fps` was produced; 0 before the first value. */
  atMs: number;
  detail: string;
}>;

export type FrameRateTarget = Readonly<{
  target: string;
  layerHint: string;
  layerCandidates: readonly string[];
  intervalMs: number;
  enabled: boolean;
}>;

export type EstimatorMode = "idle" | "streaming" | "offline";

/** What the sampler loop needs from an estimator. */
export interface FrameRateSource {
  configure(target: FrameRateTarget): void;
  readLatest(): LatestFrameRate;
  readonly sampleCount: number;
}

/** An estimator that owns a background task. `stop` resolves false when the join window ran out. */
export interface FrameRateTask extends FrameRateSource {
  start(): void;
  stop(joinMs?: number): Promise<boolean>;
}

export const EMPTY_LATEST: LatestFrameRate = Object.freeze({ fps: null, atMs: 0, detail: "" });

export const DISABLED_TARGET: FrameRateTarget = Object.freeze({
  target: "",
  layerHint: "",
  layerCandidates: [],
  intervalMs: 1_000,
  enabled: false,
});
