// src/core/fps/index.ts
export * from "./types";
export { FrameRateEstimator, isActiveTarget } from "./estimator";
export { FrameRateConsumer } from "./consumer";
export { GfxCounterStrategy } from "./legacy";
export { LayerTracker, layerCandidates } from "./layers";
export { TraceProcessorShell, resolveTraceProcessor, type TraceQuery } from "./traceQuery";
