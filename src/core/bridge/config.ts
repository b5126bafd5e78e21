// src/core/bridge/config.ts
import { z } from "zod";

export type SampleConfig = Readonly<{
  enabled: boolean;
  targetIdentifier: string;
  /** Always ≥ 1. */
  intervalMs: number;
  wantedKeys: ReadonlySet<string>;
}>;

export const DEFAULT_INTERVAL_MS = 1_000;

/**
 * Remote config written by the monitor app. Individual fields degrade to their
 * defaults instead of rejecting the whole document; only a non-object root is
 * rejected.
 */
const RemoteConfigSchema = z.object({
  enabled: z.boolean().catch(false),
  targetPackage: z.string().trim().catch(""),
  samplingMs: z.coerce.number().int().catch(DEFAULT_INTERVAL_MS),
  metricKeys: z.array(z.string()).catch([]),
});

export type RemoteConfig = z.infer<typeof RemoteConfigSchema>;

/** Parses config text; null for blank text, invalid JSON or a non-object root. */
export function parseSampleConfig(text: string): SampleConfig | null {
  const raw = (text ?? "").trim();
  if (!raw) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!json || typeof json !== "object" || Array.isArray(json)) return null;

  const parsed = RemoteConfigSchema.safeParse(json);
  if (!parsed.success) return null;
  return toSampleConfig(parsed.data);
}

export function toSampleConfig(cfg: RemoteConfig): SampleConfig {
  const samplingMs = cfg.samplingMs > 0 ? cfg.samplingMs : DEFAULT_INTERVAL_MS;
  return Object.freeze({
    enabled: cfg.enabled,
    targetIdentifier: cfg.targetPackage,
    intervalMs: Math.max(1, samplingMs),
    wantedKeys: new Set(cfg.metricKeys.map((k) => k.trim()).filter(Boolean)),
  });
}

export function isSamplable(cfg: SampleConfig | null): cfg is SampleConfig {
  return Boolean(cfg && cfg.enabled && cfg.targetIdentifier);
}

/** `enabled|target|keys`, compared to log config changes once. */
export function configSignature(cfg: SampleConfig): string {
  const keys = [...cfg.wantedKeys].sort();
  return `${cfg.enabled}|${cfg.targetIdentifier}|${keys.length ? keys.join(",") : "-"}`;
}
