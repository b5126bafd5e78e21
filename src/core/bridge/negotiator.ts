// src/core/bridge/negotiator.ts
//
// Reads the remote config and writes the metrics file through one of two
// locations: public external storage, or the app sandbox via `run-as`.
// Whichever succeeded last is tried first next time, so a healthy setup pays a
// single adb round-trip per operation.

import { attempt, runAs, shDoubleQuote, type RemoteExecutor } from "@/core/remote/adb";
import { RemoteError, isKind } from "@/core/remote/errors";
import { DiagnosticLog } from "@/lib/log/diagnostics";
import { parseSampleConfig, type SampleConfig } from "./config";
import { externalDirOf, type BridgeSettings } from "./settings";

export type PathMode = "unknown" | "external" | "sandboxed";

export type ConfigSource = "external" | "sandboxed" | "missing" | "not_debuggable" | "error";

export type ConfigRead = {
  config: SampleConfig | null;
  source: ConfigSource;
  error?: RemoteError | Error;
};

export const CONFIG_READ_TIMEOUT_MS = 2_500;
export const METRICS_WRITE_TIMEOUT_MS = 3_000;

type Candidate<T> = { mode: Exclude<PathMode, "unknown">; run: () => Promise<T> };

export class BridgeNegotiator {
  private configMode: PathMode = "unknown";
  private metricsMode: PathMode = "unknown";

  constructor(
    private readonly exec: RemoteExecutor,
    private readonly settings: BridgeSettings,
    private readonly log: DiagnosticLog,
  ) {}

  get configPathMode(): PathMode {
    return this.configMode;
  }

  get metricsPathMode(): PathMode {
    return this.metricsMode;
  }

  /** Postcondition: the external metrics dir exists if the shell could create it. */
  prepare(): Promise<boolean> {
    const dir = externalDirOf(this.settings.metricsExternalPath);
    return attempt(() => this.exec.execute(["shell", "mkdir", "-p", dir], { timeoutMs: 6_000 }));
  }

  async readConfig(): Promise<ConfigRead> {
    const { packageName, configExternalPath, configSandboxedPath } = this.settings;
    const candidates = ordered<string>(this.configMode, {
      external: () =>
        this.exec.execute(["shell", "cat", configExternalPath], { timeoutMs: CONFIG_READ_TIMEOUT_MS }),
      sandboxed: () =>
        runAs(this.exec, packageName, ["cat", configSandboxedPath], { timeoutMs: CONFIG_READ_TIMEOUT_MS }),
    });

    for (const [i, { mode, run }] of candidates.entries()) {
      const isLast = i === candidates.length - 1;
      try {
        const text = await run();
        this.configMode = mode;
        const config = parseSampleConfig(text);
        return config
          ? { config, source: mode }
          : { config: null, source: mode, error: new Error("config is not a JSON object") };
      } catch (err) {
        const error = asError(err);
        if (isKind(err, "not_debuggable")) {
          if (this.configMode === "sandboxed") this.configMode = "unknown";
          this.log.throttled(
            "config",
            "ERR",
            `run-as unavailable: ${packageName} is not a debuggable build, so its private config ` +
              `cannot be read. Install a debug build of the monitor app and retry.`,
            4_000,
          );
          return { config: null, source: "not_debuggable", error };
        }
        if (isKind(err, "not_found", "permission_denied")) {
          if (!isLast) continue;
          if (isKind(err, "not_found")) return { config: null, source: "missing", error };
        }
        this.log.failure("config read failed", err);
        return { config: null, source: "error", error };
      }
    }
    return { config: null, source: "missing" };
  }

  async writeMetrics(text: string): Promise<boolean> {
    const { packageName, metricsExternalPath, metricsSandboxedPath } = this.settings;
    const candidates = ordered<string>(this.metricsMode, {
      external: () =>
        this.exec.execute(["shell", "sh", "-c", shDoubleQuote(`cat > '${metricsExternalPath}'`)], {
          timeoutMs: METRICS_WRITE_TIMEOUT_MS,
          stdin: text,
        }),
      sandboxed: () =>
        runAs(this.exec, packageName, ["sh", "-c", shDoubleQuote(`cat > '${metricsSandboxedPath}'`)], {
          timeoutMs: METRICS_WRITE_TIMEOUT_MS,
          stdin: text,
        }),
    });

    for (const [i, { mode, run }] of candidates.entries()) {
      const isLast = i === candidates.length - 1;
      try {
        await run();
        this.metricsMode = mode;
        return true;
      } catch (err) {
        if (isKind(err, "not_debuggable")) {
          if (this.metricsMode === "sandboxed") this.metricsMode = "unknown";
          if (!isLast) continue;
          this.log.throttled(
            "metrics",
            "ERR",
            `metrics write failed: run-as unavailable (${packageName} is not a debuggable build).`,
            4_000,
          );
          break;
        }
        if (!isLast && isKind(err, "not_found", "permission_denied")) continue;
        this.log.failure("metrics write failed", err);
        break;
      }
    }

    this.log.throttled("metrics-none", "ERR", "metrics write failed (no write path available)", 3_000);
    return false;
  }
}

function ordered<T>(
  cached: PathMode,
  runners: Record<Candidate<T>["mode"], () => Promise<T>>,
): Candidate<T>[] {
  const external: Candidate<T> = { mode: "external", run: runners.external };
  const sandboxed: Candidate<T> = { mode: "sandboxed", run: runners.sandboxed };
  return cached === "sandboxed" ? [sandboxed, external] : [external, sandboxed];
}

function asError(err: unknown): RemoteError | Error {
  return err instanceof Error ? err : new Error(String(err));
}
