// src/core/bridge/settings.ts
//
// Identity of the on-device monitor app and the bridge file locations.
// Built once and passed into the sampler; nothing reads these as module state.

export type BridgeSettings = Readonly<{
  packageName: string;
  configFileName: string;
  metricsFileName: string;
  /** `/sdcard/Android/data/<pkg>/files/<config>` */
  configExternalPath: string;
  /** `/sdcard/Android/data/<pkg>/files/<metrics>` */
  metricsExternalPath: string;
  /** Relative to the app data dir; used through `run-as <pkg>`. */
  configSandboxedPath: string;
  metricsSandboxedPath: string;
}>;

export const DEFAULT_PACKAGE = "com.example.perfmonitor";
export const CONFIG_FILE_NAME = "pm_desktop_bridge_config.json";
export const METRICS_FILE_NAME = "pm_desktop_bridge_metrics.json";

export function createBridgeSettings(
  packageName: string = DEFAULT_PACKAGE,
  files: { config?: string; metrics?: string } = {},
): BridgeSettings {
  const pkg = packageName.trim();
  if (!pkg) throw new Error("bridge package name must not be empty");
  const configFileName = files.config ?? CONFIG_FILE_NAME;
  const metricsFileName = files.metrics ?? METRICS_FILE_NAME;
  const externalDir = `/sdcard/Android/data/${pkg}/files`;

  return Object.freeze({
    packageName: pkg,
    configFileName,
    metricsFileName,
    configExternalPath: `${externalDir}/${configFileName}`,
    metricsExternalPath: `${externalDir}/${metricsFileName}`,
    configSandboxedPath: `files/${configFileName}`,
    metricsSandboxedPath: `files/${metricsFileName}`,
  });
}

export function externalDirOf(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx > 0 ? path.slice(0, idx) : path;
}
