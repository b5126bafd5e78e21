// src/core/device/devices.ts
import { runAdb } from "@/core/remote/adb";

export type DeviceEntry = {
  serial: string;
  /** `device`, `unauthorized`, `offline`, … */
  state: string;
  attrs: Record<string, string>;
};

const DEVICE_LINE_RE = /^(\S+)\s+(.+)$/;

/** Parses `adb devices -l`. Attributes are the trailing `key:value` tokens (`model:Pixel_7`). */
export function parseDevices(output: string): DeviceEntry[] {
  const out: DeviceEntry[] = [];
  for (const raw of (output ?? "").split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("List of devices") || line.startsWith("*")) continue;
    const m = DEVICE_LINE_RE.exec(line);
    if (!m) continue;
    const [state = "unknown", ...rest] = (m[2] ?? "").split(/\s+/);
    const attrs: Record<string, string> = {};
    for (const tok of rest) {
      const i = tok.indexOf(":");
      if (i > 0) attrs[tok.slice(0, i)] = tok.slice(i + 1);
    }
    out.push({ serial: m[1] ?? "", state, attrs });
  }
  return out;
}

export function isSupportedSerial(serial: string): boolean {
  return Boolean((serial ?? "").trim());
}

/** First entry in `device` state. */
export function pickDefaultSerial(devices: readonly DeviceEntry[]): string {
  const ready = devices.filter((d) => d.state === "device" && isSupportedSerial(d.serial));
  const first = ready[0];
  if (!first) {
    const seen = devices.map((d) => `${d.serial} (${d.state})`).join(", ") || "none";
    throw new Error(`no device in 'device' state; connect and authorize USB debugging. Seen: ${seen}`);
  }
  return first.serial;
}

export function describeDevice(d: DeviceEntry): string {
  const model = d.attrs.model?.replace(/_/g, " ");
  return model ? `${model} (${d.serial})` : d.serial;
}

export async function listDevices(adbPath: string): Promise<DeviceEntry[]> {
  return parseDevices(await runAdb(adbPath, ["devices", "-l"], { timeoutMs: 3_000 }));
}
