// src/core/remote/adb.ts
import { runProcess } from "./process";

export type ExecOptions = {
  timeoutMs?: number;
  stdin?: string;
};

/**
 * One remote command against a fixed device. `args` are adb arguments after
 * `-s <serial>`, e.g. `["shell", "cat", "/proc/stat"]` or `["pull", src, dst]`.
 */
export interface RemoteExecutor {
  readonly serial: string;
  execute(args: string[], opts?: ExecOptions): Promise<string>;
}

export type AdbTarget = {
  adbPath: string;
  serial: string;
};

/** Device-less adb call (`adb devices -l`, `adb version`). */
export function runAdb(adbPath: string, args: string[], opts: ExecOptions = {}): Promise<string> {
  return runProcess(adbPath, args, {
    timeoutMs: opts.timeoutMs,
    stdin: opts.stdin,
    label: ["adb", ...args].join(" "),
  });
}

export function createAdbExecutor(target: AdbTarget): RemoteExecutor {
  const serial = target.serial.trim();
  return {
    serial,
    execute: (args, opts) => runAdb(target.adbPath, ["-s", serial, ...args], opts),
  };
}

/** `adb shell run-as <pkg> …`; only works for debuggable builds of `pkg`. */
export function runAs(
  exec: RemoteExecutor,
  packageName: string,
  args: string[],
  opts?: ExecOptions,
): Promise<string> {
  return exec.execute(["shell", "run-as", packageName, ...args], opts);
}

/**
 * Best-effort side effect: resolves true when `fn` succeeded, false otherwise.
 * Callers use it for steps whose absence is tolerated downstream (removing a
 * stale file, enabling a daemon, creating a directory).
 */
export async function attempt(fn: () => Promise<unknown>): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch {
    return false;
  }
}

/* ───────────────────── shell quoting ───────────────────── */

export function shDoubleQuote(s: string): string {
  const escaped = (s ?? "")
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\$/g, "\\$")
    .replace(/`/g, "\\`");
  return `"${escaped}"`;
}

export function shSingleQuote(s: string): string {
  return `'${(s ?? "").replace(/'/g, "'\\''")}'`;
}

/** Makes a device serial safe to embed in a file name (`host:5555` → `host_5555`). */
export function serialTag(serial: string): string {
  return (serial ?? "").replace(/[:/]/g, "_");
}
