// src/core/fps/capture.ts
//
// Short perfetto capture of SurfaceFlinger frame data onto the device.

import { attempt, serialTag, shDoubleQuote, shSingleQuote, type RemoteExecutor } from "@/core/remote/adb";
import { RemoteError, isKind } from "@/core/remote/errors";
import { sleep, type Wait } from "@/lib/wait";

export const MIN_CAPTURE_MS = 800;
export const PERFETTO_TRACE_DIR = "/data/misc/perfetto-traces";

/** `persist.traced.enable` takes a moment to bring the daemon up. */
const TRACED_SETTLE_MS = 500;

export type CaptureResult = {
  /** File to pull: the requested path, or the fallback when it could not be linked back. */
  remotePath: string;
  usedFallback: boolean;
};

export type CaptureOpts = {
  durationMs: number;
  wait?: Wait;
};

export function perfettoConfig(durationMs: number): string {
  const dur = Math.max(MIN_CAPTURE_MS, Math.trunc(durationMs));
  return [
    "buffers: {",
    "  size_kb: 32768",
    "  fill_policy: RING_BUFFER",
    "}",
    "data_sources: {",
    "  config {",
    '    name: "android.surfaceflinger.frametimeline"',
    "  }",
    "}",
    "data_sources: {",
    "  config {",
    '    name: "android.surfaceflinger.frame"',
    "  }",
    "}",
    "data_sources: {",
    "  config {",
    '    name: "linux.ftrace"',
    "    ftrace_config {",
    '      atrace_categories: "view"',
    '      atrace_categories: "gfx"',
    "    }",
    "  }",
    "}",
    `duration_ms: ${dur}`,
    "write_into_file: true",
    "flush_period_ms: 500",
    `file_write_period_ms: ${Math.max(500, Math.floor(dur / 2))}`,
    "",
  ].join("\n");
}

export function fallbackTracePath(serial: string): string {
  return `${PERFETTO_TRACE_DIR}/pm_ft_${serialTag(serial)}.perfetto-trace`;
}

const LAUNCHERS = ["perfetto", "cmd perfetto"] as const;

/**
 * Records into `remoteOut`. `cmd perfetto` is only tried when plain `perfetto`
 * is missing. A permission refusal retries once into the perfetto-traces dir
 * and copies (else symlinks) the result back.
 */
export async function captureTrace(
  exec: RemoteExecutor,
  remoteOut: string,
  opts: CaptureOpts,
): Promise<CaptureResult> {
  const dur = Math.max(MIN_CAPTURE_MS, Math.trunc(opts.durationMs));
  const cfg = perfettoConfig(dur);
  const runTimeoutMs = dur + 10_000;
  const wait = opts.wait ?? sleep;

  await removeRemoteFile(exec, remoteOut);
  await ensureTracedEnabled(exec, wait);

  const record = (launcher: string, out: string) =>
    exec.execute(["shell", "sh", "-c", shDoubleQuote(`${launcher} --txt -c - -o ${shSingleQuote(out)}`)], {
      timeoutMs: runTimeoutMs,
      stdin: cfg,
    });

  let lastErr: unknown = null;
  for (const launcher of LAUNCHERS) {
    try {
      await record(launcher, remoteOut);
      return { remotePath: remoteOut, usedFallback: false };
    } catch (err) {
      lastErr = err;
      if (isKind(err, "permission_denied")) {
        const alt = fallbackTracePath(exec.serial);
        await removeRemoteFile(exec, alt);
        try {
          await record(launcher, alt);
        } catch (err2) {
          lastErr = err2;
          break;
        }
        const linked =
          (await attempt(() => exec.execute(["shell", "cp", alt, remoteOut], { timeoutMs: 5_000 }))) ||
          (await attempt(() => exec.execute(["shell", "ln", "-sf", alt, remoteOut], { timeoutMs: 3_000 })));
        return linked ? { remotePath: remoteOut, usedFallback: true } : { remotePath: alt, usedFallback: true };
      }
      if (!isKind(err, "not_found")) break;
    }
  }

  if (lastErr instanceof Error) throw lastErr;
  throw new RemoteError("remote_failure", "perfetto capture failed", `adb -s ${exec.serial} shell perfetto`);
}

export function removeRemoteFile(exec: RemoteExecutor, remotePath: string): Promise<boolean> {
  return attempt(() => exec.execute(["shell", "rm", "-f", remotePath], { timeoutMs: 3_000 }));
}

export async function ensureTracedEnabled(exec: RemoteExecutor, wait: Wait = sleep): Promise<boolean> {
  return attempt(async () => {
    const current = (await exec.execute(["shell", "getprop", "persist.traced.enable"], { timeoutMs: 3_000 })).trim();
    if (current === "1") return;
    await exec.execute(["shell", "setprop", "persist.traced.enable", "1"], { timeoutMs: 3_000 });
    await wait(TRACED_SETTLE_MS);
  });
}
