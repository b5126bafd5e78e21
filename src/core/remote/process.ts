// src/core/remote/process.ts
import { spawn, type ChildProcess } from "node:child_process";
import { RemoteError, classifyFailure } from "./errors";

export type RunOptions = {
  timeoutMs?: number;
  stdin?: string;
  /** How the command is rendered in error messages (defaults to `command args…`). */
  label?: string;
};

export const DEFAULT_TIMEOUT_MS = 6_000;

/**
 * Runs a host command, resolving with stdout. Rejects with a RemoteError:
 * `timeout` when the bound elapses (the child is killed), `unreachable` when the
 * binary cannot be spawned, otherwise the classified non-zero exit.
 */
export function runProcess(command: string, args: string[], opts: RunOptions = {}): Promise<string> {
  const timeoutMs = Math.max(1, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const label = opts.label ?? [command, ...args].join(" ");

  return new Promise<string>((resolve, reject) => {
    let settled = false;
    let timedOut = false;
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const finish = (err: RemoteError | null, out?: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (err) reject(err);
      else resolve(out ?? "");
    };

    let child: ChildProcess;
    try {
      child = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"], windowsHide: true });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      reject(new RemoteError("unreachable", `cannot execute ${command}: ${detail}`, label));
      return;
    }

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err: NodeJS.ErrnoException) => {
      finish(new RemoteError("unreachable", `cannot execute ${command}: ${err.message}`, label));
    });

    child.on("close", (code) => {
      if (timedOut) {
        finish(new RemoteError("timeout", `timed out after ${timeoutMs}ms`, label));
        return;
      }
      const out = Buffer.concat(stdout).toString("utf8");
      if (code === 0) {
        finish(null, out);
        return;
      }
      const err = Buffer.concat(stderr).toString("utf8").trim();
      const raw = err || out.trim() || `exit code ${code ?? "null"}`;
      finish(new RemoteError(classifyFailure(raw), raw, label));
    });

    const input = child.stdin;
    if (input) {
      // The remote side may exit before reading stdin; only EPIPE is expected here.
      input.on("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "EPIPE") return;
        finish(new RemoteError("remote_failure", `stdin write failed: ${err.message}`, label));
      });
      if (opts.stdin != null) input.end(opts.stdin);
      else input.end();
    }
  });
}
