// src/core/remote/errors.ts
//
// Closed error taxonomy for remote calls. Raw adb/shell diagnostics are mapped
// to an ErrorKind exactly once, here; callers only ever branch on `kind`.

export type ErrorKind =
  | "timeout"
  | "unreachable"
  | "not_debuggable"
  | "permission_denied"
  | "not_found"
  | "remote_failure";

export class RemoteError extends Error {
  readonly kind: ErrorKind;
  /** Literal command line, e.g. `adb -s emulator-5554 shell cat /proc/stat`. */
  readonly command: string;
  /** Raw diagnostic text (stderr, else stdout) without the command suffix. */
  readonly detail: string;

  constructor(kind: ErrorKind, detail: string, command: string) {
    super(formatRemoteMessage(detail, command));
    this.name = "RemoteError";
    this.kind = kind;
    this.command = command;
    this.detail = detail;
  }
}

export function formatRemoteMessage(detail: string, command: string): string {
  const raw = detail.trim() || "command failed";
  return command ? `${raw}\n\ncommand: ${command}` : raw;
}

/**
 * Maps the text of a failed (non-zero exit) remote command to an ErrorKind.
 *
 * Order matters: `run-as` refusals usually also contain "not", and some ROMs
 * print "Permission denied" next to a missing path.
 *
 *   not_debuggable     "not debuggable", or run-as + debug + not
 *   permission_denied  "Permission denied", "errno: 13"
 *   not_found          "No such file or directory", "not found"
 *   remote_failure     anything else
 */
export function classifyFailure(text: string): ErrorKind {
  const raw = text ?? "";
  const lower = raw.toLowerCase();
  if (
    lower.includes("not debuggable") ||
    (lower.includes("run-as") && lower.includes("debug") && lower.includes("not"))
  ) {
    return "not_debuggable";
  }
  if (raw.includes("Permission denied") || raw.includes("errno: 13")) return "permission_denied";
  if (raw.includes("No such file or directory") || lower.includes("not found")) return "not_found";
  return "remote_failure";
}

export function errorKindOf(err: unknown): ErrorKind | null {
  return err instanceof RemoteError ? err.kind : null;
}

export function isKind(err: unknown, ...kinds: ErrorKind[]): boolean {
  const kind = errorKindOf(err);
  return kind !== null && kinds.includes(kind);
}
