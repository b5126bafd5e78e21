// src/lib/log/diagnostics.ts
//
// Human-readable diagnostic lines: `HH:MM:SS [SEV] message`.
// Throttled channels keep sustained failures from flooding the console: a line
// goes out when its text differs from the channel's previous line, or when the
// channel's window has elapsed.

import { describeError } from "@/lib/errors";

export type Severity = "OK" | "INFO" | "WARN" | "ERR" | "WAIT" | "CFG" | "SAMPLE";

export type LogWriter = (line: string, severity: Severity) => void;

export const consoleWriter: LogWriter = (line, severity) => {
  if (severity === "ERR") console.error(line);
  else if (severity === "WARN") console.warn(line);
  else console.log(line);
};

export type DiagnosticLogOpts = {
  write?: LogWriter;
  now?: () => number;
  stamp?: (ms: number) => string;
};

/** Default windows per channel, in ms. */
export const LOG_WINDOWS = {
  error: 5_000,
  wait: 30_000,
  state: 1_500,
  sample: 1_200,
  fps: 1_500,
} as const;

type ChannelState = { message: string; at: number };

export class DiagnosticLog {
  private readonly write: LogWriter;
  private readonly now: () => number;
  private readonly stamp: (ms: number) => string;
  private channels = new Map<string, ChannelState>();

  constructor(opts: DiagnosticLogOpts = {}) {
    this.write = opts.write ?? consoleWriter;
    this.now = opts.now ?? (() => Date.now());
    this.stamp = opts.stamp ?? clockStamp;
  }

  line(severity: Severity, message: string) {
    const text = (message ?? "").trim();
    if (!text) return;
    this.write(`${this.stamp(this.now())} [${severity}] ${text}`, severity);
  }

  /** Returns true when the line was emitted. */
  throttled(channel: string, severity: Severity, message: string, windowMs: number): boolean {
    const text = (message ?? "").trim();
    if (!text) return false;
    const at = this.now();
    const prev = this.channels.get(channel);
    if (prev && prev.message === text && at - prev.at < windowMs) return false;
    this.channels.set(channel, { message: text, at });
    this.line(severity, text);
    return true;
  }

  /** `[ERR] <prefix>: <diagnostic + command>` on the shared error channel. */
  failure(prefix: string, err: unknown): boolean {
    const detail = describeError(err).trim();
    if (!detail) return false;
    return this.throttled("error", "ERR", `${prefix}: ${detail}`, LOG_WINDOWS.error);
  }
}

function clockStamp(ms: number): string {
  return new Date(ms).toTimeString().slice(0, 8);
}
