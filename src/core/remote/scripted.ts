// src/core/remote/scripted.ts
//
// In-process RemoteExecutor that replays canned replies; stands in for a
// device in the specs.

import type { ExecOptions, RemoteExecutor } from "./adb";
import { RemoteError, type ErrorKind } from "./errors";

export type ExecCall = {
  args: string[];
  line: string;
  stdin?: string;
  timeoutMs?: number;
};

export type ScriptedReply =
  | string
  | { fail: ErrorKind; detail?: string }
  | ((call: ExecCall) => string | Promise<string>);

type Matcher = string | RegExp | ((line: string) => boolean);

type Rule = {
  matcher: Matcher;
  replies: ScriptedReply[];
};

export class ScriptedExecutor implements RemoteExecutor {
  readonly calls: ExecCall[] = [];
  private rules: Rule[] = [];

  constructor(readonly serial = "test-device") {}

  /**
   * Registers replies for commands whose `args.join(" ")` starts with `matcher`
   * (or matches it). Replies are consumed in order; the last one repeats.
   * Later registrations win over earlier ones.
   */
  on(matcher: Matcher, ...replies: ScriptedReply[]): this {
    this.rules.unshift({ matcher, replies: replies.length ? replies : [""] });
    return this;
  }

  count(matcher: Matcher): number {
    return this.calls.filter((c) => matches(matcher, c.line)).length;
  }

  lines(): string[] {
    return this.calls.map((c) => c.line);
  }

  async execute(args: string[], opts: ExecOptions = {}): Promise<string> {
    const call: ExecCall = {
      args: [...args],
      line: args.join(" "),
      stdin: opts.stdin,
      timeoutMs: opts.timeoutMs,
    };
    this.calls.push(call);

    const rule = this.rules.find((r) => matches(r.matcher, call.line));
    const command = `adb -s ${this.serial} ${call.line}`;
    if (!rule) {
      throw new RemoteError("remote_failure", `unscripted command: ${call.line}`, command);
    }

    const reply = rule.replies.length > 1 ? rule.replies.shift() : rule.replies[0];
    if (reply === undefined) return "";
    if (typeof reply === "string") return reply;
    if (typeof reply === "function") return reply(call);
    throw new RemoteError(reply.fail, reply.detail ?? reply.fail, command);
  }
}

function matches(matcher: Matcher, line: string): boolean {
  if (typeof matcher === "string") return line.startsWith(matcher);
  if (matcher instanceof RegExp) return matcher.test(line);
  return matcher(line);
}
