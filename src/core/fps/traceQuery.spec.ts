import path from "node:path";
import { describe, it, expect } from "vitest";
import { RemoteError } from "@/core/remote/errors";
import { rejectsInlineQuery, resolveTraceProcessor, traceProcessorNames } from "./traceQuery";

describe("resolveTraceProcessor", () => {
  it("prefers an executable explicit path", () => {
    const isExecutable = (f: string) => f === "/opt/tp/trace_processor";
    expect(resolveTraceProcessor({ explicit: " /opt/tp/trace_processor ", envPath: "", isExecutable })).toBe(
      "/opt/tp/trace_processor",
    );
  });

  it("searches PATH in order when the explicit path is unusable", () => {
    const hit = path.join("/usr/local/bin", "trace_processor_shell");
    const isExecutable = (f: string) => f === hit;
    expect(
      resolveTraceProcessor({
        explicit: "/missing/trace_processor",
        envPath: "/usr/bin:/usr/local/bin",
        platform: "linux",
        isExecutable,
      }),
    ).toBe(hit);
  });

  it("returns null when nothing is found", () => {
    expect(resolveTraceProcessor({ envPath: "/usr/bin", platform: "linux", isExecutable: () => false })).toBeNull();
  });

  it("uses .exe names on Windows", () => {
    expect(traceProcessorNames("win32")).toEqual(["trace_processor.exe", "trace_processor_shell.exe"]);
  });
});

describe("rejectsInlineQuery", () => {
  it("recognises builds without -Q", () => {
    expect(rejectsInlineQuery(new RemoteError("remote_failure", "Unknown option: -Q", "tp"))).toBe(true);
    expect(rejectsInlineQuery(new Error("unrecognized argument '-Q'"))).toBe(true);
    expect(rejectsInlineQuery(new Error("trace is corrupt"))).toBe(false);
  });
});
