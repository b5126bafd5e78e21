import { describe, it, expect } from "vitest";
import { buildFilters, fpsFromTrace, parseColumns, parseNameList, parseStats, sqlQuote } from "./timeline";
import type { TraceQuery } from "./traceQuery";

class FakeTrace implements TraceQuery {
  readonly sql: string[] = [];
  constructor(private readonly respond: (sql: string) => string) {}
  async query(_tracePath: string, sql: string): Promise<string> {
    this.sql.push(sql);
    return this.respond(sql);
  }
}

const TIMELINE_COLS = ["cid|name|type|notnull|dflt_value|pk", "0|id|INT|0||0", "1|ts|INT|0||0", "2|dur|INT|0||0", "3|layer_name|STRING|0||0"].join("\n");

const opts = { target: "com.game", durationMs: 1_500, layerHint: "", layerCandidates: ["com.game"] };

describe("fpsFromTrace", () => {
  it("takes the first filter with frames: an empty exact match yields to the LIKE match", async () => {
    const tq = new FakeTrace((sql) => {
      if (sql.includes("sqlite_master")) return "name\n--------------------\nactual_frame_timeline_slice\nexpected_frame_timeline_slice\n";
      if (sql.startsWith("pragma")) return TIMELINE_COLS;
      if (sql.includes("layer_name = ")) return "0|0|0";
      if (sql.includes("layer_name like '%com.game%'")) return "12|1000000000|2100000000";
      return "40|1000000000|3000000000";
    });

    const r = await fpsFromTrace(tq, "/tmp/t.perfetto-trace", opts);
    expect(r.fps).toBeCloseTo(12 / 1.1, 9);
    expect(r.detail).toBe("table=actual_frame_timeline_slice filter=layer_like=com.game count=12 spanMs=1100");
    expect(tq.sql).toHaveLength(4);
    expect(tq.sql[1]).toBe("pragma table_info(actual_frame_timeline_slice);");
    expect(tq.sql[2]).toBe(
      "select printf('%d|%d|%d', count(*), min(ts), max(ts)) from actual_frame_timeline_slice where layer_name = 'com.game';",
    );
  });

  it("reports the unfiltered total when every filter is empty", async () => {
    const tq = new FakeTrace((sql) => {
      if (sql.includes("sqlite_master")) return "actual_frame_timeline_slice";
      if (sql.startsWith("pragma")) return TIMELINE_COLS;
      return "0|0|0";
    });
    expect(await fpsFromTrace(tq, "t", opts)).toEqual({ fps: null, detail: "frame timeline count is 0 (unfiltered total=0)" });
  });

  it("filters on name and falls back to the capture duration without timestamps", async () => {
    const tq = new FakeTrace((sql) => {
      if (sql.includes("sqlite_master")) return "android_frames_v2\nframe_timeline_slice";
      if (sql.startsWith("pragma")) return "0|id|INT\n1|name|STRING";
      if (sql.includes("where name like '%com.game%'")) return "8|0|0";
      return "99|0|0";
    });
    const r = await fpsFromTrace(tq, "t", opts);
    expect(r.fps).toBeCloseTo(8_000 / 1_500, 9);
    expect(r.detail).toBe("table=frame_timeline_slice filter=name_like=com.game count=8 durMs=1500");
    expect(tq.sql[2]).toBe("select printf('%d|0|0', count(*)) from frame_timeline_slice where name like '%com.game%';");
  });

  it("scans slice markers when no timeline table exists", async () => {
    const tq = new FakeTrace((sql) => {
      if (sql.includes("name='slice'")) return "count(*)\n1";
      if (sql.includes("sqlite_master")) return "name\n";
      if (sql.includes("'Choreographer#doFrame'")) return "1|5|5";
      if (sql.includes("'DrawFrame'")) return "30|1000000000|1500000000";
      return "0|0|0";
    });
    expect(await fpsFromTrace(tq, "t", opts)).toEqual({
      fps: 60,
      detail: "ftrace_slice marker=DrawFrame count=30 spanS=0.50",
    });
  });

  it("explains why nothing was found when the slice table is missing too", async () => {
    const tq = new FakeTrace((sql) => (sql.includes("name='slice'") ? "0" : ""));
    expect(await fpsFromTrace(tq, "t", opts)).toEqual({
      fps: null,
      detail: "no frame timeline table in trace (slice table missing)",
    });
  });

  it("propagates trace query failures", async () => {
    const tq: TraceQuery = {
      query: async () => {
        throw new Error("trace_processor crashed");
      },
    };
    await expect(fpsFromTrace(tq, "t", opts)).rejects.toThrow("trace_processor crashed");
  });
});

describe("buildFilters", () => {
  it("orders exact, then LIKE, then target, then unfiltered, capped at ten layers", () => {
    const layers = Array.from({ length: 12 }, (_, i) => `L${i}`);
    const filters = buildFilters(["ts", "layer_name"], { ...opts, layerHint: "L0", layerCandidates: layers });
    expect(filters).toHaveLength(22);
    expect(filters[0]?.label).toBe("layer_eq=L0");
    expect(filters[9]?.label).toBe("layer_eq=L9");
    expect(filters[10]?.label).toBe("layer_like=L0");
    expect(filters[20]).toEqual({ where: " where layer_name like '%com.game%'", label: "pkg_like=com.game" });
    expect(filters[21]).toEqual({ where: "", label: "unfiltered" });
  });

  it("is only the unfiltered query without usable columns", () => {
    expect(buildFilters(["ts"], opts)).toEqual([{ where: "", label: "unfiltered" }]);
  });
});

describe("output parsing", () => {
  it("parses table lists, pragma rows and stats", () => {
    expect(parseNameList('name\n----\n"actual_frame_timeline_slice"\n')).toEqual(["actual_frame_timeline_slice"]);
    expect(parseColumns('cid|name|type\n0|"ts"|INT\n1|layer_name|STRING\nbad')).toEqual(["ts", "layer_name"]);
    expect(parseStats('"3|10|20"')).toEqual({ count: 3, minTs: 10, maxTs: 20 });
    expect(parseStats("no rows")).toBeNull();
    expect(sqlQuote("it's")).toBe("'it''s'");
  });
});
