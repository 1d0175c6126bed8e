import { describe, it, expect } from "vitest";
import { ReportPersistError } from "../src/core/errors.js";
import type { GateRunResult } from "../src/domain/gates/gate-evaluator.js";
import type { GateCheck, GateStatus } from "../src/domain/gates/gate-types.js";
import {
  ReportBuilder,
  aggregateStatus,
  exitCodeFor,
  parseReport,
  serializeReport,
} from "../src/domain/gates/report-builder.js";
import { FIXED_NOW, MemorySink } from "./fixtures.js";

function check(obligationId: string, status: GateStatus, extra?: Partial<GateCheck>): GateCheck {
  return {
    obligation_id: obligationId,
    status,
    message: `${status} message`,
    evidence_paths: [],
    duration_ms: 5,
    ...extra,
  };
}

function runOf(checks: GateCheck[], cancelled = false): GateRunResult {
  return { checks, cancelled, started_at: 1000, finished_at: 1250 };
}

describe("aggregateStatus", () => {
  it("orders ERROR over FAIL over incomplete over PASS", () => {
    expect(aggregateStatus(["PASS", "SKIP", "FAIL", "ERROR"])).toBe("ERROR");
    expect(aggregateStatus(["PASS", "SKIP", "FAIL"])).toBe("FAIL");
    expect(aggregateStatus(["PASS", "SKIP"])).toBe("PARTIAL");
    expect(aggregateStatus(["PASS", "PARTIAL"])).toBe("PARTIAL");
    expect(aggregateStatus(["PASS", "PASS"])).toBe("PASS");
  });

  it("treats an empty run as PASS", () => {
    expect(aggregateStatus([])).toBe("PASS");
  });
});

describe("exitCodeFor", () => {
  it("maps statuses to CI exit codes", () => {
    expect(exitCodeFor("PASS")).toBe(0);
    expect(exitCodeFor("PARTIAL")).toBe(0);
    expect(exitCodeFor("PARTIAL", true)).toBe(1);
    expect(exitCodeFor("FAIL")).toBe(1);
    expect(exitCodeFor("ERROR")).toBe(2);
  });
});

describe("ReportBuilder", () => {
  const builder = new ReportBuilder({ now: () => FIXED_NOW });

  it("builds an immutable report", () => {
    const report = builder.build(runOf([check("cache.vary.honored", "PASS"), check("cache.auth.bypass", "SKIP")]));

    expect(report).toEqual({
      timestamp: "2026-03-01T12:00:00.000Z",
      status: "PARTIAL",
      checks: [check("cache.vary.honored", "PASS"), check("cache.auth.bypass", "SKIP")],
      duration: 250,
      cancelled: false,
      strict: false,
      exit_code: 0,
    });
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.checks)).toBe(true);
    expect(Object.isFrozen(report.checks[0])).toBe(true);
  });

  it("applies strict mode to the exit code", () => {
    const strict = new ReportBuilder({ strict: true, now: () => FIXED_NOW });
    const report = strict.build(runOf([check("cache.auth.bypass", "SKIP")]));
    expect(report.strict).toBe(true);
    expect(report.exit_code).toBe(1);
  });

  it("finalize() persists before returning", async () => {
    const sink = new MemorySink();
    const report = await builder.finalize(runOf([check("cache.vary.honored", "FAIL")]), sink);
    expect(report.exit_code).toBe(1);
    expect(sink.saved).toEqual([report]);
  });

  it("finalize() fails the run when the sink fails", async () => {
    const sink = {
      save: () => {
        throw new Error("disk full");
      },
    };
    await expect(builder.finalize(runOf([check("cache.vary.honored", "PASS")]), sink)).rejects.toThrow(
      "Gate report could not be persisted: disk full",
    );
  });
});

describe("report wire format", () => {
  const builder = new ReportBuilder({ now: () => FIXED_NOW });

  it("parses what it serializes", () => {
    const report = builder.build(
      runOf([
        check("release.edge.cache.readiness", "PARTIAL", {
          evidence_paths: ["evidence/vary.har"],
          hints: ["vary star must never be cached"],
          sub_checks: [check("cache.vary.honored", "PASS"), check("cache.auth.bypass", "SKIP")],
        }),
      ]),
    );
    expect(parseReport(serializeReport(report))).toEqual(report);
  });

  it("rejects a status that disagrees with the checks", () => {
    const json = JSON.stringify({
      timestamp: FIXED_NOW.toISOString(),
      status: "PASS",
      checks: [check("cache.vary.honored", "FAIL")],
      duration: 10,
    });
    expect(() => parseReport(json, "stored report")).toThrow(ReportPersistError);
    expect(() => parseReport(json, "stored report")).toThrow(
      "Gate report could not be persisted: stored report declares status PASS but its checks aggregate to FAIL",
    );
  });

  it("derives a missing exit code", () => {
    const json = JSON.stringify({
      timestamp: FIXED_NOW.toISOString(),
      status: "PARTIAL",
      checks: [check("cache.vary.honored", "SKIP")],
      duration: 10,
      strict: true,
    });
    expect(parseReport(json).exit_code).toBe(1);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseReport("{", "stored report")).toThrow(/stored report is not valid JSON/);
  });
});
