import { z } from "zod";
import { ReportPersistError } from "../../core/errors.js";
import { getErrorMessage, logError, logInfo } from "../../core/logging.js";
import { parseWith } from "../validation.js";
import type { GateRunResult } from "./gate-evaluator.js";
import type { ExitCode, GateCheck, GateReport, GateStatus } from "./gate-types.js";

/** Persistence collaborator: stores the latest report and a history entry. */
export interface ReportSink {
  save(report: GateReport): void | Promise<void>;
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Priority order: ERROR > FAIL > (any SKIP or PARTIAL) → PARTIAL > PASS.
 * An empty run is PASS.
 */
export function aggregateStatus(statuses: Iterable<GateStatus>): GateStatus {
  let sawError = false;
  let sawFail = false;
  let sawIncomplete = false;
  for (const status of statuses) {
    if (status === "ERROR") sawError = true;
    else if (status === "FAIL") sawFail = true;
    else if (status === "SKIP" || status === "PARTIAL") sawIncomplete = true;
  }
  if (sawError) return "ERROR";
  if (sawFail) return "FAIL";
  if (sawIncomplete) return "PARTIAL";
  return "PASS";
}

export function exitCodeFor(status: GateStatus, strict = false): ExitCode {
  switch (status) {
    case "PASS":
      return 0;
    case "PARTIAL":
    case "SKIP":
      return strict ? 1 : 0;
    case "FAIL":
      return 1;
    case "ERROR":
      return 2;
  }
}

// ============================================================================
// Wire format
// ============================================================================

const GateStatusSchema = z.enum(["PASS", "FAIL", "PARTIAL", "SKIP", "ERROR"]);

const BaseCheckSchema = z.object({
  obligation_id: z.string().min(1),
  status: GateStatusSchema,
  message: z.string(),
  evidence_paths: z.array(z.string()).default([]),
  hints: z.array(z.string()).optional(),
  duration_ms: z.number().nonnegative().default(0),
});

const GateCheckSchema = BaseCheckSchema.extend({
  sub_checks: z.array(BaseCheckSchema).optional(),
});

export const GateReportSchema = z.object({
  timestamp: z.string().min(1),
  status: GateStatusSchema,
  checks: z.array(GateCheckSchema),
  duration: z.number().nonnegative(),
  cancelled: z.boolean().default(false),
  strict: z.boolean().default(false),
  exit_code: z.union([z.literal(0), z.literal(1), z.literal(2)]).optional(),
});

export function serializeReport(report: GateReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Parse a persisted report. The stored status must agree with the checks;
 * a report that claims PASS over a failing check is rejected.
 */
export function parseReport(json: string, origin = "gate report"): GateReport {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new ReportPersistError(`${origin} is not valid JSON: ${getErrorMessage(err)}`);
  }
  const parsed = parseWith(GateReportSchema, data, origin);
  const derived = aggregateStatus(parsed.checks.map((c) => c.status));
  if (derived !== parsed.status) {
    throw new ReportPersistError(
      `${origin} declares status ${parsed.status} but its checks aggregate to ${derived}`,
    );
  }
  return freezeReport({
    ...parsed,
    exit_code: parsed.exit_code ?? exitCodeFor(parsed.status, parsed.strict),
  });
}

function freezeCheck(check: GateCheck): GateCheck {
  const frozen: GateCheck = { ...check, evidence_paths: [...check.evidence_paths] };
  Object.freeze(frozen.evidence_paths);
  if (check.hints) {
    frozen.hints = [...check.hints];
    Object.freeze(frozen.hints);
  }
  if (check.sub_checks) {
    frozen.sub_checks = check.sub_checks.map(freezeCheck);
    Object.freeze(frozen.sub_checks);
  }
  return Object.freeze(frozen);
}

/** Reports are immutable once built; every nested array is frozen too. */
function freezeReport(report: GateReport): GateReport {
  const frozen: GateReport = { ...report, checks: report.checks.map(freezeCheck) };
  Object.freeze(frozen.checks);
  return Object.freeze(frozen);
}

// ============================================================================
// Builder
// ============================================================================

export interface ReportBuilderOptions {
  strict?: boolean;
  now?: () => Date;
}

export class ReportBuilder {
  private readonly strict: boolean;
  private readonly now: () => Date;

  constructor(options: ReportBuilderOptions = {}) {
    this.strict = options.strict ?? false;
    this.now = options.now ?? (() => new Date());
  }

  build(run: GateRunResult): GateReport {
    const status = aggregateStatus(run.checks.map((c) => c.status));
    return freezeReport({
      timestamp: this.now().toISOString(),
      status,
      checks: run.checks,
      duration: Math.max(0, run.finished_at - run.started_at),
      cancelled: run.cancelled,
      strict: this.strict,
      exit_code: exitCodeFor(status, this.strict),
    });
  }

  /**
   * Freeze and persist. A report that cannot be written fails the run:
   * an unsaved PASS is never returned.
   */
  async finalize(run: GateRunResult, sink: ReportSink): Promise<GateReport> {
    const report = this.build(run);
    try {
      await sink.save(report);
    } catch (err) {
      const error = new ReportPersistError(getErrorMessage(err));
      logError(error.message);
      throw error;
    }
    logInfo(
      `Gate report ${report.timestamp}: ${report.status} (${report.checks.length} check(s), exit ${report.exit_code})`,
    );
    return report;
  }
}
