import type { GateReport, GateStatus } from "../domain/gates/gate-types.js";
import type { ConsolidationSummary } from "../domain/insights/types.js";
import type { Obligation } from "../domain/obligations/types.js";
import type { Pack } from "../domain/packs/types.js";

/**
 * Compact gate report: verdicts and messages, without evidence paths
 * and sub-check detail.
 */
export interface CompactReport {
  timestamp: string;
  status: GateStatus;
  exit_code: number;
  cancelled: boolean;
  duration_ms: number;
  counts: Record<GateStatus, number>;
  checks: Array<{ obligation_id: string; status: GateStatus; message: string }>;
}

export function compactReport(report: GateReport): CompactReport {
  const counts: Record<GateStatus, number> = { PASS: 0, FAIL: 0, PARTIAL: 0, SKIP: 0, ERROR: 0 };
  for (const check of report.checks) counts[check.status] += 1;
  return {
    timestamp: report.timestamp,
    status: report.status,
    exit_code: report.exit_code,
    cancelled: report.cancelled,
    duration_ms: report.duration,
    counts,
    checks: report.checks.map((c) => ({
      obligation_id: c.obligation_id,
      status: c.status,
      message: c.message,
    })),
  };
}

export interface ObligationSummary {
  id: string;
  domain: string;
  title: string;
  risk: string;
  safe_in_prod: boolean;
  composite: boolean;
}

export function summarizeObligation(o: Obligation): ObligationSummary {
  return {
    id: o.id,
    domain: o.domain,
    title: o.title,
    risk: o.risk,
    safe_in_prod: o.safe_in_prod,
    composite: o.composite_of.length > 0,
  };
}

export interface PackSummary {
  id: string;
  name: string;
  version: string;
  failure_modes: number;
  test_templates: number;
  obligations: string[];
  proposed_obligations: string[];
}

export function summarizePack(p: Pack): PackSummary {
  return {
    id: p.id,
    name: p.name,
    version: p.version,
    failure_modes: p.failure_modes.length,
    test_templates: p.test_templates.length,
    obligations: p.obligations_covered.filter((c) => c.status === "COMMITTED").map((c) => c.id),
    proposed_obligations: p.obligations_covered
      .filter((c) => c.status === "PROPOSED")
      .map((c) => c.id),
  };
}

/** Counts first, then the lists a reviewer acts on. */
export function compactSummary(summary: ConsolidationSummary): Record<string, unknown> {
  return {
    generated_at: summary.generated_at,
    totals: {
      reinforced: summary.reinforced.length,
      proposed: summary.proposed.filter((p) => p.status === "PROPOSED").length,
      unresolved_contradictions: summary.contradictions.length,
      reference_only: summary.reference_only.length,
    },
    reinforced: summary.reinforced,
    proposed: summary.proposed,
    contradictions: summary.contradictions,
    reference_only: summary.reference_only,
  };
}
