import type { Obligation } from "../obligations/types.js";
import type { Capability } from "./capabilities.js";
import type { ReportSink } from "./report-builder.js";

export type GateStatus = "PASS" | "FAIL" | "PARTIAL" | "SKIP" | "ERROR";

export type ExitCode = 0 | 1 | 2;

export interface GateCheck {
  obligation_id: string;
  status: GateStatus;
  message: string;
  evidence_paths: string[];
  hints?: string[]; // curated invariants for the obligation
  sub_checks?: GateCheck[]; // composite obligations only
  duration_ms: number;
}

export interface GateReport {
  timestamp: string;
  status: GateStatus;
  checks: GateCheck[];
  duration: number; // ms
  cancelled: boolean;
  strict: boolean;
  exit_code: ExitCode;
}

/** Captured artifacts for one obligation plus the recorded outcome per criterion. */
export interface EvidenceRecord {
  paths: string[];
  criteria: Record<string, boolean>;
}

/**
 * Judges one pass criterion. `undefined` means no outcome was recorded,
 * which leaves the obligation unverified rather than failed.
 */
export interface CriterionEvaluator {
  evaluate(
    criterion: string,
    obligation: Obligation,
    evidence: EvidenceRecord,
  ): boolean | undefined | Promise<boolean | undefined>;
}

/** Everything a gate run needs, passed in rather than read from process state. */
export interface RunContext {
  capability: Capability;
  evidence: ReadonlyMap<string, EvidenceRecord>;
  sink: ReportSink;
  signal?: AbortSignal;
}
