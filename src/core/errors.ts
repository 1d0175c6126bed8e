/**
 * Error taxonomy.
 *
 * Load-time errors (SchemaError, DuplicateIdError) abort startup.
 * CapabilityUnavailable and CheckExecutionError never leave the gate
 * evaluator: they become SKIP and ERROR checks. ReportPersistError is fatal
 * for the run.
 */

export type GateErrorCode =
  | "SCHEMA"
  | "DUPLICATE_ID"
  | "NOT_FOUND"
  | "CONTRADICTION"
  | "BLOCKED_BY_CONTRADICTION"
  | "ALREADY_CURATED"
  | "PROPOSAL_PENDING_REVIEW"
  | "SCOPE_RESTRICTED"
  | "CAPABILITY_UNAVAILABLE"
  | "CHECK_EXECUTION"
  | "CHECK_TIMEOUT"
  | "REPORT_PERSIST";

export class GateError extends Error {
  readonly code: GateErrorCode;

  constructor(code: GateErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SchemaError extends GateError {
  readonly origin: string;
  readonly issues: string[];

  constructor(origin: string, issues: string[]) {
    super("SCHEMA", `Invalid definition in ${origin}:\n  - ${issues.join("\n  - ")}`);
    this.origin = origin;
    this.issues = issues;
  }
}

export class DuplicateIdError extends GateError {
  readonly id: string;

  constructor(id: string, firstOrigin: string, secondOrigin: string) {
    super(
      "DUPLICATE_ID",
      `Duplicate id "${id}" declared in ${firstOrigin} and ${secondOrigin}`,
    );
    this.id = id;
  }
}

export class NotFoundError extends GateError {
  readonly id: string;

  constructor(kind: string, id: string) {
    super("NOT_FOUND", `${kind} not found: ${id}`);
    this.id = id;
  }
}

export class ContradictionError extends GateError {
  readonly pairs: Array<[string, string]>;

  constructor(message: string, pairs: Array<[string, string]>, code: GateErrorCode = "CONTRADICTION") {
    super(code, message);
    this.pairs = pairs;
  }
}

export class BlockedByContradictionError extends ContradictionError {
  constructor(insightId: string, group: string, pairs: Array<[string, string]>) {
    super(
      `Cannot promote ${insightId}: group "${group}" has unresolved contradiction(s) ${pairs
        .map(([a, b]) => `${a} <> ${b}`)
        .join(", ")}`,
      pairs,
      "BLOCKED_BY_CONTRADICTION",
    );
  }
}

export class AlreadyCuratedError extends GateError {
  constructor(insightId: string, curatedId: string) {
    super("ALREADY_CURATED", `Insight ${insightId} was already promoted as ${curatedId}`);
  }
}

export class ProposalPendingReviewError extends GateError {
  readonly insightId: string;

  constructor(insightId: string, detail: string) {
    super("PROPOSAL_PENDING_REVIEW", `Proposal ${insightId} requires human approval: ${detail}`);
    this.insightId = insightId;
  }
}

export class ScopeRestrictedError extends GateError {
  constructor(insightId: string, scope: string) {
    super(
      "SCOPE_RESTRICTED",
      `Insight ${insightId} is ${scope} and stays reference material; it cannot be promoted`,
    );
  }
}

export class CapabilityUnavailable extends GateError {
  readonly capability: string;

  constructor(capability: string, detail?: string) {
    super(
      "CAPABILITY_UNAVAILABLE",
      `Missing capability: ${capability}${detail ? ` (${detail})` : ""}`,
    );
    this.capability = capability;
  }
}

export class CheckExecutionError extends GateError {
  constructor(obligationId: string, cause: string) {
    super("CHECK_EXECUTION", `Check for ${obligationId} failed to execute: ${cause}`);
  }
}

export class CheckTimeoutError extends GateError {
  constructor(obligationId: string, timeoutMs: number) {
    super("CHECK_TIMEOUT", `Check for ${obligationId} timed out after ${timeoutMs}ms`);
  }
}

export class ReportPersistError extends GateError {
  constructor(cause: string) {
    super("REPORT_PERSIST", `Gate report could not be persisted: ${cause}`);
  }
}

export function isGateError(err: unknown): err is GateError {
  return err instanceof GateError;
}
