import {
  CapabilityUnavailable,
  CheckExecutionError,
  CheckTimeoutError,
  NotFoundError,
  ProposalPendingReviewError,
} from "../../core/errors.js";
import { getErrorMessage, logDebug, logWarn } from "../../core/logging.js";
import type { ProposedObligation } from "../insights/types.js";
import type { ObligationRegistry } from "../obligations/registry.js";
import type { Obligation } from "../obligations/types.js";
import type {
  CriterionEvaluator,
  EvidenceRecord,
  GateCheck,
  GateStatus,
  RunContext,
} from "./gate-types.js";

// ============================================================================
// Target resolution
// ============================================================================

/** The slice of the insight ledger target resolution needs. */
export interface ProposalLookup {
  findProposal(id: string): ProposedObligation | null;
  approvedObligation(id: string): Obligation | null;
}

/**
 * Resolve gate targets before the run starts. Registry obligations and
 * approved proposals are runnable; a pending proposal never is.
 */
export function resolveTargets(
  ids: readonly string[],
  registry: ObligationRegistry,
  proposals?: ProposalLookup,
): Obligation[] {
  const resolved: Obligation[] = [];
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) continue;
    seen.add(id);

    if (registry.has(id)) {
      resolved.push(registry.lookup(id));
      continue;
    }
    const proposal = proposals?.findProposal(id);
    if (proposal) {
      throw new ProposalPendingReviewError(
        id,
        `status ${proposal.status}; approve it before using it in a gate run`,
      );
    }
    const approved = proposals?.approvedObligation(id);
    if (approved) {
      resolved.push(approved);
      continue;
    }
    throw new NotFoundError("Obligation", id);
  }
  return resolved;
}

// ============================================================================
// Criterion evaluation
// ============================================================================

/** Reads the outcome recorded for each criterion in the evidence file. */
export class RecordedOutcomeEvaluator implements CriterionEvaluator {
  evaluate(
    criterion: string,
    _obligation: Obligation,
    evidence: EvidenceRecord,
  ): boolean | undefined {
    return Object.prototype.hasOwnProperty.call(evidence.criteria, criterion)
      ? evidence.criteria[criterion]
      : undefined;
  }
}

/** Status of a composite obligation from its sub-check statuses. */
export function combineSubStatuses(statuses: readonly GateStatus[]): GateStatus {
  if (statuses.every((s) => s === "PASS")) return "PASS";
  if (statuses.includes("ERROR")) return "ERROR";
  if (statuses.includes("FAIL")) return "FAIL";
  if (statuses.every((s) => s === "SKIP")) return "SKIP";
  return "PARTIAL";
}

// ============================================================================
// Evaluator
// ============================================================================

export interface GateEvaluatorOptions {
  checkTimeoutMs: number;
  criterionEvaluator?: CriterionEvaluator;
  hintsFor?: (obligationId: string) => string[];
  clock?: () => number;
}

export interface GateRunResult {
  checks: GateCheck[];
  cancelled: boolean;
  started_at: number;
  finished_at: number;
}

type Verdict = Omit<GateCheck, "duration_ms" | "hints" | "sub_checks">;

const CANCELLED_MESSAGE = "Cancelled before the check completed";

/**
 * Per-obligation state machine:
 *   PENDING → capability → evidence → criteria → PASS | FAIL | SKIP | ERROR
 * PARTIAL only comes out of composite obligations.
 *
 * Checks run one at a time. A capability found missing is remembered for
 * the rest of the run, so later checks needing it skip without asking the
 * capability again.
 */
export class GateEvaluator {
  private readonly registry: ObligationRegistry;
  private readonly checkTimeoutMs: number;
  private readonly criterionEvaluator: CriterionEvaluator;
  private readonly hintsFor?: (obligationId: string) => string[];
  private readonly clock: () => number;

  constructor(registry: ObligationRegistry, options: GateEvaluatorOptions) {
    this.registry = registry;
    this.checkTimeoutMs = options.checkTimeoutMs;
    this.criterionEvaluator = options.criterionEvaluator ?? new RecordedOutcomeEvaluator();
    this.hintsFor = options.hintsFor;
    this.clock = options.clock ?? Date.now;
  }

  async run(obligations: readonly Obligation[], ctx: RunContext): Promise<GateRunResult> {
    const startedAt = this.clock();
    const missing = new Map<string, CapabilityUnavailable>();
    const checks: GateCheck[] = [];
    let cancelled = false;

    for (const obligation of obligations) {
      if (ctx.signal?.aborted) {
        cancelled = true;
        checks.push(this.finish(this.cancelledVerdict(obligation), this.clock()));
        continue;
      }
      checks.push(await this.evaluate(obligation, ctx, missing));
    }

    if (ctx.signal?.aborted) cancelled = true;
    if (cancelled) logWarn("Gate run cancelled; unresolved checks marked ERROR");

    return { checks, cancelled, started_at: startedAt, finished_at: this.clock() };
  }

  private async evaluate(
    obligation: Obligation,
    ctx: RunContext,
    missing: Map<string, CapabilityUnavailable>,
  ): Promise<GateCheck> {
    const start = this.clock();
    if (obligation.composite_of.length === 0) {
      return this.finish(await this.bounded(obligation, ctx, missing), start);
    }

    const subChecks: GateCheck[] = [];
    for (const subId of obligation.composite_of) {
      const subStart = this.clock();
      if (!this.registry.has(subId)) {
        subChecks.push(
          this.finish(
            {
              obligation_id: subId,
              status: "ERROR",
              message: `Unknown sub-obligation ${subId}`,
              evidence_paths: [],
            },
            subStart,
          ),
        );
        continue;
      }
      const sub = this.registry.lookup(subId);
      const verdict = ctx.signal?.aborted
        ? this.cancelledVerdict(sub)
        : await this.bounded(sub, ctx, missing);
      subChecks.push(this.finish(verdict, subStart));
    }

    const status = combineSubStatuses(subChecks.map((c) => c.status));
    const passed = subChecks.filter((c) => c.status === "PASS").length;
    const notable = subChecks.filter((c) => c.status !== "PASS");
    const message =
      notable.length === 0
        ? `All ${subChecks.length} sub-checks passed`
        : `${passed}/${subChecks.length} sub-checks passed; ${notable
            .map((c) => `${c.obligation_id}: ${c.status}`)
            .join(", ")}`;

    const check = this.finish(
      {
        obligation_id: obligation.id,
        status,
        message,
        evidence_paths: [...new Set(subChecks.flatMap((c) => c.evidence_paths))],
      },
      start,
    );
    check.sub_checks = subChecks;
    return check;
  }

  /**
   * Run one check under the timeout and the run's abort signal. Whatever
   * happens inside, a verdict comes back.
   */
  private bounded(
    obligation: Obligation,
    ctx: RunContext,
    missing: Map<string, CapabilityUnavailable>,
  ): Promise<Verdict> {
    return new Promise<Verdict>((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const settle = (verdict: Verdict): void => {
        if (settled) return;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        ctx.signal?.removeEventListener("abort", onAbort);
        resolve(verdict);
      };
      const onAbort = (): void => settle(this.cancelledVerdict(obligation));

      timer = setTimeout(() => {
        settle(
          this.errorVerdict(
            obligation,
            new CheckTimeoutError(obligation.id, this.checkTimeoutMs).message,
          ),
        );
      }, this.checkTimeoutMs);
      ctx.signal?.addEventListener("abort", onAbort, { once: true });

      this.check(obligation, ctx, missing).then(settle, (err: unknown) => {
        const error = new CheckExecutionError(obligation.id, getErrorMessage(err));
        logWarn(error.message);
        settle(this.errorVerdict(obligation, error.message));
      });
    });
  }

  private async check(
    obligation: Obligation,
    ctx: RunContext,
    missing: Map<string, CapabilityUnavailable>,
  ): Promise<Verdict> {
    for (const capability of obligation.requires_capabilities) {
      const known = missing.get(capability);
      if (known) {
        return this.skipVerdict(obligation, known.message);
      }
      try {
        ctx.capability.require(capability);
      } catch (err) {
        if (!(err instanceof CapabilityUnavailable)) throw err;
        missing.set(capability, err);
        logDebug(`Capability ${capability} unavailable; later checks needing it will skip`);
        return this.skipVerdict(obligation, err.message);
      }
    }

    const evidence = ctx.evidence.get(obligation.id);
    if (!evidence || evidence.paths.length === 0) {
      return this.skipVerdict(obligation, "No evidence captured; obligation is unverified");
    }

    let firstUnverified: string | null = null;
    for (const criterion of obligation.pass_criteria) {
      const outcome = await this.criterionEvaluator.evaluate(criterion, obligation, evidence);
      if (outcome === false) {
        return {
          obligation_id: obligation.id,
          status: "FAIL",
          message: `Criterion violated: ${criterion}`,
          evidence_paths: [...evidence.paths],
        };
      }
      if (outcome === undefined && firstUnverified === null) firstUnverified = criterion;
    }

    if (firstUnverified !== null) {
      return {
        obligation_id: obligation.id,
        status: "SKIP",
        message: `No recorded outcome for criterion: ${firstUnverified}`,
        evidence_paths: [...evidence.paths],
      };
    }

    return {
      obligation_id: obligation.id,
      status: "PASS",
      message: `All ${obligation.pass_criteria.length} criteria satisfied`,
      evidence_paths: [...evidence.paths],
    };
  }

  private finish(verdict: Verdict, start: number): GateCheck {
    const check: GateCheck = { ...verdict, duration_ms: Math.max(0, this.clock() - start) };
    const hints = this.hintsFor?.(verdict.obligation_id) ?? [];
    if (hints.length > 0) check.hints = hints;
    return check;
  }

  private skipVerdict(obligation: Obligation, message: string): Verdict {
    return { obligation_id: obligation.id, status: "SKIP", message, evidence_paths: [] };
  }

  private errorVerdict(obligation: Obligation, message: string): Verdict {
    return { obligation_id: obligation.id, status: "ERROR", message, evidence_paths: [] };
  }

  private cancelledVerdict(obligation: Obligation): Verdict {
    return this.errorVerdict(obligation, CANCELLED_MESSAGE);
  }
}
