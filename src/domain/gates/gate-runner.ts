import type { ObligationRegistry } from "../obligations/registry.js";
import {
  resolveTargets,
  type GateEvaluator,
  type ProposalLookup,
} from "./gate-evaluator.js";
import type { GateReport, RunContext } from "./gate-types.js";
import type { ReportBuilder } from "./report-builder.js";

export interface GateRunDeps {
  registry: ObligationRegistry;
  evaluator: GateEvaluator;
  builder: ReportBuilder;
  proposals?: ProposalLookup;
}

/**
 * Resolve targets, evaluate every check, then aggregate and persist.
 *
 * Target resolution errors (unknown id, pending proposal) abort before any
 * check runs. After that, per-check problems stay inside their checks and
 * only a persistence failure rejects.
 */
export async function runGate(
  targetIds: readonly string[],
  ctx: RunContext,
  deps: GateRunDeps,
): Promise<GateReport> {
  const obligations = resolveTargets(targetIds, deps.registry, deps.proposals);
  const run = await deps.evaluator.run(obligations, ctx);
  return deps.builder.finalize(run, ctx.sink);
}
