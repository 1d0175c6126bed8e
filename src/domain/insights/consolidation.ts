import { compareIds } from "../obligations/registry.js";
import { relationsWithin } from "./predicate.js";
import {
  PROPOSED_BUCKET,
  type ConsolidationSummary,
  type CuratedInsight,
  type Insight,
  type InsightRelation,
  type InsightReview,
  type ProposalApproval,
  type ProposedObligation,
  type ReferenceInsight,
  type ReinforcedObligation,
  type UnresolvedContradiction,
} from "./types.js";

// ============================================================================
// Ledger state helpers (pure)
// ============================================================================

export interface LedgerSnapshot {
  pending: readonly Insight[];
  curated: readonly CuratedInsight[];
  reviews: readonly InsightReview[];
  approvals: readonly ProposalApproval[];
}

export function groupKey(insight: Insight): string {
  return insight.obligation_id ?? PROPOSED_BUCKET;
}

/** Groups keyed by obligation id (ascending); members keep ingest order. */
export function groupInsights(insights: readonly Insight[]): Map<string, Insight[]> {
  const groups = new Map<string, Insight[]>();
  for (const insight of insights) {
    const key = groupKey(insight);
    const members = groups.get(key) ?? [];
    members.push(insight);
    groups.set(key, members);
  }
  return new Map([...groups.entries()].sort(([a], [b]) => compareIds(a, b)));
}

export function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export function rejectedIds(reviews: readonly InsightReview[]): Set<string> {
  const rejected = new Set<string>();
  for (const review of reviews) {
    if (review.action === "reject") {
      rejected.add(review.insight_id);
    } else if (review.resolution === "reject-first") {
      rejected.add(review.insight_id);
    } else if (review.resolution === "reject-second" && review.other_insight_id) {
      rejected.add(review.other_insight_id);
    }
  }
  return rejected;
}

/** Pairs a reviewer confirmed as complementary despite the suggestion. */
export function acceptedPairs(reviews: readonly InsightReview[]): Set<string> {
  const accepted = new Set<string>();
  for (const review of reviews) {
    if (review.resolution === "complementary" && review.other_insight_id) {
      accepted.add(pairKey(review.insight_id, review.other_insight_id));
    }
  }
  return accepted;
}

/**
 * Contradicting pairs among the non-rejected members that no reviewer has
 * resolved. Reference-only members take part: disagreement is surfaced
 * whatever the scope.
 */
export function unresolvedContradictions(
  members: readonly Insight[],
  reviews: readonly InsightReview[],
): InsightRelation[] {
  const rejected = rejectedIds(reviews);
  const accepted = acceptedPairs(reviews);
  return relationsWithin(members.filter((m) => !rejected.has(m.id))).filter(
    (r) => r.kind === "contradicts" && !accepted.has(pairKey(r.a, r.b)),
  );
}

export interface ProposalAssessment {
  eligible: boolean;
  reason: string;
}

export function assessProposal(insight: Insight, minEvidence: number): ProposalAssessment {
  if (insight.scope !== "generalizable") {
    return { eligible: false, reason: `scope is ${insight.scope}` };
  }
  if (insight.confidence !== "HIGH") {
    return { eligible: false, reason: `confidence ${insight.confidence} is below HIGH` };
  }
  if (insight.evidence_count <= minEvidence) {
    return {
      eligible: false,
      reason: `evidence_count ${insight.evidence_count} does not exceed ${minEvidence}`,
    };
  }
  return {
    eligible: true,
    reason: `HIGH confidence with ${insight.evidence_count} evidence item(s); awaiting human approval`,
  };
}

// ============================================================================
// Summary
// ============================================================================

export interface SummaryOptions {
  minEvidence: number;
  isKnownObligation: (id: string) => boolean;
  now?: Date;
}

function toReference(insight: Insight): ReferenceInsight {
  return {
    insight_id: insight.id,
    obligation_id: insight.obligation_id,
    scope: insight.scope,
    invariant: insight.invariant,
  };
}

/**
 * The record a maintainer reviews before committing curated knowledge.
 * Complementary and reinforcing relations are reported as computed; nothing
 * is merged away.
 */
export function buildSummary(
  snapshot: LedgerSnapshot,
  options: SummaryOptions,
): ConsolidationSummary {
  const rejected = rejectedIds(snapshot.reviews);
  const curatedByInsight = new Map(snapshot.curated.map((c) => [c.insight_id, c]));
  const approvals = new Map(snapshot.approvals.map((a) => [a.insight_id, a]));

  const reinforced: ReinforcedObligation[] = [];
  const proposed: ProposedObligation[] = [];
  const contradictions: UnresolvedContradiction[] = [];
  const referenceOnly: ReferenceInsight[] = [];
  const warnings: string[] = [];

  for (const [group, members] of groupInsights(snapshot.pending)) {
    const live = members.filter((m) => !rejected.has(m.id));
    const blocking = unresolvedContradictions(members, snapshot.reviews);
    for (const relation of blocking) {
      contradictions.push({ group, a: relation.a, b: relation.b, reason: relation.reason });
    }
    if (blocking.length > 0) {
      warnings.push(
        `${blocking.length} unresolved contradiction(s) block promotion in group ${group}`,
      );
    }

    for (const member of live) {
      if (member.scope !== "generalizable") referenceOnly.push(toReference(member));
    }
    const general = live.filter((m) => m.scope === "generalizable");

    if (group === PROPOSED_BUCKET) {
      for (const insight of general) {
        const approval = approvals.get(insight.id);
        const assessment = assessProposal(insight, options.minEvidence);
        const status = approval ? "APPROVED" : assessment.eligible ? "PROPOSED" : "INELIGIBLE";
        proposed.push({
          insight_id: insight.id,
          invariant: insight.invariant,
          confidence: insight.confidence,
          evidence_count: insight.evidence_count,
          status,
          reason: approval
            ? `approved by ${approval.reviewer} as ${approval.obligation_id}`
            : assessment.reason,
        });
        if (status === "PROPOSED") {
          warnings.push(`Proposal ${insight.id} awaits human approval`);
        }
      }
      continue;
    }

    const known = options.isKnownObligation(group);
    if (!known) {
      warnings.push(
        `Insight(s) ${members.map((m) => m.id).join(", ")} reference unknown obligation ${group}`,
      );
    }
    if (general.length === 0) continue;

    reinforced.push({
      obligation_id: group,
      known_obligation: known,
      insight_ids: general.map((m) => m.id),
      aggregate_evidence_count: general.reduce((sum, m) => sum + m.evidence_count, 0),
      relations: relationsWithin(general),
      curated_count: snapshot.curated.filter((c) => c.obligation_id === group).length,
      promotable:
        blocking.length > 0 || !known
          ? []
          : general.filter((m) => !curatedByInsight.has(m.id)).map((m) => m.id),
    });
  }

  return {
    generated_at: (options.now ?? new Date()).toISOString(),
    reinforced,
    proposed,
    contradictions,
    reference_only: referenceOnly,
    warnings,
  };
}
