// Insight & Consolidation Types

export type Confidence = "LOW" | "MODERATE" | "HIGH";

export type InsightScope = "generalizable" | "environment-specific" | "reference-only";

/**
 * Evidence unit extracted from a legacy test corpus. Pending records are
 * never mutated; promotion writes a separate CuratedInsight.
 */
export interface Insight {
  readonly id: string;
  readonly source: string; // corpus / suite identifier
  readonly obligation_id: string | null; // null = proposes a new obligation
  readonly invariant: string;
  readonly confidence: Confidence;
  readonly scope: InsightScope;
  readonly evidence_count: number;
}

export interface CuratedInsight {
  readonly id: string;
  readonly insight_id: string; // the pending record it was promoted from
  readonly obligation_id: string;
  readonly invariant: string;
  readonly confidence: Confidence;
  readonly scope: InsightScope;
  readonly evidence_count: number;
  readonly reviewer: string;
  readonly promoted_at: string;
}

export type Polarity = "affirm" | "deny";

/** Normalized invariant: "<mechanism> <modal> <action>". */
export interface Predicate {
  mechanism: string;
  polarity: Polarity;
  action: string;
}

export type InsightRelationKind = "contradicts" | "reinforces" | "complementary";

export interface InsightRelation {
  a: string;
  b: string;
  kind: InsightRelationKind;
  reason: string;
}

export type ContradictionResolution = "complementary" | "reject-first" | "reject-second";

export type ReviewAction = "reject" | "resolve";

export interface InsightReview {
  id: number;
  action: ReviewAction;
  insight_id: string;
  other_insight_id: string | null;
  resolution: ContradictionResolution | null;
  reviewer: string;
  reason: string;
  reviewed_at: string;
}

export interface ProposalApproval {
  insight_id: string;
  obligation_id: string;
  reviewer: string;
  obligation_json: string;
  approved_at: string;
}

export const PROPOSED_BUCKET = "proposed-new";

// Consolidation summary

export interface ReinforcedObligation {
  obligation_id: string;
  known_obligation: boolean;
  insight_ids: string[];
  aggregate_evidence_count: number;
  relations: InsightRelation[];
  curated_count: number;
  promotable: string[]; // candidates once a reviewer signs off
}

export type ProposalStatus = "PROPOSED" | "INELIGIBLE" | "APPROVED";

export interface ProposedObligation {
  insight_id: string;
  invariant: string;
  confidence: Confidence;
  evidence_count: number;
  status: ProposalStatus;
  reason: string;
}

export interface UnresolvedContradiction {
  group: string;
  a: string;
  b: string;
  reason: string;
}

export interface ReferenceInsight {
  insight_id: string;
  obligation_id: string | null;
  scope: InsightScope;
  invariant: string;
}

export interface ConsolidationSummary {
  generated_at: string;
  reinforced: ReinforcedObligation[];
  proposed: ProposedObligation[];
  contradictions: UnresolvedContradiction[];
  reference_only: ReferenceInsight[];
  warnings: string[];
}
