import type { ConsolidationConfig } from "../../core/config.js";
import {
  AlreadyCuratedError,
  BlockedByContradictionError,
  ContradictionError,
  DuplicateIdError,
  NotFoundError,
  ProposalPendingReviewError,
  ScopeRestrictedError,
} from "../../core/errors.js";
import { GroupLock } from "../../core/group-lock.js";
import { logInfo, logWarn } from "../../core/logging.js";
import type { ObligationDraft } from "../obligations/schema.js";
import {
  compareIds,
  parseObligation,
  type ObligationRegistry,
} from "../obligations/registry.js";
import type { Obligation } from "../obligations/types.js";
import { parseWith } from "../validation.js";
import {
  assessProposal,
  buildSummary,
  groupKey,
  pairKey,
  rejectedIds,
  unresolvedContradictions,
  type LedgerSnapshot,
} from "./consolidation.js";
import { relate } from "./predicate.js";
import { InsightBatchSchema } from "./schema.js";
import {
  PROPOSED_BUCKET,
  type ConsolidationSummary,
  type ContradictionResolution,
  type CuratedInsight,
  type Insight,
  type InsightReview,
  type ProposalApproval,
  type ProposedObligation,
} from "./types.js";

/**
 * Storage seam for the ledger. Pending records are append-only; every
 * promotion, review and approval is a new row.
 */
export interface InsightRepository {
  listPending(): Insight[];
  getPending(id: string): Insight | null;
  insertPending(insights: readonly Insight[]): void;
  listCurated(): CuratedInsight[];
  getCuratedByInsight(insightId: string): CuratedInsight | null;
  insertCurated(curated: CuratedInsight): void;
  listReviews(): InsightReview[];
  insertReview(review: Omit<InsightReview, "id">): InsightReview;
  listApprovals(): ProposalApproval[];
  getApproval(insightId: string): ProposalApproval | null;
  insertApproval(approval: ProposalApproval): void;
}

export interface PromoteEligibleResult {
  promoted: CuratedInsight[];
  blocked: Array<{ group: string; pairs: Array<[string, string]> }>;
  skipped: Array<{ group: string; reason: string }>;
}

export interface InsightLedgerOptions {
  lock?: GroupLock;
  now?: () => Date;
}

export class InsightLedger {
  private readonly repo: InsightRepository;
  private readonly registry: ObligationRegistry;
  private readonly config: ConsolidationConfig;
  private readonly lock: GroupLock;
  private readonly now: () => Date;

  constructor(
    repo: InsightRepository,
    registry: ObligationRegistry,
    config: ConsolidationConfig,
    options: InsightLedgerOptions = {},
  ) {
    this.repo = repo;
    this.registry = registry;
    this.config = config;
    this.lock = options.lock ?? new GroupLock();
    this.now = options.now ?? (() => new Date());
  }

  // --------------------------------------------------------------------------
  // Ingestion & reads
  // --------------------------------------------------------------------------

  /** Validate extractor output and append it to the pending partition. */
  ingest(records: unknown, origin = "ingest"): Insight[] {
    const batch = parseWith(InsightBatchSchema, records, origin);
    const seen = new Set<string>();
    for (const insight of batch) {
      if (seen.has(insight.id) || this.repo.getPending(insight.id)) {
        throw new DuplicateIdError(insight.id, "the insight ledger", origin);
      }
      seen.add(insight.id);
    }

    const unknown = batch.filter(
      (i) => i.obligation_id !== null && !this.registry.has(i.obligation_id),
    );
    for (const insight of unknown) {
      logWarn(`Insight ${insight.id} references unknown obligation ${insight.obligation_id}`);
    }

    this.repo.insertPending(batch);
    logInfo(`Ingested ${batch.length} insight(s) from ${origin}`);
    return batch;
  }

  pending(): Insight[] {
    return this.repo.listPending();
  }

  curated(): CuratedInsight[] {
    return this.repo.listCurated();
  }

  curatedFor(obligationId: string): CuratedInsight[] {
    return this.repo.listCurated().filter((c) => c.obligation_id === obligationId);
  }

  consolidate(): ConsolidationSummary {
    return buildSummary(this.snapshot(), {
      minEvidence: this.config.proposalMinEvidence,
      isKnownObligation: (id) => this.registry.has(id),
      now: this.now(),
    });
  }

  /** A pending proposal that has not been approved, or null. */
  findProposal(id: string): ProposedObligation | null {
    const insight = this.repo.getPending(id);
    if (!insight || insight.obligation_id !== null) return null;
    if (this.repo.getApproval(id)) return null;
    const assessment = assessProposal(insight, this.config.proposalMinEvidence);
    return {
      insight_id: insight.id,
      invariant: insight.invariant,
      confidence: insight.confidence,
      evidence_count: insight.evidence_count,
      status: assessment.eligible ? "PROPOSED" : "INELIGIBLE",
      reason: assessment.reason,
    };
  }

  /** Obligation created by an approved proposal, looked up by obligation id. */
  approvedObligation(obligationId: string): Obligation | null {
    const approval = this.repo.listApprovals().find((a) => a.obligation_id === obligationId);
    if (!approval) return null;
    return parseObligation(
      JSON.parse(approval.obligation_json),
      `approval of ${approval.insight_id}`,
    );
  }

  // --------------------------------------------------------------------------
  // Promotion
  // --------------------------------------------------------------------------

  async promote(insightId: string, reviewer: string): Promise<CuratedInsight> {
    const insight = this.requirePending(insightId);
    if (insight.obligation_id === null) {
      throw new ProposalPendingReviewError(
        insightId,
        "it proposes a new obligation; use approveProposal",
      );
    }
    return this.lock.run(groupKey(insight), () => this.promoteLocked(insight, reviewer));
  }

  /**
   * Promote every candidate of every group without an unresolved
   * contradiction. Groups run concurrently; each holds its own lock.
   */
  async promoteEligible(reviewer: string): Promise<PromoteEligibleResult> {
    const result: PromoteEligibleResult = { promoted: [], blocked: [], skipped: [] };
    const groups = [
      ...new Set(
        this.repo
          .listPending()
          .filter((i) => i.obligation_id !== null)
          .map(groupKey),
      ),
    ];

    await Promise.all(
      groups.map((group) =>
        this.lock.run(group, () => {
          if (!this.registry.has(group)) {
            result.skipped.push({ group, reason: `unknown obligation ${group}` });
            return;
          }
          const members = this.members(group);
          const blocking = unresolvedContradictions(members, this.repo.listReviews());
          if (blocking.length > 0) {
            result.blocked.push({
              group,
              pairs: blocking.map((r): [string, string] => [r.a, r.b]),
            });
            return;
          }
          const rejected = rejectedIds(this.repo.listReviews());
          for (const insight of members) {
            if (insight.scope !== "generalizable" || rejected.has(insight.id)) continue;
            if (this.repo.getCuratedByInsight(insight.id)) continue;
            result.promoted.push(this.writeCurated(insight, reviewer));
          }
        }),
      ),
    );

    result.promoted.sort((a, b) => compareIds(a.id, b.id));
    return result;
  }

  // --------------------------------------------------------------------------
  // Human review
  // --------------------------------------------------------------------------

  async reject(insightId: string, reviewer: string, reason: string): Promise<InsightReview> {
    const insight = this.requirePending(insightId);
    return this.lock.run(groupKey(insight), () => {
      const curated = this.repo.getCuratedByInsight(insightId);
      if (curated) {
        throw new AlreadyCuratedError(insightId, curated.id);
      }
      const review = this.repo.insertReview({
        action: "reject",
        insight_id: insightId,
        other_insight_id: null,
        resolution: null,
        reviewer,
        reason,
        reviewed_at: this.now().toISOString(),
      });
      logInfo(`Insight ${insightId} rejected by ${reviewer}`);
      return review;
    });
  }

  /**
   * Record a reviewer's decision on a suggested contradiction. Only pairs
   * that are currently unresolved contradictions can be resolved.
   */
  async resolveContradiction(
    firstId: string,
    secondId: string,
    reviewer: string,
    resolution: ContradictionResolution,
    reason = "",
  ): Promise<InsightReview> {
    const first = this.requirePending(firstId);
    const second = this.requirePending(secondId);
    const group = groupKey(first);
    if (groupKey(second) !== group) {
      throw new ContradictionError(
        `Insights ${firstId} and ${secondId} belong to different groups`,
        [[firstId, secondId]],
      );
    }

    return this.lock.run(group, () => {
      const open = unresolvedContradictions(this.members(group), this.repo.listReviews());
      const key = pairKey(firstId, secondId);
      if (!open.some((r) => pairKey(r.a, r.b) === key)) {
        throw new ContradictionError(
          `Insights ${firstId} and ${secondId} are not an unresolved contradiction (${relate(first, second).kind})`,
          [[firstId, secondId]],
        );
      }
      const rejectedId =
        resolution === "reject-first" ? firstId : resolution === "reject-second" ? secondId : null;
      const curated = rejectedId === null ? null : this.repo.getCuratedByInsight(rejectedId);
      if (rejectedId !== null && curated) {
        throw new AlreadyCuratedError(rejectedId, curated.id);
      }
      const review = this.repo.insertReview({
        action: "resolve",
        insight_id: firstId,
        other_insight_id: secondId,
        resolution,
        reviewer,
        reason,
        reviewed_at: this.now().toISOString(),
      });
      logInfo(`Contradiction ${firstId} <> ${secondId} resolved as ${resolution} by ${reviewer}`);
      return review;
    });
  }

  /**
   * The explicit human action that turns an eligible proposal into an
   * obligation. The draft is validated like a committed obligation file.
   */
  async approveProposal(
    insightId: string,
    reviewer: string,
    draft: ObligationDraft,
  ): Promise<Obligation> {
    const insight = this.requirePending(insightId);
    if (insight.obligation_id !== null) {
      throw new NotFoundError("Proposal", insightId);
    }

    return this.lock.run(PROPOSED_BUCKET, () => {
      const existing = this.repo.getApproval(insightId);
      if (existing) {
        throw new AlreadyCuratedError(insightId, existing.obligation_id);
      }
      const reviews = this.repo.listReviews();
      if (rejectedIds(reviews).has(insightId)) {
        throw new ScopeRestrictedError(insightId, "rejected");
      }
      const blocking = unresolvedContradictions(this.members(PROPOSED_BUCKET), reviews).filter(
        (r) => r.a === insightId || r.b === insightId,
      );
      if (blocking.length > 0) {
        throw new BlockedByContradictionError(
          insightId,
          PROPOSED_BUCKET,
          blocking.map((r): [string, string] => [r.a, r.b]),
        );
      }
      const assessment = assessProposal(insight, this.config.proposalMinEvidence);
      if (!assessment.eligible) {
        throw new ProposalPendingReviewError(insightId, `not eligible: ${assessment.reason}`);
      }

      const obligation = parseObligation(
        { ...draft, pass_criteria: draft.pass_criteria ?? [insight.invariant] },
        `proposal ${insightId}`,
      );
      const clash = this.repo.listApprovals().find((a) => a.obligation_id === obligation.id);
      if (this.registry.has(obligation.id) || clash) {
        throw new DuplicateIdError(
          obligation.id,
          clash ? `approval of ${clash.insight_id}` : "the obligation registry",
          `proposal ${insightId}`,
        );
      }

      this.repo.insertApproval({
        insight_id: insightId,
        obligation_id: obligation.id,
        reviewer,
        obligation_json: JSON.stringify(obligation),
        approved_at: this.now().toISOString(),
      });
      logInfo(`Proposal ${insightId} approved by ${reviewer} as ${obligation.id}`);
      return obligation;
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private promoteLocked(insight: Insight, reviewer: string): CuratedInsight {
    const existing = this.repo.getCuratedByInsight(insight.id);
    if (existing) {
      throw new AlreadyCuratedError(insight.id, existing.id);
    }

    const reviews = this.repo.listReviews();
    if (rejectedIds(reviews).has(insight.id)) {
      throw new ScopeRestrictedError(insight.id, "rejected");
    }
    if (insight.scope !== "generalizable") {
      throw new ScopeRestrictedError(insight.id, insight.scope);
    }

    const group = groupKey(insight);
    const blocking = unresolvedContradictions(this.members(group), reviews);
    if (blocking.length > 0) {
      throw new BlockedByContradictionError(
        insight.id,
        group,
        blocking.map((r): [string, string] => [r.a, r.b]),
      );
    }
    if (!this.registry.has(group)) {
      throw new NotFoundError("Obligation", group);
    }

    return this.writeCurated(insight, reviewer);
  }

  private writeCurated(insight: Insight, reviewer: string): CuratedInsight {
    const curated: CuratedInsight = {
      id: `cur_${insight.id}`,
      insight_id: insight.id,
      obligation_id: groupKey(insight),
      invariant: insight.invariant,
      confidence: insight.confidence,
      scope: insight.scope,
      evidence_count: insight.evidence_count,
      reviewer,
      promoted_at: this.now().toISOString(),
    };
    this.repo.insertCurated(curated);
    logInfo(`Insight ${insight.id} promoted to ${curated.id} by ${reviewer}`);
    return curated;
  }

  private members(group: string): Insight[] {
    return this.repo.listPending().filter((i) => groupKey(i) === group);
  }

  private requirePending(id: string): Insight {
    const insight = this.repo.getPending(id);
    if (!insight) {
      throw new NotFoundError("Insight", id);
    }
    return insight;
  }

  private snapshot(): LedgerSnapshot {
    return {
      pending: this.repo.listPending(),
      curated: this.repo.listCurated(),
      reviews: this.repo.listReviews(),
      approvals: this.repo.listApprovals(),
    };
  }
}
