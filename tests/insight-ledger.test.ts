import { describe, it, expect, beforeEach } from "vitest";
import {
  AlreadyCuratedError,
  BlockedByContradictionError,
  ContradictionError,
  DuplicateIdError,
  NotFoundError,
  ProposalPendingReviewError,
  SchemaError,
  ScopeRestrictedError,
} from "../src/core/errors.js";
import { GroupLock } from "../src/core/group-lock.js";
import { InsightLedger } from "../src/domain/insights/ledger.js";
import {
  FIXED_NOW,
  MemoryInsightRepository,
  makeConsolidationConfig,
  makeInsight,
  makeRegistry,
} from "./fixtures.js";

const registry = makeRegistry([
  { id: "cache.vary.honored" },
  { id: "resilience.graceful.degradation", domain: "resilience" },
]);

describe("InsightLedger", () => {
  let repo: MemoryInsightRepository;
  let ledger: InsightLedger;

  beforeEach(() => {
    repo = new MemoryInsightRepository();
    ledger = new InsightLedger(repo, registry, makeConsolidationConfig(), {
      now: () => FIXED_NOW,
    });
  });

  describe("ingest", () => {
    it("validates and appends records", () => {
      const ingested = ledger.ingest(
        [{ ...makeInsight(), confidence: "high", scope: " Generalizable " }],
        "batch.json",
      );
      expect(ingested).toEqual([makeInsight()]);
      expect(ledger.pending()).toEqual([makeInsight()]);
    });

    it("rejects malformed records", () => {
      expect(() =>
        ledger.ingest([{ ...makeInsight(), evidence_count: -1 }], "batch.json"),
      ).toThrow(SchemaError);
      expect(ledger.pending()).toEqual([]);
    });

    it("rejects ids already in the ledger", () => {
      ledger.ingest([makeInsight()], "first.json");
      expect(() => ledger.ingest([makeInsight()], "second.json")).toThrow(
        'Duplicate id "ins-1" declared in the insight ledger and second.json',
      );
    });

    it("rejects duplicate ids inside one batch", () => {
      expect(() => ledger.ingest([makeInsight(), makeInsight()], "batch.json")).toThrow(
        DuplicateIdError,
      );
      expect(ledger.pending()).toEqual([]);
    });
  });

  describe("promote", () => {
    it("writes a curated record without touching the pending one", async () => {
      ledger.ingest([makeInsight()], "batch.json");
      const curated = await ledger.promote("ins-1", "reviewer-1");

      expect(curated).toEqual({
        id: "cur_ins-1",
        insight_id: "ins-1",
        obligation_id: "cache.vary.honored",
        invariant: "vary header must split cache entries",
        confidence: "HIGH",
        scope: "generalizable",
        evidence_count: 3,
        reviewer: "reviewer-1",
        promoted_at: "2026-03-01T12:00:00.000Z",
      });
      expect(ledger.pending()).toEqual([makeInsight()]);
      expect(ledger.curatedFor("cache.vary.honored")).toEqual([curated]);
    });

    it("refuses a second promotion", async () => {
      ledger.ingest([makeInsight()], "batch.json");
      await ledger.promote("ins-1", "reviewer-1");
      await expect(ledger.promote("ins-1", "reviewer-2")).rejects.toThrow(AlreadyCuratedError);
    });

    it("keeps non-generalizable insights as reference", async () => {
      ledger.ingest([makeInsight({ scope: "environment-specific" })], "batch.json");
      await expect(ledger.promote("ins-1", "reviewer-1")).rejects.toThrow(ScopeRestrictedError);
    });

    it("is blocked by an unresolved contradiction", async () => {
      ledger.ingest(
        [
          makeInsight({ id: "a", invariant: "responses must be cached" }),
          makeInsight({ id: "b", invariant: "responses must not be cached" }),
        ],
        "batch.json",
      );
      const attempt = ledger.promote("a", "reviewer-1");
      await expect(attempt).rejects.toThrow(BlockedByContradictionError);
      await expect(ledger.promote("a", "reviewer-1")).rejects.toThrow(
        'Cannot promote a: group "cache.vary.honored" has unresolved contradiction(s) a <> b',
      );
      expect(ledger.curated()).toEqual([]);
    });

    it("proceeds once the contradiction is resolved", async () => {
      ledger.ingest(
        [
          makeInsight({ id: "a", invariant: "responses must be cached" }),
          makeInsight({ id: "b", invariant: "responses must not be cached" }),
        ],
        "batch.json",
      );
      await ledger.resolveContradiction("a", "b", "reviewer-1", "reject-second", "b is outdated");

      const curated = await ledger.promote("a", "reviewer-1");
      expect(curated.id).toBe("cur_a");
      await expect(ledger.promote("b", "reviewer-1")).rejects.toThrow(ScopeRestrictedError);
    });

    it("routes proposals to approval", async () => {
      ledger.ingest([makeInsight({ obligation_id: null })], "batch.json");
      await expect(ledger.promote("ins-1", "reviewer-1")).rejects.toThrow(
        ProposalPendingReviewError,
      );
    });

    it("requires a known obligation", async () => {
      ledger.ingest([makeInsight({ obligation_id: "cache.unknown.thing" })], "batch.json");
      await expect(ledger.promote("ins-1", "reviewer-1")).rejects.toThrow(
        "Obligation not found: cache.unknown.thing",
      );
    });

    it("throws NotFoundError for unknown insights", async () => {
      await expect(ledger.promote("missing", "reviewer-1")).rejects.toThrow(NotFoundError);
    });
  });

  describe("promoteEligible", () => {
    it("promotes clean groups and reports blocked and unknown ones", async () => {
      ledger.ingest(
        [
          makeInsight({ id: "ok-1", obligation_id: "resilience.graceful.degradation", invariant: "backup origin failover" }),
          makeInsight({ id: "ok-2", obligation_id: "resilience.graceful.degradation", invariant: "stale on not found" }),
          makeInsight({ id: "ref", obligation_id: "resilience.graceful.degradation", scope: "reference-only", invariant: "lab only" }),
          makeInsight({ id: "a", invariant: "responses must be cached" }),
          makeInsight({ id: "b", invariant: "responses must not be cached" }),
          makeInsight({ id: "x", obligation_id: "cache.unknown.thing" }),
        ],
        "batch.json",
      );

      const result = await ledger.promoteEligible("reviewer-1");

      expect(result.promoted.map((c) => c.id)).toEqual(["cur_ok-1", "cur_ok-2"]);
      expect(result.blocked).toEqual([{ group: "cache.vary.honored", pairs: [["a", "b"]] }]);
      expect(result.skipped).toEqual([
        { group: "cache.unknown.thing", reason: "unknown obligation cache.unknown.thing" },
      ]);
    });

    it("serializes with a concurrent promotion of the same group", async () => {
      const lock = new GroupLock();
      ledger = new InsightLedger(repo, registry, makeConsolidationConfig(), { lock });
      ledger.ingest([makeInsight()], "batch.json");

      const [single, bulk] = await Promise.allSettled([
        ledger.promote("ins-1", "reviewer-1"),
        ledger.promoteEligible("reviewer-2"),
      ]);

      expect(single.status).toBe("fulfilled");
      expect(bulk.status === "fulfilled" ? bulk.value.promoted : null).toEqual([]);
      expect(repo.curatedRows).toHaveLength(1);
      expect(lock.isLocked("cache.vary.honored")).toBe(false);
    });
  });

  describe("reviews", () => {
    it("reject() records the decision and blocks promotion", async () => {
      ledger.ingest([makeInsight()], "batch.json");
      const review = await ledger.reject("ins-1", "reviewer-1", "too specific");

      expect(review).toEqual({
        id: 1,
        action: "reject",
        insight_id: "ins-1",
        other_insight_id: null,
        resolution: null,
        reviewer: "reviewer-1",
        reason: "too specific",
        reviewed_at: "2026-03-01T12:00:00.000Z",
      });
      await expect(ledger.promote("ins-1", "reviewer-1")).rejects.toThrow(
        "Insight ins-1 is rejected and stays reference material; it cannot be promoted",
      );
    });

    it("resolveContradiction() only accepts open contradictions", async () => {
      ledger.ingest(
        [
          makeInsight({ id: "a", obligation_id: "resilience.graceful.degradation", invariant: "backup origin failover" }),
          makeInsight({ id: "b", obligation_id: "resilience.graceful.degradation", invariant: "stale on not found" }),
          makeInsight({ id: "c" }),
        ],
        "batch.json",
      );
      await expect(
        ledger.resolveContradiction("a", "b", "reviewer-1", "complementary"),
      ).rejects.toThrow("Insights a and b are not an unresolved contradiction (complementary)");
      await expect(
        ledger.resolveContradiction("a", "c", "reviewer-1", "complementary"),
      ).rejects.toThrow(ContradictionError);
    });

    it("a complementary resolution unblocks both insights", async () => {
      ledger.ingest(
        [
          makeInsight({ id: "a", invariant: "responses must be cached" }),
          makeInsight({ id: "b", invariant: "responses must not be cached" }),
        ],
        "batch.json",
      );
      await ledger.resolveContradiction("b", "a", "reviewer-1", "complementary", "different routes");
      const result = await ledger.promoteEligible("reviewer-1");
      expect(result.promoted.map((c) => c.id)).toEqual(["cur_a", "cur_b"]);
      expect(ledger.consolidate().contradictions).toEqual([]);
    });
    it("resolveContradiction() cannot reject an insight that is already curated", async () => {
      ledger.ingest([makeInsight({ id: "a", invariant: "responses must be cached" })], "batch.json");
      const curated = await ledger.promote("a", "reviewer-1");
      ledger.ingest([makeInsight({ id: "b", invariant: "responses must not be cached" })], "later.json");

      await expect(
        ledger.resolveContradiction("a", "b", "reviewer-1", "reject-first"),
      ).rejects.toThrow(AlreadyCuratedError);
      await expect(
        ledger.resolveContradiction("b", "a", "reviewer-1", "reject-second"),
      ).rejects.toThrow("Insight a was already promoted as cur_a");
      expect(repo.reviewRows).toEqual([]);
      expect(ledger.curatedFor("cache.vary.honored")).toEqual([curated]);
      await expect(ledger.promote("b", "reviewer-1")).rejects.toThrow(BlockedByContradictionError);
    });
  });

  describe("proposals", () => {
    const draft = {
      id: "cache.purge.propagated",
      title: "Purges reach every edge",
      domain: "cache",
      risk: "high" as const,
    };

    it("an eligible proposal is PROPOSED and never a gate target", () => {
      ledger.ingest([makeInsight({ id: "p", obligation_id: null, evidence_count: 8 })], "batch.json");
      expect(ledger.findProposal("p")).toEqual({
        insight_id: "p",
        invariant: "vary header must split cache entries",
        confidence: "HIGH",
        evidence_count: 8,
        status: "PROPOSED",
        reason: "HIGH confidence with 8 evidence item(s); awaiting human approval",
      });
      expect(ledger.approvedObligation("cache.purge.propagated")).toBeNull();
    });

    it("approveProposal() creates a runnable obligation", async () => {
      ledger.ingest([makeInsight({ id: "p", obligation_id: null, evidence_count: 8 })], "batch.json");
      const obligation = await ledger.approveProposal("p", "reviewer-1", draft);

      expect(obligation.id).toBe("cache.purge.propagated");
      expect(obligation.pass_criteria).toEqual(["vary header must split cache entries"]);
      expect(ledger.findProposal("p")).toBeNull();
      expect(ledger.approvedObligation("cache.purge.propagated")).toEqual(obligation);
      await expect(ledger.approveProposal("p", "reviewer-1", draft)).rejects.toThrow(
        AlreadyCuratedError,
      );
    });

    it("approveProposal() is blocked by a contradicting proposal until it is resolved", async () => {
      ledger.ingest(
        [
          makeInsight({
            id: "p1",
            obligation_id: null,
            evidence_count: 8,
            invariant: "Purge requests must always reach every edge",
          }),
          makeInsight({
            id: "p2",
            obligation_id: null,
            evidence_count: 8,
            invariant: "Purge requests must never reach every edge",
          }),
        ],
        "batch.json",
      );

      await expect(ledger.approveProposal("p1", "reviewer-1", draft)).rejects.toThrow(
        'Cannot promote p1: group "proposed-new" has unresolved contradiction(s) p1 <> p2',
      );
      await expect(
        ledger.approveProposal("p2", "reviewer-1", { ...draft, id: "cache.purge.withheld" }),
      ).rejects.toThrow(BlockedByContradictionError);
      expect(repo.approvalRows).toEqual([]);

      await ledger.resolveContradiction("p1", "p2", "reviewer-1", "reject-second", "superseded");
      const obligation = await ledger.approveProposal("p1", "reviewer-1", draft);
      expect(obligation.pass_criteria).toEqual(["Purge requests must always reach every edge"]);
    });

    it("refuses ineligible proposals", async () => {
      ledger.ingest([makeInsight({ id: "p", obligation_id: null, evidence_count: 2 })], "batch.json");
      await expect(ledger.approveProposal("p", "reviewer-1", draft)).rejects.toThrow(
        "Proposal p requires human approval: not eligible: evidence_count 2 does not exceed 5",
      );
    });

    it("refuses an id the registry already holds", async () => {
      ledger.ingest([makeInsight({ id: "p", obligation_id: null, evidence_count: 8 })], "batch.json");
      await expect(
        ledger.approveProposal("p", "reviewer-1", { ...draft, id: "cache.vary.honored" }),
      ).rejects.toThrow(DuplicateIdError);
    });

    it("refuses insights that are not proposals", async () => {
      ledger.ingest([makeInsight()], "batch.json");
      await expect(ledger.approveProposal("ins-1", "reviewer-1", draft)).rejects.toThrow(
        "Proposal not found: ins-1",
      );
    });
  });
});
