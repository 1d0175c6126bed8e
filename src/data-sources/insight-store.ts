import path from "path";
import { getErrorMessage, logInfo, logWarn } from "../core/logging.js";
import type { InsightRepository } from "../domain/insights/ledger.js";
import {
  ConfidenceSchema,
  ContradictionResolutionSchema,
  InsightScopeSchema,
} from "../domain/insights/schema.js";
import type {
  Confidence,
  ContradictionResolution,
  CuratedInsight,
  Insight,
  InsightReview,
  InsightScope,
  ProposalApproval,
} from "../domain/insights/types.js";
import {
  SqliteDatabase,
  rowNumber,
  rowText,
  rowTextOrNull,
  type Row,
} from "./sqlite-adapter.js";

const DB_FILENAME = "insights.db";

/**
 * SQLite-backed insight ledger partitions. Rows are only ever inserted;
 * a promotion or review never rewrites the pending record it refers to.
 */
export class InsightStore implements InsightRepository {
  private db: SqliteDatabase | null = null;
  private dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  initialize(): void {
    this.db = SqliteDatabase.open(path.join(this.dataDir, DB_FILENAME));

    this.db.sqlExec(`
      CREATE TABLE IF NOT EXISTS pending_insights (
        seq            INTEGER PRIMARY KEY AUTOINCREMENT,
        id             TEXT NOT NULL UNIQUE,
        source         TEXT NOT NULL,
        obligation_id  TEXT,
        invariant      TEXT NOT NULL,
        confidence     TEXT NOT NULL CHECK(confidence IN ('LOW','MODERATE','HIGH')),
        scope          TEXT NOT NULL,
        evidence_count INTEGER NOT NULL CHECK(evidence_count >= 0),
        ingested_at    TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS curated_insights (
        id             TEXT PRIMARY KEY,
        insight_id     TEXT NOT NULL UNIQUE REFERENCES pending_insights(id),
        obligation_id  TEXT NOT NULL,
        invariant      TEXT NOT NULL,
        confidence     TEXT NOT NULL,
        scope          TEXT NOT NULL,
        evidence_count INTEGER NOT NULL,
        reviewer       TEXT NOT NULL,
        promoted_at    TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS insight_reviews (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        action           TEXT NOT NULL CHECK(action IN ('reject','resolve')),
        insight_id       TEXT NOT NULL,
        other_insight_id TEXT,
        resolution       TEXT,
        reviewer         TEXT NOT NULL,
        reason           TEXT NOT NULL DEFAULT '',
        reviewed_at      TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS proposal_approvals (
        insight_id      TEXT PRIMARY KEY,
        obligation_id   TEXT NOT NULL UNIQUE,
        reviewer        TEXT NOT NULL,
        obligation_json TEXT NOT NULL,
        approved_at     TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_pending_obligation ON pending_insights(obligation_id);
      CREATE INDEX IF NOT EXISTS idx_curated_obligation ON curated_insights(obligation_id);
    `);

    this.db.persist();
    logInfo("InsightStore initialized");
  }

  // --------------------------------------------------------------------------
  // Pending
  // --------------------------------------------------------------------------

  listPending(): Insight[] {
    return this.open()
      .prepare("SELECT * FROM pending_insights ORDER BY seq")
      .all()
      .map(mapInsight);
  }

  getPending(id: string): Insight | null {
    const row = this.open().prepare("SELECT * FROM pending_insights WHERE id = ?").get(id);
    return row ? mapInsight(row) : null;
  }

  insertPending(insights: readonly Insight[]): void {
    const db = this.open();
    const insertAll = db.transaction((batch: readonly Insight[]) => {
      const stmt = db.prepare(`
        INSERT INTO pending_insights (id, source, obligation_id, invariant, confidence, scope, evidence_count)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      for (const i of batch) {
        stmt.run(i.id, i.source, i.obligation_id, i.invariant, i.confidence, i.scope, i.evidence_count);
      }
    });
    insertAll(insights);
    db.persist();
  }

  // --------------------------------------------------------------------------
  // Curated
  // --------------------------------------------------------------------------

  listCurated(): CuratedInsight[] {
    return this.open()
      .prepare("SELECT * FROM curated_insights ORDER BY promoted_at, id")
      .all()
      .map(mapCurated);
  }

  getCuratedByInsight(insightId: string): CuratedInsight | null {
    const row = this.open()
      .prepare("SELECT * FROM curated_insights WHERE insight_id = ?")
      .get(insightId);
    return row ? mapCurated(row) : null;
  }

  insertCurated(c: CuratedInsight): void {
    const db = this.open();
    db.prepare(`
      INSERT INTO curated_insights (id, insight_id, obligation_id, invariant, confidence, scope, evidence_count, reviewer, promoted_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      c.id,
      c.insight_id,
      c.obligation_id,
      c.invariant,
      c.confidence,
      c.scope,
      c.evidence_count,
      c.reviewer,
      c.promoted_at,
    );
    db.persist();
  }

  // --------------------------------------------------------------------------
  // Reviews & approvals
  // --------------------------------------------------------------------------

  listReviews(): InsightReview[] {
    return this.open()
      .prepare("SELECT * FROM insight_reviews ORDER BY id")
      .all()
      .map(mapReview);
  }

  insertReview(review: Omit<InsightReview, "id">): InsightReview {
    const db = this.open();
    const info = db
      .prepare(`
        INSERT INTO insight_reviews (action, insight_id, other_insight_id, resolution, reviewer, reason, reviewed_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        review.action,
        review.insight_id,
        review.other_insight_id,
        review.resolution,
        review.reviewer,
        review.reason,
        review.reviewed_at,
      );
    db.persist();
    return { id: info.lastInsertRowid, ...review };
  }

  listApprovals(): ProposalApproval[] {
    return this.open()
      .prepare("SELECT * FROM proposal_approvals ORDER BY approved_at, insight_id")
      .all()
      .map(mapApproval);
  }

  getApproval(insightId: string): ProposalApproval | null {
    const row = this.open()
      .prepare("SELECT * FROM proposal_approvals WHERE insight_id = ?")
      .get(insightId);
    return row ? mapApproval(row) : null;
  }

  insertApproval(a: ProposalApproval): void {
    const db = this.open();
    db.prepare(`
      INSERT INTO proposal_approvals (insight_id, obligation_id, reviewer, obligation_json, approved_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(a.insight_id, a.obligation_id, a.reviewer, a.obligation_json, a.approved_at);
    db.persist();
  }

  close(): void {
    if (this.db) {
      try {
        this.db.close();
      } catch (err) {
        logWarn(`InsightStore.close(): ${getErrorMessage(err)}`);
      }
      this.db = null;
    }
  }

  private open(): SqliteDatabase {
    if (!this.db) {
      throw new Error("InsightStore not initialized. Call initialize() first.");
    }
    return this.db;
  }
}

// ============================================================================
// Row mapping
// ============================================================================

function confidence(row: Row): Confidence {
  return ConfidenceSchema.parse(rowText(row, "confidence"));
}

function scope(row: Row): InsightScope {
  return InsightScopeSchema.parse(rowText(row, "scope"));
}

function resolution(row: Row): ContradictionResolution | null {
  const raw = rowTextOrNull(row, "resolution");
  return raw === null ? null : ContradictionResolutionSchema.parse(raw);
}

function mapInsight(row: Row): Insight {
  return {
    id: rowText(row, "id"),
    source: rowText(row, "source"),
    obligation_id: rowTextOrNull(row, "obligation_id"),
    invariant: rowText(row, "invariant"),
    confidence: confidence(row),
    scope: scope(row),
    evidence_count: rowNumber(row, "evidence_count"),
  };
}

function mapCurated(row: Row): CuratedInsight {
  return {
    id: rowText(row, "id"),
    insight_id: rowText(row, "insight_id"),
    obligation_id: rowText(row, "obligation_id"),
    invariant: rowText(row, "invariant"),
    confidence: confidence(row),
    scope: scope(row),
    evidence_count: rowNumber(row, "evidence_count"),
    reviewer: rowText(row, "reviewer"),
    promoted_at: rowText(row, "promoted_at"),
  };
}

function mapReview(row: Row): InsightReview {
  return {
    id: rowNumber(row, "id"),
    action: rowText(row, "action") === "reject" ? "reject" : "resolve",
    insight_id: rowText(row, "insight_id"),
    other_insight_id: rowTextOrNull(row, "other_insight_id"),
    resolution: resolution(row),
    reviewer: rowText(row, "reviewer"),
    reason: rowText(row, "reason"),
    reviewed_at: rowText(row, "reviewed_at"),
  };
}

function mapApproval(row: Row): ProposalApproval {
  return {
    insight_id: rowText(row, "insight_id"),
    obligation_id: rowText(row, "obligation_id"),
    reviewer: rowText(row, "reviewer"),
    obligation_json: rowText(row, "obligation_json"),
    approved_at: rowText(row, "approved_at"),
  };
}
