import type {
  ConsolidationConfig,
  GateRunConfig,
  SelectionConfig,
} from "../src/core/config.js";
import type { InsightRepository } from "../src/domain/insights/ledger.js";
import type {
  CuratedInsight,
  Insight,
  InsightReview,
  ProposalApproval,
} from "../src/domain/insights/types.js";
import type { GateReport } from "../src/domain/gates/gate-types.js";
import type { ReportSink } from "../src/domain/gates/report-builder.js";
import { ObligationRegistry } from "../src/domain/obligations/registry.js";
import type { ObligationFile } from "../src/domain/obligations/schema.js";
import { PackCatalog } from "../src/domain/packs/catalog.js";
import type { PackFile } from "../src/domain/packs/schema.js";

// ============================================================================
// Config
// ============================================================================

export function makeSelectionConfig(overrides?: Partial<SelectionConfig>): SelectionConfig {
  return {
    threshold: 0.5,
    defaultPackId: "edge-baseline",
    obligationSignalWeight: 0.6,
    fullCreditMatches: 3,
    decay: 0.5,
    ...overrides,
  };
}

export function makeConsolidationConfig(
  overrides?: Partial<ConsolidationConfig>,
): ConsolidationConfig {
  return { proposalMinEvidence: 5, ...overrides };
}

export function makeGateRunConfig(overrides?: Partial<GateRunConfig>): GateRunConfig {
  return {
    checkTimeoutMs: 1000,
    strict: false,
    privileged: false,
    capabilities: ["http_client"],
    ...overrides,
  };
}

// ============================================================================
// Obligations & packs
// ============================================================================

/**
 * Raw obligation definition as it would appear in a YAML file. Every
 * default-able field is spelled out so tests can assert on it.
 */
export function makeObligationFile(overrides?: Partial<ObligationFile>): ObligationFile {
  return {
    id: "cache.vary.honored",
    title: "Vary header splits cache entries",
    domain: "cache",
    risk: "high",
    safe_in_prod: true,
    required_signals: [],
    pass_criteria: ["variants cached separately"],
    suggested_checks: [],
    evidence_to_capture: [],
    requires_capabilities: [],
    composite_of: [],
    ...overrides,
  };
}

export function makeRegistry(files: Array<Partial<ObligationFile>>): ObligationRegistry {
  return ObligationRegistry.load(
    files.map((f, i) => ({ origin: `test-${i}.yaml`, data: makeObligationFile(f) })),
  );
}

export function makePackFile(overrides?: Partial<PackFile>): PackFile {
  return {
    id: "edge-baseline",
    name: "Edge baseline",
    version: "1.0.0",
    description: "",
    tags: [],
    failure_modes: [],
    test_templates: [],
    obligations_covered: [],
    recipes: [],
    signals: [],
    references: [],
    ...overrides,
  };
}

export function makeCatalog(
  packs: Array<Partial<PackFile>>,
  registry: ObligationRegistry,
): PackCatalog {
  return PackCatalog.load(
    packs.map((p, i) => ({ origin: `pack-${i}.yaml`, data: makePackFile(p) })),
    registry,
  );
}

// ============================================================================
// Insights
// ============================================================================

export function makeInsight(overrides?: Partial<Insight>): Insight {
  return {
    id: "ins-1",
    source: "legacy-cache-suite",
    obligation_id: "cache.vary.honored",
    invariant: "vary header must split cache entries",
    confidence: "HIGH",
    scope: "generalizable",
    evidence_count: 3,
    ...overrides,
  };
}

/** In-process stand-in for the SQLite insight store. */
export class MemoryInsightRepository implements InsightRepository {
  pendingRows: Insight[] = [];
  curatedRows: CuratedInsight[] = [];
  reviewRows: InsightReview[] = [];
  approvalRows: ProposalApproval[] = [];

  listPending(): Insight[] {
    return [...this.pendingRows];
  }

  getPending(id: string): Insight | null {
    return this.pendingRows.find((i) => i.id === id) ?? null;
  }

  insertPending(insights: readonly Insight[]): void {
    this.pendingRows.push(...insights);
  }

  listCurated(): CuratedInsight[] {
    return [...this.curatedRows];
  }

  getCuratedByInsight(insightId: string): CuratedInsight | null {
    return this.curatedRows.find((c) => c.insight_id === insightId) ?? null;
  }

  insertCurated(curated: CuratedInsight): void {
    this.curatedRows.push(curated);
  }

  listReviews(): InsightReview[] {
    return [...this.reviewRows];
  }

  insertReview(review: Omit<InsightReview, "id">): InsightReview {
    const stored = { id: this.reviewRows.length + 1, ...review };
    this.reviewRows.push(stored);
    return stored;
  }

  listApprovals(): ProposalApproval[] {
    return [...this.approvalRows];
  }

  getApproval(insightId: string): ProposalApproval | null {
    return this.approvalRows.find((a) => a.insight_id === insightId) ?? null;
  }

  insertApproval(approval: ProposalApproval): void {
    this.approvalRows.push(approval);
  }
}

// ============================================================================
// Reports
// ============================================================================

export class MemorySink implements ReportSink {
  saved: GateReport[] = [];

  save(report: GateReport): void {
    this.saved.push(report);
  }
}

export const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");
