import type { SelectionConfig } from "../../core/config.js";
import { NotFoundError } from "../../core/errors.js";
import type { ObligationRegistry } from "../obligations/registry.js";
import { compareIds } from "../obligations/registry.js";
import type { PackCatalog } from "../packs/catalog.js";
import { buildSignalTable, validateSignalTable } from "./signal-table.js";
import { containsKeyword, tokenize } from "./text.js";
import type {
  ExplainEntry,
  PackSelection,
  SelectedObligation,
  SelectionResult,
  SignalEntry,
} from "./types.js";

const SCORE_PRECISION = 1e6;

function round(score: number): number {
  return Math.round(score * SCORE_PRECISION) / SCORE_PRECISION;
}

function byWeightThenKeyword(a: ExplainEntry, b: ExplainEntry): number {
  if (b.weight !== a.weight) return b.weight - a.weight;
  const kw = compareIds(a.keyword, b.keyword);
  if (kw !== 0) return kw;
  return compareIds(a.matched_target, b.matched_target);
}

/**
 * Score with diminishing returns: the strongest `fullCredit` keywords count
 * in full, the k-th keyword after them counts weight * decay^k.
 */
export function diminishingScore(
  weights: readonly number[],
  fullCredit: number,
  decay: number,
): number {
  const sorted = [...weights].sort((a, b) => b - a);
  let score = 0;
  sorted.forEach((w, i) => {
    score += i < fullCredit ? w : w * Math.pow(decay, i - fullCredit + 1);
  });
  return round(score);
}

/**
 * Maps free-text feature descriptions to packs and obligations.
 * Pure: holds only immutable tables, performs no I/O.
 */
export class SignalMatcher {
  private readonly table: readonly SignalEntry[];
  private readonly keywordTokens: ReadonlyMap<string, readonly string[]>;
  private readonly catalog: PackCatalog;
  private readonly config: SelectionConfig;

  constructor(table: readonly SignalEntry[], catalog: PackCatalog, config: SelectionConfig) {
    validateSignalTable(table);
    if (!catalog.has(config.defaultPackId)) {
      throw new NotFoundError("Default pack", config.defaultPackId);
    }
    this.table = table;
    this.catalog = catalog;
    this.config = config;
    this.keywordTokens = new Map(table.map((e) => [e.keyword, tokenize(e.keyword)]));
  }

  static fromCatalog(
    catalog: PackCatalog,
    registry: ObligationRegistry,
    config: SelectionConfig,
  ): SignalMatcher {
    return new SignalMatcher(buildSignalTable(catalog, registry, config), catalog, config);
  }

  /** Every table entry whose keyword occurs in the text, strongest first. */
  explain(text: string): ExplainEntry[] {
    const tokens = tokenize(text);
    const hits = new Map<string, boolean>();
    const matches: ExplainEntry[] = [];

    for (const entry of this.table) {
      let hit = hits.get(entry.keyword);
      if (hit === undefined) {
        hit = containsKeyword(tokens, this.keywordTokens.get(entry.keyword) ?? []);
        hits.set(entry.keyword, hit);
      }
      if (!hit) continue;
      matches.push({
        keyword: entry.keyword,
        matched_target: entry.target.id,
        target_kind: entry.target.kind,
        weight: entry.weight,
      });
    }

    return matches.sort(byWeightThenKeyword);
  }

  select(text: string): SelectionResult {
    const matches = this.explain(text);
    const { threshold, fullCreditMatches, decay, defaultPackId } = this.config;
    const warnings: string[] = [];

    const packMatches = new Map<string, ExplainEntry[]>();
    const obligationMatches = new Map<string, ExplainEntry[]>();
    for (const match of matches) {
      const bucket = match.target_kind === "pack" ? packMatches : obligationMatches;
      const list = bucket.get(match.matched_target) ?? [];
      list.push(match);
      bucket.set(match.matched_target, list);
    }

    const scored: PackSelection[] = [...packMatches.entries()].map(([packId, hits]) => ({
      pack_id: packId,
      score: diminishingScore(
        hits.map((h) => h.weight),
        fullCreditMatches,
        decay,
      ),
      matched: hits.map((h) => h.keyword),
    }));

    let packs = scored
      .filter((p) => p.score >= threshold)
      .sort((a, b) => b.score - a.score || compareIds(a.pack_id, b.pack_id));

    const usedDefault = packs.length === 0;
    if (usedDefault) {
      const partial = scored.find((p) => p.pack_id === defaultPackId);
      packs = [
        {
          pack_id: defaultPackId,
          score: partial?.score ?? 0,
          matched: partial?.matched ?? [],
        },
      ];
      warnings.push(
        `No strong match: no pack scored >= ${threshold}; falling back to default pack ${defaultPackId}`,
      );
    }

    const via = new Map<string, Set<string>>();
    const addVia = (obligationId: string, source: string): void => {
      const sources = via.get(obligationId) ?? new Set<string>();
      sources.add(source);
      via.set(obligationId, sources);
    };

    for (const pack of packs) {
      for (const id of this.catalog.committedObligations(pack.pack_id)) addVia(id, pack.pack_id);
      const proposed = this.catalog
        .get(pack.pack_id)
        .obligations_covered.filter((c) => c.status === "PROPOSED")
        .map((c) => c.id);
      if (proposed.length > 0) {
        warnings.push(
          `Pack ${pack.pack_id} lists proposed obligation(s) awaiting approval: ${proposed.join(", ")}`,
        );
      }
    }

    for (const [obligationId, hits] of obligationMatches) {
      const score = diminishingScore(
        hits.map((h) => h.weight),
        fullCreditMatches,
        decay,
      );
      if (score >= threshold) addVia(obligationId, "signal");
    }

    const obligations: SelectedObligation[] = [...via.entries()]
      .sort(([a], [b]) => compareIds(a, b))
      .map(([id, sources]) => ({ obligation_id: id, via: [...sources].sort(compareIds) }));

    return { packs, obligations, used_default: usedDefault, warnings };
  }
}
