import type {
  Insight,
  InsightRelation,
  InsightRelationKind,
  Polarity,
  Predicate,
} from "./types.js";

/**
 * Modal phrases that split an invariant into mechanism and action.
 * Longer phrases first so "must never" wins over "must".
 */
const MODALS: ReadonlyArray<readonly [string, Polarity]> = [
  ["should always", "affirm"],
  ["must always", "affirm"],
  ["must never", "deny"],
  ["should never", "deny"],
  ["should not", "deny"],
  ["must not", "deny"],
  ["does not", "deny"],
  ["do not", "deny"],
  ["cannot", "deny"],
  ["never", "deny"],
  ["always", "affirm"],
  ["should", "affirm"],
  ["must", "affirm"],
];

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9_\-\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Reduce an invariant to {mechanism, polarity, action}. Text without a modal
 * phrase is an affirmative statement about its whole text with no action.
 */
export function toPredicate(invariant: string): Predicate {
  const text = normalizeText(invariant);
  const words = text.split(" ");

  for (let i = 0; i < words.length; i++) {
    for (const [phrase, polarity] of MODALS) {
      const parts = phrase.split(" ");
      const hit = parts.every((p, k) => words[i + k] === p);
      if (!hit) continue;
      return {
        mechanism: words.slice(0, i).join(" "),
        polarity,
        action: words.slice(i + parts.length).join(" "),
      };
    }
  }

  return { mechanism: text, polarity: "affirm", action: "" };
}

/**
 * Suggested relation between two invariants. Symmetric: swapping the
 * arguments never changes the kind.
 */
export function classifyPredicates(
  a: Predicate,
  b: Predicate,
): { kind: InsightRelationKind; reason: string } {
  if (a.mechanism !== b.mechanism) {
    return { kind: "complementary", reason: "distinct mechanisms" };
  }
  if (a.action !== b.action) {
    return {
      kind: "complementary",
      reason: `same mechanism "${a.mechanism}", distinct actions`,
    };
  }
  if (a.polarity !== b.polarity) {
    return {
      kind: "contradicts",
      reason: `"${a.mechanism}" both required and forbidden to "${a.action}"`,
    };
  }
  return { kind: "reinforces", reason: "same normalized invariant" };
}

export function relate(a: Insight, b: Insight): InsightRelation {
  const { kind, reason } = classifyPredicates(
    toPredicate(a.invariant),
    toPredicate(b.invariant),
  );
  return { a: a.id, b: b.id, kind, reason };
}

/** Pairwise relations inside one group, in input order (i < j). */
export function relationsWithin(insights: readonly Insight[]): InsightRelation[] {
  const relations: InsightRelation[] = [];
  for (let i = 0; i < insights.length; i++) {
    for (let j = i + 1; j < insights.length; j++) {
      relations.push(relate(insights[i], insights[j]));
    }
  }
  return relations;
}
