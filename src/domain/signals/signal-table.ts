import type { SelectionConfig } from "../../core/config.js";
import { SchemaError } from "../../core/errors.js";
import type { ObligationRegistry } from "../obligations/registry.js";
import type { PackCatalog } from "../packs/catalog.js";
import type { SignalEntry } from "./types.js";

/**
 * Keyword → target table, assembled from pack signals and obligation
 * required_signals. Maintainer-authored data; nothing here is learned.
 * Entries are ordered by keyword, then target, so every consumer iterates
 * the same way.
 */
export function buildSignalTable(
  catalog: PackCatalog,
  registry: ObligationRegistry,
  config: Pick<SelectionConfig, "obligationSignalWeight">,
): SignalEntry[] {
  const entries = new Map<string, SignalEntry>();
  const add = (entry: SignalEntry): void => {
    const key = `${entry.keyword}\u0000${entry.target.kind}:${entry.target.id}`;
    const existing = entries.get(key);
    if (!existing || existing.weight < entry.weight) entries.set(key, entry);
  };

  for (const pack of catalog.list()) {
    for (const signal of pack.signals) {
      add({
        keyword: normalizeKeyword(signal.keyword),
        target: { kind: "pack", id: pack.id },
        weight: signal.weight,
      });
    }
  }

  for (const obligation of registry.list()) {
    for (const keyword of obligation.required_signals) {
      add({
        keyword: normalizeKeyword(keyword),
        target: { kind: "obligation", id: obligation.id },
        weight: config.obligationSignalWeight,
      });
    }
  }

  const table = [...entries.values()].filter((e) => e.keyword.length > 0);
  validateSignalTable(table);
  return table.sort(compareEntries);
}

export function validateSignalTable(table: readonly SignalEntry[]): void {
  const issues = table
    .filter((e) => !(e.weight > 0 && e.weight <= 1))
    .map(
      (e) =>
        `signal "${e.keyword}" → ${e.target.kind} ${e.target.id}: weight ${e.weight} is outside (0, 1]`,
    );
  if (issues.length > 0) {
    throw new SchemaError("signal table", issues);
  }
}

function normalizeKeyword(keyword: string): string {
  return keyword.toLowerCase().split(/[^a-z0-9_]+/).filter(Boolean).join(" ");
}

function compareEntries(a: SignalEntry, b: SignalEntry): number {
  const ka = `${a.keyword}\u0000${a.target.kind}:${a.target.id}`;
  const kb = `${b.keyword}\u0000${b.target.kind}:${b.target.id}`;
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}
