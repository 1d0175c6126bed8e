import { DuplicateIdError, NotFoundError, SchemaError } from "../../core/errors.js";
import { logInfo } from "../../core/logging.js";
import { parseWith } from "../validation.js";
import { ObligationFileSchema, type ObligationFile } from "./schema.js";
import type { DefinitionSource, Obligation } from "./types.js";

export function toObligation(file: ObligationFile): Obligation {
  return Object.freeze({
    id: file.id,
    domain: file.domain,
    title: file.title,
    risk: file.risk,
    safe_in_prod: file.safe_in_prod,
    required_signals: Object.freeze([...file.required_signals]),
    pass_criteria: Object.freeze([...file.pass_criteria]),
    suggested_checks: Object.freeze(
      file.suggested_checks.map((c) => Object.freeze({ ...c })),
    ),
    evidence_to_capture: Object.freeze([...file.evidence_to_capture]),
    requires_capabilities: Object.freeze([...file.requires_capabilities]),
    composite_of: Object.freeze([...file.composite_of]),
  });
}

/**
 * Parse one obligation definition. Used by the registry at load and by the
 * proposal approval path, so an approved proposal meets the same bar as a
 * committed file.
 */
export function parseObligation(data: unknown, origin: string): Obligation {
  return toObligation(parseWith(ObligationFileSchema, data, origin));
}

/**
 * Read-only index of the committed obligation catalog.
 */
export class ObligationRegistry {
  private readonly byId: ReadonlyMap<string, Obligation>;
  private readonly sorted: readonly Obligation[];

  private constructor(byId: Map<string, Obligation>) {
    this.byId = byId;
    this.sorted = [...byId.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * Validate every source, reject duplicate ids, then check composite
   * references against the full set.
   */
  static load(sources: readonly DefinitionSource[]): ObligationRegistry {
    const byId = new Map<string, Obligation>();
    const origins = new Map<string, string>();

    for (const source of sources) {
      const obligation = parseObligation(source.data, source.origin);
      const firstOrigin = origins.get(obligation.id);
      if (firstOrigin !== undefined) {
        throw new DuplicateIdError(obligation.id, firstOrigin, source.origin);
      }
      origins.set(obligation.id, source.origin);
      byId.set(obligation.id, obligation);
    }

    for (const obligation of byId.values()) {
      const issues: string[] = [];
      if (obligation.composite_of.length > 0 && obligation.requires_capabilities.length > 0) {
        issues.push(
          "requires_capabilities: composite obligations take capabilities from their sub-obligations",
        );
      }
      for (const subId of obligation.composite_of) {
        const sub = byId.get(subId);
        if (subId === obligation.id) {
          issues.push("composite_of: obligation cannot contain itself");
        } else if (!sub) {
          issues.push(`composite_of: unknown obligation "${subId}"`);
        } else if (sub.composite_of.length > 0) {
          issues.push(`composite_of: "${subId}" is itself composite`);
        }
      }
      if (issues.length > 0) {
        throw new SchemaError(origins.get(obligation.id) ?? obligation.id, issues);
      }
    }

    logInfo(`ObligationRegistry loaded ${byId.size} obligation(s)`);
    return new ObligationRegistry(byId);
  }

  lookup(id: string): Obligation {
    const obligation = this.byId.get(id);
    if (!obligation) {
      throw new NotFoundError("Obligation", id);
    }
    return obligation;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Ordered by id ascending. */
  list(domainFilter?: string): Obligation[] {
    if (!domainFilter) return [...this.sorted];
    const domain = domainFilter.trim().toLowerCase();
    return this.sorted.filter((o) => o.domain.toLowerCase() === domain);
  }

  domains(): string[] {
    return [...new Set(this.sorted.map((o) => o.domain))].sort(compareIds);
  }

  get size(): number {
    return this.byId.size;
  }
}

/** Code-unit ordering, independent of the host locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
