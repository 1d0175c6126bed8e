import { DuplicateIdError, NotFoundError, SchemaError } from "../../core/errors.js";
import { logInfo, logWarn } from "../../core/logging.js";
import type { ObligationRegistry } from "../obligations/registry.js";
import { compareIds } from "../obligations/registry.js";
import type { DefinitionSource } from "../obligations/types.js";
import { parseWith } from "../validation.js";
import { PackFileSchema, type PackFile } from "./schema.js";
import type { Pack } from "./types.js";

export function toPack(file: PackFile): Pack {
  return Object.freeze({
    id: file.id,
    name: file.name,
    version: file.version,
    description: file.description,
    tags: Object.freeze([...file.tags]),
    failure_modes: Object.freeze(
      file.failure_modes.map((m) =>
        Object.freeze({
          ...m,
          symptoms: Object.freeze([...m.symptoms]),
          root_causes: Object.freeze([...m.root_causes]),
          mitigation_strategies: Object.freeze([...m.mitigation_strategies]),
          tags: Object.freeze([...m.tags]),
        }),
      ),
    ),
    test_templates: Object.freeze(
      file.test_templates.map((t) =>
        Object.freeze({
          ...t,
          setup_steps: Object.freeze([...t.setup_steps]),
          execution_steps: Object.freeze([...t.execution_steps]),
          assertions: Object.freeze(t.assertions.map((a) => Object.freeze({ ...a }))),
          cleanup_steps: Object.freeze([...t.cleanup_steps]),
        }),
      ),
    ),
    obligations_covered: Object.freeze(file.obligations_covered.map((c) => Object.freeze({ ...c }))),
    recipes: Object.freeze(
      file.recipes.map((r) =>
        Object.freeze({
          ...r,
          metrics: Object.freeze([...r.metrics]),
          log_patterns: Object.freeze([...r.log_patterns]),
        }),
      ),
    ),
    signals: Object.freeze(file.signals.map((s) => Object.freeze({ ...s }))),
    references: Object.freeze([...file.references]),
  });
}

/**
 * Cross-reference checks a schema cannot express:
 *   A. failure mode ids are unique inside the pack
 *   B. every test template points at a failure mode of the same pack
 *   C. every covered obligation exists in the registry, unless marked PROPOSED
 *   D. a keyword appears at most once in the pack's signal list
 *
 * All checks run so the maintainer sees every problem in one load.
 */
export function validatePackReferences(
  pack: Pack,
  registry: ObligationRegistry,
): string[] {
  const issues: string[] = [];

  const modeIds = new Set<string>();
  for (const mode of pack.failure_modes) {
    if (modeIds.has(mode.id)) {
      issues.push(`failure_modes: duplicate id "${mode.id}"`);
    }
    modeIds.add(mode.id);
  }

  for (const template of pack.test_templates) {
    if (!modeIds.has(template.failure_mode_id)) {
      issues.push(
        `test_templates.${template.id}: unknown failure_mode_id "${template.failure_mode_id}"`,
      );
    }
  }

  for (const covered of pack.obligations_covered) {
    if (covered.status === "PROPOSED") continue;
    if (!registry.has(covered.id)) {
      issues.push(
        `obligations_covered: "${covered.id}" is not in the registry (mark it PROPOSED if it awaits approval)`,
      );
    }
  }

  const keywords = new Set<string>();
  for (const signal of pack.signals) {
    if (keywords.has(signal.keyword)) {
      issues.push(`signals: keyword "${signal.keyword}" listed twice`);
    }
    keywords.add(signal.keyword);
  }

  return issues;
}

/**
 * Read-only collection of knowledge packs, validated against the obligation
 * registry at load.
 */
export class PackCatalog {
  private readonly byId: ReadonlyMap<string, Pack>;

  private constructor(byId: Map<string, Pack>) {
    this.byId = byId;
  }

  static load(
    sources: readonly DefinitionSource[],
    registry: ObligationRegistry,
  ): PackCatalog {
    const byId = new Map<string, Pack>();
    const origins = new Map<string, string>();

    for (const source of sources) {
      const pack = toPack(parseWith(PackFileSchema, source.data, source.origin));
      const firstOrigin = origins.get(pack.id);
      if (firstOrigin !== undefined) {
        throw new DuplicateIdError(pack.id, firstOrigin, source.origin);
      }

      const issues = validatePackReferences(pack, registry);
      if (issues.length > 0) {
        throw new SchemaError(source.origin, issues);
      }

      const proposed = pack.obligations_covered.filter((c) => c.status === "PROPOSED");
      if (proposed.length > 0) {
        logWarn(
          `Pack ${pack.id} references ${proposed.length} PROPOSED obligation(s) awaiting approval: ${proposed
            .map((c) => c.id)
            .join(", ")}`,
        );
      }

      origins.set(pack.id, source.origin);
      byId.set(pack.id, pack);
    }

    logInfo(`PackCatalog loaded ${byId.size} pack(s)`);
    return new PackCatalog(byId);
  }

  get(id: string): Pack {
    const pack = this.byId.get(id);
    if (!pack) {
      throw new NotFoundError("Pack", id);
    }
    return pack;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Ordered by id ascending. */
  list(): Pack[] {
    return [...this.byId.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  /** Committed obligation ids the pack covers; PROPOSED entries are never returned. */
  committedObligations(packId: string): string[] {
    return this.get(packId)
      .obligations_covered.filter((c) => c.status === "COMMITTED")
      .map((c) => c.id);
  }

  /** Packs whose coverage lists the obligation (committed entries only). */
  packsCovering(obligationId: string): string[] {
    return this.list()
      .filter((p) =>
        p.obligations_covered.some(
          (c) => c.id === obligationId && c.status === "COMMITTED",
        ),
      )
      .map((p) => p.id);
  }

  get size(): number {
    return this.byId.size;
  }
}
