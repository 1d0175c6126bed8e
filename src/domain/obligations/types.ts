// Obligation Types

export type RiskLevel = "low" | "medium" | "high";

export interface SuggestedCheck {
  name: string;
  method: string;
}

/**
 * A portable, checkable correctness property. Maintainer-authored and
 * frozen once loaded.
 */
export interface Obligation {
  readonly id: string; // dotted-domain, e.g. "cache.vary.honored"
  readonly domain: string;
  readonly title: string;
  readonly risk: RiskLevel;
  readonly safe_in_prod: boolean;
  readonly required_signals: readonly string[];
  readonly pass_criteria: readonly string[]; // ordered
  readonly suggested_checks: readonly SuggestedCheck[];
  readonly evidence_to_capture: readonly string[];
  readonly requires_capabilities: readonly string[];
  readonly composite_of: readonly string[]; // empty = single check
}

/** One raw definition handed to the registry, usually one YAML file. */
export interface DefinitionSource {
  origin: string;
  data: unknown;
}
