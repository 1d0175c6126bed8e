// Knowledge Pack Types

export type Severity = "critical" | "high" | "medium" | "low";

export interface FailureMode {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  readonly symptoms: readonly string[];
  readonly root_causes: readonly string[];
  readonly mitigation_strategies: readonly string[];
  readonly tags: readonly string[];
}

export interface TemplateAssertion {
  readonly description: string;
  readonly expression: string;
}

export interface TestTemplate {
  readonly id: string;
  readonly name: string;
  readonly failure_mode_id: string;
  readonly priority: Severity;
  readonly setup_steps: readonly string[];
  readonly execution_steps: readonly string[];
  readonly assertions: readonly TemplateAssertion[];
  readonly cleanup_steps: readonly string[];
  readonly requires_privileged: boolean;
  readonly fallback_available: boolean; // simulator path exists
}

export interface Recipe {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly metrics: readonly string[];
  readonly log_patterns: readonly string[];
}

export interface PackSignal {
  readonly keyword: string;
  readonly weight: number; // (0, 1]
}

export type CoverageStatus = "COMMITTED" | "PROPOSED";

export interface CoveredObligation {
  readonly id: string;
  readonly status: CoverageStatus;
}

/** A knowledge pack, frozen once the catalog loads it. */
export interface Pack {
  readonly id: string;
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly failure_modes: readonly FailureMode[];
  readonly test_templates: readonly TestTemplate[];
  readonly obligations_covered: readonly CoveredObligation[];
  readonly recipes: readonly Recipe[];
  readonly signals: readonly PackSignal[];
  readonly references: readonly string[];
}
