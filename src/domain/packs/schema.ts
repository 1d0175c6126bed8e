import { z } from "zod";
import { OBLIGATION_ID_PATTERN } from "../obligations/schema.js";

const text = z.string().trim().min(1);
const textList = z.array(text).default([]);

export const SeveritySchema = z.enum(["critical", "high", "medium", "low"]);

export const FailureModeSchema = z.object({
  id: text,
  name: text,
  description: z.string().default(""),
  severity: SeveritySchema.default("medium"),
  symptoms: textList,
  root_causes: textList,
  mitigation_strategies: textList,
  tags: textList,
});

export const TestTemplateSchema = z.object({
  id: text,
  name: text,
  failure_mode_id: text,
  priority: SeveritySchema.default("medium"),
  setup_steps: textList,
  execution_steps: textList,
  assertions: z
    .array(z.object({ description: text, expression: z.string().default("") }))
    .default([]),
  cleanup_steps: textList,
  requires_privileged: z.boolean().default(false),
  fallback_available: z.boolean().default(true),
});

export const RecipeSchema = z.object({
  id: text,
  name: text,
  description: z.string().default(""),
  metrics: textList,
  log_patterns: textList,
});

export const PackSignalSchema = z.object({
  keyword: z.string().trim().toLowerCase().min(1),
  weight: z.number().gt(0, "weight must be > 0").lte(1, "weight must be <= 1"),
});

const obligationId = z.string().trim().regex(OBLIGATION_ID_PATTERN);

/** Plain id = committed obligation; object form can mark it PROPOSED. */
export const CoveredObligationSchema = z.union([
  obligationId.transform((id) => ({ id, status: "COMMITTED" as const })),
  z.object({
    id: obligationId,
    status: z.enum(["COMMITTED", "PROPOSED"]).default("COMMITTED"),
  }),
]);

export const PackFileSchema = z.object({
  id: z.string().trim().regex(/^[a-z0-9][a-z0-9-]*$/, "must be a kebab-case pack id"),
  name: text,
  version: z.string().trim().default("1.0.0"),
  description: z.string().default(""),
  tags: textList,
  failure_modes: z.array(FailureModeSchema).default([]),
  test_templates: z.array(TestTemplateSchema).default([]),
  obligations_covered: z.array(CoveredObligationSchema).default([]),
  recipes: z.array(RecipeSchema).default([]),
  signals: z.array(PackSignalSchema).default([]),
  references: textList,
});

export type PackFile = z.infer<typeof PackFileSchema>;
