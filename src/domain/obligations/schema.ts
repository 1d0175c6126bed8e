import { z } from "zod";

export const OBLIGATION_ID_PATTERN = /^[a-z0-9_-]+(\.[a-z0-9_-]+)+$/;

export const RiskLevelSchema = z.enum(["low", "medium", "high"]);

export const SuggestedCheckSchema = z.object({
  name: z.string().trim().min(1),
  method: z.string().trim().min(1),
});

export const ObligationFileSchema = z.object({
  id: z
    .string()
    .trim()
    .regex(OBLIGATION_ID_PATTERN, "must be a dotted-domain id like cache.vary.honored"),
  title: z.string().trim().min(1),
  domain: z.string().trim().min(1),
  risk: RiskLevelSchema,
  safe_in_prod: z.boolean().default(false),
  required_signals: z.array(z.string().trim().min(1)).default([]),
  pass_criteria: z.array(z.string().trim().min(1)).min(1),
  suggested_checks: z.array(SuggestedCheckSchema).default([]),
  evidence_to_capture: z.array(z.string().trim().min(1)).default([]),
  requires_capabilities: z.array(z.string().trim().toLowerCase().min(1)).default([]),
  composite_of: z.array(z.string().trim().regex(OBLIGATION_ID_PATTERN)).default([]),
});

export type ObligationFile = z.infer<typeof ObligationFileSchema>;

/** What a reviewer supplies when approving a proposal; the rest defaults. */
export const ObligationDraftSchema = ObligationFileSchema.partial().required({
  id: true,
  title: true,
  domain: true,
  risk: true,
});

export type ObligationDraft = z.infer<typeof ObligationDraftSchema>;
