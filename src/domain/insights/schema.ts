import { z } from "zod";
import { OBLIGATION_ID_PATTERN } from "../obligations/schema.js";

export const ConfidenceSchema = z.preprocess(
  (v) => (typeof v === "string" ? v.trim().toUpperCase() : v),
  z.enum(["LOW", "MODERATE", "HIGH"]),
);

export const InsightScopeSchema = z.preprocess(
  (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
  z.enum(["generalizable", "environment-specific", "reference-only"]),
);

export const InsightRecordSchema = z.object({
  id: z.string().trim().min(1),
  source: z.string().trim().min(1),
  obligation_id: z.string().trim().regex(OBLIGATION_ID_PATTERN).nullable(),
  invariant: z.string().trim().min(1),
  confidence: ConfidenceSchema,
  scope: InsightScopeSchema,
  evidence_count: z.number().int().nonnegative(),
});

export const InsightBatchSchema = z.array(InsightRecordSchema);

export const ContradictionResolutionSchema = z.enum([
  "complementary",
  "reject-first",
  "reject-second",
]);
