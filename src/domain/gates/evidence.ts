import { z } from "zod";
import { OBLIGATION_ID_PATTERN } from "../obligations/schema.js";
import { parseWith } from "../validation.js";
import type { EvidenceRecord } from "./gate-types.js";

const EvidenceEntrySchema = z.object({
  obligation_id: z.string().trim().regex(OBLIGATION_ID_PATTERN),
  paths: z.array(z.string().trim().min(1)).default([]),
  criteria: z.record(z.boolean()).default({}),
});

export const EvidenceFileSchema = z.object({
  evidence: z.array(EvidenceEntrySchema).default([]),
  capabilities: z.array(z.string().trim().toLowerCase().min(1)).optional(),
  privileged: z.boolean().optional(),
});

export interface EvidenceBundle {
  evidence: Map<string, EvidenceRecord>;
  capabilities?: string[];
  privileged?: boolean;
}

/**
 * Parse evidence produced by a prior test run. Entries for the same
 * obligation merge: paths concatenate, later criterion outcomes win.
 */
export function parseEvidence(data: unknown, origin: string): EvidenceBundle {
  const file = parseWith(EvidenceFileSchema, data, origin);
  const evidence = new Map<string, EvidenceRecord>();
  for (const entry of file.evidence) {
    const existing = evidence.get(entry.obligation_id);
    evidence.set(entry.obligation_id, {
      paths: [...(existing?.paths ?? []), ...entry.paths],
      criteria: { ...(existing?.criteria ?? {}), ...entry.criteria },
    });
  }
  return {
    evidence,
    capabilities: file.capabilities,
    privileged: file.privileged,
  };
}
