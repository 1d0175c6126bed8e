import {
  assertObligationFileFree,
  readJsonFile,
  writeObligationFile,
} from "../data-sources/catalog-files.js";
import { ContradictionResolutionSchema } from "../domain/insights/schema.js";
import { ObligationDraftSchema } from "../domain/obligations/schema.js";
import { parseWith } from "../domain/validation.js";
import { compactSummary } from "./response-formatter.js";
import type { ToolDefinition } from "./tool-registry.js";
import {
  argBoolOpt,
  argString,
  argStringOpt,
  argValue,
  formatToolResponse,
} from "./tool-registry.js";

function requireArg(
  args: Record<string, unknown> | undefined,
  key: string,
): string | null {
  const value = argString(args, key).trim();
  return value ? value : null;
}

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "ingest_insights",
      description:
        "Append extractor output to the pending insight ledger. Pass either a JSON file path or the records inline. Each record: id, obligation_id (null proposes a new obligation), invariant, source, confidence (HIGH/MODERATE/LOW), scope (generalizable/environment-specific/reference-only), evidence_count.",
      inputSchema: {
        type: "object",
        properties: {
          file: { type: "string", description: "Path to a JSON array of insight records." },
          records: {
            type: "array",
            items: { type: "object" },
            description: "Insight records inline.",
          },
        },
      },
      handler: async (args, ctx) => {
        const file = argStringOpt(args, "file");
        const records = argValue(args, "records");
        if (!file && records === undefined) {
          return formatToolResponse({ success: false, error: "Provide file or records." });
        }
        const ingested = file
          ? ctx.ledger.ingest(readJsonFile(file), file)
          : ctx.ledger.ingest(records, "records argument");
        return formatToolResponse({
          success: true,
          data: {
            ingested: ingested.map((i) => i.id),
            total_pending: ctx.ledger.pending().length,
          },
        });
      },
    },
    {
      name: "consolidation_summary",
      description:
        "Group pending insights by obligation and classify them: reinforced obligations with aggregate evidence, proposals for new obligations, unresolved contradictions that block promotion, and reference-only insights.",
      inputSchema: { type: "object", properties: {} },
      handler: async (_args, ctx) => {
        const summary = ctx.ledger.consolidate();
        return formatToolResponse({
          success: true,
          data: compactSummary(summary),
          warnings: summary.warnings,
        });
      },
    },
    {
      name: "promote_insight",
      description:
        "Promote one generalizable insight into the curated partition. Fails when its group has an unresolved contradiction, when it is not generalizable or was rejected, or when it is already curated.",
      inputSchema: {
        type: "object",
        properties: {
          insight_id: { type: "string", description: "Pending insight id." },
          reviewer: { type: "string", description: "Who is promoting." },
        },
        required: ["insight_id", "reviewer"],
      },
      handler: async (args, ctx) => {
        const insightId = requireArg(args, "insight_id");
        const reviewer = requireArg(args, "reviewer");
        if (!insightId || !reviewer) {
          return formatToolResponse({ success: false, error: "insight_id and reviewer are required." });
        }
        const curated = await ctx.ledger.promote(insightId, reviewer);
        return formatToolResponse({ success: true, data: { curated } });
      },
    },
    {
      name: "promote_eligible",
      description:
        "Promote every generalizable insight of every group free of unresolved contradictions. Reports blocked and skipped groups.",
      inputSchema: {
        type: "object",
        properties: {
          reviewer: { type: "string", description: "Who is promoting." },
        },
        required: ["reviewer"],
      },
      handler: async (args, ctx) => {
        const reviewer = requireArg(args, "reviewer");
        if (!reviewer) {
          return formatToolResponse({ success: false, error: "reviewer is required." });
        }
        const result = await ctx.ledger.promoteEligible(reviewer);
        return formatToolResponse({
          success: true,
          data: {
            promoted: result.promoted.map((c) => c.id),
            blocked: result.blocked,
            skipped: result.skipped,
          },
          warnings: result.blocked.map(
            (b) => `Group ${b.group} blocked by ${b.pairs.length} unresolved contradiction(s)`,
          ),
        });
      },
    },
    {
      name: "reject_insight",
      description: "Record a rejection. A rejected insight is never promoted and stops counting toward contradictions.",
      inputSchema: {
        type: "object",
        properties: {
          insight_id: { type: "string", description: "Pending insight id." },
          reviewer: { type: "string", description: "Who is rejecting." },
          reason: { type: "string", description: "Why." },
        },
        required: ["insight_id", "reviewer", "reason"],
      },
      handler: async (args, ctx) => {
        const insightId = requireArg(args, "insight_id");
        const reviewer = requireArg(args, "reviewer");
        const reason = requireArg(args, "reason");
        if (!insightId || !reviewer || !reason) {
          return formatToolResponse({
            success: false,
            error: "insight_id, reviewer and reason are required.",
          });
        }
        const review = await ctx.ledger.reject(insightId, reviewer, reason);
        return formatToolResponse({ success: true, data: { review } });
      },
    },
    {
      name: "resolve_contradiction",
      description:
        "Resolve a suggested contradiction between two insights of the same group: complementary (both stand), reject-first or reject-second.",
      inputSchema: {
        type: "object",
        properties: {
          first_id: { type: "string", description: "First insight of the pair." },
          second_id: { type: "string", description: "Second insight of the pair." },
          reviewer: { type: "string", description: "Who is resolving." },
          resolution: {
            type: "string",
            enum: ["complementary", "reject-first", "reject-second"],
          },
          reason: { type: "string", description: "Optional note." },
        },
        required: ["first_id", "second_id", "reviewer", "resolution"],
      },
      handler: async (args, ctx) => {
        const firstId = requireArg(args, "first_id");
        const secondId = requireArg(args, "second_id");
        const reviewer = requireArg(args, "reviewer");
        if (!firstId || !secondId || !reviewer) {
          return formatToolResponse({
            success: false,
            error: "first_id, second_id and reviewer are required.",
          });
        }
        const resolution = parseWith(
          ContradictionResolutionSchema,
          argValue(args, "resolution"),
          "resolution argument",
        );
        const review = await ctx.ledger.resolveContradiction(
          firstId,
          secondId,
          reviewer,
          resolution,
          argString(args, "reason"),
        );
        return formatToolResponse({ success: true, data: { review } });
      },
    },
    {
      name: "approve_proposal",
      description:
        "Approve an eligible proposal (HIGH confidence, generalizable, enough evidence) as a new obligation. The draft needs id, title, domain and risk; pass_criteria defaults to the insight's invariant. write_file also saves it under the obligations directory for the next catalog load.",
      inputSchema: {
        type: "object",
        properties: {
          insight_id: { type: "string", description: "Insight id of the proposal." },
          reviewer: { type: "string", description: "Who is approving." },
          obligation: {
            type: "object",
            description: "Obligation draft: id, title, domain, risk, plus any optional fields.",
          },
          write_file: {
            type: "boolean",
            description: "Write the obligation YAML file (default false).",
          },
        },
        required: ["insight_id", "reviewer", "obligation"],
      },
      handler: async (args, ctx) => {
        const insightId = requireArg(args, "insight_id");
        const reviewer = requireArg(args, "reviewer");
        if (!insightId || !reviewer) {
          return formatToolResponse({ success: false, error: "insight_id and reviewer are required." });
        }
        const draft = parseWith(
          ObligationDraftSchema,
          argValue(args, "obligation"),
          "obligation argument",
        );
        const writeFile = argBoolOpt(args, "write_file");
        // The approval row is permanent, so a taken file must fail before it.
        if (writeFile) {
          assertObligationFileFree(ctx.config.catalog.obligationsDir, draft);
        }
        const obligation = await ctx.ledger.approveProposal(insightId, reviewer, draft);
        const file = writeFile
          ? writeObligationFile(ctx.config.catalog.obligationsDir, obligation)
          : null;
        return formatToolResponse({
          success: true,
          data: { obligation, file },
          ...(file ? {} : { warnings: ["Obligation not written to disk; it is runnable but not committed"] }),
        });
      },
    },
  ];
}
