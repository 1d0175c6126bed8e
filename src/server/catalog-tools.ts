import type { ToolDefinition } from "./tool-registry.js";
import { argString, argStringOpt, formatToolResponse } from "./tool-registry.js";
import { summarizeObligation, summarizePack } from "./response-formatter.js";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "list_obligations",
      description:
        "List committed release obligations, ordered by id. Optionally filter by domain (cache, routing, observability, ...).",
      inputSchema: {
        type: "object",
        properties: {
          domain: {
            type: "string",
            description: "Only obligations in this domain (case-insensitive).",
          },
        },
      },
      handler: async (args, ctx) => {
        const domain = argStringOpt(args, "domain");
        const obligations = ctx.registry.list(domain).map(summarizeObligation);
        return formatToolResponse({
          success: true,
          data: {
            obligations,
            total: obligations.length,
            domains: ctx.registry.domains(),
          },
        });
      },
    },
    {
      name: "get_obligation",
      description:
        "Full obligation definition: pass criteria, suggested checks, evidence to capture, plus the packs covering it and curated insights attached as hints.",
      inputSchema: {
        type: "object",
        properties: {
          id: {
            type: "string",
            description: 'Obligation id, e.g. "cache.vary.honored".',
          },
        },
        required: ["id"],
      },
      handler: async (args, ctx) => {
        const id = argString(args, "id");
        const obligation = ctx.registry.lookup(id);
        return formatToolResponse({
          success: true,
          data: {
            obligation,
            covered_by: ctx.catalog.packsCovering(id),
            hints: ctx.ledger.curatedFor(id).map((c) => ({
              curated_id: c.id,
              invariant: c.invariant,
              confidence: c.confidence,
            })),
          },
        });
      },
    },
    {
      name: "list_packs",
      description:
        "List knowledge packs with their failure-mode and template counts and the obligations they cover.",
      inputSchema: { type: "object", properties: {} },
      handler: async (_args, ctx) => {
        const packs = ctx.catalog.list().map(summarizePack);
        return formatToolResponse({
          success: true,
          data: { packs, total: packs.length },
        });
      },
    },
    {
      name: "get_pack",
      description: "Full pack definition: failure modes, test templates, recipes and signals.",
      inputSchema: {
        type: "object",
        properties: {
          id: { type: "string", description: 'Pack id, e.g. "edge-http-cache-correctness".' },
        },
        required: ["id"],
      },
      handler: async (args, ctx) => {
        return formatToolResponse({
          success: true,
          data: { pack: ctx.catalog.get(argString(args, "id")) },
        });
      },
    },
  ];
}
