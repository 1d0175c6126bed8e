import type { ToolDefinition } from "./tool-registry.js";
import { argBoolOpt, argString, formatToolResponse } from "./tool-registry.js";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "select_packs",
      description:
        "Score a free-text feature description against pack and obligation signals. Returns the selected packs (score >= threshold, best first), the obligations they imply, and warnings such as a fallback to the default pack.",
      inputSchema: {
        type: "object",
        properties: {
          text: {
            type: "string",
            description: 'Feature or change description, e.g. "Add cache bypass for authenticated requests".',
          },
          explain: {
            type: "boolean",
            description: "Include the keyword match trace (default false).",
          },
        },
        required: ["text"],
      },
      handler: async (args, ctx) => {
        const text = argString(args, "text");
        if (!text.trim()) {
          return formatToolResponse({ success: false, error: "text is required." });
        }
        const selection = ctx.matcher.select(text);
        return formatToolResponse({
          success: true,
          data: {
            packs: selection.packs,
            obligations: selection.obligations,
            used_default: selection.used_default,
            ...(argBoolOpt(args, "explain") ? { explain: ctx.matcher.explain(text) } : {}),
          },
          warnings: selection.warnings,
        });
      },
    },
    {
      name: "explain_selection",
      description:
        "Show every keyword match behind a selection: keyword, matched pack or obligation, and weight, strongest first.",
      inputSchema: {
        type: "object",
        properties: {
          text: { type: "string", description: "Feature or change description." },
        },
        required: ["text"],
      },
      handler: async (args, ctx) => {
        const text = argString(args, "text");
        if (!text.trim()) {
          return formatToolResponse({ success: false, error: "text is required." });
        }
        const matches = ctx.matcher.explain(text);
        return formatToolResponse({
          success: true,
          data: { matches, total: matches.length },
        });
      },
    },
  ];
}
