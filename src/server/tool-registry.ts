import { isGateError } from "../core/errors.js";
import { getErrorMessage, logError, logWarn } from "../core/logging.js";
import type { ServerContext } from "./context.js";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  handler: (
    args: Record<string, unknown> | undefined,
    ctx: ServerContext,
  ) => Promise<ToolResponse>;
}

// ============================================================================
// Arg-parsing helpers
// ============================================================================

export function argString(
  args: Record<string, unknown> | undefined,
  key: string,
): string {
  const val = args?.[key];
  return typeof val === "string" ? val : "";
}

export function argStringOpt(
  args: Record<string, unknown> | undefined,
  key: string,
): string | undefined {
  const val = args?.[key];
  return typeof val === "string" ? val : undefined;
}

export function argNumber(
  args: Record<string, unknown> | undefined,
  key: string,
): number | undefined {
  const val = args?.[key];
  return typeof val === "number" ? val : undefined;
}

export function argBoolOpt(
  args: Record<string, unknown> | undefined,
  key: string,
): boolean | undefined {
  const val = args?.[key];
  return typeof val === "boolean" ? val : undefined;
}

export function argStringArray(
  args: Record<string, unknown> | undefined,
  key: string,
): string[] | undefined {
  const val = args?.[key];
  if (!Array.isArray(val)) return undefined;
  return val.filter((v): v is string => typeof v === "string");
}

/** Raw structured argument, validated later by the domain schema. */
export function argValue(
  args: Record<string, unknown> | undefined,
  key: string,
): unknown {
  return args?.[key];
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Format any result-shaped object into an MCP content response. Warnings
 * are logged as well as returned.
 */
export function formatToolResponse(result: {
  success: boolean;
  warnings?: string[];
  [key: string]: unknown;
}): ToolResponse {
  for (const warning of result.warnings ?? []) {
    logWarn(warning);
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

export function formatToolError(err: unknown): ToolResponse {
  if (isGateError(err)) {
    return formatToolResponse({ success: false, error: err.message, code: err.code });
  }
  return formatToolResponse({ success: false, error: getErrorMessage(err) });
}

/**
 * Collects tool definitions from tool modules and provides dispatch.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(defs: ToolDefinition[]): void {
    for (const def of defs) {
      if (this.tools.has(def.name)) {
        throw new Error(`Duplicate tool name: ${def.name}`);
      }
      this.tools.set(def.name, def);
    }
  }

  listTools(): Array<{
    name: string;
    description: string;
    inputSchema: Record<string, unknown>;
  }> {
    return [...this.tools.values()].map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
  }

  /** Domain errors become `{success: false, error, code}` responses. */
  async callTool(
    name: string,
    args: Record<string, unknown> | undefined,
    ctx: ServerContext,
  ): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }
    try {
      return await tool.handler(args, ctx);
    } catch (err) {
      if (!isGateError(err)) {
        logError(`Tool ${name} failed:`, getErrorMessage(err));
      }
      return formatToolError(err);
    }
  }
}
