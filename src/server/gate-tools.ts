import { readJsonFile } from "../data-sources/catalog-files.js";
import { parseEvidence, type EvidenceBundle } from "../domain/gates/evidence.js";
import type { GateStatus } from "../domain/gates/gate-types.js";
import { executeGate } from "./context.js";
import { compactReport } from "./response-formatter.js";
import type { ToolDefinition } from "./tool-registry.js";
import {
  argBoolOpt,
  argNumber,
  argStringArray,
  argStringOpt,
  argValue,
  formatToolResponse,
} from "./tool-registry.js";

const STATUSES: readonly GateStatus[] = ["PASS", "FAIL", "PARTIAL", "SKIP", "ERROR"];

function loadEvidence(args: Record<string, unknown> | undefined): EvidenceBundle {
  const file = argStringOpt(args, "evidence_file");
  if (file) return parseEvidence(readJsonFile(file), file);
  const inline = argValue(args, "evidence");
  if (inline !== undefined) return parseEvidence(inline, "evidence argument");
  return { evidence: new Map() };
}

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "run_gate",
      description:
        "Evaluate obligations against captured evidence and persist the report. Targets: obligation_ids, else the obligations selected for text, else every obligation. Returns the aggregate status (PASS/PARTIAL/FAIL/ERROR) and the exit code a CI step should use.",
      inputSchema: {
        type: "object",
        properties: {
          obligation_ids: {
            type: "array",
            items: { type: "string" },
            description: "Obligations to evaluate.",
          },
          text: {
            type: "string",
            description: "Feature description; its selected obligations become the targets.",
          },
          evidence_file: {
            type: "string",
            description:
              'Path to an evidence JSON file: {"evidence": [{"obligation_id", "paths", "criteria"}], "capabilities"?, "privileged"?}.',
          },
          evidence: {
            type: "object",
            description: "Inline evidence in the same format as evidence_file.",
          },
          strict: {
            type: "boolean",
            description: "Exit 1 on PARTIAL (default from GATE_STRICT).",
          },
          full: {
            type: "boolean",
            description: "Return the full report with evidence paths, hints and sub-checks (default false).",
          },
        },
      },
      handler: async (args, ctx) => {
        const outcome = await executeGate(ctx, {
          obligationIds: argStringArray(args, "obligation_ids"),
          text: argStringOpt(args, "text"),
          evidence: loadEvidence(args),
          strict: argBoolOpt(args, "strict"),
        });
        return formatToolResponse({
          success: true,
          data: {
            targets: outcome.targets,
            report: argBoolOpt(args, "full") ? outcome.report : compactReport(outcome.report),
          },
          warnings: outcome.warnings,
        });
      },
    },
    {
      name: "get_latest_report",
      description: "The most recent persisted gate report.",
      inputSchema: {
        type: "object",
        properties: {
          full: { type: "boolean", description: "Return the full report (default false)." },
        },
      },
      handler: async (args, ctx) => {
        const report = ctx.reportStore.getLatest();
        if (!report) {
          return formatToolResponse({
            success: false,
            error: "No gate report has been persisted yet. Run run_gate first.",
          });
        }
        return formatToolResponse({
          success: true,
          data: { report: argBoolOpt(args, "full") ? report : compactReport(report) },
        });
      },
    },
    {
      name: "list_reports",
      description: "Gate report history, newest first. Filter by aggregate status.",
      inputSchema: {
        type: "object",
        properties: {
          status: {
            type: "string",
            enum: [...STATUSES],
            description: "Only reports with this aggregate status.",
          },
          limit: { type: "number", description: "Max results to return (default 20, max 100)." },
        },
      },
      handler: async (args, ctx) => {
        const raw = argStringOpt(args, "status");
        const status = STATUSES.find((s) => s === raw);
        if (raw !== undefined && !status) {
          return formatToolResponse({
            success: false,
            error: `Invalid status. Must be one of ${STATUSES.join(", ")}.`,
          });
        }
        const reports = ctx.reportStore.listReports({ status, limit: argNumber(args, "limit") });
        return formatToolResponse({
          success: true,
          data: { reports, total: reports.length },
        });
      },
    },
  ];
}
