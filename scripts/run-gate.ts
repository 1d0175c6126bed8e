#!/usr/bin/env npx tsx
/**
 * Run the release gate from CI and exit with its code.
 *
 * Usage:
 *   npx tsx scripts/run-gate.ts [obligation-id ...] [--text "feature description"]
 *                               [--evidence evidence.json] [--strict]
 *
 * Exit codes: 0 PASS (or PARTIAL when not strict), 1 FAIL (or PARTIAL when
 * strict), 2 ERROR or a run that could not complete.
 */

import { ReportPersistError, isGateError } from "../src/core/errors.js";
import { readJsonFile } from "../src/data-sources/catalog-files.js";
import { parseEvidence, type EvidenceBundle } from "../src/domain/gates/evidence.js";
import { closeServerContext, createServerContext, executeGate } from "../src/server/context.js";

// ============================================================================
// CLI Args
// ============================================================================

interface GateArgs {
  obligationIds: string[];
  text?: string;
  evidenceFile?: string;
  strict?: boolean;
}

function parseArgs(): GateArgs {
  const args = process.argv.slice(2);
  const parsed: GateArgs = { obligationIds: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--text" && args[i + 1]) {
      parsed.text = args[i + 1];
      i++;
    } else if (arg === "--evidence" && args[i + 1]) {
      parsed.evidenceFile = args[i + 1];
      i++;
    } else if (arg === "--strict") {
      parsed.strict = true;
    } else if (!arg.startsWith("--")) {
      parsed.obligationIds.push(arg);
    }
  }

  return parsed;
}

const ICONS: Record<string, string> = {
  PASS: "✓",
  FAIL: "✗",
  PARTIAL: "◐",
  SKIP: "-",
  ERROR: "!",
};

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs();
  const evidence: EvidenceBundle = args.evidenceFile
    ? parseEvidence(readJsonFile(args.evidenceFile), args.evidenceFile)
    : { evidence: new Map() };

  const controller = new AbortController();
  process.on("SIGINT", () => {
    console.error("Interrupted; cancelling outstanding checks...");
    controller.abort();
  });

  const ctx = await createServerContext();
  try {
    const { report, warnings } = await executeGate(ctx, {
      obligationIds: args.obligationIds,
      text: args.text,
      evidence,
      strict: args.strict,
      signal: controller.signal,
    });

    for (const warning of warnings) console.error(`warning: ${warning}`);
    console.log(`=== Release gate: ${report.status} (exit ${report.exit_code}) ===`);
    for (const check of report.checks) {
      console.log(`  ${ICONS[check.status] ?? "?"} ${check.obligation_id} [${check.status}] ${check.message}`);
      for (const sub of check.sub_checks ?? []) {
        console.log(`      ${ICONS[sub.status] ?? "?"} ${sub.obligation_id}: ${sub.message}`);
      }
    }
    if (report.cancelled) console.log("Run was cancelled before every check completed.");
    process.exitCode = report.exit_code;
  } finally {
    closeServerContext(ctx);
  }
}

main().catch((err: unknown) => {
  if (err instanceof ReportPersistError) {
    console.error(`Report could not be persisted: ${err.message}`);
  } else if (isGateError(err)) {
    console.error(`${err.code}: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(2);
});
