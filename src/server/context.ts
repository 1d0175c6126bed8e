import { loadConfig, type AppConfig } from "../core/config.js";
import { getErrorMessage, logInfo, logWarn } from "../core/logging.js";
import {
  readObligationSources,
  readPackSources,
} from "../data-sources/catalog-files.js";
import { InsightStore } from "../data-sources/insight-store.js";
import { ReportStore } from "../data-sources/report-store.js";
import { ensureSqlJs } from "../data-sources/sqlite-adapter.js";
import { selectCapability } from "../domain/gates/capabilities.js";
import type { EvidenceBundle } from "../domain/gates/evidence.js";
import { GateEvaluator } from "../domain/gates/gate-evaluator.js";
import { runGate } from "../domain/gates/gate-runner.js";
import type { GateReport } from "../domain/gates/gate-types.js";
import { ReportBuilder } from "../domain/gates/report-builder.js";
import { InsightLedger } from "../domain/insights/ledger.js";
import { ObligationRegistry } from "../domain/obligations/registry.js";
import { PackCatalog } from "../domain/packs/catalog.js";
import { SignalMatcher } from "../domain/signals/matcher.js";

export interface ServerContext {
  config: AppConfig;
  registry: ObligationRegistry;
  catalog: PackCatalog;
  matcher: SignalMatcher;
  insightStore: InsightStore;
  reportStore: ReportStore;
  ledger: InsightLedger;
}

/**
 * Create and initialize the full server context.
 * Catalog load errors (SchemaError, DuplicateIdError) propagate: a broken
 * catalog aborts startup.
 */
export async function createServerContext(
  config: AppConfig = loadConfig(),
): Promise<ServerContext> {
  // sql.js WASM must load before any SQLite operations
  await ensureSqlJs();

  const registry = ObligationRegistry.load(
    readObligationSources(config.catalog.obligationsDir),
  );
  const catalog = PackCatalog.load(readPackSources(config.catalog.packsDir), registry);
  const matcher = SignalMatcher.fromCatalog(catalog, registry, config.selection);

  const insightStore = new InsightStore(config.catalog.dataDir);
  insightStore.initialize();
  const reportStore = new ReportStore(config.catalog.dataDir);
  reportStore.initialize();

  const ledger = new InsightLedger(insightStore, registry, config.consolidation);

  logInfo(
    `Context ready: ${registry.size} obligation(s), ${catalog.size} pack(s), ${ledger.pending().length} pending insight(s)`,
  );

  return { config, registry, catalog, matcher, insightStore, reportStore, ledger };
}

export function closeServerContext(ctx: ServerContext): void {
  ctx.insightStore.close();
  ctx.reportStore.close();
}

// ============================================================================
// Gate runs
// ============================================================================

export interface GateRequest {
  obligationIds?: string[];
  text?: string;
  evidence: EvidenceBundle;
  strict?: boolean;
  signal?: AbortSignal;
}

export interface GateOutcome {
  report: GateReport;
  targets: string[];
  warnings: string[];
}

/**
 * Pick the targets (explicit ids, else the selection for `text`, else the
 * whole registry), build the run context and run the gate.
 */
export async function executeGate(
  ctx: ServerContext,
  request: GateRequest,
): Promise<GateOutcome> {
  const warnings: string[] = [];
  let targets: string[];
  if (request.obligationIds && request.obligationIds.length > 0) {
    targets = request.obligationIds;
  } else if (request.text && request.text.trim()) {
    const selection = ctx.matcher.select(request.text);
    warnings.push(...selection.warnings);
    targets = selection.obligations.map((o) => o.obligation_id);
  } else {
    targets = ctx.registry.list().map((o) => o.id);
  }
  if (targets.length === 0) {
    warnings.push("No obligations selected; the gate evaluated nothing");
  }

  const capability = selectCapability({
    privileged: request.evidence.privileged ?? ctx.config.gate.privileged,
    capabilities: [
      ...ctx.config.gate.capabilities,
      ...(request.evidence.capabilities ?? []),
    ],
  });

  const evaluator = new GateEvaluator(ctx.registry, {
    checkTimeoutMs: ctx.config.gate.checkTimeoutMs,
    hintsFor: (id) => {
      try {
        return ctx.ledger.curatedFor(id).map((c) => c.invariant);
      } catch (err) {
        logWarn(`Hints unavailable for ${id}: ${getErrorMessage(err)}`);
        return [];
      }
    },
  });
  const builder = new ReportBuilder({ strict: request.strict ?? ctx.config.gate.strict });

  const report = await runGate(
    targets,
    {
      capability,
      evidence: request.evidence.evidence,
      sink: ctx.reportStore,
      signal: request.signal,
    },
    { registry: ctx.registry, evaluator, builder, proposals: ctx.ledger },
  );

  return { report, targets, warnings };
}
