import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import type { AppConfig } from "../src/core/config.js";
import { ensureSqlJs } from "../src/data-sources/sqlite-adapter.js";
import {
  closeServerContext,
  createServerContext,
  type ServerContext,
} from "../src/server/context.js";
import { createToolRegistry } from "../src/server/index.js";
import { ToolRegistry, argStringArray, type ToolResponse } from "../src/server/tool-registry.js";
import { makeConsolidationConfig, makeGateRunConfig, makeInsight, makeSelectionConfig } from "./fixtures.js";

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

const VARY_CRITERIA = [
  "Responses carrying Vary are cached per distinct value of each listed request header",
  "A request with a different Accept-Encoding never receives another variant's body",
];

function body(response: ToolResponse): unknown {
  return JSON.parse(response.content[0].text);
}

describe("argument helpers", () => {
  it("drop non-string array members", () => {
    expect(argStringArray({ ids: ["a", 1, "b"] }, "ids")).toEqual(["a", "b"]);
    expect(argStringArray({ ids: "a" }, "ids")).toBeUndefined();
  });
});

describe("ToolRegistry", () => {
  it("rejects duplicate tool names", () => {
    const registry = createToolRegistry();
    expect(() => registry.register([
      {
        name: "run_gate",
        description: "again",
        inputSchema: { type: "object" },
        handler: async () => ({ content: [], isError: false }),
      },
    ])).toThrow("Duplicate tool name: run_gate");
  });

  it("lists every tool module", () => {
    const names = createToolRegistry().listTools().map((t) => t.name);
    expect(names).toEqual([
      "list_obligations",
      "get_obligation",
      "list_packs",
      "get_pack",
      "select_packs",
      "explain_selection",
      "run_gate",
      "get_latest_report",
      "list_reports",
      "ingest_insights",
      "consolidation_summary",
      "promote_insight",
      "promote_eligible",
      "reject_insight",
      "resolve_contradiction",
      "approve_proposal",
    ]);
  });
});

describe("tools over a live context", () => {
  let tmpDir: string;
  let obligationsDir: string;
  let ctx: ServerContext;
  let tools: ToolRegistry;

  beforeAll(async () => {
    await ensureSqlJs();
  });

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "server-tools-test-"));
    obligationsDir = path.join(tmpDir, "obligations");
    fs.cpSync(path.join(ROOT, "obligations"), obligationsDir, { recursive: true });
    const config: AppConfig = {
      catalog: {
        obligationsDir,
        packsDir: path.join(ROOT, "packs"),
        dataDir: tmpDir,
      },
      selection: makeSelectionConfig(),
      consolidation: makeConsolidationConfig(),
      gate: makeGateRunConfig(),
    };
    ctx = await createServerContext(config);
    tools = createToolRegistry();
  });

  afterEach(() => {
    closeServerContext(ctx);
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("throws on unknown tools", async () => {
    await expect(tools.callTool("nope", {}, ctx)).rejects.toThrow("Unknown tool: nope");
  });

  it("turns domain errors into coded responses", async () => {
    const response = await tools.callTool("get_obligation", { id: "cache.unknown.thing" }, ctx);
    expect(response.isError).toBe(true);
    expect(body(response)).toEqual({
      success: false,
      error: "Obligation not found: cache.unknown.thing",
      code: "NOT_FOUND",
    });
  });

  it("filters obligations by domain", async () => {
    const response = await tools.callTool("list_obligations", { domain: "Routing" }, ctx);
    expect(body(response)).toMatchObject({
      success: true,
      data: {
        total: 2,
        obligations: [
          { id: "routing.host.header.preserved", composite: false },
          { id: "routing.origin.failover", composite: false },
        ],
      },
    });
  });

  it("runs the gate, persists the report and serves it back", async () => {
    const run = await tools.callTool(
      "run_gate",
      {
        obligation_ids: ["cache.vary.honored"],
        evidence: {
          evidence: [
            {
              obligation_id: "cache.vary.honored",
              paths: ["evidence/vary.har"],
              criteria: { [VARY_CRITERIA[0]]: true, [VARY_CRITERIA[1]]: true },
            },
          ],
        },
      },
      ctx,
    );
    expect(run.isError).toBe(false);
    expect(body(run)).toMatchObject({
      success: true,
      data: {
        targets: ["cache.vary.honored"],
        report: { status: "PASS", exit_code: 0, counts: { PASS: 1 } },
      },
    });

    const latest = await tools.callTool("get_latest_report", { full: true }, ctx);
    expect(body(latest)).toMatchObject({
      success: true,
      data: { report: { status: "PASS", checks: [{ evidence_paths: ["evidence/vary.har"] }] } },
    });

    const history = await tools.callTool("list_reports", { status: "PASS" }, ctx);
    expect(body(history)).toMatchObject({ success: true, data: { total: 1 } });
  });

  it("rejects an unknown report status filter", async () => {
    const response = await tools.callTool("list_reports", { status: "GREEN" }, ctx);
    expect(body(response)).toEqual({
      success: false,
      error: "Invalid status. Must be one of PASS, FAIL, PARTIAL, SKIP, ERROR.",
    });
  });

  it("attaches promoted insights to the obligation as hints", async () => {
    await tools.callTool("ingest_insights", { records: [makeInsight()] }, ctx);
    const promoted = await tools.callTool(
      "promote_insight",
      { insight_id: "ins-1", reviewer: "reviewer-1" },
      ctx,
    );
    expect(promoted.isError).toBe(false);

    const obligation = await tools.callTool("get_obligation", { id: "cache.vary.honored" }, ctx);
    expect(body(obligation)).toMatchObject({
      success: true,
      data: {
        covered_by: ["edge-http-cache-correctness"],
        hints: [
          {
            curated_id: "cur_ins-1",
            invariant: "vary header must split cache entries",
            confidence: "HIGH",
          },
        ],
      },
    });
  });

  it("checks the obligation file before recording an approval", async () => {
    await tools.callTool(
      "ingest_insights",
      { records: [makeInsight({ id: "p", obligation_id: null, evidence_count: 8 })] },
      ctx,
    );
    const taken = path.join(obligationsDir, "cache", "cache.purge.propagated.yaml");
    fs.writeFileSync(taken, "id: cache.purge.propagated\n");
    const args = {
      insight_id: "p",
      reviewer: "reviewer-1",
      obligation: { id: "cache.purge.propagated", title: "Purges reach every edge", domain: "cache", risk: "high" },
      write_file: true,
    };

    const refused = await tools.callTool("approve_proposal", args, ctx);
    expect(refused.isError).toBe(true);
    expect(body(refused)).toEqual({
      success: false,
      error: `Invalid definition in ${taken}:\n  - obligation file already exists`,
      code: "SCHEMA",
    });
    expect(ctx.ledger.findProposal("p")).not.toBeNull();

    fs.rmSync(taken);
    const approved = await tools.callTool("approve_proposal", args, ctx);
    expect(body(approved)).toMatchObject({
      success: true,
      data: { obligation: { id: "cache.purge.propagated" }, file: taken },
    });
    expect(fs.existsSync(taken)).toBe(true);
  });

  it("requires a reason to reject an insight", async () => {
    await tools.callTool("ingest_insights", { records: [makeInsight()] }, ctx);
    const response = await tools.callTool(
      "reject_insight",
      { insight_id: "ins-1", reviewer: "reviewer-1" },
      ctx,
    );
    expect(response.isError).toBe(true);
  });
});
