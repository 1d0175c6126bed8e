import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

// Load environment variables
dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Nearest ancestor holding package.json; same answer from src/ and dist/src/. */
function findRepoRoot(start: string): string {
  let dir = start;
  while (!fs.existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(start, "../..");
    dir = parent;
  }
  return dir;
}

const REPO_ROOT = findRepoRoot(__dirname);

export interface CatalogConfig {
  obligationsDir: string;
  packsDir: string;
  dataDir: string;
}

export interface SelectionConfig {
  threshold: number;
  defaultPackId: string;
  obligationSignalWeight: number;
  fullCreditMatches: number;
  decay: number;
}

export interface ConsolidationConfig {
  proposalMinEvidence: number;
}

export interface GateRunConfig {
  checkTimeoutMs: number;
  strict: boolean;
  privileged: boolean;
  capabilities: string[];
}

export interface AppConfig {
  catalog: CatalogConfig;
  selection: SelectionConfig;
  consolidation: ConsolidationConfig;
  gate: GateRunConfig;
}

function envNum(
  key: string,
  fallback: number,
  validate: (n: number) => boolean,
): number {
  const val = process.env[key];
  if (val === undefined || val.trim() === "") return fallback;
  const parsed = Number(val);
  return validate(parsed) ? parsed : fallback;
}

function envFloat(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isFinite);
}

function envInt(key: string, fallback: number): number {
  return envNum(key, fallback, Number.isInteger);
}

function envBool(key: string, fallback: boolean): boolean {
  const raw = (process.env[key] ?? "").trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(raw)) return true;
  if (["false", "0", "no", "off"].includes(raw)) return false;
  return fallback;
}

function envDir(key: string, fallback: string): string {
  const raw = process.env[key];
  return raw && raw.trim() ? path.resolve(raw.trim()) : fallback;
}

function parseList(raw?: string): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

export function loadCatalogConfig(): CatalogConfig {
  return {
    obligationsDir: envDir("OBLIGATIONS_DIR", path.join(REPO_ROOT, "obligations")),
    packsDir: envDir("PACKS_DIR", path.join(REPO_ROOT, "packs")),
    dataDir: envDir("DATA_DIR", path.join(REPO_ROOT, "data")),
  };
}

/**
 * Keyword weights themselves live in the pack files; these are the knobs
 * around them.
 */
export function loadSelectionConfig(): SelectionConfig {
  return {
    threshold: envFloat("SELECTION_THRESHOLD", 0.5),
    defaultPackId: (process.env.SELECTION_DEFAULT_PACK ?? "").trim() || "edge-baseline",
    obligationSignalWeight: envFloat("SIGNAL_OBLIGATION_WEIGHT", 0.6),
    fullCreditMatches: envInt("SIGNAL_FULL_CREDIT_MATCHES", 3),
    decay: envFloat("SIGNAL_DECAY", 0.5),
  };
}

export function loadConsolidationConfig(): ConsolidationConfig {
  return {
    proposalMinEvidence: envInt("PROPOSAL_MIN_EVIDENCE", 5),
  };
}

export function loadGateRunConfig(): GateRunConfig {
  return {
    checkTimeoutMs: Math.max(1, envInt("GATE_CHECK_TIMEOUT_MS", 30_000)),
    strict: envBool("GATE_STRICT", false),
    privileged: envBool("GATE_PRIVILEGED", false),
    capabilities: parseList(process.env.GATE_CAPABILITIES),
  };
}

/**
 * Validate config invariants at startup.
 * Collects every problem before throwing so a broken .env is fixed in one pass.
 */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];
  const { selection, consolidation, gate } = config;

  if (selection.threshold <= 0)
    errors.push("SELECTION_THRESHOLD must be > 0");
  if (!selection.defaultPackId)
    errors.push("SELECTION_DEFAULT_PACK must not be empty");
  if (selection.obligationSignalWeight <= 0 || selection.obligationSignalWeight > 1)
    errors.push("SIGNAL_OBLIGATION_WEIGHT must be in (0, 1]");
  if (selection.fullCreditMatches < 1)
    errors.push("SIGNAL_FULL_CREDIT_MATCHES must be >= 1");
  if (selection.decay < 0 || selection.decay > 1)
    errors.push("SIGNAL_DECAY must be between 0 and 1");
  if (consolidation.proposalMinEvidence < 0)
    errors.push("PROPOSAL_MIN_EVIDENCE must be non-negative");
  if (gate.checkTimeoutMs < 1)
    errors.push("GATE_CHECK_TIMEOUT_MS must be >= 1");

  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  - ${errors.join("\n  - ")}`);
  }
}

export function loadConfig(): AppConfig {
  const config: AppConfig = {
    catalog: loadCatalogConfig(),
    selection: loadSelectionConfig(),
    consolidation: loadConsolidationConfig(),
    gate: loadGateRunConfig(),
  };
  validateConfig(config);
  return config;
}
