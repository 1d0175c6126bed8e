import fs from "fs";
import path from "path";
import YAML from "yaml";
import { SchemaError } from "../core/errors.js";
import { getErrorMessage, logDebug } from "../core/logging.js";
import type { DefinitionSource, Obligation } from "../domain/obligations/types.js";

const YAML_EXTENSIONS = new Set([".yaml", ".yml"]);
const PACK_FILENAMES = ["pack.yaml", "pack.yml"];

export function parseYamlSource(content: string, origin: string): DefinitionSource {
  try {
    return { origin, data: YAML.parse(content) };
  } catch (err) {
    throw new SchemaError(origin, [`YAML syntax: ${getErrorMessage(err)}`]);
  }
}

function listYamlFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listYamlFiles(full));
    } else if (entry.isFile() && YAML_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
      files.push(full);
    }
  }
  return files;
}

/** One source per obligation file under `dir` (recursive), in path order. */
export function readObligationSources(dir: string): DefinitionSource[] {
  if (!fs.existsSync(dir)) {
    throw new SchemaError(dir, ["obligations directory does not exist"]);
  }
  const files = listYamlFiles(dir).sort();
  logDebug(`Found ${files.length} obligation file(s) under ${dir}`);
  return files.map((file) => parseYamlSource(fs.readFileSync(file, "utf-8"), file));
}

/** One source per `<dir>/<pack-id>/pack.yaml`, in directory order. */
export function readPackSources(dir: string): DefinitionSource[] {
  if (!fs.existsSync(dir)) {
    throw new SchemaError(dir, ["packs directory does not exist"]);
  }
  const sources: DefinitionSource[] = [];
  const packDirs = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();

  for (const name of packDirs) {
    const file = PACK_FILENAMES.map((f) => path.join(dir, name, f)).find((f) => fs.existsSync(f));
    if (!file) {
      logDebug(`Skipping ${name}: no pack.yaml`);
      continue;
    }
    sources.push(parseYamlSource(fs.readFileSync(file, "utf-8"), file));
  }
  return sources;
}

/** Read a JSON file (insight batch, evidence). Parse failures are SchemaErrors. */
export function readJsonFile(file: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (err) {
    throw new SchemaError(file, [`cannot read file: ${getErrorMessage(err)}`]);
  }
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new SchemaError(file, [`JSON syntax: ${getErrorMessage(err)}`]);
  }
}

/**
 * Write an approved obligation as `<dir>/<domain>/<id>.yaml` so the next
 * registry load commits it. Never overwrites an existing file.
 */
/** `<dir>/<domain>/<id>.yaml`, with the domain folded to a directory name. */
export function obligationFilePath(
  dir: string,
  obligation: Pick<Obligation, "id" | "domain">,
): string {
  const domainDir = path.join(dir, obligation.domain.toLowerCase().replace(/[^a-z0-9_-]+/g, "-"));
  return path.join(domainDir, `${obligation.id}.yaml`);
}

/** Throws when the obligation's file is already on disk; returns its path otherwise. */
export function assertObligationFileFree(
  dir: string,
  obligation: Pick<Obligation, "id" | "domain">,
): string {
  const file = obligationFilePath(dir, obligation);
  if (fs.existsSync(file)) {
    throw new SchemaError(file, ["obligation file already exists"]);
  }
  return file;
}

export function writeObligationFile(dir: string, obligation: Obligation): string {
  const file = assertObligationFileFree(dir, obligation);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, YAML.stringify(obligation), "utf-8");
  return file;
}
