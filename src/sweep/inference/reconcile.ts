import fs from "node:fs/promises";
import path from "node:path";
import type { SubsystemLogger } from "../../logging/subsystem.js";
import { SweepError, isSweepError } from "../errors.js";
import { isDirectory } from "../files.js";
import { writeConfigDocument } from "../json-config.js";
import {
  DEFAULT_LAYOUT,
  createInferenceLayout,
  resolveInferencePaths,
  resolveTpgDirOfInferenceFile,
  resolveTrainingResultsDir,
  type SweepLayout,
} from "../layout.js";
import type { DataType, InferenceConfig } from "../schema.js";
import {
  inferTpgDataType,
  inferenceCombinations,
  type InferenceKey,
  type MicroarchitectureSpec,
} from "./combinations.js";

export type InferenceFileKind = "configs" | "results";

export type PlannedConfig = {
  tpgDir: string;
  configPath: string;
  key: InferenceKey;
};

export type GenerateConfigsResult = {
  planned: PlannedConfig[];
  written: string[];
  skippedTpgs: string[];
  warnings: string[];
  errors: string[];
};

export type MissingInference = {
  configPath: string;
  tpgDir: string;
};

export type FindMissingResult = {
  missing: MissingInference[];
  configCount: number;
  resultCount: number;
};

async function requireTrainingResultsDir(root: string, layout: SweepLayout): Promise<string> {
  const base = resolveTrainingResultsDir(root, layout);
  if (!(await isDirectory(base))) {
    throw new SweepError(
      "ArtifactMissing",
      `Expected ${layout.inference.trainingResultsDir} under ${root}, not found.`,
    );
  }
  return base;
}

export async function discoverTpgDirs(
  root: string,
  layout: SweepLayout = DEFAULT_LAYOUT,
): Promise<string[]> {
  const base = await requireTrainingResultsDir(root, layout);
  const entries = await fs.readdir(base, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(base, name));
}

export function configFileName(key: Pick<InferenceKey, "uarch" | "isa" | "abi" | "dataType">) {
  return `${key.uarch}_${key.isa}_${key.abi}_${key.dataType}.json`;
}

export function toInferenceConfig(key: InferenceKey): InferenceConfig {
  return {
    tpg: key.tpgId,
    uarch: key.uarch,
    isa: key.isa,
    abi: key.abi,
    dtype: key.dataType,
    compiler: key.compiler,
  };
}

function readTpgDataType(tpgId: string, errors: string[]): DataType | null {
  try {
    return inferTpgDataType(tpgId);
  } catch (err) {
    if (!isSweepError(err, "AmbiguousTypeTag")) {
      throw err;
    }
    errors.push(err.message);
    return null;
  }
}

/**
 * Expected keys across all TPG directories, flattened in discovery order.
 * `mini > 0` keeps only the first `mini` entries of the flattened list.
 */
export function planInferenceConfigs(params: {
  tpgDirs: string[];
  layout?: SweepLayout;
  mini?: number;
  microarchitectures?: readonly MicroarchitectureSpec[];
}): Omit<GenerateConfigsResult, "written"> {
  const layout = params.layout ?? DEFAULT_LAYOUT;
  const planned: PlannedConfig[] = [];
  const skippedTpgs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];

  for (const tpgDir of params.tpgDirs) {
    const tpgId = path.basename(tpgDir);
    const dataType = readTpgDataType(tpgId, errors);
    if (!dataType) {
      skippedTpgs.push(tpgDir);
      continue;
    }
    const { keys, skipped } = inferenceCombinations({
      tpgId,
      dataType,
      microarchitectures: params.microarchitectures,
    });
    for (const uarch of skipped) {
      warnings.push(`${tpgId} on ${uarch} skipped (dtype=${dataType})`);
    }
    const { configsDir } = resolveInferencePaths(tpgDir, layout);
    for (const key of keys) {
      planned.push({ tpgDir, configPath: path.join(configsDir, configFileName(key)), key });
    }
  }

  const mini = params.mini ?? 0;
  return {
    planned: mini > 0 ? planned.slice(0, mini) : planned,
    skippedTpgs,
    warnings,
    errors,
  };
}

export async function generateInferenceConfigs(params: {
  root: string;
  layout?: SweepLayout;
  mini?: number;
  microarchitectures?: readonly MicroarchitectureSpec[];
  log: SubsystemLogger;
}): Promise<GenerateConfigsResult> {
  const layout = params.layout ?? DEFAULT_LAYOUT;
  const tpgDirs = await discoverTpgDirs(params.root, layout);
  const plan = planInferenceConfigs({
    tpgDirs,
    layout,
    mini: params.mini,
    microarchitectures: params.microarchitectures,
  });

  const prepared = new Set<string>();
  const written: string[] = [];
  for (const entry of plan.planned) {
    if (!prepared.has(entry.tpgDir)) {
      await createInferenceLayout(entry.tpgDir, layout);
      prepared.add(entry.tpgDir);
    }
    await writeConfigDocument(entry.configPath, toInferenceConfig(entry.key));
    written.push(entry.configPath);
  }

  for (const warning of plan.warnings) {
    params.log.debug(warning);
  }
  for (const error of plan.errors) {
    params.log.error(error);
  }
  params.log.info(`wrote ${written.length} inference configs for ${prepared.size} TPGs`);
  return { ...plan, written };
}

export async function findInferenceFiles(
  root: string,
  kind: InferenceFileKind,
  layout: SweepLayout = DEFAULT_LAYOUT,
): Promise<string[]> {
  const files: string[] = [];
  for (const tpgDir of await discoverTpgDirs(root, layout)) {
    const paths = resolveInferencePaths(tpgDir, layout);
    const dir = kind === "configs" ? paths.configsDir : paths.resultsDir;
    if (!(await isDirectory(dir))) {
      continue;
    }
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isFile() && entry.name.endsWith(".json")) {
        files.push(path.join(dir, entry.name));
      }
    }
  }
  return files.sort();
}

/** Owning TPG directory plus file stem; equal for a config and its result. */
export function inferenceFileKey(
  filePath: string,
  kind: InferenceFileKind,
  layout: SweepLayout = DEFAULT_LAYOUT,
): string {
  const tpgDir = resolveTpgDirOfInferenceFile(filePath, kind, layout);
  const stem = path.basename(filePath, path.extname(filePath));
  return path.join(tpgDir, stem);
}

/** Entries of `expected` whose key has no counterpart in `actual`. */
export function computeMissing<T>(expected: Map<string, T>, actual: Iterable<string>): T[] {
  const present = new Set(actual);
  const missing: T[] = [];
  for (const [key, value] of expected) {
    if (!present.has(key)) {
      missing.push(value);
    }
  }
  return missing;
}

export async function findMissingInferenceResults(params: {
  root: string;
  layout?: SweepLayout;
}): Promise<FindMissingResult> {
  const layout = params.layout ?? DEFAULT_LAYOUT;
  const configs = await findInferenceFiles(params.root, "configs", layout);
  const results = await findInferenceFiles(params.root, "results", layout);

  const expected = new Map<string, MissingInference>();
  for (const configPath of configs) {
    expected.set(inferenceFileKey(configPath, "configs", layout), {
      configPath,
      tpgDir: resolveTpgDirOfInferenceFile(configPath, "configs", layout),
    });
  }
  const actual = results.map((resultPath) => inferenceFileKey(resultPath, "results", layout));

  return {
    missing: computeMissing(expected, actual),
    configCount: configs.length,
    resultCount: results.length,
  };
}

export function renderResumeList(paths: string[]): string {
  const lines = paths.map((line) => line.trim()).filter((line) => line.length > 0);
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
