import fs from "node:fs/promises";
import path from "node:path";
import type { SubsystemLogger } from "../logging/subsystem.js";
import { SweepError } from "./errors.js";
import { copyFile, fileExists, isDirectory } from "./files.js";
import { readConfigRecord, writeConfigDocument } from "./json-config.js";
import { createUnitLayout, DEFAULT_LAYOUT, type SweepLayout, type UnitPaths } from "./layout.js";
import {
  ResourceParamsSchema,
  TrainParamsSchema,
  type ExperimentUnit,
  type ParameterTuple,
  type TrainingResources,
} from "./schema.js";

/** Written into the config but never part of the unit id. */
export const DECORATION_KEYS: ReadonlySet<string> = new Set(["instrSetName"]);

export const RESERVED_TUPLE_KEYS: ReadonlySet<string> = new Set(["seed", "instrType", "instrSetName"]);

export type TupleFieldValue = string | number | boolean;

/** Template keys a tuple overrides, in template-write order. */
export function tupleConfigFields(tuple: ParameterTuple): Array<[string, TupleFieldValue]> {
  const fields: Array<[string, TupleFieldValue]> = [
    ["seed", tuple.seed],
    ["instrType", tuple.dataType],
  ];
  for (const [flag, enabled] of Object.entries(tuple.instructionSet.flags)) {
    fields.push([flag, enabled]);
  }
  fields.push(["instrSetName", tuple.instructionSet.name]);
  return fields;
}

function formatIdValue(value: TupleFieldValue): string {
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  return String(value);
}

/**
 * `key-value` pairs joined by `_`, sorted by key. Two tuples get the same id
 * exactly when their non-decoration fields are equal.
 */
export function computeUnitId(tuple: ParameterTuple): string {
  return tupleConfigFields(tuple)
    .filter(([key]) => !DECORATION_KEYS.has(key))
    .toSorted(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}-${formatIdValue(value)}`)
    .join("_");
}

export type MaterializeContext = {
  outDir: string;
  templateDir: string;
  training: TrainingResources;
  layout?: SweepLayout;
  /** Replaces the template's resource config when it exists. */
  customResourceConfig?: string;
  log: SubsystemLogger;
};

export type MaterializeResult = {
  unit: ExperimentUnit;
  paths: UnitPaths;
  warnings: string[];
};

export async function assertTemplateDir(
  templateDir: string,
  layout: SweepLayout = DEFAULT_LAYOUT,
): Promise<void> {
  const trainParams = path.join(templateDir, layout.unit.trainParamsFile);
  if (!(await isDirectory(templateDir)) || !(await fileExists(trainParams))) {
    throw new SweepError(
      "TemplateFileMissing",
      `Base template not found: ${trainParams}`,
    );
  }
}

async function copyTemplateFiles(templateDir: string, paramsDir: string): Promise<string[]> {
  const entries = await fs.readdir(templateDir, { withFileTypes: true });
  const copied: string[] = [];
  for (const entry of entries.toSorted((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
    if (!entry.isFile()) {
      continue;
    }
    await copyFile(path.join(templateDir, entry.name), path.join(paramsDir, entry.name));
    copied.push(entry.name);
  }
  return copied;
}

async function overrideTrainParams(params: {
  tuple: ParameterTuple;
  paths: UnitPaths;
  training: TrainingResources;
  fileName: string;
}): Promise<string[]> {
  const warnings: string[] = [];
  const data = await readConfigRecord(params.paths.trainParams, TrainParamsSchema);

  data.timeMaxTraining = Math.floor(params.training.timeSeconds);
  if (params.training.stopMode === "generations" && params.training.generations !== undefined) {
    if ("nbGenerations" in data) {
      data.nbGenerations = params.training.generations;
    } else {
      warnings.push(`Key 'nbGenerations' not found in ${params.fileName}.`);
    }
  }

  for (const [key, value] of tupleConfigFields(params.tuple)) {
    if (key in data || DECORATION_KEYS.has(key)) {
      data[key] = value;
      continue;
    }
    warnings.push(`Key '${key}' not found in ${params.fileName}.`);
  }

  await writeConfigDocument(params.paths.trainParams, data);
  return warnings;
}

async function overrideResourceParams(paths: UnitPaths, cores: number): Promise<boolean> {
  if (!(await fileExists(paths.resourceParams))) {
    return false;
  }
  const data = await readConfigRecord(paths.resourceParams, ResourceParamsSchema);
  data.nbThreads = Math.floor(cores);
  await writeConfigDocument(paths.resourceParams, data);
  return true;
}

/**
 * Creates `<outDir>/<id>/` with its `params/` and `outLogs/` trees and an
 * overridden copy of the base template. Re-running on the same tuple
 * rewrites the same directory.
 */
export async function materializeUnit(
  tuple: ParameterTuple,
  ctx: MaterializeContext,
): Promise<MaterializeResult> {
  const layout = ctx.layout ?? DEFAULT_LAYOUT;
  await assertTemplateDir(ctx.templateDir, layout);

  const id = computeUnitId(tuple);
  const workDir = path.join(ctx.outDir, id);
  const log = ctx.log.child(id);
  const warnings: string[] = [];

  const paths = await createUnitLayout(workDir, layout);
  const copied = await copyTemplateFiles(ctx.templateDir, paths.paramsDir);
  log.debug(`copied template files: ${copied.join(", ")}`);

  if (ctx.customResourceConfig) {
    if (await fileExists(ctx.customResourceConfig)) {
      await copyFile(ctx.customResourceConfig, paths.resourceParams);
    } else {
      warnings.push(
        `Custom resource config not found (${ctx.customResourceConfig}); using template copy.`,
      );
    }
  }

  warnings.push(
    ...(await overrideTrainParams({
      tuple,
      paths,
      training: ctx.training,
      fileName: layout.unit.trainParamsFile,
    })),
  );

  if (!(await overrideResourceParams(paths, ctx.training.cores))) {
    warnings.push(`No ${layout.unit.resourceParamsFile} found to modify.`);
  }

  for (const warning of warnings) {
    log.warn(warning);
  }

  return {
    unit: { id, workDir, tuple, status: "created" },
    paths,
    warnings,
  };
}
