import fs from "node:fs/promises";
import type { SubsystemLogger } from "../../logging/subsystem.js";
import { isSweepError } from "../errors.js";
import { fileExists } from "../files.js";
import { readConfigDocument } from "../json-config.js";
import { DEFAULT_LAYOUT, resolveUnitPaths, type SweepLayout } from "../layout.js";
import { TrainParamsSchema, type DataType } from "../schema.js";
import {
  applyPatchRules,
  resolvePatchTarget,
  type CodegenFileRole,
  type PatchTarget,
} from "./rules.js";

export {
  applyPatchRules,
  insertLinkageGuards,
  PATCH_RULES,
  resolvePatchTarget,
} from "./rules.js";
export type { CodegenFileRole, PatchRule, PatchTarget } from "./rules.js";

const FILE_ROLES: readonly CodegenFileRole[] = [
  "graphSource",
  "graphHeader",
  "programSource",
  "programHeader",
];

export type PatchFileReport = {
  role: CodegenFileRole;
  path: string;
  status: "patched" | "unchanged" | "missing" | "failed";
  rules: string[];
};

export type PatchUnitResult = {
  ok: boolean;
  unitDir: string;
  dataType?: DataType;
  files: PatchFileReport[];
  warnings: string[];
  errors: string[];
};

async function resolveUnitTarget(
  trainParamsPath: string,
  override?: string,
): Promise<PatchTarget> {
  if (override !== undefined) {
    return resolvePatchTarget(override);
  }
  const params = await readConfigDocument(trainParamsPath, TrainParamsSchema);
  return resolvePatchTarget(params.instrType ?? "");
}

/**
 * Retargets one unit's generated sources to the unit's data type. Missing
 * sources are skipped with a warning. An unreadable or unknown type, or a
 * source that cannot be read or written, fails the unit.
 */
export async function patchGeneratedCode(params: {
  unitDir: string;
  layout?: SweepLayout;
  log: SubsystemLogger;
  /** Overrides the data type read from the unit's config. */
  dataType?: string;
}): Promise<PatchUnitResult> {
  const paths = resolveUnitPaths(params.unitDir, params.layout ?? DEFAULT_LAYOUT);
  const warnings: string[] = [];
  const errors: string[] = [];
  const files: PatchFileReport[] = [];

  if (params.dataType === undefined && !(await fileExists(paths.trainParams))) {
    errors.push(`Config not found: ${paths.trainParams}`);
    return { ok: false, unitDir: params.unitDir, files, warnings, errors };
  }

  let target: PatchTarget;
  try {
    target = await resolveUnitTarget(paths.trainParams, params.dataType);
  } catch (err) {
    const message = isSweepError(err) ? err.message : `Failed to read ${paths.trainParams}: ${String(err)}`;
    errors.push(message);
    params.log.error(message);
    return { ok: false, unitDir: params.unitDir, files, warnings, errors };
  }

  params.log.info(`patch ${params.unitDir} -> ${target.cType}`);

  for (const role of FILE_ROLES) {
    const filePath = paths.codegen[role];
    if (!(await fileExists(filePath))) {
      const warning = `${filePath} not found, skipping ${role} patch.`;
      warnings.push(warning);
      params.log.warn(warning);
      files.push({ role, path: filePath, status: "missing", rules: [] });
      continue;
    }
    try {
      const source = await fs.readFile(filePath, "utf-8");
      const { text, applied } = applyPatchRules(source, role, target);
      if (text !== source) {
        await fs.writeFile(filePath, text, "utf-8");
      }
      files.push({
        role,
        path: filePath,
        status: text !== source ? "patched" : "unchanged",
        rules: applied,
      });
    } catch (err) {
      const message = `Failed to patch ${filePath}: ${String(err)}`;
      errors.push(message);
      params.log.error(message);
      files.push({ role, path: filePath, status: "failed", rules: [] });
    }
  }

  return {
    ok: errors.length === 0,
    unitDir: params.unitDir,
    dataType: target.dataType,
    files,
    warnings,
    errors,
  };
}
