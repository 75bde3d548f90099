import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

/**
 * Every relative path the sweep reads or writes. External tools depend on
 * these names; change them here and nowhere else.
 */
export const SweepLayoutSchema = z
  .object({
    unit: z
      .object({
        paramsDir: z.string().min(1).default("params"),
        outLogsDir: z.string().min(1).default("outLogs"),
        dotfilesDir: z.string().min(1).default("dotfiles"),
        trainParamsFile: z.string().min(1).default("trainParams.json"),
        resourceParamsFile: z.string().min(1).default("params.json"),
        trainingLogFile: z.string().min(1).default("garbage.ods"),
        codegenDir: z.string().min(1).default("CodeGen"),
        codegenBaseName: z.string().min(1).default("codeGenArmlearn"),
      })
      .strip()
      .default({}),
    inference: z
      .object({
        trainingResultsDir: z.string().min(1).default("training_results"),
        inferenceDir: z.string().min(1).default("inference"),
        configsDir: z.string().min(1).default("configs"),
        resultsDir: z.string().min(1).default("results"),
        overlaysDir: z.string().min(1).default("overlays"),
        expeDir: z.string().min(1).default("tpg_inference_expe"),
      })
      .strip()
      .default({}),
  })
  .strip();
export type SweepLayout = z.infer<typeof SweepLayoutSchema>;
export type SweepLayoutInput = z.input<typeof SweepLayoutSchema>;

export const DEFAULT_LAYOUT: SweepLayout = SweepLayoutSchema.parse({});

export type UnitPaths = {
  unitDir: string;
  paramsDir: string;
  outLogsDir: string;
  dotfilesDir: string;
  trainParams: string;
  resourceParams: string;
  trainingLog: string;
  codegenDir: string;
  codegen: {
    graphSource: string;
    graphHeader: string;
    programSource: string;
    programHeader: string;
  };
};

export function resolveUnitPaths(unitDir: string, layout: SweepLayout = DEFAULT_LAYOUT): UnitPaths {
  const u = layout.unit;
  const paramsDir = path.join(unitDir, u.paramsDir);
  const outLogsDir = path.join(unitDir, u.outLogsDir);
  const codegenDir = path.join(outLogsDir, u.codegenDir);
  const base = u.codegenBaseName;
  return {
    unitDir,
    paramsDir,
    outLogsDir,
    dotfilesDir: path.join(outLogsDir, u.dotfilesDir),
    trainParams: path.join(paramsDir, u.trainParamsFile),
    resourceParams: path.join(paramsDir, u.resourceParamsFile),
    trainingLog: path.join(outLogsDir, u.trainingLogFile),
    codegenDir,
    codegen: {
      graphSource: path.join(codegenDir, `${base}.c`),
      graphHeader: path.join(codegenDir, `${base}.h`),
      programSource: path.join(codegenDir, `${base}_program.c`),
      programHeader: path.join(codegenDir, `${base}_program.h`),
    },
  };
}

export async function createUnitLayout(
  unitDir: string,
  layout: SweepLayout = DEFAULT_LAYOUT,
): Promise<UnitPaths> {
  const paths = resolveUnitPaths(unitDir, layout);
  await fs.mkdir(paths.paramsDir, { recursive: true });
  await fs.mkdir(paths.dotfilesDir, { recursive: true });
  return paths;
}

export type InferencePaths = {
  tpgDir: string;
  inferenceDir: string;
  configsDir: string;
  resultsDir: string;
  overlaysDir: string;
  expeDir: string;
};

export function resolveTrainingResultsDir(root: string, layout: SweepLayout = DEFAULT_LAYOUT) {
  return path.join(root, layout.inference.trainingResultsDir);
}

export function resolveInferencePaths(
  tpgDir: string,
  layout: SweepLayout = DEFAULT_LAYOUT,
): InferencePaths {
  const inf = layout.inference;
  const inferenceDir = path.join(tpgDir, inf.inferenceDir);
  return {
    tpgDir,
    inferenceDir,
    configsDir: path.join(inferenceDir, inf.configsDir),
    resultsDir: path.join(inferenceDir, inf.resultsDir),
    overlaysDir: path.join(inferenceDir, inf.overlaysDir),
    expeDir: path.join(inferenceDir, inf.expeDir),
  };
}

export async function createInferenceLayout(
  tpgDir: string,
  layout: SweepLayout = DEFAULT_LAYOUT,
): Promise<InferencePaths> {
  const paths = resolveInferencePaths(tpgDir, layout);
  for (const dir of [paths.configsDir, paths.resultsDir, paths.overlaysDir, paths.expeDir]) {
    await fs.mkdir(dir, { recursive: true });
  }
  return paths;
}

function segmentDepth(relative: string): number {
  return relative.split(/[\\/]+/).filter(Boolean).length;
}

/**
 * Owning TPG directory of a file stored under
 * `<tpg>/<inferenceDir>/<configsDir|resultsDir>/<file>`. The walk depth is
 * derived from the layout instead of being hard-coded.
 */
export function resolveTpgDirOfInferenceFile(
  filePath: string,
  kind: "configs" | "results",
  layout: SweepLayout = DEFAULT_LAYOUT,
): string {
  const inf = layout.inference;
  const leaf = kind === "configs" ? inf.configsDir : inf.resultsDir;
  const depth = segmentDepth(inf.inferenceDir) + segmentDepth(leaf) + 1;
  let dir = filePath;
  for (let i = 0; i < depth; i += 1) {
    dir = path.dirname(dir);
  }
  return dir;
}
