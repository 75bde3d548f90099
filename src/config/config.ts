import fs from "node:fs";
import path from "node:path";
import JSON5 from "json5";
import { z } from "zod";
import { RESERVED_TUPLE_KEYS } from "../sweep/materialize.js";
import { SweepError } from "../sweep/errors.js";
import { MICROARCHITECTURES } from "../sweep/inference/combinations.js";
import { SweepLayoutSchema } from "../sweep/layout.js";
import { SweepDimensionsSchema, TrainingResourcesSchema } from "../sweep/schema.js";
import { resolveUserPath } from "../utils.js";

export const DEFAULT_CONFIG_FILE = "sweep.config.json5";
export const CONFIG_PATH_ENV = "TPG_SWEEP_CONFIG";

const ContainerSchema = z
  .object({
    image: z.string().min(1),
    command: z.array(z.string().min(1)).default([]),
  })
  .strip();

const SchedulerSchema = z
  .object({
    backend: z.enum(["slurm", "local"]).default("slurm"),
    partition: z.string().min(1).optional(),
    maxInFlight: z.number().int().positive().default(8),
    /** Added to a job's wall time while waiting on `srun`. */
    queueTimeoutSeconds: z.number().int().nonnegative().default(0),
  })
  .strip();

const InferenceSettingsSchema = z
  .object({
    /** Truncates the flattened inference product; 0 keeps everything. */
    mini: z.number().int().nonnegative().default(0),
    microarchitectures: z.array(z.string().min(1)).optional(),
    simulatorsDir: z.string().min(1).default("x-heep/experimentations/microarchitectures/simulators"),
    simulatorsMountPath: z
      .string()
      .min(1)
      .default("/x-heep/experimentations/microarchitectures/simulators"),
    cpus: z.number().int().positive().default(1),
    memory: z.string().min(1).default("4G"),
    wallTimeSeconds: z.number().int().positive().default(3600),
  })
  .strip();

export const SweepConfigSchema = z
  .object({
    projectRoot: z.string().min(1).default("."),
    outDir: z.string().min(1).optional(),
    templateDir: z.string().min(1),
    customResourceConfig: z.string().min(1).optional(),
    sweep: SweepDimensionsSchema,
    training: TrainingResourcesSchema.default({}),
    scheduler: SchedulerSchema.default({}),
    containers: z
      .object({
        trainer: ContainerSchema,
        codegen: ContainerSchema,
        simulator: ContainerSchema.optional(),
      })
      .strip(),
    inference: InferenceSettingsSchema.default({}),
    layout: SweepLayoutSchema.default({}),
  })
  .strip()
  .superRefine((cfg, ctx) => {
    const names = new Set<string>();
    const flagSets = new Map<string, string>();
    cfg.sweep.instructionSets.forEach((set, idx) => {
      // the set name is not part of the unit id, so equal flags mean equal units
      const signature = JSON.stringify(
        Object.entries(set.flags).toSorted(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
      );
      const sameFlags = flagSets.get(signature);
      if (sameFlags !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sweep", "instructionSets", idx, "flags"],
          message: `instruction set ${set.name} has the same flags as ${sameFlags}`,
        });
      } else {
        flagSets.set(signature, set.name);
      }
      if (names.has(set.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sweep", "instructionSets", idx, "name"],
          message: `duplicate instruction set name: ${set.name}`,
        });
      }
      names.add(set.name);
      for (const flag of Object.keys(set.flags)) {
        if (RESERVED_TUPLE_KEYS.has(flag)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["sweep", "instructionSets", idx, "flags", flag],
            message: `flag name collides with a reserved config key: ${flag}`,
          });
        }
      }
    });
    const knownUarchs = new Set(MICROARCHITECTURES.map((spec) => spec.uarch));
    cfg.inference.microarchitectures?.forEach((uarch, idx) => {
      if (!knownUarchs.has(uarch)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["inference", "microarchitectures", idx],
          message: `unknown microarchitecture: ${uarch}`,
        });
      }
    });
    if (cfg.training.stopMode === "generations" && cfg.training.generations === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["training", "generations"],
        message: "generations is required when stopMode is \"generations\"",
      });
    }
  });
export type SweepConfigInput = z.input<typeof SweepConfigSchema>;
type ParsedSweepConfig = z.infer<typeof SweepConfigSchema>;

/** Sweep configuration with every path made absolute. */
export type SweepConfig = ParsedSweepConfig & {
  configPath?: string;
  outDir: string;
};

export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

/**
 * Validates a raw config document. Relative paths resolve against
 * `baseDir`, which is the config file's directory when loaded from disk.
 */
export function parseSweepConfig(raw: unknown, baseDir: string, configPath?: string): SweepConfig {
  const parsed = SweepConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error);
    throw new SweepError(
      "ConfigInvalid",
      `Invalid sweep config${configPath ? ` (${configPath})` : ""}:\n${issues
        .map((line) => `- ${line}`)
        .join("\n")}`,
    );
  }
  const cfg = parsed.data;
  const resolve = (p: string, from: string) =>
    path.isAbsolute(p) || p.startsWith("~") ? resolveUserPath(p) : path.resolve(from, p);
  const projectRoot = resolve(cfg.projectRoot, baseDir);
  return {
    ...cfg,
    configPath,
    projectRoot,
    outDir: cfg.outDir
      ? resolve(cfg.outDir, projectRoot)
      : path.join(projectRoot, cfg.layout.inference.trainingResultsDir),
    templateDir: resolve(cfg.templateDir, projectRoot),
    customResourceConfig: cfg.customResourceConfig
      ? resolve(cfg.customResourceConfig, projectRoot)
      : undefined,
    inference: {
      ...cfg.inference,
      simulatorsDir: resolve(cfg.inference.simulatorsDir, projectRoot),
    },
  };
}

export function resolveConfigPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const fromEnv = env[CONFIG_PATH_ENV]?.trim();
  if (explicit?.trim()) {
    return resolveUserPath(explicit);
  }
  if (fromEnv) {
    return resolveUserPath(fromEnv);
  }
  return path.join(cwd, DEFAULT_CONFIG_FILE);
}

export function loadConfig(opts?: {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): SweepConfig {
  const configPath = resolveConfigPath(opts?.configPath, opts?.env, opts?.cwd);
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new SweepError("ConfigInvalid", `Cannot read sweep config ${configPath}: ${String(err)}`, {
      cause: err,
    });
  }
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (err) {
    throw new SweepError("ConfigInvalid", `Cannot parse sweep config ${configPath}: ${String(err)}`, {
      cause: err,
    });
  }
  return parseSweepConfig(raw, path.dirname(configPath), configPath);
}
