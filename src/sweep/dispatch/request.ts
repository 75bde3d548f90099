import path from "node:path";
import type { InferencePaths, UnitPaths } from "../layout.js";
import type { ExperimentUnit, InferenceConfig, TrainingResources } from "../schema.js";
import type { BindMount, ContainerSpec, JobRequest, ResourceSpec } from "./types.js";
import { shellJoin, shellQuote } from "./utils.js";

/**
 * The trainer only checks its time budget between generations, so a
 * time-bounded run can overshoot by up to one generation.
 */
export const WALLTIME_SAFETY_MARGIN_SECONDS = 30 * 60;

/** Hard cap for generation-bounded runs, whose duration is unknown up front. */
export const GENERATION_STOP_WALLTIME_SECONDS = 72 * 3600;

export const CODEGEN_WALLTIME_SECONDS = 3600;

export const OVERLAY_SIZE_MB = 512;

export const CONTAINER_PARAMS_DIR = "/params";
export const CONTAINER_OUTLOGS_DIR = "/outLogs";
export const CONTAINER_INFERENCE_DIR = "/inference";

export function computeTrainingWallTime(training: TrainingResources): number {
  if (training.stopMode === "time") {
    return training.timeSeconds + WALLTIME_SAFETY_MARGIN_SECONDS;
  }
  return GENERATION_STOP_WALLTIME_SECONDS;
}

export function unitBindMounts(paths: UnitPaths): BindMount[] {
  return [
    { hostPath: paths.paramsDir, containerPath: CONTAINER_PARAMS_DIR },
    { hostPath: paths.outLogsDir, containerPath: CONTAINER_OUTLOGS_DIR },
  ];
}

export function containerArgv(params: {
  container: ContainerSpec;
  bindMounts: BindMount[];
  overlay?: string;
  args?: string[];
}): string[] {
  const argv = ["apptainer", "exec"];
  if (params.overlay) {
    argv.push("--overlay", params.overlay);
  }
  for (const bind of params.bindMounts) {
    argv.push("--bind", `${bind.hostPath}:${bind.containerPath}${bind.readOnly ? ":ro" : ""}`);
  }
  argv.push(params.container.image, ...params.container.command, ...(params.args ?? []));
  return argv;
}

export function buildTrainRequest(params: {
  unit: ExperimentUnit;
  paths: UnitPaths;
  training: TrainingResources;
  container: ContainerSpec;
}): JobRequest {
  const bindMounts = unitBindMounts(params.paths);
  return {
    id: `${params.unit.id}.train`,
    kind: "train",
    command: containerArgv({ container: params.container, bindMounts }),
    resourceSpec: {
      cpus: params.training.cores,
      memory: params.training.memory,
      wallTimeSeconds: computeTrainingWallTime(params.training),
    },
    bindMounts,
    workDir: params.unit.workDir,
    setup: [],
    cleanup: [],
  };
}

export function buildCodegenRequest(params: {
  unit: ExperimentUnit;
  paths: UnitPaths;
  memory: string;
  container: ContainerSpec;
}): JobRequest {
  const bindMounts = unitBindMounts(params.paths);
  return {
    id: `${params.unit.id}.codegen`,
    kind: "codegen",
    command: containerArgv({ container: params.container, bindMounts }),
    resourceSpec: { cpus: 1, memory: params.memory, wallTimeSeconds: CODEGEN_WALLTIME_SECONDS },
    bindMounts,
    workDir: params.unit.workDir,
    setup: [],
    cleanup: [],
  };
}

export function inferenceKeyName(config: Pick<InferenceConfig, "uarch" | "isa" | "abi" | "dtype">) {
  return `${config.uarch}_${config.isa}_${config.abi}_${config.dtype}`;
}

export function buildSimulationRequest(params: {
  config: InferenceConfig;
  compiler: string;
  unitPaths: UnitPaths;
  inferencePaths: InferencePaths;
  container: ContainerSpec;
  simulatorsMount: BindMount;
  resources: ResourceSpec;
}): JobRequest {
  const key = inferenceKeyName(params.config);
  const overlay = path.join(params.inferencePaths.overlaysDir, `overlay_${key}.img`);
  const bindMounts: BindMount[] = [
    ...unitBindMounts(params.unitPaths),
    { hostPath: params.inferencePaths.inferenceDir, containerPath: CONTAINER_INFERENCE_DIR },
    { ...params.simulatorsMount, readOnly: true },
  ];
  return {
    id: `${path.basename(params.inferencePaths.tpgDir)}.${key}`,
    kind: "simulate",
    command: containerArgv({
      container: params.container,
      bindMounts,
      overlay,
      args: [
        params.config.uarch,
        params.config.isa,
        params.config.abi,
        params.config.dtype.toUpperCase(),
        params.compiler,
      ],
    }),
    resourceSpec: params.resources,
    bindMounts,
    workDir: params.inferencePaths.tpgDir,
    setup: [["apptainer", "overlay", "create", "--size", String(OVERLAY_SIZE_MB), overlay]],
    cleanup: [["rm", "-f", overlay]],
  };
}

/** The argv a backend wraps: the bare command, or a shell script when steps are attached. */
export function jobArgv(request: JobRequest): string[] {
  if (request.setup.length === 0 && request.cleanup.length === 0) {
    return [...request.command];
  }
  const lines = ["set -e"];
  if (request.cleanup.length > 0) {
    lines.push(`trap ${shellQuote(request.cleanup.map(shellJoin).join("; "))} EXIT`);
  }
  lines.push(...request.setup.map(shellJoin), shellJoin(request.command));
  return ["sh", "-c", lines.join("\n")];
}
