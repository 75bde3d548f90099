import type { JobRequest, SchedulerBackend } from "./types.js";
import { jobArgv } from "./request.js";
import { formatWallTime } from "./utils.js";

export type SchedulerBackendName = "slurm" | "local";

export function createSlurmBackend(opts: {
  partition?: string;
  /** Extra time allowed for the job to sit in the queue. */
  queueTimeoutSeconds: number;
}): SchedulerBackend {
  return {
    name: "slurm",
    renderArgv: (request: JobRequest) => {
      const spec = request.resourceSpec;
      const argv = [
        "srun",
        `--job-name=${request.id}`,
        `--cpus-per-task=${spec.cpus}`,
        `--mem=${spec.memory}`,
        `--time=${formatWallTime(spec.wallTimeSeconds)}`,
        `--chdir=${request.workDir}`,
      ];
      if (opts.partition?.trim()) {
        argv.push(`--partition=${opts.partition.trim()}`);
      }
      argv.push(...jobArgv(request));
      return argv;
    },
    timeoutMs: (request) =>
      (request.resourceSpec.wallTimeSeconds + Math.max(0, opts.queueTimeoutSeconds)) * 1000,
  };
}

export function createLocalBackend(): SchedulerBackend {
  return {
    name: "local",
    renderArgv: (request) => jobArgv(request),
    timeoutMs: (request) => request.resourceSpec.wallTimeSeconds * 1000,
  };
}

export function resolveSchedulerBackend(params: {
  backend: SchedulerBackendName;
  partition?: string;
  queueTimeoutSeconds: number;
}): SchedulerBackend {
  if (params.backend === "slurm") {
    return createSlurmBackend({
      partition: params.partition,
      queueTimeoutSeconds: params.queueTimeoutSeconds,
    });
  }
  return createLocalBackend();
}
