import type { UnitStatus } from "../schema.js";

export type JobKind = "train" | "codegen" | "simulate";

export type ResourceSpec = {
  cpus: number;
  /** Scheduler memory string, e.g. "8G". */
  memory: string;
  wallTimeSeconds: number;
};

export type BindMount = {
  hostPath: string;
  containerPath: string;
  readOnly?: boolean;
};

export type ContainerSpec = {
  image: string;
  command: string[];
};

export type JobRequest = {
  id: string;
  kind: JobKind;
  /** Container invocation, without setup/cleanup steps. */
  command: string[];
  resourceSpec: ResourceSpec;
  bindMounts: BindMount[];
  workDir: string;
  /** Host-side steps run in the same job before and after `command`. */
  setup: string[][];
  cleanup: string[][];
};

/**
 * `stopped`: killed in flight by a stop request. `skipped`: never started
 * because the dispatcher was already stopped.
 */
export type JobOutcomeStatus =
  | Extract<UnitStatus, "completed" | "failed">
  | "dry_run"
  | "stopped"
  | "skipped";

export type JobOutcome = {
  requestId: string;
  kind: JobKind;
  status: JobOutcomeStatus;
  argv: string[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  exitCode?: number | null;
  timedOut?: boolean;
  stdoutTail?: string;
  stderrTail?: string;
  error?: string;
};

export type SchedulerBackend = {
  name: string;
  /** Full argv handed to the process runner. */
  renderArgv: (request: JobRequest) => string[];
  /** Upper bound on how long the runner waits for this request. */
  timeoutMs: (request: JobRequest) => number;
};
