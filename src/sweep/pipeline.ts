import path from "node:path";
import type { SweepConfig } from "../config/config.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import type { RunCommand } from "../process/exec.js";
import { aggregateResults, writeResultsCsv, type AggregateResult } from "./aggregate.js";
import { resolveSchedulerBackend } from "./dispatch/backends.js";
import { JobDispatcher } from "./dispatch/dispatcher.js";
import {
  buildCodegenRequest,
  buildSimulationRequest,
  buildTrainRequest,
} from "./dispatch/request.js";
import type { JobOutcome, JobRequest } from "./dispatch/types.js";
import { SweepError } from "./errors.js";
import { expandParameterSpace } from "./expand.js";
import { fileExists } from "./files.js";
import { determineCompiler } from "./inference/combinations.js";
import { computeMissing, findMissingInferenceResults } from "./inference/reconcile.js";
import { readConfigDocument } from "./json-config.js";
import { resolveInferencePaths, resolveUnitPaths, type UnitPaths } from "./layout.js";
import { assertTemplateDir, computeUnitId, materializeUnit } from "./materialize.js";
import { patchGeneratedCode, type PatchUnitResult } from "./patch/index.js";
import { InferenceConfigSchema, type ExperimentUnit, type InferenceConfig } from "./schema.js";

export const RESULTS_FILE = "results.csv";

export type SweepDeps = {
  runCommand?: RunCommand;
};

export type SweepRunResult = {
  ok: boolean;
  dryRun: boolean;
  stopped: boolean;
  units: ExperimentUnit[];
  requests: JobRequest[];
  outcomes: JobOutcome[];
  patches: PatchUnitResult[];
  aggregate?: AggregateResult;
  resultsPath?: string;
  warnings: string[];
  errors: string[];
};

type UnitEntry = {
  unit: ExperimentUnit;
  paths: UnitPaths;
};

function forwardAbort(signal: AbortSignal | undefined, dispatcher: JobDispatcher): () => void {
  if (!signal) {
    return () => {};
  }
  const onAbort = () => dispatcher.stop("sweep stop requested");
  if (signal.aborted) {
    onAbort();
    return () => {};
  }
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}

function describeFailure(outcome: JobOutcome): string {
  if (outcome.status === "skipped") {
    return `${outcome.kind} ${outcome.requestId} skipped: sweep stopped`;
  }
  const detail =
    outcome.error ??
    (outcome.timedOut ? "timed out" : `exit=${String(outcome.exitCode ?? "unknown")}`);
  return `${outcome.kind} ${outcome.requestId} ${outcome.status}: ${detail}`;
}

/**
 * expand -> materialize -> train -> (codegen -> patch) per unit -> aggregate.
 * Unit failures are collected; only an invalid template aborts the sweep.
 */
export async function runSweep(params: {
  cfg: SweepConfig;
  dryRun?: boolean;
  /** Skip units whose metrics file and generated sources already exist. */
  resume?: boolean;
  signal?: AbortSignal;
  deps?: SweepDeps;
  log?: SubsystemLogger;
}): Promise<SweepRunResult> {
  const { cfg } = params;
  const log = params.log ?? createSubsystemLogger("sweep/pipeline");
  const dryRun = Boolean(params.dryRun);
  const warnings: string[] = [];
  const errors: string[] = [];
  const patches: PatchUnitResult[] = [];
  const outcomes: JobOutcome[] = [];
  const requests: JobRequest[] = [];

  await assertTemplateDir(cfg.templateDir, cfg.layout);

  const tuples = expandParameterSpace(cfg.sweep);
  log.info(`expanded ${tuples.length} parameter tuples`);

  const entries: UnitEntry[] = [];
  const plannedIds = new Map<string, string>();
  for (const tuple of tuples) {
    const id = computeUnitId(tuple);
    const owner = plannedIds.get(id);
    if (owner !== undefined) {
      warnings.push(
        `Unit ${id} is already planned for instruction set ${owner}; skipping ${tuple.instructionSet.name}.`,
      );
      continue;
    }
    plannedIds.set(id, tuple.instructionSet.name);
    try {
      const res = await materializeUnit(tuple, {
        outDir: cfg.outDir,
        templateDir: cfg.templateDir,
        training: cfg.training,
        layout: cfg.layout,
        customResourceConfig: cfg.customResourceConfig,
        log: log.child("materialize"),
      });
      warnings.push(...res.warnings);
      entries.push({ unit: res.unit, paths: res.paths });
    } catch (err) {
      errors.push(
        `materialize seed=${tuple.seed} ${tuple.instructionSet.name}/${tuple.dataType}: ${String(err)}`,
      );
    }
  }

  let pending = entries;
  if (params.resume) {
    const expected = new Map(entries.map((entry) => [entry.unit.id, entry]));
    const done: string[] = [];
    for (const entry of entries) {
      const trained = await fileExists(entry.paths.trainingLog);
      if (trained && (await fileExists(entry.paths.codegen.graphSource))) {
        entry.unit.status = "completed";
        done.push(entry.unit.id);
      }
    }
    pending = computeMissing(expected, done);
    log.info(`resume: ${done.length} units already done, ${pending.length} to run`);
  }

  const dispatcher = new JobDispatcher({
    backend: resolveSchedulerBackend(cfg.scheduler),
    log: log.child("dispatch"),
    runCommand: params.deps?.runCommand,
    config: { maxInFlight: cfg.scheduler.maxInFlight, dryRun },
  });
  const release = forwardAbort(params.signal, dispatcher);

  const byRequest = new Map<string, UnitEntry>();
  const trainRequests = pending.map((entry) => {
    const request = buildTrainRequest({
      unit: entry.unit,
      paths: entry.paths,
      training: cfg.training,
      container: cfg.containers.trainer,
    });
    byRequest.set(request.id, entry);
    return request;
  });
  requests.push(...trainRequests);

  const afterTraining = async (entry: UnitEntry) => {
    const codegen = buildCodegenRequest({
      unit: entry.unit,
      paths: entry.paths,
      memory: cfg.training.memory,
      container: cfg.containers.codegen,
    });
    requests.push(codegen);
    const outcome = await dispatcher.run(codegen);
    outcomes.push(outcome);
    if (outcome.status === "dry_run") {
      return;
    }
    if (outcome.status !== "completed") {
      entry.unit.status = "failed";
      errors.push(describeFailure(outcome));
      return;
    }
    // patching waits only for this unit's own generated sources
    const patched = await patchGeneratedCode({
      unitDir: entry.unit.workDir,
      layout: cfg.layout,
      log: log.child("patch"),
    });
    patches.push(patched);
    warnings.push(...patched.warnings);
    errors.push(...patched.errors);
    entry.unit.status = patched.ok ? "completed" : "failed";
  };

  try {
    for (const entry of pending) {
      if (!dryRun) {
        entry.unit.status = "submitted";
      }
    }
    await dispatcher.dispatchAll(trainRequests, {
      onStart: (request) => {
        const entry = byRequest.get(request.id);
        if (entry) {
          entry.unit.status = "running";
        }
      },
      onFinish: async (outcome, request) => {
        outcomes.push(outcome);
        const entry = byRequest.get(request.id);
        if (!entry) {
          return;
        }
        switch (outcome.status) {
          case "completed":
          case "dry_run":
            try {
              await afterTraining(entry);
            } catch (err) {
              entry.unit.status = "failed";
              errors.push(`unit ${entry.unit.id} failed after training: ${String(err)}`);
            }
            return;
          case "skipped":
            entry.unit.status = "created";
            return;
          case "failed":
          case "stopped":
            entry.unit.status = "failed";
            errors.push(describeFailure(outcome));
            return;
        }
      },
    });
  } finally {
    release();
  }

  const units = entries.map((entry) => entry.unit);
  const result: SweepRunResult = {
    ok: false,
    dryRun,
    stopped: dispatcher.stopped,
    units,
    requests,
    outcomes,
    patches,
    warnings,
    errors,
  };

  if (!dryRun) {
    // barrier: every dispatched unit has finished before this point
    const completed = units.filter((unit) => unit.status === "completed").map((unit) => unit.workDir);
    const aggregate = await aggregateResults({
      unitDirs: completed,
      layout: cfg.layout,
      log: log.child("aggregate"),
    });
    const resultsPath = path.join(cfg.outDir, RESULTS_FILE);
    await writeResultsCsv(resultsPath, aggregate.table);
    warnings.push(...aggregate.warnings);
    result.aggregate = aggregate;
    result.resultsPath = resultsPath;
    log.info(
      `aggregated ${aggregate.included.length}/${completed.length} completed units into ${resultsPath}`,
    );
  }

  result.ok = errors.length === 0 && !dispatcher.stopped;
  return result;
}

export type InferenceRunResult = {
  ok: boolean;
  dryRun: boolean;
  stopped: boolean;
  missing: number;
  requests: JobRequest[];
  outcomes: JobOutcome[];
  warnings: string[];
  errors: string[];
};

async function readInferenceConfig(
  configPath: string,
  warnings: string[],
): Promise<InferenceConfig | null> {
  try {
    return await readConfigDocument(configPath, InferenceConfigSchema);
  } catch (err) {
    warnings.push(`Invalid inference config ${configPath}: ${String(err)}`);
    return null;
  }
}

/** Simulates every inference config that has no result yet. */
export async function runInferenceSweep(params: {
  cfg: SweepConfig;
  root?: string;
  dryRun?: boolean;
  signal?: AbortSignal;
  deps?: SweepDeps;
  log?: SubsystemLogger;
}): Promise<InferenceRunResult> {
  const { cfg } = params;
  const log = params.log ?? createSubsystemLogger("sweep/inference");
  const simulator = cfg.containers.simulator;
  if (!simulator) {
    throw new SweepError("ConfigInvalid", "containers.simulator is required for inference runs");
  }
  const dryRun = Boolean(params.dryRun);
  const warnings: string[] = [];
  const errors: string[] = [];

  const { missing } = await findMissingInferenceResults({
    root: params.root ?? cfg.projectRoot,
    layout: cfg.layout,
  });
  log.info(`${missing.length} inference configs without results`);

  const requests: JobRequest[] = [];
  for (const entry of missing) {
    const config = await readInferenceConfig(entry.configPath, warnings);
    if (!config) {
      continue;
    }
    requests.push(
      buildSimulationRequest({
        config,
        compiler: config.compiler ?? determineCompiler(config.isa),
        unitPaths: resolveUnitPaths(entry.tpgDir, cfg.layout),
        inferencePaths: resolveInferencePaths(entry.tpgDir, cfg.layout),
        container: simulator,
        simulatorsMount: {
          hostPath: cfg.inference.simulatorsDir,
          containerPath: cfg.inference.simulatorsMountPath,
        },
        resources: {
          cpus: cfg.inference.cpus,
          memory: cfg.inference.memory,
          wallTimeSeconds: cfg.inference.wallTimeSeconds,
        },
      }),
    );
  }
  for (const warning of warnings) {
    log.warn(warning);
  }

  const dispatcher = new JobDispatcher({
    backend: resolveSchedulerBackend(cfg.scheduler),
    log: log.child("dispatch"),
    runCommand: params.deps?.runCommand,
    config: { maxInFlight: cfg.scheduler.maxInFlight, dryRun },
  });
  const release = forwardAbort(params.signal, dispatcher);
  let outcomes: JobOutcome[];
  try {
    outcomes = await dispatcher.dispatchAll(requests);
  } finally {
    release();
  }
  for (const outcome of outcomes) {
    if (outcome.status === "failed" || outcome.status === "stopped") {
      errors.push(describeFailure(outcome));
    }
  }

  return {
    ok: errors.length === 0 && !dispatcher.stopped,
    dryRun,
    stopped: dispatcher.stopped,
    missing: missing.length,
    requests,
    outcomes,
    warnings,
    errors,
  };
}
