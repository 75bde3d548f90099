import path from "node:path";
import { describe, expect, it } from "vitest";
import { resolveInferencePaths, resolveUnitPaths } from "../layout.js";
import { TrainingResourcesSchema, type ExperimentUnit } from "../schema.js";
import { createLocalBackend, createSlurmBackend } from "./backends.js";
import {
  buildCodegenRequest,
  buildSimulationRequest,
  buildTrainRequest,
  computeTrainingWallTime,
  jobArgv,
} from "./request.js";
import { formatWallTime, shellQuote } from "./utils.js";

const unit: ExperimentUnit = {
  id: "u1",
  workDir: "/w/u1",
  tuple: { seed: 0, dataType: "double", instructionSet: { name: "A", flags: {} } },
  status: "created",
};
const trainer = { image: "/img/trainer.sif", command: ["/bin/train"] };

describe("sweep/dispatch/request", () => {
  it("adds the safety margin to time-bounded training", () => {
    expect(computeTrainingWallTime(TrainingResourcesSchema.parse({ timeSeconds: 3600 }))).toBe(5400);
    expect(
      computeTrainingWallTime(
        TrainingResourcesSchema.parse({ stopMode: "generations", generations: 10, timeSeconds: 60 }),
      ),
    ).toBe(72 * 3600);
  });

  it("formats slurm wall times", () => {
    expect(formatWallTime(5400)).toBe("01:30:00");
    expect(formatWallTime(72 * 3600)).toBe("3-00:00:00");
    expect(formatWallTime(59.2)).toBe("00:01:00");
  });

  it("wraps a training job in srun with its resource spec", () => {
    const request = buildTrainRequest({
      unit,
      paths: resolveUnitPaths(unit.workDir),
      training: TrainingResourcesSchema.parse({ cores: 4, memory: "8G", timeSeconds: 3600 }),
      container: trainer,
    });
    const backend = createSlurmBackend({ partition: "cpu", queueTimeoutSeconds: 60 });
    expect(backend.renderArgv(request)).toEqual([
      "srun",
      "--job-name=u1.train",
      "--cpus-per-task=4",
      "--mem=8G",
      "--time=01:30:00",
      "--chdir=/w/u1",
      "--partition=cpu",
      "apptainer",
      "exec",
      "--bind",
      `${path.join("/w/u1", "params")}:/params`,
      "--bind",
      `${path.join("/w/u1", "outLogs")}:/outLogs`,
      "/img/trainer.sif",
      "/bin/train",
    ]);
    expect(backend.timeoutMs(request)).toBe(5460 * 1000);
    expect(createLocalBackend().timeoutMs(request)).toBe(5400 * 1000);
  });

  it("gives code generation one cpu and a fixed wall time", () => {
    const request = buildCodegenRequest({
      unit,
      paths: resolveUnitPaths(unit.workDir),
      memory: "2G",
      container: { image: "/img/codegen.sif", command: [] },
    });
    expect(request.id).toBe("u1.codegen");
    expect(request.resourceSpec).toEqual({ cpus: 1, memory: "2G", wallTimeSeconds: 3600 });
    expect(jobArgv(request)).toEqual(request.command);
  });

  it("creates and removes an overlay around a simulation", () => {
    const tpgDir = path.join("/r", "training_results", "tpg-a");
    const request = buildSimulationRequest({
      config: { tpg: "tpg-a", uarch: "cv32e40p", isa: "rv32imc_zicsr", abi: "ilp32", dtype: "float" },
      compiler: "/opt/tools/riscv",
      unitPaths: resolveUnitPaths(tpgDir),
      inferencePaths: resolveInferencePaths(tpgDir),
      container: { image: "/img/sim.sif", command: ["run-sim"] },
      simulatorsMount: { hostPath: "/sims", containerPath: "/simulators" },
      resources: { cpus: 1, memory: "4G", wallTimeSeconds: 600 },
    });
    const overlay = path.join(tpgDir, "inference", "overlays", "overlay_cv32e40p_rv32imc_zicsr_ilp32_float.img");

    expect(request.id).toBe("tpg-a.cv32e40p_rv32imc_zicsr_ilp32_float");
    expect(request.command.slice(0, 4)).toEqual(["apptainer", "exec", "--overlay", overlay]);
    expect(request.command).toContain("/sims:/simulators:ro");
    expect(request.command).toContain(`${path.join(tpgDir, "inference")}:/inference`);
    expect(request.command.slice(-6)).toEqual([
      "run-sim",
      "cv32e40p",
      "rv32imc_zicsr",
      "ilp32",
      "FLOAT",
      "/opt/tools/riscv",
    ]);

    const [sh, flag, script = ""] = jobArgv(request);
    expect([sh, flag]).toEqual(["sh", "-c"]);
    expect(script.split("\n").slice(0, 3)).toEqual([
      "set -e",
      `trap ${shellQuote(`rm -f ${overlay}`)} EXIT`,
      `apptainer overlay create --size 512 ${overlay}`,
    ]);
  });

  it("quotes shell arguments that need it", () => {
    expect(shellQuote("plain/path-1.img")).toBe("plain/path-1.img");
    expect(shellQuote("it's here")).toBe("'it'\\''s here'");
    expect(shellQuote("")).toBe("''");
  });
});
