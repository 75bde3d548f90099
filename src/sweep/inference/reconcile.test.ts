import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { isSweepError } from "../errors.js";
import {
  computeMissing,
  findMissingInferenceResults,
  generateInferenceConfigs,
  planInferenceConfigs,
  renderResumeList,
} from "./reconcile.js";

const log = createSubsystemLogger("test/reconcile");

const DOUBLE_TPG = "instrType-double_seed-0_useInstrTrig-True";
const FLOAT_TPG = "instrType-float_seed-0_useInstrTrig-True";

async function makeRoot(tpgNames: string[]): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "tpg-sweep-reconcile-"));
  for (const name of tpgNames) {
    await fs.mkdir(path.join(root, "training_results", name), { recursive: true });
  }
  return root;
}

describe("sweep/inference/reconcile", () => {
  it("writes one config per valid combination and skips unreadable TPG names", async () => {
    const root = await makeRoot([DOUBLE_TPG, FLOAT_TPG, "badname"]);

    const res = await generateInferenceConfigs({ root, log });

    expect(res.written).toHaveLength(36 + 40);
    expect(res.skippedTpgs).toEqual([path.join(root, "training_results", "badname")]);
    expect(res.errors).toEqual(["Cannot detect data type from TPG directory name: badname"]);

    const tpgDir = path.join(root, "training_results", DOUBLE_TPG);
    const configPath = path.join(tpgDir, "inference", "configs", "cv32e20_im0_rv32i_zicsr_ilp32_double.json");
    expect(JSON.parse(await fs.readFile(configPath, "utf-8"))).toEqual({
      tpg: DOUBLE_TPG,
      uarch: "cv32e20_im0",
      isa: "rv32i_zicsr",
      abi: "ilp32",
      dtype: "double",
      compiler: "/opt/tools/riscv",
    });
    for (const dir of ["results", "overlays", "tpg_inference_expe"]) {
      expect((await fs.stat(path.join(tpgDir, "inference", dir))).isDirectory()).toBe(true);
    }
  });

  it("truncates the flattened product in mini mode", () => {
    const tpgDirs = [path.join("/r", "training_results", DOUBLE_TPG), path.join("/r", "training_results", FLOAT_TPG)];
    const plan = planInferenceConfigs({ tpgDirs, mini: 3 });
    expect(plan.planned.map((p) => `${path.basename(p.tpgDir)}:${p.key.uarch}:${p.key.isa}`)).toEqual([
      `${DOUBLE_TPG}:cv32e20_im0:rv32i_zicsr`,
      `${DOUBLE_TPG}:cv32e20_im0:rv32ic_zicsr`,
      `${DOUBLE_TPG}:cv32e20_im1:rv32im_zicsr`,
    ]);
    expect(planInferenceConfigs({ tpgDirs }).planned).toHaveLength(76);
  });

  it("lists the configs whose results are missing", async () => {
    const root = await makeRoot([FLOAT_TPG]);
    const tpgDir = path.join(root, "training_results", FLOAT_TPG);
    const configsDir = path.join(tpgDir, "inference", "configs");
    const resultsDir = path.join(tpgDir, "inference", "results");
    await fs.mkdir(configsDir, { recursive: true });
    await fs.mkdir(resultsDir, { recursive: true });
    const stems = ["k1", "k2", "k3", "k4", "k5"];
    for (const stem of stems) {
      await fs.writeFile(path.join(configsDir, `${stem}.json`), "{}", "utf-8");
    }
    for (const stem of ["k1", "k3", "k5"]) {
      await fs.writeFile(path.join(resultsDir, `${stem}.json`), "{}", "utf-8");
    }

    const res = await findMissingInferenceResults({ root });

    expect(res.configCount).toBe(5);
    expect(res.resultCount).toBe(3);
    expect(res.missing).toEqual([
      { configPath: path.join(configsDir, "k2.json"), tpgDir },
      { configPath: path.join(configsDir, "k4.json"), tpgDir },
    ]);
    expect(renderResumeList(res.missing.map((m) => m.configPath))).toBe(
      `${path.join(configsDir, "k2.json")}\n${path.join(configsDir, "k4.json")}\n`,
    );
  });

  it("treats a result in another TPG as not matching", async () => {
    const root = await makeRoot([DOUBLE_TPG, FLOAT_TPG]);
    const a = path.join(root, "training_results", DOUBLE_TPG, "inference");
    const b = path.join(root, "training_results", FLOAT_TPG, "inference");
    await fs.mkdir(path.join(a, "configs"), { recursive: true });
    await fs.mkdir(path.join(b, "results"), { recursive: true });
    await fs.writeFile(path.join(a, "configs", "k.json"), "{}", "utf-8");
    await fs.writeFile(path.join(b, "results", "k.json"), "{}", "utf-8");

    const res = await findMissingInferenceResults({ root });
    expect(res.missing.map((m) => m.configPath)).toEqual([path.join(a, "configs", "k.json")]);
  });

  it("satisfies Missing = Expected - Actual at the extremes", () => {
    const expected = new Map([
      ["a", "cfg-a"],
      ["b", "cfg-b"],
    ]);
    expect(computeMissing(expected, ["a", "b"])).toEqual([]);
    expect(computeMissing(expected, [])).toEqual(["cfg-a", "cfg-b"]);
    expect(computeMissing(expected, ["b", "zz"])).toEqual(["cfg-a"]);
  });

  it("filters blank lines from the resume list", () => {
    expect(renderResumeList(["a", "", "  ", "b"])).toBe("a\nb\n");
    expect(renderResumeList([])).toBe("");
  });

  it("requires a training results directory", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "tpg-sweep-reconcile-"));
    const err = await findMissingInferenceResults({ root }).catch((e: unknown) => e);
    expect(isSweepError(err, "ArtifactMissing")).toBe(true);
  });
});
