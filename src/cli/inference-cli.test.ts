import { Command } from "commander";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";

const runtime = {
  log: vi.fn((_message: string) => {}),
  error: vi.fn((_message: string) => {}),
  exit: vi.fn((_code: number) => {}),
};

vi.mock("../runtime.js", () => ({ defaultRuntime: runtime }));

const { registerInferenceCli } = await import("./inference-cli.js");

const TPG = "instrType-double_seed-0_useInstrTrig-True";

async function run(argv: string[]) {
  const program = new Command();
  registerInferenceCli(program);
  await program.parseAsync(argv, { from: "user" });
}

async function makeRoot(): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "tpg-sweep-cli-inf-"));
  await fs.mkdir(path.join(root, "training_results", TPG), { recursive: true });
  return root;
}

describe("cli/inference", () => {
  beforeEach(() => {
    runtime.log.mockClear();
    runtime.error.mockClear();
    runtime.exit.mockClear();
  });

  it("rejects unknown microarchitectures", async () => {
    const root = await makeRoot();

    await run(["inference-configs", "--root", root, "--uarch", "cv32e20_im0,z80"]);

    expect(runtime.error).toHaveBeenCalledWith("error: unknown microarchitecture(s): z80");
    expect(runtime.exit).toHaveBeenCalledWith(1);
    await expect(fs.stat(path.join(root, "training_results", TPG, "inference"))).rejects.toThrow();
  });

  it("writes configs, lists them as missing, then aggregates no results", async () => {
    const root = await makeRoot();
    const configsDir = path.join(root, "training_results", TPG, "inference", "configs");

    await run(["inference-configs", "--root", root, "--uarch", "cv32e20_im0", "--json"]);
    expect(runtime.exit).toHaveBeenLastCalledWith(0);
    expect(JSON.parse(runtime.log.mock.calls[0]?.[0] ?? "null")).toMatchObject({
      ok: true,
      written: [
        path.join(configsDir, "cv32e20_im0_rv32i_zicsr_ilp32_double.json"),
        path.join(configsDir, "cv32e20_im0_rv32ic_zicsr_ilp32_double.json"),
      ],
    });

    runtime.log.mockClear();
    const listFile = path.join(root, "resume.txt");
    await run(["missing", "--root", root, "--out", listFile]);
    const expected = [
      path.join(configsDir, "cv32e20_im0_rv32i_zicsr_ilp32_double.json"),
      path.join(configsDir, "cv32e20_im0_rv32ic_zicsr_ilp32_double.json"),
    ];
    expect(await fs.readFile(listFile, "utf-8")).toBe(`${expected.join("\n")}\n`);
    expect(runtime.log).toHaveBeenCalledWith(expected.join("\n"));
    expect(runtime.exit).toHaveBeenLastCalledWith(0);

    runtime.log.mockClear();
    const outDir = path.join(root, "results_out");
    await run(["latency", "--root", root, "--out", outDir, "--json"]);
    expect(JSON.parse(runtime.log.mock.calls[0]?.[0] ?? "null")).toMatchObject({
      files: 0,
      rows: 0,
      groups: 0,
      perSeedPath: path.join(outDir, "aggregated_tpg_results.csv"),
      averagedPath: path.join(outDir, "aggregated_averaged_tpg_results.csv"),
    });
    expect(runtime.exit).toHaveBeenLastCalledWith(0);
  });

  it("takes root, layout, mini and microarchitectures from --config", async () => {
    const root = await makeRoot();
    const configPath = path.join(root, "sweep.config.json5");
    await fs.writeFile(
      configPath,
      `{
  templateDir: "templates",
  sweep: { seeds: [0], instructionSets: [{ name: "A" }], dataTypes: ["double"] },
  containers: { trainer: { image: "t.sif" }, codegen: { image: "c.sif" } },
  inference: { mini: 1, microarchitectures: ["cv32e20_im0"] },
  layout: { inference: { configsDir: "cfgs" } },
}
`,
      "utf-8",
    );
    const expected = path.join(
      root,
      "training_results",
      TPG,
      "inference",
      "cfgs",
      "cv32e20_im0_rv32i_zicsr_ilp32_double.json",
    );

    await run(["inference-configs", "--config", configPath, "--json"]);
    expect(JSON.parse(runtime.log.mock.calls[0]?.[0] ?? "null")).toMatchObject({
      ok: true,
      written: [expected],
    });

    runtime.log.mockClear();
    await run(["missing", "--config", configPath]);
    expect(runtime.log).toHaveBeenCalledWith(expected);

    runtime.log.mockClear();
    await run(["inference-configs", "--config", configPath, "--mini", "0", "--json"]);
    expect(JSON.parse(runtime.log.mock.calls[0]?.[0] ?? "null")).toMatchObject({
      written: [expected, expected.replace("rv32i_zicsr", "rv32ic_zicsr")],
    });
  });

  it("fails when training_results is absent", async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "tpg-sweep-cli-inf-"));

    await run(["missing", "--root", root]);

    expect(runtime.error).toHaveBeenCalledWith(
      `error: Expected training_results under ${root}, not found.`,
    );
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });
});
