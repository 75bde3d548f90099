import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { resolveUnitPaths } from "../layout.js";
import { patchGeneratedCode } from "./index.js";

const log = createSubsystemLogger("test/patch");
const fixturesDir = fileURLToPath(new URL("./fixtures/", import.meta.url));

async function makeUnit(trainParams: Record<string, unknown> | null, files: string[]) {
  const unitDir = await fs.mkdtemp(path.join(os.tmpdir(), "tpg-sweep-patch-"));
  const paths = resolveUnitPaths(unitDir);
  await fs.mkdir(paths.paramsDir, { recursive: true });
  await fs.mkdir(paths.codegenDir, { recursive: true });
  if (trainParams) {
    await fs.writeFile(paths.trainParams, JSON.stringify(trainParams), "utf-8");
  }
  for (const file of files) {
    await fs.copyFile(path.join(fixturesDir, file), path.join(paths.codegenDir, file));
  }
  return { unitDir, paths };
}

describe("sweep/patch", () => {
  it("patches present files and warns about missing ones", async () => {
    const { unitDir, paths } = await makeUnit({ instrType: "int" }, [
      "codeGenArmlearn.c",
      "codeGenArmlearn_program.c",
      "codeGenArmlearn_program.h",
    ]);

    const res = await patchGeneratedCode({ unitDir, log });

    expect(res.ok).toBe(true);
    expect(res.dataType).toBe("int");
    expect(res.files.map((f) => `${f.role}:${f.status}`)).toEqual([
      "graphSource:patched",
      "graphHeader:missing",
      "programSource:patched",
      "programHeader:patched",
    ]);
    expect(res.warnings).toEqual([
      `${paths.codegen.graphHeader} not found, skipping graphHeader patch.`,
    ]);
    const graph = await fs.readFile(paths.codegen.graphSource, "utf-8");
    expect(graph).toContain("int bestScore = results[0];");

    const again = await patchGeneratedCode({ unitDir, log });
    expect(again.files.map((f) => f.status)).toEqual(["unchanged", "missing", "unchanged", "unchanged"]);
    expect(await fs.readFile(paths.codegen.graphSource, "utf-8")).toBe(graph);
  });

  it("reports a source it cannot read and still patches the others", async () => {
    const { unitDir, paths } = await makeUnit({ instrType: "int" }, [
      "codeGenArmlearn.c",
      "codeGenArmlearn_program.c",
      "codeGenArmlearn_program.h",
    ]);
    await fs.mkdir(paths.codegen.graphHeader);

    const res = await patchGeneratedCode({ unitDir, log });

    expect(res.ok).toBe(false);
    expect(res.files.map((f) => `${f.role}:${f.status}`)).toEqual([
      "graphSource:patched",
      "graphHeader:failed",
      "programSource:patched",
      "programHeader:patched",
    ]);
    expect(res.errors).toHaveLength(1);
    expect(res.errors[0]).toMatch(new RegExp(`^Failed to patch .*codeGenArmlearn\\.h: Error: EISDIR`));
  });

  it("fails only this unit on an unknown type tag", async () => {
    const { unitDir, paths } = await makeUnit({ instrType: "quad" }, ["codeGenArmlearn.c"]);
    const before = await fs.readFile(paths.codegen.graphSource, "utf-8");

    const res = await patchGeneratedCode({ unitDir, log });

    expect(res.ok).toBe(false);
    expect(res.errors).toEqual(['Unrecognized data type tag: "quad"']);
    expect(await fs.readFile(paths.codegen.graphSource, "utf-8")).toBe(before);
  });

  it("reports a unit without a config", async () => {
    const { unitDir, paths } = await makeUnit(null, []);
    const res = await patchGeneratedCode({ unitDir, log });
    expect(res).toMatchObject({ ok: false, errors: [`Config not found: ${paths.trainParams}`] });
  });

  it("takes an explicit data type over the config", async () => {
    const { unitDir, paths } = await makeUnit(null, ["codeGenArmlearn_program.h"]);
    const res = await patchGeneratedCode({ unitDir, log, dataType: "float" });
    expect(res.ok).toBe(true);
    expect(await fs.readFile(paths.codegen.programHeader, "utf-8")).toContain("float P0();");
  });
});
