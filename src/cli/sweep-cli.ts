import type { Command } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import { loadConfig } from "../config/config.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { defaultRuntime } from "../runtime.js";
import { aggregateResults, writeResultsCsv } from "../sweep/aggregate.js";
import type { SweepLayout } from "../sweep/layout.js";
import { patchGeneratedCode, type PatchUnitResult } from "../sweep/patch/index.js";
import { RESULTS_FILE, runInferenceSweep, runSweep } from "../sweep/pipeline.js";
import { theme } from "../terminal/theme.js";
import { resolveUserPath, shortenHomePath } from "../utils.js";
import { interruptSignal, runCommandWithRuntime } from "./cli-utils.js";

type SweepRunOpts = {
  config?: string;
  dryRun?: boolean;
  resume?: boolean;
  json?: boolean;
};

type SimulateOpts = {
  config?: string;
  root?: string;
  dryRun?: boolean;
  json?: boolean;
};

type AggregateOpts = {
  config?: string;
  out?: string;
  json?: boolean;
};

type PatchOpts = {
  type?: string;
  json?: boolean;
};

function printIssues(warnings: string[], errors: string[]) {
  for (const w of warnings) {
    defaultRuntime.log(theme.warn(`- ${w}`));
  }
  for (const e of errors) {
    defaultRuntime.log(theme.error(`- ${e}`));
  }
}

async function listUnitDirs(outDir: string): Promise<string[]> {
  const entries = await fs.readdir(outDir, { withFileTypes: true });
  return entries.filter((entry) => entry.isDirectory()).map((entry) => path.join(outDir, entry.name));
}

export function registerSweepCli(program: Command) {
  program
    .command("run")
    .description("Expand, materialize, train, generate code, patch, and aggregate a sweep")
    .option("--config <path>", "Sweep config file (default: ./sweep.config.json5)")
    .option("--dry-run", "Materialize units and print job commands without running them", false)
    .option("--resume", "Skip units whose metrics and generated code already exist", false)
    .option("--json", "Output JSON summary", false)
    .action(async (opts: SweepRunOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        const cfg = loadConfig({ configPath: opts.config });
        const interrupt = interruptSignal(defaultRuntime);
        const res = await runSweep({
          cfg,
          dryRun: Boolean(opts.dryRun),
          resume: Boolean(opts.resume),
          signal: interrupt.signal,
        }).finally(interrupt.release);

        if (opts.json) {
          defaultRuntime.log(
            JSON.stringify(
              {
                ok: res.ok,
                dryRun: res.dryRun,
                stopped: res.stopped,
                units: res.units.map((unit) => ({
                  id: unit.id,
                  workDir: unit.workDir,
                  status: unit.status,
                })),
                outcomes: res.outcomes,
                resultsPath: res.resultsPath ?? null,
                warnings: res.warnings,
                errors: res.errors,
              },
              null,
              2,
            ),
          );
          defaultRuntime.exit(res.ok ? 0 : 1);
          return;
        }

        defaultRuntime.log(
          `${theme.heading(res.dryRun ? "Sweep dry run" : "Sweep run")} ${
            res.ok ? theme.success("✓") : res.stopped ? theme.warn("!") : theme.error("✗")
          }`,
        );
        defaultRuntime.log(`${theme.muted("Out:")} ${theme.command(shortenHomePath(cfg.outDir))}`);
        const counts = new Map<string, number>();
        for (const unit of res.units) {
          counts.set(unit.status, (counts.get(unit.status) ?? 0) + 1);
        }
        defaultRuntime.log(
          `${theme.muted("Units:")} ${res.units.length} (${[...counts.entries()]
            .map(([status, n]) => `${status}=${n}`)
            .join(" ")})`,
        );
        if (res.dryRun) {
          for (const outcome of res.outcomes) {
            defaultRuntime.log(`${theme.muted(outcome.requestId)} ${outcome.argv.join(" ")}`);
          }
        }
        if (res.resultsPath) {
          defaultRuntime.log(
            `${theme.muted("Results:")} ${theme.command(shortenHomePath(res.resultsPath))}`,
          );
        }
        printIssues(res.warnings, res.errors);
        defaultRuntime.exit(res.ok ? 0 : 1);
      });
    });

  program
    .command("simulate")
    .description("Run the instruction-set simulator for every inference config without a result")
    .option("--config <path>", "Sweep config file (default: ./sweep.config.json5)")
    .option("--root <dir>", "Root holding training_results (default: config projectRoot)")
    .option("--dry-run", "Print simulation commands without running them", false)
    .option("--json", "Output JSON summary", false)
    .action(async (opts: SimulateOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        const cfg = loadConfig({ configPath: opts.config });
        const interrupt = interruptSignal(defaultRuntime);
        const res = await runInferenceSweep({
          cfg,
          root: opts.root?.trim() ? resolveUserPath(opts.root) : undefined,
          dryRun: Boolean(opts.dryRun),
          signal: interrupt.signal,
        }).finally(interrupt.release);

        if (opts.json) {
          defaultRuntime.log(JSON.stringify(res, null, 2));
          defaultRuntime.exit(res.ok ? 0 : 1);
          return;
        }
        defaultRuntime.log(
          `${theme.heading("Inference simulate")} ${res.ok ? theme.success("✓") : theme.error("✗")}`,
        );
        defaultRuntime.log(`${theme.muted("Missing:")} ${res.missing}`);
        const completed = res.outcomes.filter((outcome) => outcome.status === "completed").length;
        defaultRuntime.log(`${theme.muted("Completed:")} ${completed}/${res.outcomes.length}`);
        if (res.dryRun) {
          for (const outcome of res.outcomes) {
            defaultRuntime.log(`${theme.muted(outcome.requestId)} ${outcome.argv.join(" ")}`);
          }
        }
        printIssues(res.warnings, res.errors);
        defaultRuntime.exit(res.ok ? 0 : 1);
      });
    });

  program
    .command("aggregate")
    .description("Merge unit metrics files into one CSV table")
    .argument("[unitDirs...]", "Unit directories (default: every directory under the config outDir)")
    .option("--config <path>", "Sweep config file, used when no unit directories are given")
    .option("--out <file>", "Output CSV (default: <outDir>/results.csv)")
    .option("--json", "Output JSON summary", false)
    .action(async (unitDirs: string[], opts: AggregateOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        let dirs = unitDirs.map((dir) => resolveUserPath(dir));
        let layout: SweepLayout | undefined;
        let outPath = opts.out?.trim() ? resolveUserPath(opts.out) : undefined;
        if (dirs.length === 0) {
          const cfg = loadConfig({ configPath: opts.config });
          dirs = await listUnitDirs(cfg.outDir);
          layout = cfg.layout;
          outPath ??= path.join(cfg.outDir, RESULTS_FILE);
        }
        const target = outPath ?? path.resolve(RESULTS_FILE);
        const res = await aggregateResults({
          unitDirs: dirs,
          layout,
          log: createSubsystemLogger("sweep/aggregate"),
        });
        await writeResultsCsv(target, res.table);

        if (opts.json) {
          defaultRuntime.log(
            JSON.stringify(
              {
                out: target,
                rows: res.table.rows.length,
                columns: res.table.columns,
                included: res.included,
                skipped: res.skipped,
                warnings: res.warnings,
              },
              null,
              2,
            ),
          );
          defaultRuntime.exit(0);
          return;
        }
        defaultRuntime.log(`${theme.heading("Aggregate")} ${theme.success("✓")}`);
        defaultRuntime.log(`${theme.muted("Out:")} ${theme.command(shortenHomePath(target))}`);
        defaultRuntime.log(
          `${theme.muted("Rows:")} ${res.table.rows.length} ${theme.muted("units:")} ${res.included.length}/${dirs.length}`,
        );
        for (const entry of res.skipped) {
          defaultRuntime.log(theme.muted(`- skipped ${entry.unitDir}: ${entry.reason}`));
        }
        printIssues(res.warnings, []);
        defaultRuntime.exit(0);
      });
    });

  program
    .command("patch")
    .description("Retarget generated inference code to each unit's data type")
    .argument("<unitDirs...>", "Unit directories holding outLogs/CodeGen")
    .option("--type <dataType>", "Override the data type read from params/trainParams.json")
    .option("--json", "Output JSON results", false)
    .action(async (unitDirs: string[], opts: PatchOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        const log = createSubsystemLogger("sweep/patch");
        const results: PatchUnitResult[] = [];
        for (const dir of unitDirs) {
          results.push(
            await patchGeneratedCode({
              unitDir: resolveUserPath(dir),
              dataType: opts.type?.trim() || undefined,
              log,
            }),
          );
        }
        const ok = results.every((res) => res.ok);

        if (opts.json) {
          defaultRuntime.log(JSON.stringify(results, null, 2));
          defaultRuntime.exit(ok ? 0 : 1);
          return;
        }
        for (const res of results) {
          defaultRuntime.log(
            `${theme.heading("Patch")} ${res.ok ? theme.success("✓") : theme.error("✗")} ${theme.command(
              shortenHomePath(res.unitDir),
            )}${res.dataType ? theme.muted(` (${res.dataType})`) : ""}`,
          );
          for (const file of res.files) {
            defaultRuntime.log(theme.muted(`  ${file.role}: ${file.status}`));
          }
          printIssues(res.warnings, res.errors);
        }
        defaultRuntime.exit(ok ? 0 : 1);
      });
    });
}
