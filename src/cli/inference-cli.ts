import type { Command } from "commander";
import path from "node:path";
import { loadConfig, type SweepConfig } from "../config/config.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { defaultRuntime } from "../runtime.js";
import { MICROARCHITECTURES } from "../sweep/inference/combinations.js";
import { aggregateLatencyResults } from "../sweep/inference/latency.js";
import {
  findMissingInferenceResults,
  generateInferenceConfigs,
  renderResumeList,
} from "../sweep/inference/reconcile.js";
import { writeTextFile } from "../sweep/files.js";
import { theme } from "../terminal/theme.js";
import { resolveUserPath, shortenHomePath } from "../utils.js";
import { parseList, parseNonNegativeInt, runCommandWithRuntime } from "./cli-utils.js";

type InferenceConfigsOpts = {
  config?: string;
  root?: string;
  mini?: string;
  uarch?: string;
  json?: boolean;
};

type MissingOpts = {
  config?: string;
  root?: string;
  out?: string;
  json?: boolean;
};

type LatencyOpts = {
  config?: string;
  root?: string;
  out?: string;
  json?: boolean;
};

/**
 * With `--config`, the root defaults to the config's projectRoot and its
 * layout applies; without it, the default layout under `--root` (or cwd).
 */
function resolveInferenceContext(opts: { config?: string; root?: string }): {
  root: string;
  cfg?: SweepConfig;
} {
  const cfg = opts.config?.trim() ? loadConfig({ configPath: opts.config }) : undefined;
  const root = opts.root?.trim() ? resolveUserPath(opts.root) : (cfg?.projectRoot ?? path.resolve("."));
  return { root, cfg };
}

export function registerInferenceCli(program: Command) {
  program
    .command("inference-configs")
    .description("Write one simulator config per TPG x microarchitecture x ISA combination")
    .option("--config <path>", "Sweep config supplying root, layout, inference.mini and microarchitectures")
    .option("--root <dir>", "Root holding training_results (default: config projectRoot or cwd)")
    .option("--mini <n>", "Keep only the first n combinations overall (0 = all)")
    .option("--uarch <names>", "Comma-separated microarchitectures to include (default: all)")
    .option("--json", "Output JSON summary", false)
    .action(async (opts: InferenceConfigsOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        const { root, cfg } = resolveInferenceContext(opts);
        const wanted = parseList(opts.uarch) ?? cfg?.inference.microarchitectures;
        if (wanted) {
          const known = new Set(MICROARCHITECTURES.map((spec) => spec.uarch));
          const unknown = wanted.filter((name) => !known.has(name));
          if (unknown.length > 0) {
            defaultRuntime.error(`error: unknown microarchitecture(s): ${unknown.join(", ")}`);
            defaultRuntime.exit(1);
            return;
          }
        }
        const res = await generateInferenceConfigs({
          root,
          layout: cfg?.layout,
          mini: parseNonNegativeInt(opts.mini, cfg?.inference.mini ?? 0),
          microarchitectures: wanted
            ? MICROARCHITECTURES.filter((spec) => wanted.includes(spec.uarch))
            : undefined,
          log: createSubsystemLogger("sweep/inference"),
        });
        const ok = res.errors.length === 0;

        if (opts.json) {
          defaultRuntime.log(
            JSON.stringify(
              {
                ok,
                written: res.written,
                skippedTpgs: res.skippedTpgs,
                warnings: res.warnings,
                errors: res.errors,
              },
              null,
              2,
            ),
          );
          defaultRuntime.exit(ok ? 0 : 1);
          return;
        }
        defaultRuntime.log(
          `${theme.heading("Inference configs")} ${ok ? theme.success("✓") : theme.warn("!")}`,
        );
        defaultRuntime.log(`${theme.muted("Written:")} ${res.written.length}`);
        for (const tpgDir of res.skippedTpgs) {
          defaultRuntime.log(theme.warn(`- skipped ${shortenHomePath(tpgDir)}`));
        }
        for (const e of res.errors) {
          defaultRuntime.log(theme.error(`- ${e}`));
        }
        defaultRuntime.exit(ok ? 0 : 1);
      });
    });

  program
    .command("missing")
    .description("List inference configs that have no result yet (one path per line)")
    .option("--config <path>", "Sweep config supplying root and layout")
    .option("--root <dir>", "Root holding training_results (default: config projectRoot or cwd)")
    .option("--out <file>", "Also write the list to a file")
    .option("--json", "Output JSON with the owning TPG directory of each config", false)
    .action(async (opts: MissingOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        const { root, cfg } = resolveInferenceContext(opts);
        const res = await findMissingInferenceResults({ root, layout: cfg?.layout });
        const list = renderResumeList(res.missing.map((entry) => entry.configPath));
        if (opts.out?.trim()) {
          await writeTextFile(resolveUserPath(opts.out), list);
        }
        if (opts.json) {
          defaultRuntime.log(JSON.stringify(res, null, 2));
        } else if (list) {
          defaultRuntime.log(list.trimEnd());
        }
        defaultRuntime.exit(0);
      });
    });

  program
    .command("latency")
    .description("Aggregate inference latency results into per-seed and averaged CSVs")
    .option("--config <path>", "Sweep config supplying root and layout")
    .option("--root <dir>", "Root holding training_results (default: config projectRoot or cwd)")
    .option("--out <dir>", "Output directory", "results_out")
    .option("--json", "Output JSON summary", false)
    .action(async (opts: LatencyOpts) => {
      await runCommandWithRuntime(defaultRuntime, async () => {
        const { root, cfg } = resolveInferenceContext(opts);
        const res = await aggregateLatencyResults({
          root,
          layout: cfg?.layout,
          outDir: path.resolve(opts.out ?? "results_out"),
          log: createSubsystemLogger("sweep/latency"),
        });

        if (opts.json) {
          defaultRuntime.log(
            JSON.stringify(
              {
                files: res.fileCount,
                rows: res.perSeed.rows.length,
                groups: res.averaged.rows.length,
                perSeedPath: res.perSeedPath,
                averagedPath: res.averagedPath,
                skipped: res.skipped,
              },
              null,
              2,
            ),
          );
          defaultRuntime.exit(0);
          return;
        }
        defaultRuntime.log(`${theme.heading("Latency")} ${theme.success("✓")}`);
        defaultRuntime.log(
          `${theme.muted("Files:")} ${res.fileCount} ${theme.muted("rows:")} ${res.perSeed.rows.length} ${theme.muted("groups:")} ${res.averaged.rows.length}`,
        );
        defaultRuntime.log(`${theme.muted("Per seed:")} ${theme.command(shortenHomePath(res.perSeedPath))}`);
        defaultRuntime.log(`${theme.muted("Averaged:")} ${theme.command(shortenHomePath(res.averagedPath))}`);
        for (const file of res.skipped) {
          defaultRuntime.log(theme.warn(`- skipped ${shortenHomePath(file)}`));
        }
        defaultRuntime.exit(0);
      });
    });
}
