import fs from "node:fs/promises";
import path from "node:path";
import type { SubsystemLogger } from "../../logging/subsystem.js";
import { writeResultsCsv, type ResultTable } from "../aggregate.js";
import { parseCommentedJson } from "../json-config.js";
import { DEFAULT_LAYOUT, resolveTpgDirOfInferenceFile, type SweepLayout } from "../layout.js";
import { InferenceResultSchema } from "../schema.js";
import { findInferenceFiles } from "./reconcile.js";

const XPULP_EXTENSIONS = "_xcvalu_xcvbi_xcvbitmanip_xcvhwlp_xcvmac_xcvmem_xcvsimd";
const SEED_TOKEN = /_seed-(\d+)_/;

export const PER_SEED_FILE = "aggregated_tpg_results.csv";
export const AVERAGED_FILE = "aggregated_averaged_tpg_results.csv";

export const PER_SEED_COLUMNS = [
  "tpg_nickname",
  "uarch",
  "isa",
  "abi",
  "dtype",
  "seed",
  "tpg_mean_latency",
  "tpg_stddev_latency",
] as const;

export const AVERAGED_COLUMNS = [
  "tpg_nickname",
  "uarch",
  "isa",
  "abi",
  "dtype",
  "mean_latency_avg",
  "mean_latency_stddev",
] as const;

/** The simulator reports xpulp as its expanded extension list; fold it back. */
export function foldXpulpExtensions(isa: string): string {
  return isa.split(XPULP_EXTENSIONS).join("_xpulp");
}

export function canonicalizeTpgName(tpgDirName: string): { canonical: string; seed: number | null } {
  const digits = tpgDirName.match(SEED_TOKEN)?.[1];
  const seed = digits === undefined ? null : Number(digits);
  const canonical = tpgDirName
    .replace(new RegExp(SEED_TOKEN.source, "g"), "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return { canonical, seed };
}

function flagBit(canonical: string, flag: string): 0 | 1 {
  const match = canonical.match(new RegExp(`${flag}-(True|False)`));
  return match?.[1] === "True" ? 1 : 0;
}

export function tpgNickname(canonical: string): string {
  const dtype = canonical.match(/instrType-(double|float|int|fixedpt)/)?.[1] ?? "unk";
  const expari = flagBit(canonical, "useInstrExpensiveArithmetic");
  if (/useInstrLog2Exp2-(True|False)/.test(canonical) || /useInstrZmmul-(True|False)/.test(canonical)) {
    const l2e2 = flagBit(canonical, "useInstrLog2Exp2");
    const zmu = flagBit(canonical, "useInstrZmmul");
    return `l2e2${l2e2}_zmu${zmu}_expari${expari}-${dtype}`;
  }
  const trig = flagBit(canonical, "useInstrTrig");
  const logexp = flagBit(canonical, "useInstrLogExp");
  return `trig${trig}_logexp${logexp}_expari${expari}-${dtype}`;
}

type SeedLatency = {
  seed: number | null;
  mean: number;
  stddev: number;
};

type LatencyGroup = {
  canonical: string;
  nickname: string;
  uarch: string;
  isa: string;
  abi: string;
  dtype: string;
  seeds: SeedLatency[];
};

export type LatencyAggregate = {
  perSeed: ResultTable;
  averaged: ResultTable;
  fileCount: number;
  skipped: string[];
  warnings: string[];
};

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function average(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function groupOrder(a: LatencyGroup, b: LatencyGroup): number {
  return (
    compareCodePoints(a.canonical, b.canonical) ||
    compareCodePoints(a.uarch, b.uarch) ||
    compareCodePoints(a.isa, b.isa)
  );
}

export async function buildLatencyAggregate(params: {
  resultFiles: string[];
  layout?: SweepLayout;
}): Promise<LatencyAggregate> {
  const layout = params.layout ?? DEFAULT_LAYOUT;
  const groups = new Map<string, LatencyGroup>();
  const skipped: string[] = [];
  const warnings: string[] = [];

  for (const file of params.resultFiles) {
    let raw: unknown;
    try {
      raw = parseCommentedJson(await fs.readFile(file, "utf-8"));
    } catch (err) {
      skipped.push(file);
      warnings.push(`Failed to load JSON ${file}: ${String(err)}`);
      continue;
    }
    const parsed = InferenceResultSchema.safeParse(raw);
    if (!parsed.success) {
      skipped.push(file);
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      warnings.push(`Invalid result ${file}: ${issues}`);
      continue;
    }
    const result = parsed.data;
    const tpgDirName = path.basename(resolveTpgDirOfInferenceFile(file, "results", layout));
    const { canonical, seed } = canonicalizeTpgName(tpgDirName);
    const isa = foldXpulpExtensions(result.isa);
    const groupKey = `${canonical}\u0000${result.simulator}\u0000${isa}`;
    let group = groups.get(groupKey);
    if (!group) {
      group = {
        canonical,
        nickname: tpgNickname(canonical),
        uarch: result.simulator,
        isa,
        abi: result.abi,
        dtype: result.dtype,
        seeds: [],
      };
      groups.set(groupKey, group);
    }
    group.seeds.push({ seed, mean: result.tpg_mean_latency, stddev: result.tpg_stddev_latency });
  }

  const ordered = [...groups.values()].toSorted(groupOrder);
  const perSeedRows: Array<Record<string, string>> = [];
  const averagedRows: Array<Record<string, string>> = [];
  for (const group of ordered) {
    const base = {
      tpg_nickname: group.nickname,
      uarch: group.uarch,
      isa: group.isa,
      abi: group.abi,
      dtype: group.dtype,
    };
    for (const entry of group.seeds) {
      perSeedRows.push({
        ...base,
        seed: entry.seed === null ? "" : String(entry.seed),
        tpg_mean_latency: String(entry.mean),
        tpg_stddev_latency: String(entry.stddev),
      });
    }
    averagedRows.push({
      ...base,
      mean_latency_avg: String(round2(average(group.seeds.map((entry) => entry.mean)))),
      mean_latency_stddev: String(round2(average(group.seeds.map((entry) => entry.stddev)))),
    });
  }

  return {
    perSeed: { columns: [...PER_SEED_COLUMNS], rows: perSeedRows },
    averaged: { columns: [...AVERAGED_COLUMNS], rows: averagedRows },
    fileCount: params.resultFiles.length,
    skipped,
    warnings,
  };
}

export async function aggregateLatencyResults(params: {
  root: string;
  outDir: string;
  layout?: SweepLayout;
  log: SubsystemLogger;
}): Promise<LatencyAggregate & { perSeedPath: string; averagedPath: string }> {
  const layout = params.layout ?? DEFAULT_LAYOUT;
  const resultFiles = await findInferenceFiles(params.root, "results", layout);
  params.log.info(`${resultFiles.length} inference result files`);

  const aggregate = await buildLatencyAggregate({ resultFiles, layout });
  for (const warning of aggregate.warnings) {
    params.log.warn(warning);
  }
  if (aggregate.perSeed.rows.length === 0) {
    params.log.warn("no inference results to aggregate");
  }

  const perSeedPath = path.join(params.outDir, PER_SEED_FILE);
  const averagedPath = path.join(params.outDir, AVERAGED_FILE);
  await writeResultsCsv(perSeedPath, aggregate.perSeed);
  await writeResultsCsv(averagedPath, aggregate.averaged);
  return { ...aggregate, perSeedPath, averagedPath };
}
