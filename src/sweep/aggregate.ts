import fs from "node:fs/promises";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { SubsystemLogger } from "../logging/subsystem.js";
import { fileExists, writeTextFile } from "./files.js";
import { readConfigDocument } from "./json-config.js";
import { DEFAULT_LAYOUT, resolveUnitPaths, type SweepLayout } from "./layout.js";
import { TrainParamsSchema } from "./schema.js";

export const TAG_COLUMNS = ["seed", "dataType", "instructionSetName"] as const;

const TAG_SET: ReadonlySet<string> = new Set(TAG_COLUMNS);

export type ResultTable = {
  columns: string[];
  rows: Array<Record<string, string>>;
};

/**
 * Whitespace-delimited table: the first line is ignored, the second names
 * the columns, the rest are data. Short rows leave trailing cells empty.
 */
export function parseMetricsTable(text: string): ResultTable | null {
  const lines = text.split(/\r?\n/);
  if (lines.length < 2) {
    return null;
  }
  const columns = (lines[1] ?? "").trim().split(/\s+/).filter(Boolean);
  if (columns.length === 0) {
    return null;
  }
  const rows: Array<Record<string, string>> = [];
  for (const line of lines.slice(2)) {
    const cells = line.trim().split(/\s+/).filter(Boolean);
    if (cells.length === 0) {
      continue;
    }
    const row: Record<string, string> = {};
    columns.forEach((column, idx) => {
      row[column] = cells[idx] ?? "";
    });
    rows.push(row);
  }
  return { columns, rows };
}

type UnitTags = Record<(typeof TAG_COLUMNS)[number], string>;

async function readUnitTags(trainParamsPath: string): Promise<{ tags: UnitTags; warning?: string }> {
  const empty: UnitTags = { seed: "", dataType: "", instructionSetName: "" };
  if (!(await fileExists(trainParamsPath))) {
    return { tags: empty, warning: `Config not found: ${trainParamsPath}` };
  }
  try {
    const params = await readConfigDocument(trainParamsPath, TrainParamsSchema);
    return {
      tags: {
        seed: params.seed === undefined ? "" : String(params.seed),
        dataType: params.instrType ?? "",
        instructionSetName: params.instrSetName ?? "",
      },
    };
  } catch (err) {
    return { tags: empty, warning: `Failed to read ${trainParamsPath}: ${String(err)}` };
  }
}

export type AggregateResult = {
  table: ResultTable;
  included: string[];
  skipped: Array<{ unitDir: string; reason: string }>;
  warnings: string[];
};

/** Orders unit directories by unit id, so completion order never leaks into the table. */
function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function orderUnitDirs(unitDirs: string[]): string[] {
  const unique = [...new Set(unitDirs.map((dir) => path.resolve(dir)))];
  return unique.toSorted((a, b) => {
    const byId = compareCodePoints(path.basename(a), path.basename(b));
    return byId !== 0 ? byId : compareCodePoints(a, b);
  });
}

export async function aggregateResults(params: {
  unitDirs: string[];
  layout?: SweepLayout;
  log: SubsystemLogger;
}): Promise<AggregateResult> {
  const layout = params.layout ?? DEFAULT_LAYOUT;
  const metricColumns: string[] = [];
  const seenColumns = new Set<string>(TAG_COLUMNS);
  const rows: Array<Record<string, string>> = [];
  const included: string[] = [];
  const skipped: AggregateResult["skipped"] = [];
  const warnings: string[] = [];

  for (const unitDir of orderUnitDirs(params.unitDirs)) {
    const paths = resolveUnitPaths(unitDir, layout);
    if (!(await fileExists(paths.trainingLog))) {
      skipped.push({ unitDir, reason: `metrics file missing: ${paths.trainingLog}` });
      continue;
    }
    let text: string;
    try {
      text = await fs.readFile(paths.trainingLog, "utf-8");
    } catch (err) {
      skipped.push({ unitDir, reason: `metrics file unreadable: ${String(err)}` });
      continue;
    }
    const table = parseMetricsTable(text);
    if (!table) {
      skipped.push({ unitDir, reason: `metrics file has no header: ${paths.trainingLog}` });
      continue;
    }
    const { tags, warning } = await readUnitTags(paths.trainParams);
    if (warning) {
      warnings.push(warning);
    }
    for (const column of table.columns) {
      if (TAG_SET.has(column)) {
        warnings.push(`Metric column '${column}' in ${paths.trainingLog} is overwritten by the unit tag.`);
        continue;
      }
      if (!seenColumns.has(column)) {
        seenColumns.add(column);
        metricColumns.push(column);
      }
    }
    for (const row of table.rows) {
      rows.push({ ...row, ...tags });
    }
    included.push(unitDir);
  }

  for (const entry of skipped) {
    params.log.debug(`skip ${entry.unitDir}: ${entry.reason}`);
  }
  for (const warning of warnings) {
    params.log.warn(warning);
  }

  const columns = [...metricColumns, ...TAG_COLUMNS];
  const filled = rows.map((row) => {
    const out: Record<string, string> = {};
    for (const column of columns) {
      out[column] = row[column] ?? "";
    }
    return out;
  });

  return { table: { columns, rows: filled }, included, skipped, warnings };
}

export function renderCsv(table: ResultTable): string {
  if (table.rows.length === 0) {
    return stringify([table.columns]);
  }
  return stringify(table.rows, { header: true, columns: table.columns });
}

export async function writeResultsCsv(filePath: string, table: ResultTable): Promise<void> {
  await writeTextFile(filePath, renderCsv(table));
}
