import fs from "node:fs/promises";
import JSON5 from "json5";
import type { z } from "zod";
import { writeJsonFile } from "./files.js";

/** Template documents may carry comments and trailing commas. */
export function parseCommentedJson(text: string): unknown {
  const parsed: unknown = JSON5.parse(text);
  return parsed;
}

export async function readConfigDocument<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
): Promise<z.infer<T>> {
  const raw = await fs.readFile(filePath, "utf-8");
  return schema.parse(parseCommentedJson(raw));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates an object document against `schema` and returns it as a plain
 * record in its original key order, unknown keys included.
 */
export async function readConfigRecord(
  filePath: string,
  schema: z.ZodTypeAny,
): Promise<Record<string, unknown>> {
  const raw = parseCommentedJson(await fs.readFile(filePath, "utf-8"));
  schema.parse(raw);
  if (!isRecord(raw)) {
    throw new Error(`Config document is not an object: ${filePath}`);
  }
  return { ...raw };
}

/** Config documents are rewritten comment-free with 4-space indentation. */
export async function writeConfigDocument(filePath: string, value: unknown): Promise<void> {
  await writeJsonFile(filePath, value, 4);
}
