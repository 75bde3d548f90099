import { SweepError } from "../errors.js";
import { DataTypeSchema, type DataType } from "../schema.js";

/** The only arithmetic type the code generator emits. */
export const DEFAULT_TYPE_TOKEN = "double";

export type CodegenFileRole = "graphSource" | "graphHeader" | "programSource" | "programHeader";

export type PatchRuleCategory = "declaration" | "sentinel" | "body" | "extern" | "linkage";

export type PatchTarget = {
  dataType: DataType;
  /** C spelling of the type; `fixedpt` is a typedef supplied by the inference build. */
  cType: string;
};

export type PatchRule = {
  id: string;
  category: PatchRuleCategory;
  roles: readonly CodegenFileRole[];
  when?: (target: PatchTarget) => boolean;
  apply: (source: string, target: PatchTarget) => string;
};

const C_TYPES: Record<DataType, string> = {
  double: "double",
  float: "float",
  int: "int",
  fixedpt: "fixedpt",
};

export function resolvePatchTarget(tag: string): PatchTarget {
  const parsed = DataTypeSchema.safeParse(tag.trim());
  if (!parsed.success) {
    throw new SweepError("AmbiguousTypeTag", `Unrecognized data type tag: "${tag}"`);
  }
  return { dataType: parsed.data, cType: C_TYPES[parsed.data] };
}

const SENTINEL_DECLARATION =
  /\bdouble\s+(bestScore|challengerScore)\s*=\s*\(isnan\((results\[\w+\])\)\)\s*\?\s*-INFINITY\s*:\s*\2\s*;/g;

const EXTERN_FREE_INPUT = /^extern\s+.*\bin\d+\s*;/;

const LINKAGE_MARKER = /extern\s+"C"/;

const OPEN_GUARD = ["", "#ifdef __cplusplus", 'extern "C" {', "#endif"];
const CLOSE_GUARD = ["#ifdef __cplusplus", "}", "#endif", ""];

/**
 * Opening guard after the first `#define` (the include guard), closing guard
 * before the last `#endif`. Skipped when a linkage block is already there.
 */
export function insertLinkageGuards(source: string): string {
  if (LINKAGE_MARKER.test(source)) {
    return source;
  }
  const lines = source.split("\n");
  const defineIdx = lines.findIndex((line) => /^#define /.test(line));
  let endifIdx = -1;
  lines.forEach((line, idx) => {
    if (/^#endif/.test(line)) {
      endifIdx = idx;
    }
  });

  const endAt = lines[lines.length - 1] === "" ? lines.length - 1 : lines.length;
  const closeAt = endifIdx >= 0 ? endifIdx : endAt;
  const closeBlock = endifIdx >= 0 ? CLOSE_GUARD : CLOSE_GUARD.slice(0, 3);
  const openAt = defineIdx >= 0 ? defineIdx + 1 : 0;
  const openBlock = defineIdx >= 0 ? OPEN_GUARD : [...OPEN_GUARD.slice(1), ""];

  // splice the later position first so the earlier index stays valid
  const out = [...lines];
  if (closeAt >= openAt) {
    out.splice(closeAt, 0, ...closeBlock);
    out.splice(openAt, 0, ...openBlock);
  } else {
    out.splice(openAt, 0, ...openBlock);
    out.splice(closeAt, 0, ...closeBlock);
  }
  return out.join("\n");
}

export const PATCH_RULES: readonly PatchRule[] = [
  {
    id: "declaration.bestProgram",
    category: "declaration",
    roles: ["graphSource"],
    apply: (source, target) =>
      source.replaceAll(/\bbestProgram\(double(\s*\*\s*)results\b/g, `bestProgram(${target.cType}$1results`),
  },
  {
    id: "declaration.inferenceTPG",
    category: "declaration",
    roles: ["graphSource", "graphHeader"],
    apply: (source, target) =>
      source.replaceAll(/\binferenceTPG\(double(\s*\*)/g, `inferenceTPG(${target.cType}$1`),
  },
  {
    id: "declaration.teamScores",
    category: "declaration",
    roles: ["graphSource"],
    apply: (source, target) =>
      source.replaceAll(/\bdouble(\s+)T(\d+)Scores\b/g, `${target.cType}$1T$2Scores`),
  },
  {
    id: "sentinel.runningBest",
    category: "sentinel",
    roles: ["graphSource"],
    // integers have no NaN or -INFINITY; seed the comparison directly
    when: (target) => target.dataType === "int",
    apply: (source, target) => source.replaceAll(SENTINEL_DECLARATION, `${target.cType} $1 = $2;`),
  },
  {
    id: "declaration.scoreLocals",
    category: "declaration",
    roles: ["graphSource"],
    apply: (source, target) =>
      source.replaceAll(/\bdouble(\s+)(bestScore|challengerScore)(\s*)=/g, `${target.cType}$1$2$3=`),
  },
  {
    id: "body.defaultType",
    category: "body",
    roles: ["programSource"],
    apply: (source, target) => source.replaceAll(/\bdouble\b/g, target.cType),
  },
  {
    id: "extern.freeInputs",
    category: "extern",
    roles: ["programSource"],
    apply: (source) =>
      source
        .split("\n")
        .filter((line) => !EXTERN_FREE_INPUT.test(line))
        .join("\n"),
  },
  {
    id: "declaration.programs",
    category: "declaration",
    roles: ["programHeader"],
    apply: (source, target) =>
      source.replaceAll(/\bdouble(\s+)P(\d+)\(\);/g, `${target.cType}$1P$2();`),
  },
  {
    id: "linkage.cplusplusGuards",
    category: "linkage",
    roles: ["graphHeader"],
    apply: (source) => insertLinkageGuards(source),
  },
];

export type PatchApplication = {
  text: string;
  applied: string[];
};

/** Applying the result a second time changes nothing. */
export function applyPatchRules(
  source: string,
  role: CodegenFileRole,
  target: PatchTarget,
  rules: readonly PatchRule[] = PATCH_RULES,
): PatchApplication {
  let text = source;
  const applied: string[] = [];
  for (const rule of rules) {
    if (!rule.roles.includes(role)) {
      continue;
    }
    if (rule.when && !rule.when(target)) {
      continue;
    }
    const next = rule.apply(text, target);
    if (next !== text) {
      applied.push(rule.id);
      text = next;
    }
  }
  return { text, applied };
}
