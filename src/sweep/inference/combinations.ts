import { SweepError } from "../errors.js";
import type { DataType } from "../schema.js";

export type MicroarchitectureSpec = {
  uarch: string;
  /** ISA string; `(c)` marks an optional compressed extension. */
  isaPattern: string;
  abi: string;
};

export const MICROARCHITECTURES: readonly MicroarchitectureSpec[] = [
  { uarch: "cv32e20_im0", isaPattern: "rv32i(c)_zicsr", abi: "ilp32" },
  { uarch: "cv32e20_im1", isaPattern: "rv32im(c)_zicsr", abi: "ilp32" },
  { uarch: "cv32e20_im2", isaPattern: "rv32im(c)_zicsr", abi: "ilp32" },
  { uarch: "cv32e20_im3", isaPattern: "rv32im(c)_zicsr", abi: "ilp32" },
  { uarch: "cv32e20_em0", isaPattern: "rv32e(c)_zicsr", abi: "ilp32e" },
  { uarch: "cv32e20_em1", isaPattern: "rv32em(c)_zicsr", abi: "ilp32e" },
  { uarch: "cv32e20_em2", isaPattern: "rv32em(c)_zicsr", abi: "ilp32e" },
  { uarch: "cv32e20_em3", isaPattern: "rv32em(c)_zicsr", abi: "ilp32e" },
  { uarch: "cv32e40x_im0", isaPattern: "rv32i(c)_zicsr", abi: "ilp32" },
  { uarch: "cv32e40x_im1", isaPattern: "rv32i(c)_zicsr_zmmul", abi: "ilp32" },
  { uarch: "cv32e40x_im2", isaPattern: "rv32im(c)_zicsr", abi: "ilp32" },
  { uarch: "cv32e40x_em0", isaPattern: "rv32e(c)_zicsr", abi: "ilp32e" },
  { uarch: "cv32e40x_em1", isaPattern: "rv32e(c)_zicsr_zmmul", abi: "ilp32e" },
  { uarch: "cv32e40x_em2", isaPattern: "rv32em(c)_zicsr", abi: "ilp32e" },
  { uarch: "cv32e40px", isaPattern: "rv32im(c)_zicsr", abi: "ilp32" },
  { uarch: "cv32e40px_fpu", isaPattern: "rv32imf(c)_zicsr", abi: "ilp32f" },
  { uarch: "cv32e40px_corev_pulp", isaPattern: "rv32im(c)_zicsr_xpulp", abi: "ilp32f" },
  { uarch: "cv32e40px_corev_pulp_fpu", isaPattern: "rv32imf(c)_zicsr_xpulp", abi: "ilp32f" },
  { uarch: "cv32e40p", isaPattern: "rv32im(c)_zicsr", abi: "ilp32" },
  { uarch: "cv32e40p_corev_pulp", isaPattern: "rv32im(c)_zicsr_xpulp", abi: "ilp32" },
];

export const COREV_COMPILER = "/opt/tools/corev";
export const RISCV_COMPILER = "/opt/tools/riscv";

/** `rv32im(c)_zicsr` -> `rv32im_zicsr`, `rv32imc_zicsr`. */
export function expandIsa(pattern: string): string[] {
  if (!pattern.includes("(c)")) {
    return [pattern];
  }
  const [base = "", ...rest] = pattern.split("(c)");
  const suffix = rest.join("");
  return [`${base}${suffix}`, `${base}c${suffix}`];
}

export function determineCompiler(isa: string): string {
  return isa.toLowerCase().includes("xpulp") ? COREV_COMPILER : RISCV_COMPILER;
}

export function microarchHasFpu(uarch: string): boolean {
  return uarch.toLowerCase().includes("fpu");
}

export function isValidCombination(dataType: DataType, uarch: string): boolean {
  if ((dataType === "fixedpt" || dataType === "double") && microarchHasFpu(uarch)) {
    return false;
  }
  return true;
}

const TPG_DTYPE_TAG = /(?:^|_)instrType-(double|float|int|fixedpt)(?=_|$)/;

export function inferTpgDataType(tpgDirName: string): DataType {
  const match = tpgDirName.match(TPG_DTYPE_TAG);
  const tag = match?.[1];
  if (tag === "double" || tag === "float" || tag === "int" || tag === "fixedpt") {
    return tag;
  }
  throw new SweepError(
    "AmbiguousTypeTag",
    `Cannot detect data type from TPG directory name: ${tpgDirName}`,
  );
}

export type InferenceKey = {
  tpgId: string;
  uarch: string;
  isa: string;
  abi: string;
  dataType: DataType;
  compiler: string;
};

/**
 * Every valid (microarchitecture, ISA) pairing for one TPG, in table order
 * with the plain ISA before its compressed variant.
 */
export function inferenceCombinations(params: {
  tpgId: string;
  dataType: DataType;
  microarchitectures?: readonly MicroarchitectureSpec[];
}): { keys: InferenceKey[]; skipped: string[] } {
  const keys: InferenceKey[] = [];
  const skipped: string[] = [];
  for (const spec of params.microarchitectures ?? MICROARCHITECTURES) {
    if (!isValidCombination(params.dataType, spec.uarch)) {
      skipped.push(spec.uarch);
      continue;
    }
    for (const isa of expandIsa(spec.isaPattern)) {
      keys.push({
        tpgId: params.tpgId,
        uarch: spec.uarch,
        isa,
        abi: spec.abi,
        dataType: params.dataType,
        compiler: determineCompiler(isa),
      });
    }
  }
  return { keys, skipped };
}
