import type {
  DataType,
  InstructionSet,
  ParameterTuple,
  SeedsSpec,
  SweepDimensions,
} from "./schema.js";

export function resolveSeeds(seeds: SeedsSpec): number[] {
  if (Array.isArray(seeds)) {
    return [...seeds];
  }
  const out: number[] = [];
  for (let seed = seeds.from; seed <= seeds.to; seed += 1) {
    out.push(seed);
  }
  return out;
}

function truncate<T>(values: readonly T[], mini: number): T[] {
  const k = Math.max(0, Math.floor(mini));
  return k > 0 ? values.slice(0, k) : [...values];
}

export type ResolvedDimensions = {
  seeds: number[];
  instructionSets: InstructionSet[];
  dataTypes: DataType[];
};

/**
 * Applies mini sampling to each dimension on its own, so a reduced sweep
 * still crosses every kept value with every other.
 */
export function resolveDimensions(dimensions: SweepDimensions): ResolvedDimensions {
  return {
    seeds: truncate(resolveSeeds(dimensions.seeds), dimensions.mini),
    instructionSets: truncate(dimensions.instructionSets, dimensions.mini),
    dataTypes: truncate(dimensions.dataTypes, dimensions.mini),
  };
}

/** Seed outermost, then instruction set, then data type. */
export function* iterateParameterSpace(dimensions: SweepDimensions): Generator<ParameterTuple> {
  const resolved = resolveDimensions(dimensions);
  for (const seed of resolved.seeds) {
    for (const instructionSet of resolved.instructionSets) {
      const frozenSet = Object.freeze({
        name: instructionSet.name,
        flags: Object.freeze({ ...instructionSet.flags }),
      });
      for (const dataType of resolved.dataTypes) {
        yield Object.freeze({ seed, instructionSet: frozenSet, dataType });
      }
    }
  }
}

export function expandParameterSpace(dimensions: SweepDimensions): ParameterTuple[] {
  return [...iterateParameterSpace(dimensions)];
}

export function countParameterSpace(dimensions: SweepDimensions): number {
  const resolved = resolveDimensions(dimensions);
  return resolved.seeds.length * resolved.instructionSets.length * resolved.dataTypes.length;
}
