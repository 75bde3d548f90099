import { describe, expect, it } from "vitest";
import {
  countParameterSpace,
  expandParameterSpace,
  iterateParameterSpace,
  resolveSeeds,
} from "./expand.js";
import { SweepDimensionsSchema } from "./schema.js";

const A = { name: "A", flags: { useInstrTrig: true } };
const B = { name: "B", flags: { useInstrTrig: false } };
const C = { name: "C", flags: { useInstrTrig: false, useInstrLogExp: true } };

describe("sweep/expand", () => {
  it("resolves an inclusive seed range", () => {
    expect(resolveSeeds({ from: 3, to: 5 })).toEqual([3, 4, 5]);
    expect(resolveSeeds([7, 2])).toEqual([7, 2]);
  });

  it("emits seed outermost, then instruction set, then data type", () => {
    const tuples = expandParameterSpace(
      SweepDimensionsSchema.parse({
        seeds: [0, 1],
        instructionSets: [A, B],
        dataTypes: ["double", "int"],
      }),
    );
    expect(tuples.map((t) => `${t.seed}/${t.instructionSet.name}/${t.dataType}`)).toEqual([
      "0/A/double",
      "0/A/int",
      "0/B/double",
      "0/B/int",
      "1/A/double",
      "1/A/int",
      "1/B/double",
      "1/B/int",
    ]);
  });

  it("emits the product of dimension sizes, all distinct", () => {
    const dims = SweepDimensionsSchema.parse({
      seeds: { from: 0, to: 2 },
      instructionSets: [A, B, C],
      dataTypes: ["double", "float", "int", "fixedpt"],
    });
    const tuples = expandParameterSpace(dims);
    expect(tuples).toHaveLength(3 * 3 * 4);
    expect(countParameterSpace(dims)).toBe(36);
    const keys = new Set(tuples.map((t) => `${t.seed}/${t.instructionSet.name}/${t.dataType}`));
    expect(keys.size).toBe(36);
  });

  it("truncates each dimension before the product in mini mode", () => {
    const tuples = expandParameterSpace(
      SweepDimensionsSchema.parse({
        seeds: [0, 1, 2],
        instructionSets: [A],
        dataTypes: ["double", "float", "int"],
        mini: 2,
      }),
    );
    expect(tuples).toHaveLength(4);
    expect(tuples.map((t) => `${t.seed}/${t.dataType}`)).toEqual([
      "0/double",
      "0/float",
      "1/double",
      "1/float",
    ]);
  });

  it("yields frozen tuples and restarts from the beginning", () => {
    const dims = SweepDimensionsSchema.parse({
      seeds: [4],
      instructionSets: [A],
      dataTypes: ["float"],
    });
    const first = [...iterateParameterSpace(dims)];
    const second = [...iterateParameterSpace(dims)];
    expect(first).toEqual(second);
    expect(Object.isFrozen(first[0])).toBe(true);
    expect(Object.isFrozen(first[0]?.instructionSet.flags)).toBe(true);
  });
});
