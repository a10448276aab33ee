import { describe, it, expect } from "vitest";
import type { Column } from "../model-types.js";
import { packArray, unpackArray } from "./arrayCodec.js";

const slots: Column = {
  name: "Slots",
  type: { isArray: true, baseType: { isArray: false, kind: "Int32" } },
  constraints: [],
  isUnique: false,
  cells: [0, 1, 2],
  arrayLength: 3,
};

const int = (value: number) => ({ kind: "Int32" as const, value });

describe("packArray", () => {
  it("writes every slot and the aggregate of non-zero values", () => {
    expect(packArray(slots, [int(5), int(0), int(7)])).toEqual({
      Slots: "[5,7]",
      Slots_0: 5,
      Slots_1: 0,
      Slots_2: 7,
    });
  });

  it("fills missing slots with NULL", () => {
    expect(packArray(slots, [int(1)])).toEqual({
      Slots: "[1]",
      Slots_0: 1,
      Slots_1: null,
      Slots_2: null,
    });
  });

  it("refuses more values than the header declared", () => {
    expect(() => packArray(slots, [int(1), int(2), int(3), int(4)])).toThrow(RangeError);
  });

  it("only accepts array columns", () => {
    const scalar: Column = { ...slots, type: { isArray: false, kind: "Int32" } };
    expect(() => packArray(scalar, [])).toThrow(TypeError);
  });
});

describe("unpackArray", () => {
  it("reads back what was packed", () => {
    const record = packArray(slots, [int(4), int(9)]);
    expect(unpackArray(slots, record)).toEqual([4, 9]);
  });

  it("stops at the first zero slot", () => {
    expect(unpackArray(slots, { Slots_0: 5, Slots_1: 0, Slots_2: 7 })).toEqual([5]);
  });

  it("stops at the first missing slot", () => {
    expect(unpackArray(slots, { Slots_0: 5, Slots_2: 7 })).toEqual([5]);
  });

  it("treats the zero date as a gap", () => {
    const dates: Column = {
      ...slots,
      name: "At",
      type: { isArray: true, baseType: { isArray: false, kind: "DateTime" } },
      arrayLength: 2,
    };
    expect(
      unpackArray(dates, {
        At_0: "2024-01-02T00:00:00.000Z",
        At_1: "0001-01-01T00:00:00.000Z",
      })
    ).toEqual(["2024-01-02T00:00:00.000Z"]);
  });
});
