import { describe, expect, test } from "vitest";
import { toBitArray } from "../src/runtime/index.js";

describe("toBitArray", () => {
  test("least significant bit first", () => {
    expect(toBitArray(5, 4)).toEqual([true, false, true, false]);
    expect(toBitArray(0b1010, 2)).toEqual([false, true]);
  });

  test("negative values use their two's-complement pattern", () => {
    expect(toBitArray(-1, 3)).toEqual([true, true, true]);
    expect(toBitArray(-2, 2)).toEqual([false, true]);
  });

  test("bigint input and zero length", () => {
    expect(toBitArray(1n << 40n, 41)[40]).toBe(true);
    expect(toBitArray(7, 0)).toEqual([]);
  });

  test("negative length is rejected", () => {
    expect(() => toBitArray(1, -1)).toThrow(RangeError);
  });
});
