import { describe, expect, it } from "vitest";
import { coerceNumericColumn, isExactNumber, jsonReplacer, typeColumn, valuesEqual } from "../src/utils/values.js";

describe("value typing", () => {
  it("keeps integers past 2^53 out of numeric columns", () => {
    expect(isExactNumber("9007199254740991")).toBe(true);
    expect(isExactNumber("9007199254740992")).toBe(false);
    expect(isExactNumber("1.5e300")).toBe(true);
    expect(typeColumn(["9007199254740992", "9007199254740993"])).toEqual(["9007199254740992", "9007199254740993"]);
  });

  it("reads unparseable cells of a numeric column as null", () => {
    expect(coerceNumericColumn(["1", "", "N/A", "2.5"])).toEqual({ values: [1, null, null, 2.5], rejected: ["N/A"] });
  });
});

describe("valuesEqual", () => {
  it("treats identical special floats as equal", () => {
    expect(valuesEqual(Number.NaN, Number.NaN, 1e-10)).toBe(true);
    expect(valuesEqual(Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY, 1e-10)).toBe(true);
    expect(valuesEqual(Number.NaN, Number.POSITIVE_INFINITY, 1e-10)).toBe(false);
    expect(valuesEqual(Number.NEGATIVE_INFINITY, Number.POSITIVE_INFINITY, 1e-10)).toBe(false);
  });
});

describe("jsonReplacer", () => {
  it("writes NaN and the infinities as text", () => {
    const values = { a: Number.NaN, b: Number.POSITIVE_INFINITY, c: Number.NEGATIVE_INFINITY, d: 1 };

    const text = JSON.stringify(values, jsonReplacer);

    expect(text).toBe('{"a":"NaN","b":"Infinity","c":"-Infinity","d":1}');
  });
});
