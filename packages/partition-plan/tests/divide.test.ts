import { describe, expect, it } from "vitest";
import { divide } from "../src/divide.js";
import { ValidationError } from "../src/errors.js";

describe("divide", () => {
  it("gives the remainder to the first partitions", () => {
    expect(divide(1003, 8)).toEqual([126, 126, 126, 125, 125, 125, 125, 125]);
  });

  it("splits evenly when there is no remainder", () => {
    expect(divide(1000, 10)).toEqual(Array(10).fill(100));
  });

  it("pads with zeros when there are more partitions than units", () => {
    expect(divide(5, 8)).toEqual([1, 1, 1, 1, 1, 0, 0, 0]);
  });

  it("returns all zeros for an empty total", () => {
    expect(divide(0, 3)).toEqual([0, 0, 0]);
  });

  it("returns the total for a single partition", () => {
    expect(divide(17, 1)).toEqual([17]);
  });

  it("always sums to the total", () => {
    for (let total = 0; total <= 60; total++) {
      for (let n = 1; n <= 12; n++) {
        const sizes = divide(total, n);
        expect(sizes).toHaveLength(n);
        expect(sizes.reduce((a, b) => a + b, 0)).toBe(total);
      }
    }
  });

  it("places base + 1 before the remainder boundary and base after it", () => {
    for (let total = 0; total <= 60; total++) {
      for (let n = 1; n <= 12; n++) {
        const base = Math.floor(total / n);
        const remainder = total % n;
        divide(total, n).forEach((size, i) => {
          expect(size).toBe(i < remainder ? base + 1 : base);
        });
      }
    }
  });

  it("rejects partition counts below one", () => {
    expect(() => divide(10, 0)).toThrow(ValidationError);
    expect(() => divide(10, -2)).toThrow(ValidationError);
  });

  it("rejects non-integer arguments", () => {
    expect(() => divide(10, 2.5)).toThrow(ValidationError);
    expect(() => divide(10.5, 2)).toThrow(ValidationError);
    expect(() => divide(-1, 2)).toThrow(ValidationError);
  });
});
