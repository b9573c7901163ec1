import { describe, it, expect } from "vitest";
import { median, medianAbsoluteDeviation } from "../src/stats.js";

describe("median", () => {
  it("takes the middle of an odd sample", () => {
    expect(median([3, 1, 2])).toBe(2);
  });

  it("averages the middle pair of an even sample", () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it("is NaN for an empty sample", () => {
    expect(median([])).toBeNaN();
  });
});

describe("medianAbsoluteDeviation", () => {
  it("ignores a single outlier", () => {
    expect(medianAbsoluteDeviation([1, 2, 3, 4, 100])).toBe(1);
  });

  it("is zero when most values agree", () => {
    expect(medianAbsoluteDeviation([5, 5, 5, 9])).toBe(0);
  });
});
