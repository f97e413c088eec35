import { describe, it, expect } from "vitest";
import { averageTraces, derivative, maxAbs, mean, removeDc } from "../../src/dsp/stats";

describe("stats", () => {
  it("takes the mean, zero for empty input", () => {
    expect(mean([1, 2, 3, 6])).toBe(3);
    expect(mean([])).toBe(0);
  });

  it("removes the DC offset", () => {
    expect(Array.from(removeDc([4, 6, 8]))).toEqual([-2, 0, 2]);
  });

  it("averages traces sample by sample over the shortest length", () => {
    expect(Array.from(averageTraces([[1, 3, 5], [3, 5]]))).toEqual([2, 4]);
    expect(averageTraces([])).toHaveLength(0);
  });

  it("scales the first difference by the sample rate", () => {
    expect(Array.from(derivative([0, 1, 3, 2], 100))).toEqual([0, 100, 200, -100]);
  });

  it("finds the largest magnitude", () => {
    expect(maxAbs([1, -7, 3])).toBe(7);
    expect(maxAbs([])).toBe(0);
  });
});
