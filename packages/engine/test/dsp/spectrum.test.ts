import { describe, it, expect } from "vitest";
import { bandPower, hannWindow, welchPsd } from "../../src/dsp/spectrum";
import { constant, sine } from "../_harness/signals";

describe("hannWindow", () => {
  it("is periodic (no repeated endpoint)", () => {
    const w = hannWindow(4);
    expect(w[0]).toBeCloseTo(0, 12);
    expect(w[1]).toBeCloseTo(0.5, 12);
    expect(w[2]).toBeCloseTo(1, 12);
    expect(w[3]).toBeCloseTo(0.5, 12);
  });
});

describe("welchPsd", () => {
  it("computes a single-segment density estimate", () => {
    // Window [0, .5, 1, .5] leaves an impulse of -1 at index 2,
    // so every |X[k]|² is 1; scale = 1 / (fs * Σw²) = 1 / 6
    const { freqs, psd } = welchPsd([1, 0, -1, 0], 4, { nperseg: 4 });

    expect(Array.from(freqs)).toEqual([0, 1, 2]);
    expect(psd[0]).toBeCloseTo(1 / 6, 12);
    expect(psd[1]).toBeCloseTo(1 / 3, 12);
    expect(psd[2]).toBeCloseTo(1 / 6, 12);
  });

  it("spaces bins at fs / nperseg up to Nyquist", () => {
    const { freqs } = welchPsd(sine(10, 1, 250, 125), 250, { nperseg: 125 });
    expect(freqs).toHaveLength(63);
    expect(freqs[1]).toBe(2);
    expect(freqs[62]).toBe(124);
  });

  it("clamps the segment length to the input", () => {
    const { freqs } = welchPsd(sine(10, 1, 250, 50), 250, { nperseg: 125 });
    expect(freqs).toHaveLength(26);
    expect(freqs[1]).toBe(5);
  });

  it("removes the mean of each segment", () => {
    const { psd } = welchPsd(constant(42, 256), 250, { nperseg: 128 });
    for (const value of psd) {
      expect(value).toBeCloseTo(0, 12);
    }
  });

  it("peaks at the bin of a pure tone", () => {
    const { freqs, psd } = welchPsd(sine(40, 3, 250, 500), 250, { nperseg: 125 });
    let peak = 0;
    for (let k = 1; k < psd.length; k++) {
      if (psd[k] > psd[peak]) peak = k;
    }
    expect(freqs[peak]).toBe(40);
  });

  it("returns an empty spectrum for empty input", () => {
    const { freqs, psd } = welchPsd([], 250, { nperseg: 125 });
    expect(freqs).toHaveLength(0);
    expect(psd).toHaveLength(0);
  });
});

describe("bandPower", () => {
  it("averages the bins inside the closed band", () => {
    const spectrum = welchPsd([1, 0, -1, 0], 4, { nperseg: 4 });
    expect(bandPower(spectrum, 1, 2)).toBeCloseTo(0.25, 12);
    expect(bandPower(spectrum, 0, 0)).toBeCloseTo(1 / 6, 12);
  });

  it("is zero for an all-zero signal", () => {
    const spectrum = welchPsd(constant(0, 125), 250, { nperseg: 125 });
    expect(bandPower(spectrum, 35, 110)).toBe(0);
  });

  it("is zero when no bin falls in the band", () => {
    const spectrum = welchPsd(sine(40, 3, 250, 125), 250, { nperseg: 125 });
    expect(bandPower(spectrum, 130, 200)).toBe(0);
    expect(bandPower(spectrum, 40.5, 41.5)).toBe(0);
  });
});
