import { describe, it, expect } from "vitest";
import { BandPowerExtractor } from "../../src/features/BandPowerExtractor";
import { DerivativeExtractor } from "../../src/features/DerivativeExtractor";
import { constant, sine } from "../_harness/signals";

describe("BandPowerExtractor", () => {
  const extractor = new BandPowerExtractor({
    sampleRate: 250,
    fftWindowSeconds: 0.5,
    bandLow: 35,
    bandHigh: 110,
    minSeconds: 0.1,
  });

  it("is zero for an all-zero window", () => {
    expect(extractor.extract(new Float64Array(1000))).toBe(0);
  });

  it("is zero below the minimum sub-window length", () => {
    expect(extractor.extract(Float64Array.from(sine(60, 10, 250, 24)))).toBe(0);
    expect(extractor.extract(new Float64Array(0))).toBe(0);
  });

  it("measures in-band activity far above out-of-band activity", () => {
    const inBand = extractor.extract(Float64Array.from(sine(60, 10, 250, 1000)));
    const outOfBand = extractor.extract(Float64Array.from(sine(10, 10, 250, 1000)));

    expect(inBand).toBeGreaterThan(0);
    expect(inBand).toBeGreaterThan(outOfBand * 100);
  });

  it("scales with the square of the amplitude", () => {
    const small = extractor.extract(Float64Array.from(sine(60, 1, 250, 1000)));
    const large = extractor.extract(Float64Array.from(sine(60, 10, 250, 1000)));
    expect(large / small).toBeCloseTo(100, 6);
  });

  it("only looks at the newest sub-window", () => {
    const signal = [...sine(60, 10, 250, 500), ...constant(0, 125)];
    expect(extractor.extract(Float64Array.from(signal))).toBe(0);
  });
});

describe("DerivativeExtractor", () => {
  const extractor = new DerivativeExtractor({ sampleRate: 100, checkSeconds: 0.1 });

  it("reports the peak rate of change in the newest segment", () => {
    const trace = [...constant(0, 20), 0, 2, 5, 4];
    // newest 10 samples; steepest step is 2 → 5 at 100 Hz
    expect(extractor.extract(Float64Array.from(trace), 4)).toBe(300);
  });

  it("ignores spikes older than the scanned segment", () => {
    const trace = [0, 50, 0, ...constant(0, 40)];
    expect(extractor.extract(Float64Array.from(trace), 5)).toBe(0);
  });

  it("scans the whole batch when it is longer than the minimum", () => {
    const trace = [0, 50, 0, ...constant(0, 40)];
    expect(extractor.extract(Float64Array.from(trace), 43)).toBe(5000);
  });

  it("is zero for an empty trace", () => {
    expect(extractor.extract(new Float64Array(0), 0)).toBe(0);
  });
});
