import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { CalibrationEngine } from "../../src/calibration/CalibrationEngine";
import { FixedBaseline } from "../../src/calibration/FixedBaseline";

describe("CalibrationEngine", () => {
  it("collects until the period has elapsed, then locks the mean", () => {
    const engine = new CalibrationEngine({ calibrationSeconds: 1, minSamples: 2 });

    expect(engine.update(2, 0)).toEqual({ type: "collecting", elapsedMs: 0, count: 1 });
    expect(engine.update(4, 500)).toEqual({ type: "collecting", elapsedMs: 500, count: 2 });
    expect(engine.normalize(4)).toBeNull();

    expect(engine.update(6, 1000)).toEqual({ type: "locked", baseline: 4, count: 3 });
    expect(engine.normalize(8)).toBe(2);
    expect(engine.state()).toEqual({
      phase: "CALIBRATED",
      baselinePower: 4,
      accumulatedSampleCount: 3,
      collectionStartTime: 0,
      deferred: false,
    });
  });

  it("measures the period from the first update", () => {
    const engine = new CalibrationEngine({ calibrationSeconds: 1, minSamples: 0 });
    engine.update(1, 5000);
    expect(engine.update(1, 5999).type).toBe("collecting");
    expect(engine.update(1, 6000).type).toBe("locked");
    expect(engine.state().collectionStartTime).toBe(5000);
  });

  it("skips non-positive samples", () => {
    const engine = new CalibrationEngine({ calibrationSeconds: 0, minSamples: 1 });
    engine.update(0, 0);
    engine.update(-3, 10);
    engine.update(Number.NaN, 20);
    expect(engine.state().accumulatedSampleCount).toBe(0);
  });

  it("defers while too few samples have been seen, and recovers", () => {
    const engine = new CalibrationEngine({ calibrationSeconds: 1, minSamples: 2 });
    engine.update(1, 0);
    engine.update(0, 600);

    expect(engine.update(1, 1000)).toEqual({ type: "deferred", elapsedMs: 1000, count: 2 });
    expect(engine.state()).toMatchObject({ phase: "COLLECTING", deferred: true });

    expect(engine.update(4, 1100)).toEqual({ type: "locked", baseline: 2, count: 3 });
    expect(engine.state().deferred).toBe(false);
  });

  it("floors the baseline", () => {
    const engine = new CalibrationEngine({
      calibrationSeconds: 0,
      minSamples: 0,
      minBaselinePower: 1e-6,
    });
    expect(engine.update(1e-9, 0)).toEqual({ type: "locked", baseline: 1e-6, count: 1 });
  });

  it("keeps the baseline at or above the floor for any accumulation", () => {
    fc.assert(
      fc.property(
        fc.array(fc.oneof(fc.constant(0), fc.double({ min: 0, max: 1e3, noNaN: true })), {
          minLength: 1,
          maxLength: 30,
        }),
        (features) => {
          const engine = new CalibrationEngine({
            calibrationSeconds: 0,
            minSamples: 0,
            minBaselinePower: 1e-12,
          });
          features.forEach((feature, i) => engine.update(feature, i));
          expect(engine.state().baselinePower).toBeGreaterThanOrEqual(1e-12);
        }
      )
    );
  });

  it("never leaves CALIBRATED once locked", () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: 0, max: 1e3, noNaN: true }), { minLength: 10, maxLength: 60 }),
        (features) => {
          const engine = new CalibrationEngine({ calibrationSeconds: 0.1, minSamples: 0 });
          let locked = false;
          features.forEach((feature, i) => {
            engine.update(feature, i * 40);
            if (engine.state().phase === "CALIBRATED") locked = true;
            if (locked) expect(engine.state().phase).toBe("CALIBRATED");
          });
        }
      )
    );
  });

  it("ignores new samples once locked", () => {
    const engine = new CalibrationEngine({ calibrationSeconds: 0, minSamples: 0 });
    engine.update(5, 0);
    expect(engine.update(500, 10)).toEqual({ type: "calibrated" });
    expect(engine.state().baselinePower).toBe(5);
  });

  it("starts collecting again after reset", () => {
    const engine = new CalibrationEngine({ calibrationSeconds: 0, minSamples: 0 });
    engine.update(5, 0);
    engine.reset();
    expect(engine.state()).toMatchObject({
      phase: "COLLECTING",
      accumulatedSampleCount: 0,
      collectionStartTime: null,
    });
  });
});

describe("FixedBaseline", () => {
  it("is always calibrated against its threshold", () => {
    const baseline = new FixedBaseline(20000);
    expect(baseline.update()).toEqual({ type: "calibrated" });
    expect(baseline.normalize(30000)).toBe(1.5);
    expect(baseline.state().phase).toBe("CALIBRATED");
  });

  it("rejects a non-positive threshold", () => {
    expect(() => new FixedBaseline(0)).toThrow(/positive finite/);
  });
});
