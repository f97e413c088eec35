import type { CalibrationState } from "@neurocue/contracts";
import type { CalibrationUpdate, Calibrator } from "./CalibrationEngine";

/**
 * Calibrator with a preset baseline, used where the threshold is an
 * absolute value (the blink derivative). Always CALIBRATED.
 */
export class FixedBaseline implements Calibrator {
  constructor(readonly baseline: number) {
    if (!(baseline > 0) || !Number.isFinite(baseline)) {
      throw new Error(`FixedBaseline needs a positive finite baseline, got ${baseline}`);
    }
  }

  update(): CalibrationUpdate {
    return { type: "calibrated" };
  }

  normalize(feature: number): number {
    return feature / this.baseline;
  }

  state(): CalibrationState {
    return {
      phase: "CALIBRATED",
      baselinePower: this.baseline,
      accumulatedSampleCount: 0,
      collectionStartTime: null,
      deferred: false,
    };
  }

  reset(): void {}
}
