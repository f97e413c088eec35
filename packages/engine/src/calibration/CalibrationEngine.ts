/**
 * Calibration Engine
 *
 * Learns the resting band power of the run. While COLLECTING, every
 * positive feature sample is accumulated. Once the collection time has
 * elapsed AND more than `minSamples` have been seen, the baseline is
 * locked to their mean (floored at `minBaselinePower`) and the engine
 * stays CALIBRATED for the rest of the run.
 *
 * Collection starts at the first update, not at construction, so a
 * late first batch does not shorten the warm-up.
 */

import type { CalibrationState, Seconds, SessionMs } from "@neurocue/contracts";
import { secondsToMs } from "@neurocue/contracts";

/**
 * What a calibration did with one feature sample.
 * - collecting: still inside the collection period
 * - deferred: period over but too few samples; rechecked next update
 * - locked: baseline computed on this update
 * - calibrated: already locked earlier
 */
export type CalibrationUpdate =
  | { type: "collecting"; elapsedMs: number; count: number }
  | { type: "deferred"; elapsedMs: number; count: number }
  | { type: "locked"; baseline: number; count: number }
  | { type: "calibrated" };

/**
 * Anything that can turn a raw feature into a normalized score.
 */
export interface Calibrator {
  update(feature: number, now: SessionMs): CalibrationUpdate;

  /** feature / baseline, or null while not calibrated */
  normalize(feature: number): number | null;

  state(): CalibrationState;

  reset(): void;
}

/**
 * Configuration for the CalibrationEngine.
 */
export interface CalibrationEngineConfig {
  /** @default 3 */
  calibrationSeconds?: Seconds;

  /** Samples required, strictly more than this. @default 5 */
  minSamples?: number;

  /** @default 1e-12 */
  minBaselinePower?: number;
}

const DEFAULT_CONFIG: Required<CalibrationEngineConfig> = {
  calibrationSeconds: 3,
  minSamples: 5,
  minBaselinePower: 1e-12,
};

export class CalibrationEngine implements Calibrator {
  private config: Required<CalibrationEngineConfig>;

  private calibrated = false;
  private baseline: number;
  private sum = 0;
  private count = 0;
  private startTime: SessionMs | null = null;
  private deferred = false;

  constructor(config: CalibrationEngineConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.baseline = this.config.minBaselinePower;
  }

  update(feature: number, now: SessionMs): CalibrationUpdate {
    if (this.calibrated) return { type: "calibrated" };

    if (this.startTime === null) this.startTime = now;
    if (feature > 0 && Number.isFinite(feature)) {
      this.sum += feature;
      this.count++;
    }

    const elapsedMs = now - this.startTime;
    if (elapsedMs < secondsToMs(this.config.calibrationSeconds)) {
      return { type: "collecting", elapsedMs, count: this.count };
    }

    if (this.count <= this.config.minSamples) {
      this.deferred = true;
      return { type: "deferred", elapsedMs, count: this.count };
    }

    this.baseline = Math.max(this.sum / this.count, this.config.minBaselinePower);
    this.calibrated = true;
    this.deferred = false;
    return { type: "locked", baseline: this.baseline, count: this.count };
  }

  normalize(feature: number): number | null {
    if (!this.calibrated) return null;
    return feature / this.baseline;
  }

  state(): CalibrationState {
    return {
      phase: this.calibrated ? "CALIBRATED" : "COLLECTING",
      baselinePower: this.baseline,
      accumulatedSampleCount: this.count,
      collectionStartTime: this.startTime,
      deferred: this.deferred,
    };
  }

  reset(): void {
    this.calibrated = false;
    this.baseline = this.config.minBaselinePower;
    this.sum = 0;
    this.count = 0;
    this.startTime = null;
    this.deferred = false;
  }
}
