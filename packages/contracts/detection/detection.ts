/**
 * Detection Types
 *
 * Shared vocabulary for calibration and event detection.
 */

import type { SessionMs } from "../core/time";

export type CalibrationPhase = "COLLECTING" | "CALIBRATED";

export interface CalibrationState {
  phase: CalibrationPhase;
  /** Floor-guarded baseline; meaningful once CALIBRATED */
  baselinePower: number;
  accumulatedSampleCount: number;
  /** Null until the first feature sample is seen */
  collectionStartTime: SessionMs | null;
  /** The calibration deadline has passed without enough samples; rechecked every update */
  deferred: boolean;
}

/**
 * Which decision branch fired.
 * - high: score exceeded the high multiplier, emitted immediately
 * - low: score held above the low multiplier for the debounce count
 */
export type DetectionClass = "high" | "low";

export type DetectionKind = "blink" | "clench" | "head-move";

export interface DetectionEvent {
  kind: DetectionKind;
  class: DetectionClass;
  /** The normalized score that triggered the event */
  magnitude: number;
  timestamp: SessionMs;
}

/**
 * Result of evaluating one frame.
 */
export type DecisionOutcome =
  | { type: "inactive" }                 // not calibrated
  | { type: "cooldown"; until: SessionMs }
  | { type: "idle" }                     // below the low multiplier
  | { type: "debouncing"; count: number }
  | { type: "emit"; class: DetectionClass; score: number };
