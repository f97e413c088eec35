/**
 * Gesture Detector
 *
 * High-frequency band power on the frontal channels, normalized by the
 * calibrated resting power. A very large burst (above the high
 * multiplier) is a head movement; a sustained moderate rise is a jaw
 * clench.
 */

import type { DetectionClass, DetectionKind } from "@neurocue/contracts";
import type { CalibrationEngine } from "../calibration/CalibrationEngine";
import type { ConditionedWindow, SignalConditioner } from "../conditioning/SignalConditioner";
import type { BandPowerExtractor } from "../features/BandPowerExtractor";
import type { EventDecider } from "./EventDecider";
import { ThresholdDetector } from "./ThresholdDetector";

export class GestureDetector extends ThresholdDetector {
  readonly id = "gesture";

  constructor(
    conditioner: SignalConditioner,
    private readonly extractor: BandPowerExtractor,
    calibration: CalibrationEngine,
    decider: EventDecider
  ) {
    super(conditioner, calibration, decider);
  }

  protected measure(window: ConditionedWindow): number {
    return this.extractor.extract(window.filtered);
  }

  protected kindFor(cls: DetectionClass): DetectionKind {
    return cls === "high" ? "head-move" : "clench";
  }
}
