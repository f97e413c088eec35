/**
 * Blink Detector
 *
 * Peak |d/dt| of the band-limited occipital trace over the newest
 * segment, divided by a fixed threshold. Any frame strictly above the
 * threshold is a blink.
 */

import type { DetectionKind } from "@neurocue/contracts";
import type { FixedBaseline } from "../calibration/FixedBaseline";
import type { ConditionedWindow, SignalConditioner } from "../conditioning/SignalConditioner";
import type { DerivativeExtractor } from "../features/DerivativeExtractor";
import type { EventDecider } from "./EventDecider";
import { ThresholdDetector } from "./ThresholdDetector";

export class BlinkDetector extends ThresholdDetector {
  readonly id = "blink";

  constructor(
    conditioner: SignalConditioner,
    private readonly extractor: DerivativeExtractor,
    threshold: FixedBaseline,
    decider: EventDecider
  ) {
    super(conditioner, threshold, decider);
  }

  protected measure(window: ConditionedWindow): number {
    return this.extractor.extract(window.filtered, window.appended);
  }

  protected kindFor(): DetectionKind {
    return "blink";
  }
}
