/**
 * Shared frame pipeline of the detectors:
 * conditioning → feature → calibration → decision.
 *
 * Subclasses choose the feature and how a decision class maps to an
 * event kind.
 */

import type {
  CalibrationState,
  DetectionClass,
  DetectionEvent,
  DetectionKind,
  IDetector,
  SampleBatch,
  SessionMs,
} from "@neurocue/contracts";
import type { Calibrator, CalibrationUpdate } from "../calibration/CalibrationEngine";
import type { ConditionedWindow, SignalConditioner } from "../conditioning/SignalConditioner";
import type { EventDecider } from "./EventDecider";

/**
 * Everything the last frame computed, for logging and tests.
 */
export interface FrameTrace {
  feature: number;
  score: number | null;
  calibration: CalibrationUpdate;
}

export abstract class ThresholdDetector implements IDetector {
  abstract readonly id: string;

  private last: FrameTrace | null = null;

  constructor(
    protected readonly conditioner: SignalConditioner,
    protected readonly calibrator: Calibrator,
    protected readonly decider: EventDecider
  ) {}

  protected abstract measure(window: ConditionedWindow): number;

  protected abstract kindFor(cls: DetectionClass): DetectionKind;

  init(): void {
    this.reset();
  }

  dispose(): void {
    this.conditioner.reset();
  }

  process(batch: SampleBatch, now: SessionMs): DetectionEvent | null {
    const window = this.conditioner.update(batch);
    const feature = this.measure(window);
    const calibration = this.calibrator.update(feature, now);
    const score = this.calibrator.normalize(feature);
    this.last = { feature, score, calibration };

    const outcome = this.decider.decide(score, now);
    if (outcome.type !== "emit") return null;

    return {
      kind: this.kindFor(outcome.class),
      class: outcome.class,
      magnitude: outcome.score,
      timestamp: now,
    };
  }

  calibration(): CalibrationState {
    return this.calibrator.state();
  }

  lastFrame(): FrameTrace | null {
    return this.last;
  }

  reset(): void {
    this.conditioner.reset();
    this.calibrator.reset();
    this.decider.reset();
    this.last = null;
  }
}
