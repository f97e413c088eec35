/**
 * Builds detectors and the session state machine from a RuntimeConfig.
 *
 * Filter chains:
 * - gesture: 50 Hz notch (Q 30), then 2nd-order high-pass at 2 Hz,
 *   over the average of the move channels
 * - blink: 2nd-order high-pass at 0.3 Hz, then 2nd-order low-pass at
 *   20 Hz, over the first blink channel
 */

import type { RuntimeConfig } from "@neurocue/contracts";
import { secondsToMs } from "@neurocue/contracts";
import { CalibrationEngine } from "./calibration/CalibrationEngine";
import { FixedBaseline } from "./calibration/FixedBaseline";
import { SignalConditioner } from "./conditioning/SignalConditioner";
import type { FilterStage } from "./dsp/filters";
import { BandPowerExtractor } from "./features/BandPowerExtractor";
import { DerivativeExtractor } from "./features/DerivativeExtractor";
import { BlinkDetector } from "./detectors/BlinkDetector";
import { EventDecider } from "./detectors/EventDecider";
import { GestureDetector } from "./detectors/GestureDetector";
import { SessionStateMachine } from "./session/SessionStateMachine";

export const GESTURE_STAGES: readonly FilterStage[] = [
  { type: "notch", frequency: 50, q: 30 },
  { type: "highpass", cutoff: 2, order: 2 },
];

export const BLINK_STAGES: readonly FilterStage[] = [
  { type: "highpass", cutoff: 0.3, order: 2 },
  { type: "lowpass", cutoff: 20, order: 2 },
];

export function createGestureDetector(
  config: RuntimeConfig,
  stages: readonly FilterStage[] = GESTURE_STAGES
): GestureDetector {
  return new GestureDetector(
    new SignalConditioner({
      channels: config.moveChannels,
      sampleRate: config.sampleRate,
      windowSeconds: config.analysisWindowSeconds,
      combine: "average",
      stages: [...stages],
    }),
    new BandPowerExtractor({
      sampleRate: config.sampleRate,
      fftWindowSeconds: config.fftWindowSeconds,
      bandLow: config.frequencyBandLow,
      bandHigh: config.frequencyBandHigh,
      minSeconds: config.minFeatureSeconds,
    }),
    new CalibrationEngine({
      calibrationSeconds: config.calibrationSeconds,
      minSamples: config.minCalibrationSamples,
      minBaselinePower: config.minBaselinePower,
    }),
    new EventDecider({
      lowMultiplier: config.lowThresholdMultiplier,
      highMultiplier: config.highThresholdMultiplier,
      debounceFrames: config.debounceFrameCount,
      cooldownMs: secondsToMs(config.cooldownSeconds),
    })
  );
}

export function createBlinkDetector(
  config: RuntimeConfig,
  stages: readonly FilterStage[] = BLINK_STAGES
): BlinkDetector {
  return new BlinkDetector(
    new SignalConditioner({
      channels: config.blinkChannels,
      sampleRate: config.sampleRate,
      windowSeconds: config.blinkWindowSeconds,
      combine: "first",
      stages: [...stages],
    }),
    new DerivativeExtractor({
      sampleRate: config.sampleRate,
      checkSeconds: config.blinkCheckSeconds,
    }),
    new FixedBaseline(config.blinkDerivativeThreshold),
    // Score is |d/dt| / threshold: a blink fires at once when it is strictly above 1
    new EventDecider({
      lowMultiplier: 1,
      highMultiplier: 1,
      debounceFrames: 1,
      cooldownMs: secondsToMs(config.blinkCooldownSeconds),
    })
  );
}

export function createSessionStateMachine(config: RuntimeConfig): SessionStateMachine {
  return new SessionStateMachine({
    readySeconds: config.readySeconds,
    restSeconds: config.restSeconds,
  });
}
