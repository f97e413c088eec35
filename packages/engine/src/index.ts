// Buffers
export { RingBuffer } from "./buffer/RingBuffer";
export { ChannelBuffers } from "./buffer/ChannelBuffers";

// DSP
export {
  FilterCascade,
  FilterDesignError,
  butterworth,
  notch,
  designStage,
  sosFilter,
} from "./dsp/filters";
export type { Biquad, FilterStage } from "./dsp/filters";
export { hannWindow, welchPsd, bandPower } from "./dsp/spectrum";
export type { PowerSpectrum, WelchOptions } from "./dsp/spectrum";
export { mean, removeDc, averageTraces, derivative, maxAbs } from "./dsp/stats";

// Conditioning & features
export { SignalConditioner } from "./conditioning/SignalConditioner";
export type {
  SignalConditionerConfig,
  ConditionedWindow,
  ChannelCombine,
} from "./conditioning/SignalConditioner";
export { BandPowerExtractor } from "./features/BandPowerExtractor";
export type { BandPowerExtractorConfig } from "./features/BandPowerExtractor";
export { DerivativeExtractor } from "./features/DerivativeExtractor";
export type { DerivativeExtractorConfig } from "./features/DerivativeExtractor";

// Calibration
export { CalibrationEngine } from "./calibration/CalibrationEngine";
export type {
  CalibrationEngineConfig,
  CalibrationUpdate,
  Calibrator,
} from "./calibration/CalibrationEngine";
export { FixedBaseline } from "./calibration/FixedBaseline";

// Detectors
export { EventDecider } from "./detectors/EventDecider";
export type { EventDeciderConfig } from "./detectors/EventDecider";
export { ThresholdDetector } from "./detectors/ThresholdDetector";
export type { FrameTrace } from "./detectors/ThresholdDetector";
export { GestureDetector } from "./detectors/GestureDetector";
export { BlinkDetector } from "./detectors/BlinkDetector";

// Session
export { SessionStateMachine } from "./session/SessionStateMachine";
export type {
  SessionStateMachineConfig,
  TransitionListener,
} from "./session/SessionStateMachine";

// Clocks
export { SystemClock, ManualClock } from "./clock/clocks";

// Workers
export { PollingWorker } from "./workers/PollingWorker";
export type { PollingWorkerConfig } from "./workers/PollingWorker";
export { DetectorWorker, formatIssues } from "./workers/DetectorWorker";
export type { DetectorWorkerConfig } from "./workers/DetectorWorker";
export { SessionWorker } from "./workers/SessionWorker";
export type { SessionWorkerConfig } from "./workers/SessionWorker";

// Factories
export {
  GESTURE_STAGES,
  BLINK_STAGES,
  createGestureDetector,
  createBlinkDetector,
  createSessionStateMachine,
} from "./factories";
