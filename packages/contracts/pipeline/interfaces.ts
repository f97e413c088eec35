/**
 * Pipeline Interfaces
 *
 * Contracts for the pieces a worker is assembled from: sample sources,
 * detectors, clocks, and the workers themselves.
 *
 * Flow: acquisition → raw-sample → detectors → blink-event / move-event
 *       → session state machine → status / command → external sinks
 */

import type { SourceId, WorkerId } from "../core/provenance";
import type { SessionMs } from "../core/time";
import type { SampleBatch } from "../signal/signal";
import type { CalibrationState, DetectionEvent } from "../detection/detection";
import type { Diagnostic } from "../diagnostics/diagnostics";

// ============================================================================
// Time
// ============================================================================

/**
 * Source of "now" for every timing decision.
 * Workers never read the wall clock directly, so tests can drive time.
 */
export interface IClock {
  now(): SessionMs;
}

// ============================================================================
// Acquisition
// ============================================================================

/**
 * Upstream producer of sample batches at a fixed rate.
 * Hardware drivers live outside this project; anything that can push
 * batches can implement this.
 */
export interface ISampleSource {
  readonly source: SourceId;

  /**
   * Subscribe to batches as they are produced.
   * Returns an unsubscribe function.
   */
  onBatch(callback: (batch: SampleBatch) => void): () => void;

  start(): void;

  stop(): void;
}

// ============================================================================
// Detectors
// ============================================================================

/**
 * Detector that turns conditioned sample batches into discrete events.
 *
 * Detectors own their rolling buffer and calibration state. They are fed
 * every batch in arrival order and decide synchronously.
 */
export interface IDetector {
  readonly id: string;

  /** Called once before the first batch */
  init(): void;

  /** Called once when the owning worker stops */
  dispose(): void;

  /**
   * Append a batch and run conditioning → extraction → decision.
   * @returns the emitted event, or null for no event on this frame
   */
  process(batch: SampleBatch, now: SessionMs): DetectionEvent | null;

  /** Current calibration view (always CALIBRATED for fixed-threshold detectors) */
  calibration(): CalibrationState;

  /** Clear buffers, calibration and decision state */
  reset(): void;
}

// ============================================================================
// Workers
// ============================================================================

/**
 * A long-lived cooperative poll loop.
 */
export interface IWorker {
  readonly id: WorkerId;

  /**
   * Run until stop() is called. Resolves after cleanup has run.
   * Rejects only on setup failure.
   */
  run(): Promise<void>;

  /** Request a stop; observed within one receive timeout. */
  stop(): void;

  readonly running: boolean;

  diagnostics(): readonly Diagnostic[];
}
