/**
 * Detector Worker
 *
 * Binds one detector to the bus: raw-sample in, blink-event or
 * move-event out. Each cycle waits at most `receiveTimeoutMs` for the
 * next batch, so a stop request is seen within one timeout.
 *
 * Events are published only when the detector fires:
 * - blink     → blink-event { triggered: true }
 * - clench    → move-event  { direction: 1 }
 * - head-move → move-event  { direction: -1 }
 */

import type {
  CalibrationPhase,
  DetectionEvent,
  IDetector,
  IMessageBus,
  ISubscription,
  Ms,
  PayloadIssue,
  Seconds,
} from "@neurocue/contracts";
import { secondsToMs } from "@neurocue/contracts";
import { PollingWorker, type PollingWorkerConfig } from "./PollingWorker";

/**
 * Configuration for the DetectorWorker.
 */
export interface DetectorWorkerConfig extends PollingWorkerConfig {
  /** Longest wait for a batch per cycle. @default 100 */
  receiveTimeoutMs?: Ms;

  /** Silence after which acquisition is reported unavailable. @default 1 */
  stallSeconds?: Seconds;
}

export function formatIssues(issues: readonly PayloadIssue[]): string {
  return issues.map((issue) => `${issue.path || "(root)"}: ${issue.message}`).join("; ");
}

export class DetectorWorker extends PollingWorker {
  private receiveTimeoutMs: Ms;
  private stallMs: Ms;

  private subscription: ISubscription<"raw-sample"> | null = null;
  private lastBatchAt = 0;
  private stalled = false;
  private phase: CalibrationPhase | null = null;
  private deferred = false;
  private emitted = 0;

  constructor(
    private readonly detector: IDetector,
    private readonly bus: IMessageBus,
    config: DetectorWorkerConfig = {}
  ) {
    super(`detector:${detector.id}`, config);
    this.receiveTimeoutMs = config.receiveTimeoutMs ?? 100;
    this.stallMs = secondsToMs(config.stallSeconds ?? 1);
  }

  get eventCount(): number {
    return this.emitted;
  }

  protected setup(): void {
    this.subscription = this.bus.subscribe("raw-sample");
    this.detector.init();
    this.lastBatchAt = this.clock.now();
    this.stalled = false;
    this.phase = this.detector.calibration().phase;
    this.deferred = false;
  }

  protected async cycle(): Promise<void> {
    if (!this.subscription) return;
    const result = await this.subscription.receive(this.receiveTimeoutMs);
    const now = this.clock.now();
    this.checkOverflow(this.subscription);

    switch (result.kind) {
      case "message": {
        if (this.stalled) {
          this.stalled = false;
          this.logger.info("Acquisition resumed");
        }
        this.lastBatchAt = now;

        const event = this.detector.process(result.payload, now);
        this.trackCalibration();
        if (event) this.publish(event);
        return;
      }
      case "timeout":
        if (!this.stalled && now - this.lastBatchAt >= this.stallMs) {
          this.stalled = true;
          const message = `No samples for ${((now - this.lastBatchAt) / 1000).toFixed(1)}s, keeping last window`;
          this.report("ACQUISITION_UNAVAILABLE", "warning", message);
          this.logger.warn(message);
        }
        return;
      case "malformed": {
        const message = `Dropped malformed raw-sample: ${formatIssues(result.issues)}`;
        this.report("MALFORMED_MESSAGE", "warning", message);
        this.logger.warn(message);
        return;
      }
      case "closed":
        this.logger.info("Bus closed");
        this.stop();
        return;
    }
  }

  protected teardown(): void {
    this.subscription?.close();
    this.subscription = null;
    this.detector.dispose();
  }

  private trackCalibration(): void {
    const state = this.detector.calibration();

    if (state.phase === "CALIBRATED" && this.phase !== "CALIBRATED") {
      this.logger.info(
        `Baseline locked: ${state.baselinePower.toExponential(1)} (${state.accumulatedSampleCount} samples)`
      );
    }
    this.phase = state.phase;

    if (state.deferred && !this.deferred) {
      const message = `Calibration deferred: ${state.accumulatedSampleCount} samples collected`;
      this.report("CALIBRATION_INSUFFICIENT_DATA", "warning", message);
      this.logger.warn(message);
    }
    this.deferred = state.deferred;
  }

  private publish(event: DetectionEvent): void {
    this.emitted++;
    this.logger.info(`${event.kind} detected (x${event.magnitude.toFixed(1)})`);

    switch (event.kind) {
      case "blink":
        this.bus.publish("blink-event", { triggered: true });
        return;
      case "clench":
        this.bus.publish("move-event", { direction: 1 });
        return;
      case "head-move":
        this.bus.publish("move-event", { direction: -1 });
        return;
    }
  }
}
