/**
 * Polling Worker
 *
 * Base for every long-lived loop: setup, then cycle → sleep until
 * stopped, then teardown. A cycle that throws is logged and recorded as
 * CYCLE_FAILED; the loop carries on. Only setup failures reject run().
 * Teardown runs on every exit path.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  IClock,
  ISubscription,
  IWorker,
  Logger,
  Ms,
  TopicName,
  WorkerId,
} from "@neurocue/contracts";
import { DiagnosticLog, TOPIC_DELIVERY, createConsoleLogger, describeError } from "@neurocue/contracts";
import { SystemClock } from "../clock/clocks";

/**
 * Configuration shared by all workers.
 */
export interface PollingWorkerConfig {
  /** Pause between cycles. @default 10 */
  pollIntervalMs?: Ms;

  clock?: IClock;

  logger?: Logger;

  /** Recent diagnostics kept per worker. @default 50 */
  diagnosticsCapacity?: number;
}

export abstract class PollingWorker implements IWorker {
  readonly id: WorkerId;

  protected readonly clock: IClock;
  protected readonly logger: Logger;
  protected readonly pollIntervalMs: Ms;

  private log: DiagnosticLog;
  private controller: AbortController | null = null;
  private cycles = 0;
  private droppedSeen = new Map<TopicName, number>();

  constructor(id: WorkerId, config: PollingWorkerConfig = {}) {
    this.id = id;
    this.clock = config.clock ?? new SystemClock();
    this.logger = config.logger ?? createConsoleLogger(id);
    this.pollIntervalMs = config.pollIntervalMs ?? 10;
    this.log = new DiagnosticLog(config.diagnosticsCapacity ?? 50);
  }

  /** Open subscriptions. Throwing here is fatal. */
  protected abstract setup(): void;

  /** One bounded unit of work. */
  protected abstract cycle(): Promise<void>;

  /** Release bus handles. Must not throw. */
  protected abstract teardown(): void;

  get running(): boolean {
    return this.controller !== null;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  async run(): Promise<void> {
    if (this.controller) {
      throw new Error(`Worker ${this.id} is already running`);
    }
    const controller = new AbortController();
    this.controller = controller;

    this.droppedSeen.clear();
    try {
      this.setup();
      this.logger.info("Started");

      while (!controller.signal.aborted) {
        try {
          await this.cycle();
        } catch (err) {
          this.report("CYCLE_FAILED", "error", `Cycle failed: ${describeError(err)}`);
          this.logger.error("Cycle failed", err);
        }
        this.cycles++;
        await this.pause(controller.signal);
      }
    } finally {
      this.teardown();
      this.controller = null;
      this.logger.info("Stopped");
    }
  }

  stop(): void {
    this.controller?.abort();
  }

  diagnostics(): readonly Diagnostic[] {
    return this.log.list();
  }

  protected report(code: DiagnosticCode, severity: DiagnosticSeverity, message: string): void {
    this.log.record({
      code,
      severity,
      message,
      timestamp: this.clock.now(),
      source: this.id,
    });
  }

  /**
   * Record QUEUE_OVERFLOW when a queued subscription has dropped messages
   * since the last check. Superseded LATEST messages are not overflow. The
   * bus itself logs the drops.
   */
  protected checkOverflow(subscription: Pick<ISubscription<TopicName>, "topic" | "dropped">): void {
    if (TOPIC_DELIVERY[subscription.topic] !== "queued") return;
    const total = subscription.dropped();
    const seen = this.droppedSeen.get(subscription.topic) ?? 0;
    if (total <= seen) return;
    this.droppedSeen.set(subscription.topic, total);
    this.report(
      "QUEUE_OVERFLOW",
      "warning",
      `${total - seen} ${subscription.topic} message(s) dropped (total ${total})`
    );
  }

  private async pause(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    try {
      await sleep(this.pollIntervalMs, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  }
}
