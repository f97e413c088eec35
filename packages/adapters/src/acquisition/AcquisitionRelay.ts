/**
 * Acquisition Relay
 *
 * Forwards every batch from a sample source onto the raw-sample topic.
 * Both detector paths subscribe to that one stream and pick their own
 * channels downstream.
 */

import type { IMessageBus, ISampleSource, Logger, SampleBatch } from "@neurocue/contracts";
import { BusError, batchLength, describeError, silentLogger } from "@neurocue/contracts";

export interface AcquisitionRelayConfig {
  logger?: Logger;
}

export class AcquisitionRelay {
  private source: ISampleSource;
  private bus: IMessageBus;
  private logger: Logger;
  private unsubscribe: (() => void) | null = null;

  private batchCount = 0;
  private sampleCount = 0;

  constructor(source: ISampleSource, bus: IMessageBus, config: AcquisitionRelayConfig = {}) {
    this.source = source;
    this.bus = bus;
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Start forwarding and start the source.
   */
  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.source.onBatch((batch) => this.forward(batch));
    this.source.start();
    this.logger.info(`Relaying "${this.source.source}" onto raw-sample`);
  }

  /**
   * Stop the source and stop forwarding.
   */
  stop(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
      this.source.stop();
    }
  }

  get running(): boolean {
    return this.unsubscribe !== null;
  }

  stats(): { batches: number; samples: number } {
    return { batches: this.batchCount, samples: this.sampleCount };
  }

  private forward(batch: SampleBatch): void {
    try {
      this.bus.publish("raw-sample", batch);
      this.batchCount++;
      this.sampleCount += batchLength(batch);
    } catch (err) {
      if (err instanceof BusError && err.code === "BUS_CLOSED") {
        this.logger.warn("Bus closed; stopping relay");
        this.stop();
        return;
      }
      this.logger.error(`Failed to relay batch: ${describeError(err)}`);
    }
  }
}
