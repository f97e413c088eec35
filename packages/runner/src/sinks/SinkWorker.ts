import type { IMessageBus, ISubscription, Ms, TopicName, TopicPayloads } from "@neurocue/contracts";
import { PollingWorker, formatIssues, type PollingWorkerConfig } from "@neurocue/engine";

export interface SinkWorkerConfig extends PollingWorkerConfig {
  /** @default 100 */
  receiveTimeoutMs?: Ms;
}

/**
 * Worker that consumes one topic and hands each payload to handle().
 * Stands where an external display or actuator would subscribe.
 */
export abstract class SinkWorker<K extends TopicName> extends PollingWorker {
  private subscription: ISubscription<K> | null = null;
  private receiveTimeoutMs: Ms;

  constructor(
    id: string,
    readonly topic: K,
    protected readonly bus: IMessageBus,
    config: SinkWorkerConfig = {}
  ) {
    super(id, config);
    this.receiveTimeoutMs = config.receiveTimeoutMs ?? 100;
  }

  protected abstract handle(payload: TopicPayloads[K]): void;

  protected setup(): void {
    this.subscription = this.bus.subscribe(this.topic);
  }

  protected async cycle(): Promise<void> {
    if (!this.subscription) return;
    const result = await this.subscription.receive(this.receiveTimeoutMs);
    this.checkOverflow(this.subscription);

    switch (result.kind) {
      case "message":
        this.handle(result.payload);
        return;
      case "malformed": {
        const message = `Dropped malformed ${this.topic}: ${formatIssues(result.issues)}`;
        this.report("MALFORMED_MESSAGE", "warning", message);
        this.logger.warn(message);
        return;
      }
      case "closed":
        this.stop();
        return;
      case "timeout":
        return;
    }
  }

  protected teardown(): void {
    this.subscription?.close();
    this.subscription = null;
  }
}
