/**
 * In-process message bus.
 *
 * Workers share nothing but this object. Every publish is copied per
 * subscriber (structuredClone), so a worker can never observe another
 * worker's later mutations.
 *
 * Delivery per topic follows TOPIC_DELIVERY:
 * - queued topics keep every message in order, bounded by capacity
 * - latest topics keep only the newest unread message
 *
 * There is no replay: a subscription created after a publish never sees it.
 */

import type {
  IMessageBus,
  ISubscription,
  Logger,
  QueueOverflowPolicy,
  SubscribeOptions,
  TopicName,
  TopicPayloads,
} from "@neurocue/contracts";
import { BusError, TOPIC_DELIVERY, isTopicName, silentLogger } from "@neurocue/contracts";
import { BusSubscription } from "./BusSubscription";

/**
 * Configuration for the bus.
 */
export interface InMemoryBusConfig {
  /** Default bound for queued subscriptions. @default 1024 */
  queueCapacity?: number;

  /** Default overflow policy for queued subscriptions. @default "drop-oldest" */
  queueOverflow?: QueueOverflowPolicy;

  logger?: Logger;
}

/** Log the first overflow drop, then every Nth */
const DROP_LOG_INTERVAL = 100;

interface Deliverable {
  deliver(raw: unknown): void;
  close(): void;
}

export class InMemoryBus implements IMessageBus {
  private config: Required<Omit<InMemoryBusConfig, "logger">>;
  private logger: Logger;
  private subscribers: Map<TopicName, Set<Deliverable>> = new Map();
  private isClosed = false;

  constructor(config: InMemoryBusConfig = {}) {
    this.config = {
      queueCapacity: config.queueCapacity ?? 1024,
      queueOverflow: config.queueOverflow ?? "drop-oldest",
    };
    this.logger = config.logger ?? silentLogger;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  publish<K extends TopicName>(topic: K, payload: TopicPayloads[K]): void {
    this.assertOpen(`publish to "${topic}"`);
    this.fanOut(topic, payload);
  }

  publishRaw(topic: string, payload: unknown): void {
    this.assertOpen(`publish to "${topic}"`);
    if (!isTopicName(topic)) {
      throw new BusError(`Unknown topic "${topic}"`, "TOPIC_UNKNOWN");
    }
    this.fanOut(topic, payload);
  }

  subscribe<K extends TopicName>(topic: K, options: SubscribeOptions = {}): ISubscription<K> {
    this.assertOpen(`subscribe to "${topic}"`);
    if (!isTopicName(topic)) {
      throw new BusError(`Unknown topic "${topic}"`, "TOPIC_UNKNOWN");
    }

    let set = this.subscribers.get(topic);
    if (!set) {
      set = new Set();
      this.subscribers.set(topic, set);
    }
    const members = set;

    const subscription: BusSubscription<K> = new BusSubscription(topic, {
      policy: TOPIC_DELIVERY[topic],
      capacity: options.capacity ?? this.config.queueCapacity,
      overflow: options.overflow ?? this.config.queueOverflow,
      onDrop: (total) => {
        if (TOPIC_DELIVERY[topic] === "queued" && (total === 1 || total % DROP_LOG_INTERVAL === 0)) {
          this.logger.warn(`Queue full on "${topic}": ${total} message(s) dropped`);
        }
      },
      onClose: () => {
        members.delete(subscription);
      },
    });
    members.add(subscription);
    return subscription;
  }

  /**
   * Number of live subscriptions on a topic.
   */
  subscriberCount(topic: TopicName): number {
    return this.subscribers.get(topic)?.size ?? 0;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const set of this.subscribers.values()) {
      for (const subscription of [...set]) {
        subscription.close();
      }
    }
    this.subscribers.clear();
  }

  private fanOut(topic: TopicName, payload: unknown): void {
    const set = this.subscribers.get(topic);
    if (!set || set.size === 0) return;

    for (const subscription of set) {
      subscription.deliver(structuredClone(payload));
    }
  }

  private assertOpen(action: string): void {
    if (this.isClosed) {
      throw new BusError(`Cannot ${action}: bus is closed`, "BUS_CLOSED");
    }
  }
}
