import type {
  DeliveryPolicy,
  ISubscription,
  Ms,
  QueueOverflowPolicy,
  ReceiveResult,
  TopicName,
  TopicPayloads,
} from "@neurocue/contracts";
import { parseTopicPayload } from "@neurocue/contracts";

/**
 * Configuration for a single subscription.
 */
export interface BusSubscriptionConfig {
  policy: DeliveryPolicy;

  /** Pending-message bound for queued delivery. @default 1024 */
  capacity?: number;

  /** @default "drop-oldest" */
  overflow?: QueueOverflowPolicy;

  /** Called after a message is discarded unread, with the running total */
  onDrop?: (total: number) => void;

  /** Called once when the subscription closes */
  onClose?: () => void;
}

const DEFAULT_CONFIG: { capacity: number; overflow: QueueOverflowPolicy } = {
  capacity: 1024,
  overflow: "drop-oldest",
};

interface Waiter<T> {
  resolve: (result: ReceiveResult<T>) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * One subscriber's inbox for one topic.
 *
 * Implements the push-to-pull reconciliation pattern:
 * - publishes arrive synchronously via deliver()
 * - the owning worker pulls them with receive()/tryReceive()
 *
 * Payloads are validated when pulled, so a bad message costs the
 * subscriber one "malformed" result and nothing else.
 */
export class BusSubscription<K extends TopicName> implements ISubscription<K> {
  readonly topic: K;

  private config: Required<Omit<BusSubscriptionConfig, "onDrop" | "onClose">>;
  private onDrop: ((total: number) => void) | undefined;
  private onClose: (() => void) | undefined;

  /** Raw payloads not yet pulled, oldest first */
  private inbox: unknown[] = [];
  private droppedCount = 0;
  private waiter: Waiter<TopicPayloads[K]> | null = null;
  private isClosed = false;

  constructor(topic: K, config: BusSubscriptionConfig) {
    this.topic = topic;
    this.config = {
      policy: config.policy,
      capacity: config.capacity ?? DEFAULT_CONFIG.capacity,
      overflow: config.overflow ?? DEFAULT_CONFIG.overflow,
    };
    this.onDrop = config.onDrop;
    this.onClose = config.onClose;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Hand a (copied) payload to this subscriber.
   */
  deliver(raw: unknown): void {
    if (this.isClosed) return;

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(this.parse(raw));
      return;
    }

    if (this.config.policy === "latest") {
      if (this.inbox.length > 0) {
        this.recordDrop(this.inbox.length);
      }
      this.inbox = [raw];
      return;
    }

    if (this.inbox.length >= this.config.capacity) {
      if (this.config.overflow === "drop-newest") {
        this.recordDrop(1);
        return;
      }
      this.inbox.shift();
      this.recordDrop(1);
    }
    this.inbox.push(raw);
  }

  receive(timeoutMs: Ms): Promise<ReceiveResult<TopicPayloads[K]>> {
    const immediate = this.tryReceive();
    if (immediate.kind !== "timeout" || this.isClosed) {
      return Promise.resolve(immediate);
    }

    // A second concurrent receive supersedes the first
    this.settleWaiter({ kind: "timeout" });

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        if (this.waiter && this.waiter.timer === timer) {
          this.waiter = null;
        }
        resolve({ kind: "timeout" });
      }, Math.max(0, timeoutMs));
      this.waiter = { resolve, timer };
    });
  }

  tryReceive(): ReceiveResult<TopicPayloads[K]> {
    if (this.inbox.length > 0) {
      return this.parse(this.inbox.shift());
    }
    if (this.isClosed) {
      return { kind: "closed" };
    }
    return { kind: "timeout" };
  }

  pending(): number {
    return this.inbox.length;
  }

  dropped(): number {
    return this.droppedCount;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.inbox = [];
    this.settleWaiter({ kind: "closed" });
    this.onClose?.();
  }

  private parse(raw: unknown): ReceiveResult<TopicPayloads[K]> {
    const result = parseTopicPayload(this.topic, raw);
    if (result.ok) {
      return { kind: "message", payload: result.payload };
    }
    return { kind: "malformed", issues: result.issues };
  }

  private settleWaiter(result: ReceiveResult<TopicPayloads[K]>): void {
    if (!this.waiter) return;
    const waiter = this.waiter;
    this.waiter = null;
    clearTimeout(waiter.timer);
    waiter.resolve(result);
  }

  private recordDrop(count: number): void {
    this.droppedCount += count;
    this.onDrop?.(this.droppedCount);
  }
}
