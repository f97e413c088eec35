/**
 * Message Bus Interfaces
 *
 * The bus is the only structure shared between workers. It owns no
 * application state: publish hands over a copy, and each subscription
 * holds its own pending messages according to the topic's delivery policy.
 */

import type { Ms } from "../core/time";
import type { PayloadIssue } from "./schemas";
import type { TopicName, TopicPayloads } from "./topics";

/**
 * Errors raised by bus setup operations.
 * Per-message problems are never thrown; they surface as receive results.
 */
export class BusError extends Error {
  constructor(
    message: string,
    public readonly code: "BUS_CLOSED" | "TOPIC_UNKNOWN" | "SUBSCRIBE_FAILED"
  ) {
    super(message);
    this.name = "BusError";
  }
}

/**
 * Outcome of a receive call.
 * - message: the next payload, already validated
 * - timeout: nothing arrived within the timeout (or nothing pending, for tryReceive)
 * - malformed: a payload arrived but failed validation; it has been consumed
 * - closed: the subscription or bus was closed
 */
export type ReceiveResult<T> =
  | { kind: "message"; payload: T }
  | { kind: "timeout" }
  | { kind: "malformed"; issues: PayloadIssue[] }
  | { kind: "closed" };

export type QueueOverflowPolicy = "drop-oldest" | "drop-newest";

export interface SubscribeOptions {
  /** Maximum pending messages on a queued topic. @default 1024 */
  capacity?: number;

  /** What to discard when a queued subscription is full. @default "drop-oldest" */
  overflow?: QueueOverflowPolicy;
}

/**
 * One subscriber's handle on one topic.
 */
export interface ISubscription<K extends TopicName> {
  readonly topic: K;

  /**
   * Wait up to `timeoutMs` for the next message.
   * Resolves immediately if one is pending. Never waits longer than the timeout.
   */
  receive(timeoutMs: Ms): Promise<ReceiveResult<TopicPayloads[K]>>;

  /**
   * Non-blocking: take the next pending message, or "timeout" if none.
   */
  tryReceive(): ReceiveResult<TopicPayloads[K]>;

  /** Messages currently waiting. */
  pending(): number;

  /** Messages discarded because the subscription was full. */
  dropped(): number;

  /** Detach from the bus. Any waiting receive resolves with "closed". */
  close(): void;
}

/**
 * Publish/subscribe transport.
 */
export interface IMessageBus {
  /**
   * Fire-and-forget publish of a typed payload.
   * Subscribers connected after this call do not see the message.
   * @throws {BusError} code=BUS_CLOSED once the bus has been closed.
   */
  publish<K extends TopicName>(topic: K, payload: TopicPayloads[K]): void;

  /**
   * Publish an untrusted payload, e.g. from an external bridge.
   * Validation happens on the subscriber side.
   * @throws {BusError} code=TOPIC_UNKNOWN for a topic outside the topic map.
   */
  publishRaw(topic: string, payload: unknown): void;

  /**
   * @throws {BusError} code=BUS_CLOSED once the bus has been closed.
   */
  subscribe<K extends TopicName>(topic: K, options?: SubscribeOptions): ISubscription<K>;

  /** Close every subscription and refuse further use. */
  close(): void;

  readonly closed: boolean;
}
