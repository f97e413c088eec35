/**
 * Bus Topics
 *
 * The bus carries exactly these topics. Each topic has a fixed payload
 * shape and a fixed delivery policy:
 *
 * - "queued": every message is kept for a subscriber, in publish order,
 *   up to the subscription's capacity.
 * - "latest": a subscriber only ever sees the newest message; anything it
 *   has not read yet is superseded by the next publish.
 */

import type { SampleBatch } from "../signal/signal";
import type { StatusCode } from "../session/session";

export type DeliveryPolicy = "queued" | "latest";

export type MoveDirection = -1 | 0 | 1;
export type CommandDirection = -1 | 1;

export interface BlinkEventPayload {
  triggered: boolean;
}

export interface MoveEventPayload {
  direction: MoveDirection;
}

export interface StatusPayload {
  modeCode: StatusCode;
}

export interface CommandPayload {
  direction: CommandDirection;
}

export interface TopicPayloads {
  "raw-sample": SampleBatch;
  "blink-event": BlinkEventPayload;
  "move-event": MoveEventPayload;
  status: StatusPayload;
  command: CommandPayload;
}

export type TopicName = keyof TopicPayloads;

export const TOPIC_DELIVERY: Readonly<Record<TopicName, DeliveryPolicy>> = {
  "raw-sample": "queued",
  "blink-event": "queued",
  "move-event": "queued",
  status: "latest",
  command: "queued",
};

export const TOPIC_NAMES: readonly TopicName[] = [
  "raw-sample",
  "blink-event",
  "move-event",
  "status",
  "command",
];

export function isTopicName(value: string): value is TopicName {
  return Object.prototype.hasOwnProperty.call(TOPIC_DELIVERY, value);
}
