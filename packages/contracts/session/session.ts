/**
 * Session State Types
 *
 * The session cycles BLINK_WAIT → PREPARE → ARMED → RESTING → BLINK_WAIT.
 * Only the state machine mutates the session; everything else sees it
 * through the status topic.
 */

import type { SessionMs } from "../core/time";
import type { CommandDirection } from "../bus/topics";

export type SessionMode = "BLINK_WAIT" | "PREPARE" | "ARMED" | "RESTING";

/**
 * Status codes on the wire. The display maps them to colours.
 */
export const STATUS_CODES = {
  BLINK_WAIT: 0,
  READY: 1,
  REST: 2,
} as const;

export type StatusName = keyof typeof STATUS_CODES;
export type StatusCode = (typeof STATUS_CODES)[StatusName];

export interface SessionState {
  mode: SessionMode;
  modeEntryTime: SessionMs;
}

/**
 * Side effects requested by a state machine step, in order.
 */
export type SessionEffect =
  | { type: "status"; code: StatusCode }
  | { type: "command"; direction: CommandDirection };

export interface SessionTransition {
  from: SessionMode;
  to: SessionMode;
  t: SessionMs;
}
