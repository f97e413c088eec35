/**
 * Session State Machine
 *
 *   BLINK_WAIT --blink--> PREPARE --readySeconds--> ARMED
 *        ^                                            |
 *        +------restSeconds------ RESTING <--move-----+
 *
 * Pure and clock-free: every call takes `now` and returns the effects
 * to publish, in order. The owning worker does the I/O.
 *
 * Only the input relevant to the current mode is honored; anything else
 * is ignored and never replayed later.
 */

import type {
  BlinkEventPayload,
  MoveEventPayload,
  Seconds,
  SessionEffect,
  SessionMode,
  SessionMs,
  SessionState,
  SessionTransition,
} from "@neurocue/contracts";
import { STATUS_CODES, secondsToMs } from "@neurocue/contracts";

/**
 * Configuration for the SessionStateMachine.
 */
export interface SessionStateMachineConfig {
  /** Wait after a blink before arming. @default 3 */
  readySeconds?: Seconds;

  /** Wait after a command before watching for blinks again. @default 2 */
  restSeconds?: Seconds;
}

const DEFAULT_CONFIG: Required<SessionStateMachineConfig> = {
  readySeconds: 3,
  restSeconds: 2,
};

/** Input topic honored in each mode; timed modes read none */
const RELEVANT_INPUT: Record<SessionMode, "blink-event" | "move-event" | null> = {
  BLINK_WAIT: "blink-event",
  PREPARE: null,
  ARMED: "move-event",
  RESTING: null,
};

export type TransitionListener = (transition: SessionTransition) => void;

export class SessionStateMachine {
  private config: Required<SessionStateMachineConfig>;
  private current: SessionState;
  private listeners: Set<TransitionListener> = new Set();

  constructor(config: SessionStateMachineConfig = {}, startTime: SessionMs = 0) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.current = { mode: "BLINK_WAIT", modeEntryTime: startTime };
  }

  state(): SessionState {
    return { ...this.current };
  }

  get mode(): SessionMode {
    return this.current.mode;
  }

  relevantInput(): "blink-event" | "move-event" | null {
    return RELEVANT_INPUT[this.current.mode];
  }

  /**
   * Status to announce when the session starts, so a display that
   * connects later still shows the right colour.
   */
  initialEffects(): SessionEffect[] {
    return [{ type: "status", code: STATUS_CODES.BLINK_WAIT }];
  }

  onBlink(payload: BlinkEventPayload, now: SessionMs): SessionEffect[] {
    if (this.current.mode !== "BLINK_WAIT" || !payload.triggered) return [];
    this.enter("PREPARE", now);
    return [];
  }

  onMove(payload: MoveEventPayload, now: SessionMs): SessionEffect[] {
    if (this.current.mode !== "ARMED" || payload.direction === 0) return [];
    const direction = payload.direction;
    this.enter("RESTING", now);
    return [
      { type: "command", direction },
      { type: "status", code: STATUS_CODES.REST },
    ];
  }

  /**
   * Time-driven transitions.
   */
  tick(now: SessionMs): SessionEffect[] {
    const elapsed = now - this.current.modeEntryTime;

    switch (this.current.mode) {
      case "PREPARE":
        if (elapsed >= secondsToMs(this.config.readySeconds)) {
          this.enter("ARMED", now);
          return [{ type: "status", code: STATUS_CODES.READY }];
        }
        return [];
      case "RESTING":
        if (elapsed >= secondsToMs(this.config.restSeconds)) {
          this.enter("BLINK_WAIT", now);
          return [{ type: "status", code: STATUS_CODES.BLINK_WAIT }];
        }
        return [];
      case "BLINK_WAIT":
      case "ARMED":
        return [];
    }
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  reset(now: SessionMs): void {
    this.current = { mode: "BLINK_WAIT", modeEntryTime: now };
  }

  private enter(mode: SessionMode, now: SessionMs): void {
    const transition: SessionTransition = { from: this.current.mode, to: mode, t: now };
    this.current = { mode, modeEntryTime: now };
    for (const listener of this.listeners) {
      listener(transition);
    }
  }
}
