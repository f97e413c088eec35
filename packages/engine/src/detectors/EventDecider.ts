/**
 * Event Decider
 *
 * Two-level threshold decision over a normalized score, with a
 * consecutive-frame debounce on the lower level and a time-based
 * cooldown after any emission.
 *
 * Per frame, when calibrated and not cooling down:
 * - score > high: emit "high" at once, clear the debounce count
 * - score > low: count the frame; emit "low" when the count reaches
 *   debounceFrames
 * - otherwise: clear the debounce count
 *
 * Cooldown is measured on the clock from the emission time, never in
 * frames.
 */

import type { DecisionOutcome, Ms, SessionMs } from "@neurocue/contracts";

/**
 * Configuration for the EventDecider.
 */
export interface EventDeciderConfig {
  /** @default 1.5 */
  lowMultiplier?: number;

  /** @default 100 */
  highMultiplier?: number;

  /** Consecutive frames above low before emitting. @default 2 */
  debounceFrames?: number;

  /** @default 1000 */
  cooldownMs?: Ms;
}

const DEFAULT_CONFIG: Required<EventDeciderConfig> = {
  lowMultiplier: 1.5,
  highMultiplier: 100,
  debounceFrames: 2,
  cooldownMs: 1000,
};

export class EventDecider {
  private config: Required<EventDeciderConfig>;
  private debounceCount = 0;
  private cooldownUntil: SessionMs | null = null;

  constructor(config: EventDeciderConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.debounceFrames < 1) {
      throw new Error(`debounceFrames must be at least 1, got ${this.config.debounceFrames}`);
    }
  }

  /**
   * @param score normalized score, or null while uncalibrated
   */
  decide(score: number | null, now: SessionMs): DecisionOutcome {
    if (score === null) return { type: "inactive" };

    if (this.cooldownUntil !== null && now < this.cooldownUntil) {
      return { type: "cooldown", until: this.cooldownUntil };
    }

    if (score > this.config.highMultiplier) {
      return this.emit("high", score, now);
    }

    if (score > this.config.lowMultiplier) {
      this.debounceCount++;
      if (this.debounceCount >= this.config.debounceFrames) {
        return this.emit("low", score, now);
      }
      return { type: "debouncing", count: this.debounceCount };
    }

    this.debounceCount = 0;
    return { type: "idle" };
  }

  get pendingFrames(): number {
    return this.debounceCount;
  }

  reset(): void {
    this.debounceCount = 0;
    this.cooldownUntil = null;
  }

  private emit(cls: "high" | "low", score: number, now: SessionMs): DecisionOutcome {
    this.debounceCount = 0;
    this.cooldownUntil = now + this.config.cooldownMs;
    return { type: "emit", class: cls, score };
  }
}
