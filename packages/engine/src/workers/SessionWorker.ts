/**
 * Session Worker
 *
 * Runs the session state machine on the bus. Per cycle, without
 * blocking:
 * 1. discard whatever arrived on the input the current mode ignores
 * 2. read at most one message from the input it honors
 * 3. apply time-driven transitions
 * 4. publish the resulting status/command effects in order
 *
 * The initial BLINK_WAIT status goes out once, right after subscribing.
 */

import type {
  IMessageBus,
  ISubscription,
  SessionEffect,
  SessionMode,
  SessionState,
  TopicName,
} from "@neurocue/contracts";
import type { SessionStateMachine } from "../session/SessionStateMachine";
import { formatIssues } from "./DetectorWorker";
import { PollingWorker, type PollingWorkerConfig } from "./PollingWorker";

export type SessionWorkerConfig = PollingWorkerConfig;

const STATUS_LABELS: Record<SessionMode, string> = {
  BLINK_WAIT: "Waiting for blink",
  PREPARE: "Blink detected, preparing",
  ARMED: "Ready, listening for moves",
  RESTING: "Move executed, resting",
};

export class SessionWorker extends PollingWorker {
  private blinks: ISubscription<"blink-event"> | null = null;
  private moves: ISubscription<"move-event"> | null = null;
  private discarded = 0;
  private unsubscribeTransitions: (() => void) | null = null;

  constructor(
    private readonly machine: SessionStateMachine,
    private readonly bus: IMessageBus,
    config: SessionWorkerConfig = {}
  ) {
    super("session", config);
  }

  state(): SessionState {
    return this.machine.state();
  }

  /** Messages dropped because they arrived in a mode that ignores them */
  get discardedCount(): number {
    return this.discarded;
  }

  protected setup(): void {
    this.blinks = this.bus.subscribe("blink-event");
    this.moves = this.bus.subscribe("move-event");
    this.machine.reset(this.clock.now());
    this.unsubscribeTransitions = this.machine.onTransition((transition) => {
      this.logger.info(`${transition.from} → ${transition.to}: ${STATUS_LABELS[transition.to]}`);
    });
    this.apply(this.machine.initialEffects());
  }

  protected async cycle(): Promise<void> {
    const blinks = this.blinks;
    const moves = this.moves;
    if (!blinks || !moves) return;
    if (this.bus.closed) {
      this.logger.info("Bus closed");
      this.stop();
      return;
    }

    this.checkOverflow(blinks);
    this.checkOverflow(moves);

    const relevant = this.machine.relevantInput();
    if (relevant !== "blink-event") this.drain(blinks);
    if (relevant !== "move-event") this.drain(moves);

    const now = this.clock.now();
    const effects: SessionEffect[] = [];

    if (relevant === "blink-event") {
      const result = blinks.tryReceive();
      if (result.kind === "message") {
        effects.push(...this.machine.onBlink(result.payload, now));
      } else if (result.kind === "malformed") {
        this.malformed("blink-event", formatIssues(result.issues));
      }
    } else if (relevant === "move-event") {
      const result = moves.tryReceive();
      if (result.kind === "message") {
        effects.push(...this.machine.onMove(result.payload, now));
      } else if (result.kind === "malformed") {
        this.malformed("move-event", formatIssues(result.issues));
      }
    }

    effects.push(...this.machine.tick(now));
    this.apply(effects);
  }

  protected teardown(): void {
    this.unsubscribeTransitions?.();
    this.unsubscribeTransitions = null;
    this.blinks?.close();
    this.moves?.close();
    this.blinks = null;
    this.moves = null;
  }

  private drain(subscription: ISubscription<"blink-event"> | ISubscription<"move-event">): void {
    let dropped = 0;
    while (subscription.pending() > 0) {
      subscription.tryReceive();
      dropped++;
    }
    if (dropped > 0) {
      this.discarded += dropped;
      this.logger.debug(`Ignored ${dropped} ${subscription.topic} message(s) in ${this.machine.mode}`);
    }
  }

  private malformed(topic: TopicName, issues: string): void {
    const message = `Dropped malformed ${topic}: ${issues}`;
    this.report("MALFORMED_MESSAGE", "warning", message);
    this.logger.warn(message);
  }

  private apply(effects: readonly SessionEffect[]): void {
    for (const effect of effects) {
      switch (effect.type) {
        case "status":
          this.bus.publish("status", { modeCode: effect.code });
          break;
        case "command":
          this.logger.info(`Command ${effect.direction > 0 ? "+1" : "-1"}`);
          this.bus.publish("command", { direction: effect.direction });
          break;
      }
    }
  }
}
