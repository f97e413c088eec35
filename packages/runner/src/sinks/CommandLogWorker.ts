import type { CommandDirection, CommandPayload, IMessageBus } from "@neurocue/contracts";
import { SinkWorker, type SinkWorkerConfig } from "./SinkWorker";

export type SlideAction = "NEXT" | "PREVIOUS";

export function slideAction(direction: CommandDirection): SlideAction {
  return direction > 0 ? "NEXT" : "PREVIOUS";
}

/**
 * Console actuator: logs the slide key a presenter remote would press.
 */
export class CommandLogWorker extends SinkWorker<"command"> {
  private actions: SlideAction[] = [];

  constructor(bus: IMessageBus, config: SinkWorkerConfig = {}) {
    super("command", "command", bus, config);
  }

  get history(): readonly SlideAction[] {
    return this.actions;
  }

  protected handle(payload: CommandPayload): void {
    const action = slideAction(payload.direction);
    this.actions.push(action);
    this.logger.info(`${payload.direction > 0 ? "+1" : "-1"} → ${action} SLIDE`);
  }
}
