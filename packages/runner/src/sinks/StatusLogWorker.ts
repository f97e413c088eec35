import type { IMessageBus, StatusCode, StatusPayload } from "@neurocue/contracts";
import { SinkWorker, type SinkWorkerConfig } from "./SinkWorker";

export type IndicatorColor = "RED" | "GREEN" | "ORANGE";

export const INDICATOR_COLORS: Record<StatusCode, IndicatorColor> = {
  0: "RED",
  1: "GREEN",
  2: "ORANGE",
};

const MEANINGS: Record<IndicatorColor, string> = {
  RED: "waiting for blink",
  GREEN: "ready for a move",
  ORANGE: "resting",
};

/**
 * Console status indicator: logs the colour an overlay would show.
 */
export class StatusLogWorker extends SinkWorker<"status"> {
  private shown: IndicatorColor[] = [];

  constructor(bus: IMessageBus, config: SinkWorkerConfig = {}) {
    super("status", "status", bus, config);
  }

  get history(): readonly IndicatorColor[] {
    return this.shown;
  }

  protected handle(payload: StatusPayload): void {
    const color = INDICATOR_COLORS[payload.modeCode];
    this.shown.push(color);
    this.logger.info(`${color} (${MEANINGS[color]})`);
  }
}
