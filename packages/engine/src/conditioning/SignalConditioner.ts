/**
 * Signal Conditioner
 *
 * Keeps the rolling window for a set of channels and turns it into one
 * filtered trace per update:
 *
 * 1. Append the batch to the per-channel ring buffers
 * 2. Subtract each channel's mean over the current window
 * 3. Combine channels (average them, or keep the first)
 * 4. Run the fixed filter cascade over the whole window from zero state
 *
 * Re-filtering the full window every update keeps the output free of
 * edge effects carried over from the previous call.
 */

import type { ChannelId, Hz, SampleBatch, Seconds } from "@neurocue/contracts";
import { ChannelBuffers } from "../buffer/ChannelBuffers";
import { FilterCascade, type FilterStage } from "../dsp/filters";
import { averageTraces, removeDc } from "../dsp/stats";

export type ChannelCombine = "average" | "first";

/**
 * Configuration for the SignalConditioner.
 */
export interface SignalConditionerConfig {
  channels: ChannelId[];

  sampleRate: Hz;

  /** Rolling window length. @default 4 */
  windowSeconds?: Seconds;

  /** How selected channels become one trace. @default "average" */
  combine?: ChannelCombine;

  /** Filter chain applied after DC removal, in order. @default [] */
  stages?: FilterStage[];
}

const DEFAULT_CONFIG: Required<Omit<SignalConditionerConfig, "channels" | "sampleRate">> = {
  windowSeconds: 4,
  combine: "average",
  stages: [],
};

export interface ConditionedWindow {
  /** Filtered trace, oldest first; as long as the buffered window */
  filtered: Float64Array;
  /** Samples the latest batch contributed */
  appended: number;
}

export class SignalConditioner {
  private config: Required<SignalConditionerConfig>;
  private buffers: ChannelBuffers;
  private cascade: FilterCascade;

  constructor(config: SignalConditionerConfig) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.channels.length === 0) {
      throw new Error("SignalConditioner needs at least one channel");
    }

    const capacity = Math.max(1, Math.floor(this.config.sampleRate * this.config.windowSeconds));
    this.buffers = new ChannelBuffers(this.config.channels, capacity);
    this.cascade = new FilterCascade(this.config.stages, this.config.sampleRate);
  }

  get sampleRate(): Hz {
    return this.config.sampleRate;
  }

  get capacity(): number {
    return this.buffers.capacity;
  }

  update(batch: SampleBatch): ConditionedWindow {
    const appended = this.buffers.append(batch);
    return { filtered: this.current(), appended };
  }

  /**
   * Filtered view of the window as it stands, without appending.
   */
  current(): Float64Array {
    const centered = this.buffers.windows().map((window) => removeDc(window));
    if (centered.length === 0) return new Float64Array(0);

    const trace = this.config.combine === "average" ? averageTraces(centered) : centered[0];
    return this.cascade.apply(trace);
  }

  reset(): void {
    this.buffers.clear();
  }
}
