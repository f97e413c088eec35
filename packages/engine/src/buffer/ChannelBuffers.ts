import type { ChannelId, SampleBatch } from "@neurocue/contracts";
import { RingBuffer } from "./RingBuffer";

/**
 * One RingBuffer per selected channel, fed from sample batches.
 * Channels missing from a batch leave their buffer untouched.
 */
export class ChannelBuffers {
  private buffers: Map<ChannelId, RingBuffer> = new Map();

  constructor(
    readonly channels: readonly ChannelId[],
    readonly capacity: number
  ) {
    for (const channel of channels) {
      this.buffers.set(channel, new RingBuffer(capacity));
    }
  }

  /**
   * Append the selected channels of a batch.
   * @returns the number of new samples appended to the first selected channel
   */
  append(batch: SampleBatch): number {
    let appended = 0;
    this.channels.forEach((channel, index) => {
      const values = batch.channels[channel];
      const buffer = this.buffers.get(channel);
      if (!values || !buffer) return;
      buffer.push(values);
      if (index === 0) appended = values.length;
    });
    return appended;
  }

  /**
   * Ordered window per channel (only channels that have data).
   */
  windows(): Float64Array[] {
    const out: Float64Array[] = [];
    for (const channel of this.channels) {
      const buffer = this.buffers.get(channel);
      if (buffer && buffer.length > 0) {
        out.push(buffer.toArray());
      }
    }
    return out;
  }

  get(channel: ChannelId): RingBuffer | undefined {
    return this.buffers.get(channel);
  }

  clear(): void {
    for (const buffer of this.buffers.values()) {
      buffer.clear();
    }
  }
}
