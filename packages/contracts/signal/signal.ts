/**
 * Sample Batch Types
 *
 * Protocol-level biosignal input. A batch is what the acquisition side
 * hands over per read: every channel carries the same number of samples,
 * recorded at a fixed rate, covering [t0, t1] on the acquisition clock.
 */

import type { Hz, SessionMs } from "../core/time";

/**
 * Electrode label, e.g. "Fp1" or "O2".
 */
export type ChannelId = string;

export interface SampleBatch {
  /** Samples per channel, oldest first. Values in microvolts. */
  channels: Record<ChannelId, number[]>;
  sampleRate: Hz;
  /** Timestamp of the first sample */
  t0: SessionMs;
  /** Timestamp of the last sample */
  t1: SessionMs;
}

/**
 * Number of samples per channel in a batch.
 * Channels are expected to be equal length; the shortest one wins if not.
 */
export function batchLength(batch: SampleBatch): number {
  let length: number | null = null;
  for (const values of Object.values(batch.channels)) {
    length = length === null ? values.length : Math.min(length, values.length);
  }
  return length ?? 0;
}
