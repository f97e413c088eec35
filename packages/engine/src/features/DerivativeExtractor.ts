/**
 * Peak absolute rate of change over the newest part of a trace.
 *
 * Only the newest `max(appended, checkSeconds * rate)` samples are
 * scanned, so a spike already reported on an earlier update is not
 * picked up again once newer data has pushed past it.
 */

import type { Hz, Seconds } from "@neurocue/contracts";
import { derivative, maxAbs } from "../dsp/stats";

export interface DerivativeExtractorConfig {
  sampleRate: Hz;

  /** Minimum scan length. @default 0.1 */
  checkSeconds?: Seconds;
}

export class DerivativeExtractor {
  private sampleRate: Hz;
  private minCheck: number;

  constructor(config: DerivativeExtractorConfig) {
    this.sampleRate = config.sampleRate;
    this.minCheck = Math.floor(config.sampleRate * (config.checkSeconds ?? 0.1));
  }

  extract(filtered: ArrayLike<number>, appended: number): number {
    if (filtered.length === 0) return 0;
    const trace = derivative(filtered, this.sampleRate);
    const check = Math.min(trace.length, Math.max(appended, this.minCheck));
    return maxAbs(trace.subarray(trace.length - check));
  }
}
