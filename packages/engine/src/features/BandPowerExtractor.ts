/**
 * Band Power Extractor
 *
 * Mean Welch PSD within [bandLow, bandHigh] over the newest
 * `fftWindowSeconds` of a filtered trace. The segment length equals the
 * sub-window when the sub-window is shorter than one FFT window.
 */

import type { Hz, Seconds } from "@neurocue/contracts";
import { bandPower, welchPsd } from "../dsp/spectrum";

/**
 * Configuration for the BandPowerExtractor.
 */
export interface BandPowerExtractorConfig {
  sampleRate: Hz;

  /** Sub-window analysed per update. @default 0.5 */
  fftWindowSeconds?: Seconds;

  /** @default 35 */
  bandLow?: Hz;

  /** @default 110 */
  bandHigh?: Hz;

  /** Sub-windows shorter than this yield 0. @default 0.1 */
  minSeconds?: Seconds;
}

const DEFAULT_CONFIG: Required<Omit<BandPowerExtractorConfig, "sampleRate">> = {
  fftWindowSeconds: 0.5,
  bandLow: 35,
  bandHigh: 110,
  minSeconds: 0.1,
};

export class BandPowerExtractor {
  private config: Required<BandPowerExtractorConfig>;
  private windowSize: number;
  private minSamples: number;

  constructor(config: BandPowerExtractorConfig) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.windowSize = Math.floor(this.config.sampleRate * this.config.fftWindowSeconds);
    this.minSamples = Math.floor(this.config.sampleRate * this.config.minSeconds);
  }

  extract(filtered: Float64Array): number {
    const start = Math.max(0, filtered.length - this.windowSize);
    const sub = filtered.subarray(start);
    if (sub.length === 0 || sub.length < this.minSamples) return 0;

    const spectrum = welchPsd(sub, this.config.sampleRate, { nperseg: this.windowSize });
    const power = bandPower(spectrum, this.config.bandLow, this.config.bandHigh);
    return Number.isFinite(power) ? power : 0;
  }
}
