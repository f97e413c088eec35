/**
 * Spectral Estimation
 *
 * Welch's method: split the input into overlapping segments, detrend
 * each by its mean, apply a periodic Hann window, and average the
 * one-sided periodograms (density scaling, units²/Hz).
 *
 * Segment lengths are arbitrary (not restricted to powers of two), so
 * the transform is a direct DFT over the positive-frequency bins.
 */

import type { Hz } from "@neurocue/contracts";
import { mean } from "./stats";

export interface PowerSpectrum {
  /** Bin centre frequencies, k * fs / n */
  freqs: Float64Array;
  psd: Float64Array;
}

export interface WelchOptions {
  /** Samples per segment; clamped to the input length */
  nperseg: number;
  /** @default floor(nperseg / 2) */
  noverlap?: number;
}

const EMPTY_SPECTRUM: PowerSpectrum = {
  freqs: new Float64Array(0),
  psd: new Float64Array(0),
};

export function hannWindow(length: number): Float64Array {
  const w = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    w[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / length);
  }
  return w;
}

/**
 * |X[k]|² for k = 0..floor(n/2).
 */
function powerBins(segment: Float64Array): Float64Array {
  const n = segment.length;
  const bins = Math.floor(n / 2) + 1;
  const out = new Float64Array(bins);

  for (let k = 0; k < bins; k++) {
    let re = 0;
    let im = 0;
    const step = (2 * Math.PI * k) / n;
    for (let i = 0; i < n; i++) {
      re += segment[i] * Math.cos(step * i);
      im -= segment[i] * Math.sin(step * i);
    }
    out[k] = re * re + im * im;
  }
  return out;
}

export function welchPsd(
  signal: ArrayLike<number>,
  sampleRate: Hz,
  options: WelchOptions
): PowerSpectrum {
  const nperseg = Math.min(Math.floor(options.nperseg), signal.length);
  if (nperseg < 1) return EMPTY_SPECTRUM;

  const noverlap = Math.min(options.noverlap ?? Math.floor(nperseg / 2), nperseg - 1);
  const stride = nperseg - noverlap;
  const segments = Math.floor((signal.length - noverlap) / stride);

  const window = hannWindow(nperseg);
  let windowEnergy = 0;
  for (let i = 0; i < nperseg; i++) windowEnergy += window[i] * window[i];
  if (windowEnergy === 0) return EMPTY_SPECTRUM;

  const bins = Math.floor(nperseg / 2) + 1;
  const psd = new Float64Array(bins);
  const segment = new Float64Array(nperseg);

  for (let s = 0; s < segments; s++) {
    const start = s * stride;
    let offset = 0;
    for (let i = 0; i < nperseg; i++) offset += signal[start + i];
    offset /= nperseg;

    for (let i = 0; i < nperseg; i++) {
      segment[i] = (signal[start + i] - offset) * window[i];
    }
    const power = powerBins(segment);
    for (let k = 0; k < bins; k++) psd[k] += power[k];
  }

  const scale = 1 / (sampleRate * windowEnergy * segments);
  const lastDoubled = nperseg % 2 === 0 ? bins - 2 : bins - 1;
  for (let k = 0; k < bins; k++) {
    psd[k] *= scale;
    if (k >= 1 && k <= lastDoubled) psd[k] *= 2;
  }

  const freqs = new Float64Array(bins);
  for (let k = 0; k < bins; k++) freqs[k] = (k * sampleRate) / nperseg;

  return { freqs, psd };
}

/**
 * Mean PSD over bins with low <= f <= high; 0 when no bin qualifies.
 */
export function bandPower(spectrum: PowerSpectrum, low: Hz, high: Hz): number {
  const selected: number[] = [];
  for (let k = 0; k < spectrum.freqs.length; k++) {
    const f = spectrum.freqs[k];
    if (f >= low && f <= high) selected.push(spectrum.psd[k]);
  }
  return selected.length === 0 ? 0 : mean(selected);
}
