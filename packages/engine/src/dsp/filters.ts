/**
 * IIR Filter Design and Application
 *
 * Fixed-coefficient filters expressed as cascades of second-order
 * sections (a0 normalized to 1). Butterworth designs use the bilinear
 * transform with the cutoff prewarped; the notch matches the usual
 * second-order notch of quality factor Q.
 *
 * Filtering always starts from zero state, so running a cascade over
 * the same window twice gives the same output.
 */

import type { Hz } from "@neurocue/contracts";

// ============================================================================
// Types
// ============================================================================

export interface Biquad {
  b0: number;
  b1: number;
  b2: number;
  a1: number;
  a2: number;
}

export type FilterStage =
  | { type: "highpass"; cutoff: Hz; order: number }
  | { type: "lowpass"; cutoff: Hz; order: number }
  | { type: "notch"; frequency: Hz; q: number };

export class FilterDesignError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FilterDesignError";
  }
}

// ============================================================================
// Design
// ============================================================================

function assertBelowNyquist(frequency: Hz, sampleRate: Hz, what: string): void {
  if (!(frequency > 0 && frequency < sampleRate / 2)) {
    throw new FilterDesignError(
      `${what} ${frequency} Hz must lie between 0 and Nyquist (${sampleRate / 2} Hz)`
    );
  }
}

/**
 * Second-order section of a Butterworth prototype with quality factor q.
 */
function secondOrderSection(kind: "highpass" | "lowpass", w0: number, q: number): Biquad {
  const cos = Math.cos(w0);
  const alpha = Math.sin(w0) / (2 * q);
  const a0 = 1 + alpha;

  const edge = kind === "lowpass" ? (1 - cos) / 2 : (1 + cos) / 2;
  const middle = kind === "lowpass" ? 1 - cos : -(1 + cos);

  return {
    b0: edge / a0,
    b1: middle / a0,
    b2: edge / a0,
    a1: (-2 * cos) / a0,
    a2: (1 - alpha) / a0,
  };
}

/**
 * First-order section, used for the real pole of odd orders.
 */
function firstOrderSection(kind: "highpass" | "lowpass", w0: number): Biquad {
  const k = Math.tan(w0 / 2);
  const norm = 1 / (1 + k);
  const gain = kind === "lowpass" ? k * norm : norm;

  return {
    b0: gain,
    b1: kind === "lowpass" ? gain : -gain,
    b2: 0,
    a1: (k - 1) * norm,
    a2: 0,
  };
}

export function butterworth(
  kind: "highpass" | "lowpass",
  order: number,
  cutoff: Hz,
  sampleRate: Hz
): Biquad[] {
  if (!Number.isInteger(order) || order < 1) {
    throw new FilterDesignError(`Filter order must be a positive integer, got ${order}`);
  }
  assertBelowNyquist(cutoff, sampleRate, "Cutoff");

  const w0 = (2 * Math.PI * cutoff) / sampleRate;
  const sections: Biquad[] = [];

  for (let k = 1; k <= Math.floor(order / 2); k++) {
    const q = 1 / (2 * Math.sin(((2 * k - 1) * Math.PI) / (2 * order)));
    sections.push(secondOrderSection(kind, w0, q));
  }
  if (order % 2 === 1) {
    sections.push(firstOrderSection(kind, w0));
  }
  return sections;
}

export function notch(frequency: Hz, q: number, sampleRate: Hz): Biquad {
  assertBelowNyquist(frequency, sampleRate, "Notch frequency");
  if (!(q > 0)) {
    throw new FilterDesignError(`Notch Q must be positive, got ${q}`);
  }

  const w0 = (2 * Math.PI * frequency) / sampleRate;
  const bandwidth = w0 / q;
  const beta = Math.tan(bandwidth / 2);
  const gain = 1 / (1 + beta);
  const cos = Math.cos(w0);

  return {
    b0: gain,
    b1: -2 * gain * cos,
    b2: gain,
    a1: -2 * gain * cos,
    a2: 2 * gain - 1,
  };
}

export function designStage(stage: FilterStage, sampleRate: Hz): Biquad[] {
  switch (stage.type) {
    case "highpass":
    case "lowpass":
      return butterworth(stage.type, stage.order, stage.cutoff, sampleRate);
    case "notch":
      return [notch(stage.frequency, stage.q, sampleRate)];
  }
}

// ============================================================================
// Application
// ============================================================================

/**
 * Run a section cascade over a signal (Direct Form II transposed,
 * zero initial state).
 */
export function sosFilter(sections: readonly Biquad[], signal: ArrayLike<number>): Float64Array {
  const out = Float64Array.from(signal);

  for (const s of sections) {
    let z1 = 0;
    let z2 = 0;
    for (let i = 0; i < out.length; i++) {
      const x = out[i];
      const y = s.b0 * x + z1;
      z1 = s.b1 * x - s.a1 * y + z2;
      z2 = s.b2 * x - s.a2 * y;
      out[i] = y;
    }
  }
  return out;
}

/**
 * A designed, reusable chain of filter stages.
 */
export class FilterCascade {
  readonly sections: readonly Biquad[];

  constructor(
    readonly stages: readonly FilterStage[],
    readonly sampleRate: Hz
  ) {
    this.sections = stages.flatMap((stage) => designStage(stage, sampleRate));
  }

  apply(signal: ArrayLike<number>): Float64Array {
    return sosFilter(this.sections, signal);
  }
}
