/**
 * Small numeric helpers over sample windows.
 * Empty input yields 0 (or an empty array); nothing here throws.
 */

export function mean(values: ArrayLike<number>): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < values.length; i++) sum += values[i];
  return sum / values.length;
}

export function removeDc(values: ArrayLike<number>): Float64Array {
  const offset = mean(values);
  const out = new Float64Array(values.length);
  for (let i = 0; i < values.length; i++) out[i] = values[i] - offset;
  return out;
}

/**
 * Sample-wise mean of equally long traces. Uses the shortest length
 * if they differ.
 */
export function averageTraces(traces: readonly ArrayLike<number>[]): Float64Array {
  if (traces.length === 0) return new Float64Array(0);
  const length = Math.min(...traces.map((t) => t.length));
  const out = new Float64Array(length);
  for (const trace of traces) {
    for (let i = 0; i < length; i++) out[i] += trace[i];
  }
  for (let i = 0; i < length; i++) out[i] /= traces.length;
  return out;
}

/**
 * First difference scaled to units per second. The first element
 * differences against itself, so the output has the input's length.
 */
export function derivative(values: ArrayLike<number>, sampleRate: number): Float64Array {
  const out = new Float64Array(values.length);
  for (let i = 1; i < values.length; i++) {
    out[i] = (values[i] - values[i - 1]) * sampleRate;
  }
  return out;
}

export function maxAbs(values: ArrayLike<number>): number {
  let max = 0;
  for (let i = 0; i < values.length; i++) {
    const v = Math.abs(values[i]);
    if (v > max) max = v;
  }
  return max;
}
