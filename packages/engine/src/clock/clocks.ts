import type { IClock, Ms, SessionMs } from "@neurocue/contracts";

/**
 * Milliseconds since construction, from the monotonic performance clock.
 */
export class SystemClock implements IClock {
  private origin = performance.now();

  now(): SessionMs {
    return performance.now() - this.origin;
  }
}

/**
 * Clock that only moves when told to. Used in tests and simulations.
 */
export class ManualClock implements IClock {
  constructor(private t: SessionMs = 0) {}

  now(): SessionMs {
    return this.t;
  }

  set(t: SessionMs): void {
    this.t = t;
  }

  advance(ms: Ms): SessionMs {
    this.t += ms;
    return this.t;
  }
}
