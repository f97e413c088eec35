import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { EventDecider } from "../../src/detectors/EventDecider";

describe("EventDecider", () => {
  it("is inactive without a score", () => {
    const decider = new EventDecider();
    expect(decider.decide(null, 0)).toEqual({ type: "inactive" });
  });

  it("emits the high class immediately", () => {
    const decider = new EventDecider({ lowMultiplier: 1.5, highMultiplier: 100 });
    expect(decider.decide(150, 0)).toEqual({ type: "emit", class: "high", score: 150 });
  });

  it("emits the low class when the debounce count is reached, not earlier", () => {
    const decider = new EventDecider({ lowMultiplier: 1.5, debounceFrames: 3, cooldownMs: 1000 });

    expect(decider.decide(1.6, 0)).toEqual({ type: "debouncing", count: 1 });
    expect(decider.decide(1.6, 40)).toEqual({ type: "debouncing", count: 2 });
    expect(decider.decide(1.6, 80)).toEqual({ type: "emit", class: "low", score: 1.6 });
    expect(decider.decide(1.6, 120)).toEqual({ type: "cooldown", until: 1080 });
  });

  it("restarts the debounce count on a quiet frame", () => {
    const decider = new EventDecider({ lowMultiplier: 1.5, debounceFrames: 2 });

    decider.decide(2, 0);
    expect(decider.decide(1.4, 40)).toEqual({ type: "idle" });
    expect(decider.decide(2, 80)).toEqual({ type: "debouncing", count: 1 });
  });

  it("clears a partial debounce when the high class fires", () => {
    const decider = new EventDecider({ debounceFrames: 2, cooldownMs: 0 });
    decider.decide(2, 0);
    decider.decide(500, 40);
    expect(decider.pendingFrames).toBe(0);
  });

  it("holds off every class until the cooldown has elapsed", () => {
    const decider = new EventDecider({ cooldownMs: 1000 });

    expect(decider.decide(500, 0).type).toBe("emit");
    expect(decider.decide(500, 999)).toEqual({ type: "cooldown", until: 1000 });
    expect(decider.decide(500, 1000).type).toBe("emit");
  });

  it("treats a score equal to the low multiplier as quiet", () => {
    const decider = new EventDecider({ lowMultiplier: 1.5, debounceFrames: 2 });
    const outcomes = [0, 40, 80, 120].map((t) => decider.decide(1.5, t).type);
    expect(outcomes).toEqual(["idle", "idle", "idle", "idle"]);
  });

  it("never emits for scores that do not exceed the low multiplier", () => {
    fc.assert(
      fc.property(
        fc.array(fc.oneof(fc.constant(1.5), fc.double({ min: 0, max: 1.5, noNaN: true })), {
          maxLength: 200,
        }),
        (scores) => {
          const decider = new EventDecider({ lowMultiplier: 1.5, debounceFrames: 1 });
          scores.forEach((score, i) => {
            expect(decider.decide(score, i * 40).type).not.toBe("emit");
          });
        }
      )
    );
  });

  it("emits once for a score held just above the low multiplier for the debounce count", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10 }), (frames) => {
        const decider = new EventDecider({
          lowMultiplier: 1.5,
          debounceFrames: frames,
          cooldownMs: 10_000,
        });
        const outcomes = Array.from({ length: frames }, (_, i) => decider.decide(1.5001, i * 40));

        expect(outcomes.filter((o) => o.type === "emit")).toHaveLength(1);
        expect(outcomes[frames - 1].type).toBe("emit");
      })
    );
  });

  it("never emits twice within the cooldown", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 3000 }),
        fc.array(fc.double({ min: 0, max: 1000, noNaN: true }), { minLength: 1, maxLength: 200 }),
        (cooldownMs, scores) => {
          const decider = new EventDecider({ cooldownMs, debounceFrames: 1 });
          const emittedAt: number[] = [];
          scores.forEach((score, i) => {
            const t = i * 20;
            if (decider.decide(score, t).type === "emit") emittedAt.push(t);
          });
          for (let i = 1; i < emittedAt.length; i++) {
            expect(emittedAt[i] - emittedAt[i - 1]).toBeGreaterThanOrEqual(cooldownMs);
          }
        }
      )
    );
  });

  it("with both levels at 1, fires only strictly above 1", () => {
    const decider = new EventDecider({
      lowMultiplier: 1,
      highMultiplier: 1,
      debounceFrames: 1,
      cooldownMs: 0,
    });
    expect(decider.decide(1, 0)).toEqual({ type: "idle" });
    expect(decider.decide(1.01, 40)).toEqual({ type: "emit", class: "high", score: 1.01 });
  });

  it("rejects a debounce count below one", () => {
    expect(() => new EventDecider({ debounceFrames: 0 })).toThrow(/at least 1/);
  });
});
