/**
 * Detector tests drive the full frame pipeline (conditioning, band
 * power or derivative, calibration, decision) with deterministic tones
 * on a 40 ms frame clock.
 */

import { describe, it, expect } from "vitest";
import type { DetectionEvent } from "@neurocue/contracts";
import { parseRuntimeConfig } from "@neurocue/contracts";
import { createBlinkDetector, createGestureDetector } from "../../src/factories";
import type { ThresholdDetector } from "../../src/detectors/ThresholdDetector";
import { makeBatch } from "../_harness/signals";

const FS = 250;
const FRAME = 10; // samples per batch
const FRAME_MS = 40;

/**
 * Feed `frames` batches; `valueAt(n)` gives every channel's sample n.
 */
function drive(
  detector: ThresholdDetector,
  channels: string[],
  frames: number,
  valueAt: (n: number) => number
): DetectionEvent[] {
  const events: DetectionEvent[] = [];
  for (let frame = 0; frame < frames; frame++) {
    const values: number[] = [];
    for (let i = 0; i < FRAME; i++) values.push(valueAt(frame * FRAME + i));

    const batch = makeBatch(
      Object.fromEntries(channels.map((channel) => [channel, [...values]])),
      FS,
      frame * FRAME_MS
    );
    const event = detector.process(batch, frame * FRAME_MS);
    if (event) events.push(event);
  }
  return events;
}

const tone = (amplitude: (n: number) => number) => (n: number) =>
  amplitude(n) * Math.sin((2 * Math.PI * 60 * n) / FS);

describe("GestureDetector", () => {
  const baseConfig = {
    lowThresholdMultiplier: 3,
    highThresholdMultiplier: 100,
    calibrationSeconds: 3,
    cooldownSeconds: 1,
  };

  it("stays silent and COLLECTING during the calibration period", () => {
    const detector = createGestureDetector(parseRuntimeConfig(baseConfig));
    detector.init();

    const events = drive(detector, ["Fp1", "Fp2"], 70, tone(() => 500));

    expect(events).toEqual([]);
    expect(detector.calibration().phase).toBe("COLLECTING");
  });

  it("locks a baseline and stays quiet at resting power", () => {
    const detector = createGestureDetector(parseRuntimeConfig(baseConfig));
    detector.init();

    const events = drive(detector, ["Fp1", "Fp2"], 150, tone(() => 1));
    const calibration = detector.calibration();

    expect(events).toEqual([]);
    expect(calibration.phase).toBe("CALIBRATED");
    expect(calibration.baselinePower).toBeGreaterThan(0);
    expect(calibration.accumulatedSampleCount).toBeGreaterThan(5);
  });

  it("reports a sustained moderate rise as a clench", () => {
    const detector = createGestureDetector(parseRuntimeConfig(baseConfig));
    detector.init();

    // resting amplitude 1, then 4 (about 16x the power) from 4 s on
    const events = drive(
      detector,
      ["Fp1", "Fp2"],
      150,
      tone((n) => (n < 1000 ? 1 : 4))
    );

    expect(events.length).toBeGreaterThan(0);
    expect(events[0]).toMatchObject({ kind: "clench", class: "low" });
    expect(events[0].timestamp).toBeGreaterThanOrEqual(4000);
    for (let i = 1; i < events.length; i++) {
      expect(events[i].timestamp - events[i - 1].timestamp).toBeGreaterThanOrEqual(1000);
      expect(events[i].kind).toBe("clench");
    }
  });

  it("reports a large burst as a head movement", () => {
    const detector = createGestureDetector(
      parseRuntimeConfig({ ...baseConfig, debounceFrameCount: 20 })
    );
    detector.init();

    const events = drive(
      detector,
      ["Fp1", "Fp2"],
      120,
      tone((n) => (n < 1000 ? 1 : 100))
    );

    expect(events[0]).toMatchObject({ kind: "head-move", class: "high" });
    expect(events[0].magnitude).toBeGreaterThan(100);
  });

  it("averages the configured channels only", () => {
    const detector = createGestureDetector(parseRuntimeConfig(baseConfig));
    detector.init();

    // Activity on occipital channels never reaches the gesture path
    const events = drive(detector, ["O1", "O2"], 150, tone(() => 100));
    expect(events).toEqual([]);
    expect(detector.lastFrame()?.feature).toBe(0);
  });
});

describe("BlinkDetector", () => {
  const config = parseRuntimeConfig({ blinkDerivativeThreshold: 20000 });

  /** 10 Hz background with a 4000 µV raised-cosine blink at 2.0–2.2 s */
  const withBlink = (n: number) => {
    const s = n / FS;
    let value = 10 * Math.sin(2 * Math.PI * 10 * s);
    if (s >= 2 && s <= 2.2) {
      value += (4000 * (1 - Math.cos((2 * Math.PI * (s - 2)) / 0.2))) / 2;
    }
    return value;
  };

  it("is calibrated from the start", () => {
    const detector = createBlinkDetector(config);
    expect(detector.calibration().phase).toBe("CALIBRATED");
  });

  it("ignores the background rhythm", () => {
    const detector = createBlinkDetector(config);
    detector.init();
    const events = drive(detector, ["O1", "O2"], 75, (n) => 10 * Math.sin((2 * Math.PI * 10 * n) / FS));
    expect(events).toEqual([]);
  });

  it("reports a blink while it is in the newest segment", () => {
    const detector = createBlinkDetector(config);
    detector.init();

    const events = drive(detector, ["O1", "O2"], 75, withBlink);

    expect(events.length).toBeGreaterThan(0);
    for (const event of events) {
      expect(event.kind).toBe("blink");
      expect(event.timestamp).toBeGreaterThanOrEqual(2000);
      expect(event.timestamp).toBeLessThanOrEqual(2400);
    }
  });
});
