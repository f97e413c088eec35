/**
 * Synthetic acquisition source.
 *
 * Stands in for the headset: a 10 Hz rhythm plus uniform noise on every
 * channel, with scripted artifacts layered on top:
 * - blink: a raised-cosine deflection on the occipital channels
 * - clench: moderate broadband noise on the frontal channels
 * - head-move: strong broadband noise on the frontal channels
 *
 * Output is deterministic for a given seed and script.
 */

import type { ChannelId, Hz, IClock, ISampleSource, SampleBatch, Seconds, SourceId } from "@neurocue/contracts";
import { createRandom } from "./random";

export type SyntheticArtifactKind = "blink" | "clench" | "head-move";

export interface SyntheticArtifact {
  kind: SyntheticArtifactKind;
  /** Offset from the first sample */
  atSeconds: Seconds;
  durationSeconds: Seconds;
  /** Channels affected. Defaults by kind: blink → O1/O2, others → Fp1/Fp2 */
  channels?: ChannelId[];
}

/**
 * Configuration for the synthetic source.
 */
export interface SyntheticSourceConfig {
  /** @default ["Fp1", "Fp2", "O1", "O2"] */
  channels?: ChannelId[];

  /** @default 250 */
  sampleRate?: Hz;

  /** Duration of each emitted batch. @default 0.04 */
  batchSeconds?: Seconds;

  /** @default 1 */
  seed?: number;

  /** Peak of the uniform background noise in µV. @default 2 */
  noiseMicrovolts?: number;

  /** @default 10 */
  rhythmHz?: Hz;

  /** @default 10 */
  rhythmMicrovolts?: number;

  /** Peak deflection of a blink in µV. @default 2000 */
  blinkMicrovolts?: number;

  /** Peak of clench noise in µV. @default 8 */
  clenchMicrovolts?: number;

  /** Peak of head-move noise in µV. @default 40 */
  headMoveMicrovolts?: number;

  artifacts?: SyntheticArtifact[];

  /** Used for batch timestamps. @default start time 0 */
  clock?: IClock;
}

const DEFAULT_CONFIG: Required<Omit<SyntheticSourceConfig, "clock">> = {
  channels: ["Fp1", "Fp2", "O1", "O2"],
  sampleRate: 250,
  batchSeconds: 0.04,
  seed: 1,
  noiseMicrovolts: 2,
  rhythmHz: 10,
  rhythmMicrovolts: 10,
  blinkMicrovolts: 2000,
  clenchMicrovolts: 8,
  headMoveMicrovolts: 40,
  artifacts: [],
};

const DEFAULT_ARTIFACT_CHANNELS: Record<SyntheticArtifactKind, ChannelId[]> = {
  blink: ["O1", "O2"],
  clench: ["Fp1", "Fp2"],
  "head-move": ["Fp1", "Fp2"],
};

export class SyntheticSampleSource implements ISampleSource {
  readonly source: SourceId = "synthetic";

  private config: Required<Omit<SyntheticSourceConfig, "clock">>;
  private clock: IClock | null;
  private random: () => number;
  private listeners: Array<(batch: SampleBatch) => void> = [];
  private timer: ReturnType<typeof setInterval> | null = null;

  /** Index of the next sample to generate */
  private sampleIndex = 0;

  /** Session time of sample 0 */
  private startTime = 0;

  constructor(config: SyntheticSourceConfig = {}) {
    const { clock, ...rest } = config;
    this.config = { ...DEFAULT_CONFIG, ...rest };
    this.clock = clock ?? null;
    this.random = createRandom(this.config.seed);
  }

  onBatch(callback: (batch: SampleBatch) => void): () => void {
    this.listeners.push(callback);
    return () => {
      const idx = this.listeners.indexOf(callback);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /**
   * Emit one batch every batchSeconds until stopped.
   */
  start(): void {
    if (this.timer) return;
    this.startTime = this.clock ? this.clock.now() : 0;
    const batchSize = this.batchSize();
    this.timer = setInterval(() => {
      this.emit(this.generate(batchSize));
    }, this.config.batchSeconds * 1000);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Samples per emitted batch.
   */
  batchSize(): number {
    return Math.max(1, Math.round(this.config.sampleRate * this.config.batchSeconds));
  }

  /**
   * Produce the next `count` samples per channel. Advances the stream.
   */
  generate(count: number): SampleBatch {
    const { sampleRate } = this.config;
    const channels: Record<ChannelId, number[]> = {};
    for (const channel of this.config.channels) {
      channels[channel] = [];
    }

    const first = this.sampleIndex;
    for (let i = 0; i < count; i++) {
      const index = first + i;
      const s = index / sampleRate;
      for (const channel of this.config.channels) {
        channels[channel].push(this.sampleAt(channel, s));
      }
    }
    this.sampleIndex += count;

    const msPerSample = 1000 / sampleRate;
    return {
      channels,
      sampleRate,
      t0: this.startTime + first * msPerSample,
      t1: this.startTime + (first + Math.max(0, count - 1)) * msPerSample,
    };
  }

  private sampleAt(channel: ChannelId, s: Seconds): number {
    const { rhythmHz, rhythmMicrovolts, noiseMicrovolts } = this.config;
    let value =
      rhythmMicrovolts * Math.sin(2 * Math.PI * rhythmHz * s) +
      noiseMicrovolts * (this.random() * 2 - 1);

    for (const artifact of this.config.artifacts) {
      const offset = s - artifact.atSeconds;
      if (offset < 0 || offset > artifact.durationSeconds) continue;
      const affected = artifact.channels ?? DEFAULT_ARTIFACT_CHANNELS[artifact.kind];
      if (!affected.includes(channel)) continue;

      switch (artifact.kind) {
        case "blink":
          value +=
            (this.config.blinkMicrovolts *
              (1 - Math.cos((2 * Math.PI * offset) / artifact.durationSeconds))) /
            2;
          break;
        case "clench":
          value += this.config.clenchMicrovolts * (this.random() * 2 - 1);
          break;
        case "head-move":
          value += this.config.headMoveMicrovolts * (this.random() * 2 - 1);
          break;
      }
    }

    return value;
  }

  private emit(batch: SampleBatch): void {
    for (const listener of this.listeners) {
      listener(batch);
    }
  }
}
