/**
 * Runtime Configuration
 *
 * Every tunable the workers read. Defaults reproduce the tuned values of
 * the reference headset setup (250 Hz, Fp1/Fp2 for jaw and head activity,
 * O1/O2 for blinks).
 *
 * Sources, lowest priority first: defaults, a JSON file, NEUROCUE_*
 * environment variables. The runner does the file I/O; this module only
 * validates and merges plain objects.
 */

import { z } from "zod";

const positive = () => z.number().finite().positive();
const nonNegative = () => z.number().finite().nonnegative();

export const runtimeConfigSchema = z
  .object({
    sampleRate: positive().default(250),
    analysisWindowSeconds: positive().default(4.0),
    fftWindowSeconds: positive().default(0.5),
    calibrationSeconds: nonNegative().default(3.0),
    readySeconds: nonNegative().default(3.0),
    restSeconds: nonNegative().default(2.0),
    lowThresholdMultiplier: positive().default(1.5),
    highThresholdMultiplier: positive().default(100.0),
    frequencyBandLow: nonNegative().default(35.0),
    frequencyBandHigh: positive().default(110.0),
    cooldownSeconds: nonNegative().default(1.0),
    debounceFrameCount: z.number().int().min(1).default(2),

    /** Analysis window of the blink path */
    blinkWindowSeconds: positive().default(5.0),
    /** Absolute derivative (µV/s) above which a blink is reported */
    blinkDerivativeThreshold: positive().default(20000),
    /** Minimum length of the newest segment scanned for a blink */
    blinkCheckSeconds: positive().default(0.1),
    blinkCooldownSeconds: nonNegative().default(0),
    moveChannels: z.array(z.string().min(1)).min(1).default(["Fp1", "Fp2"]),
    blinkChannels: z.array(z.string().min(1)).min(1).default(["O1", "O2"]),

    /** Feature samples required before a baseline may be computed (strictly more than this) */
    minCalibrationSamples: z.number().int().nonnegative().default(5),
    /** Floor applied to the computed baseline */
    minBaselinePower: positive().default(1e-12),
    /** Sub-windows shorter than this yield zero band power */
    minFeatureSeconds: positive().default(0.1),

    pollIntervalMs: positive().default(10),
    receiveTimeoutMs: positive().default(100),
    acquisitionStallSeconds: positive().default(1.0),
    queueCapacity: z.number().int().min(1).default(1024),
    queueOverflow: z.enum(["drop-oldest", "drop-newest"]).default("drop-oldest"),

    /** Batch duration produced by the synthetic source */
    batchSeconds: positive().default(0.04),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.fftWindowSeconds >= config.analysisWindowSeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["fftWindowSeconds"],
        message: "fftWindowSeconds must be shorter than analysisWindowSeconds",
      });
    }
    if (config.frequencyBandLow >= config.frequencyBandHigh) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["frequencyBandLow"],
        message: "frequencyBandLow must be below frequencyBandHigh",
      });
    }
    if (config.lowThresholdMultiplier >= config.highThresholdMultiplier) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["lowThresholdMultiplier"],
        message: "lowThresholdMultiplier must be below highThresholdMultiplier",
      });
    }
  });

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Validate a plain object and fill in defaults.
 * @throws {ConfigError} listing every invalid field.
 */
export function parseRuntimeConfig(input: unknown): RuntimeConfig {
  const result = runtimeConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = parseRuntimeConfig({});

export const ENV_PREFIX = "NEUROCUE_";

const LIST_KEYS = new Set(["moveChannels", "blinkChannels"]);
const STRING_KEYS = new Set(["queueOverflow"]);

/**
 * "readySeconds" → "NEUROCUE_READY_SECONDS"
 */
export function envVarName(key: string): string {
  return ENV_PREFIX + key.replace(/[A-Z]/g, (c) => `_${c}`).toUpperCase();
}

/**
 * Collect overrides from environment variables.
 * Values are converted by key type only; range checks are left to the schema.
 */
export function runtimeConfigFromEnv(
  env: Record<string, string | undefined>
): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const key of Object.keys(DEFAULT_RUNTIME_CONFIG)) {
    const value = env[envVarName(key)];
    if (value === undefined || value.trim() === "") continue;

    if (LIST_KEYS.has(key)) {
      overrides[key] = value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    } else if (STRING_KEYS.has(key)) {
      overrides[key] = value.trim();
    } else {
      overrides[key] = Number(value);
    }
  }
  return overrides;
}

/**
 * Merge configuration layers (later wins) and validate the result.
 */
export function mergeRuntimeConfig(
  ...layers: Array<Record<string, unknown> | undefined>
): RuntimeConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (layer) Object.assign(merged, layer);
  }
  return parseRuntimeConfig(merged);
}
