/**
 * Runtime configuration loading.
 *
 * Layers, lowest priority first:
 *   1. built-in defaults
 *   2. a JSON file (--config path)
 *   3. NEUROCUE_* environment variables
 *   4. explicit overrides (tests, CLI flags)
 */

import { readFileSync } from "node:fs";
import type { RuntimeConfig } from "@neurocue/contracts";
import {
  ConfigError,
  describeError,
  mergeRuntimeConfig,
  runtimeConfigFromEnv,
} from "@neurocue/contracts";

export interface LoadConfigOptions {
  file?: string;
  env?: Record<string, string | undefined>;
  overrides?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readConfigFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${describeError(err)}`, []);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${describeError(err)}`, []);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`, []);
  }
  return parsed;
}

/**
 * @throws {ConfigError} for an unreadable file or any invalid value.
 */
export function loadRuntimeConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  const fileLayer = options.file ? readConfigFile(options.file) : undefined;
  return mergeRuntimeConfig(fileLayer, runtimeConfigFromEnv(options.env ?? {}), options.overrides);
}
