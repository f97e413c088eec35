/**
 * neurocue CLI
 *
 *   neurocue [--config path.json] [--duration seconds] [--rounds n] [--seed n]
 *
 * Runs the full pipeline against the synthetic source with a scripted
 * series of blinks, clenches and head moves, logging status colours and
 * slide commands to the console. NEUROCUE_* environment variables
 * override the config file.
 */

import { parseArgs } from "node:util";
import { createConsoleLogger, describeError } from "@neurocue/contracts";
import { SyntheticSampleSource } from "@neurocue/adapters";
import { SystemClock } from "@neurocue/engine";
import { loadRuntimeConfig } from "./config";
import { demoScript } from "./demo";
import { Runtime } from "./Runtime";

const USAGE = `Usage: neurocue [options]

  -c, --config <file>     JSON configuration file
  -d, --duration <s>      stop after this many seconds (default: run until Ctrl-C)
  -r, --rounds <n>        scripted blink/move rounds (default: 4)
  -s, --seed <n>          noise seed (default: 1)
  -h, --help              show this help`;

const logger = createConsoleLogger("neurocue");

function parseNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`--${name} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}

async function main(argv: string[]): Promise<number> {
  let runtime: Runtime;
  let duration: number | undefined;

  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: "string", short: "c" },
        duration: { type: "string", short: "d" },
        rounds: { type: "string", short: "r" },
        seed: { type: "string", short: "s" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
    });

    if (values.help) {
      console.log(USAGE);
      return 0;
    }

    const config = loadRuntimeConfig({ file: values.config, env: process.env });
    duration = values.duration === undefined ? undefined : parseNumber("duration", values.duration, 0);
    const rounds = parseNumber("rounds", values.rounds, 4);
    const clock = new SystemClock();

    const source = new SyntheticSampleSource({
      channels: [...new Set([...config.moveChannels, ...config.blinkChannels])],
      sampleRate: config.sampleRate,
      batchSeconds: config.batchSeconds,
      seed: parseNumber("seed", values.seed, 1),
      artifacts: demoScript(Math.floor(rounds), config.calibrationSeconds + 1),
      clock,
    });
    runtime = new Runtime({ config, source, clock });
  } catch (err) {
    logger.error(describeError(err));
    console.error(USAGE);
    return 1;
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} received, stopping`);
    runtime.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  const cancelTimer = duration === undefined ? () => {} : runtime.stopAfter(duration);

  try {
    await runtime.run();
    return 0;
  } catch (err) {
    logger.error("Runtime failed", err);
    return 1;
  } finally {
    cancelTimer();
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error("Unexpected failure", err);
    process.exitCode = 1;
  }
);
