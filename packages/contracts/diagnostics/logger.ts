/**
 * Minimal logging seam.
 *
 * Components log through console with a bracketed tag, e.g.
 * "[Calibration] Baseline locked: 3.2e-2". Workers accept a Logger so
 * tests can capture or silence output.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

function debugEnabled(): boolean {
  return typeof process !== "undefined" && process.env.NEUROCUE_DEBUG === "1";
}

export function createConsoleLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message) => {
      if (debugEnabled()) console.debug(`${prefix} ${message}`);
    },
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message, err) => {
      if (err === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, err);
      }
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
