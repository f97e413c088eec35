export type Ms = number;        // milliseconds (durations, windows)
export type Seconds = number;   // configuration-facing durations
export type SessionMs = number; // ms on the worker clock (monotonic within a run)
export type Hz = number;

export const secondsToMs = (seconds: Seconds): Ms => seconds * 1000;
