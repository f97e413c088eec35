import type { SessionMs } from "../core/time";
import type { WorkerId } from "../core/provenance";

/**
 * Conditions a worker reports while it keeps running.
 */
export type DiagnosticCode =
  | "ACQUISITION_UNAVAILABLE"
  | "MALFORMED_MESSAGE"
  | "CALIBRATION_INSUFFICIENT_DATA"
  | "CYCLE_FAILED"
  | "QUEUE_OVERFLOW";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * A runtime diagnostic emitted when something goes wrong but the worker
 * can continue operating.
 */
export interface Diagnostic {
  code: DiagnosticCode;

  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** When the diagnostic was emitted */
  timestamp: SessionMs;

  /** Which worker emitted this */
  source: WorkerId;
}

/**
 * Keeps the most recent diagnostics of one worker.
 */
export class DiagnosticLog {
  private entries: Diagnostic[] = [];

  constructor(private readonly capacity = 50) {}

  record(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  list(): readonly Diagnostic[] {
    return this.entries;
  }

  count(code: DiagnosticCode): number {
    return this.entries.filter((d) => d.code === code).length;
  }

  clear(): void {
    this.entries = [];
  }
}
