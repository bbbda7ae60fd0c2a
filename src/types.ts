import type { DateTime, Duration } from "luxon";

/** One `KEY:VALUE` record of a calendar export, split at its first colon. */
export interface CalendarLine {
  key: string;
  /** Everything after the first colon, unparsed. Empty when the line has no colon. */
  value: string;
  raw: string;
}

/** Interval of recorded times known to be one zone-offset too late. `start` is exclusive, `end` inclusive. */
export interface CorrectionWindow {
  start: DateTime;
  end: DateTime;
}

export interface CorrectionRule {
  /** Property keys whose values are UTC timestamps eligible for correction. */
  keys: readonly string[];
  window: CorrectionWindow;
  /** Subtracted from every timestamp inside the window. */
  offset: Duration;
  /** Luxon format of the timestamp values, read and written in UTC. */
  format: string;
}

export type LineOutcome =
  | { kind: "passthrough"; line: string }
  | { kind: "unparsable"; line: string; key: string; value: string }
  | { kind: "out-of-window"; line: string }
  | { kind: "corrected"; line: string };

export interface UnparsableEntry {
  /** 1-based position among the emitted lines. */
  index: number;
  key: string;
  value: string;
}

export interface CorrectionReport {
  lines: number;
  corrected: number;
  unparsable: UnparsableEntry[];
}

export interface CorrectionResult {
  output: string;
  report: CorrectionReport;
}
