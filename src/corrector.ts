import { DEFAULT_CORRECTION_RULE, ICS_LINE_TERMINATOR } from "./constants.js";
import { CorrectorError } from "./errors.js";
import { readCalendarFile } from "./files.js";
import { formatTimestamp, parseTimestamp } from "./timestamp.js";
import type { CorrectionReport, CorrectionResult, CorrectionRule, LineOutcome } from "./types.js";
import { splitCalendarLine, splitCalendarLines } from "./utils.js";

export type RunResult = ({ ok: true } & CorrectionResult) | { ok: false; error: CorrectorError };

export function classifyLine(rawLine: string, rule: CorrectionRule = DEFAULT_CORRECTION_RULE): LineOutcome {
  const { key, value, raw } = splitCalendarLine(rawLine);
  if (!rule.keys.includes(key)) {
    return { kind: "passthrough", line: raw };
  }

  const timestamp = parseTimestamp(value, rule.format);
  if (!timestamp) {
    return { kind: "unparsable", line: raw, key, value };
  }

  const millis = timestamp.toMillis();
  if (millis <= rule.window.start.toMillis() || millis > rule.window.end.toMillis()) {
    return { kind: "out-of-window", line: raw };
  }

  const shifted = timestamp.minus(rule.offset);
  return { kind: "corrected", line: `${key}:${formatTimestamp(shifted, rule.format)}` };
}

export function correctLine(rawLine: string, rule: CorrectionRule = DEFAULT_CORRECTION_RULE): string {
  return classifyLine(rawLine, rule).line;
}

export function correctCalendar(text: string, rule: CorrectionRule = DEFAULT_CORRECTION_RULE): CorrectionResult {
  const report: CorrectionReport = { lines: 0, corrected: 0, unparsable: [] };
  let output = "";

  for (const rawLine of splitCalendarLines(text)) {
    const outcome = classifyLine(rawLine, rule);
    report.lines += 1;
    if (outcome.kind === "corrected") {
      report.corrected += 1;
    } else if (outcome.kind === "unparsable") {
      report.unparsable.push({ index: report.lines, key: outcome.key, value: outcome.value });
    }
    output += outcome.line + ICS_LINE_TERMINATOR;
  }

  return { output, report };
}

/**
 * Reads the calendar at `path` and returns its corrected text.
 * File-level failures come back as `{ ok: false }`; nothing is emitted for them.
 */
export async function run(path: string, rule: CorrectionRule = DEFAULT_CORRECTION_RULE): Promise<RunResult> {
  try {
    const text = await readCalendarFile(path);
    return { ok: true, ...correctCalendar(text, rule) };
  } catch (error) {
    if (error instanceof CorrectorError) {
      return { ok: false, error };
    }
    throw error;
  }
}
