import { DateTime } from "luxon";
import { ICS_UTC_FORMAT } from "./constants.js";

/**
 * Reads a whole value such as `20220309T030000Z` as a UTC instant.
 * Returns null unless the value matches `format` exactly and names a real calendar time.
 */
export function parseTimestamp(value: string, format: string = ICS_UTC_FORMAT): DateTime | null {
  const parsed = DateTime.fromFormat(value, format, { zone: "utc" });
  // fromFormat matches quoted literals case-insensitively; only the exact encoding counts.
  if (!parsed.isValid || parsed.toFormat(format) !== value) {
    return null;
  }
  return parsed;
}

export function formatTimestamp(dateTime: DateTime, format: string = ICS_UTC_FORMAT): string {
  return dateTime.toUTC().toFormat(format);
}
