import { DateTime, Duration } from "luxon";
import type { CorrectionRule } from "./types.js";

export const ICS_UTC_FORMAT = "yyyyLLdd'T'HHmmss'Z'";

export const ICS_LINE_TERMINATOR = "\r\n";

export const CORRECTABLE_KEYS = ["DTSTART", "DTEND"] as const;

// The export tool kept venue times in the departure zone for the whole event,
// so everything scheduled while the venue sat one hour ahead came out an hour late.
export const DEFAULT_CORRECTION_RULE: CorrectionRule = {
  keys: CORRECTABLE_KEYS,
  window: {
    start: DateTime.fromISO("2022-03-08T06:00:00Z", { zone: "utc" }),
    end: DateTime.fromISO("2022-03-09T06:00:00Z", { zone: "utc" }),
  },
  offset: Duration.fromObject({ hours: 1 }),
  format: ICS_UTC_FORMAT,
};

export const QUIET_ENV_VAR = "ICS_TIMESHIFT_QUIET";
