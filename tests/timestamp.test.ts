import { DateTime } from "luxon";
import { describe, expect, it } from "vitest";

import { formatTimestamp, parseTimestamp } from "../src/timestamp.js";

describe("parseTimestamp", () => {
  it("reads a basic UTC timestamp", () => {
    expect(parseTimestamp("20220309T030000Z")?.toISO()).toBe("2022-03-09T03:00:00.000Z");
  });

  it("accepts a leap day", () => {
    expect(parseTimestamp("20240229T120000Z")?.toISO()).toBe("2024-02-29T12:00:00.000Z");
  });

  it.each([
    ["", "empty value"],
    ["20220309T0300Z", "missing seconds"],
    ["20220309T030000", "missing Z"],
    ["20220309T030000Z ", "trailing space"],
    ["2022-03-09T03:00:00Z", "extended ISO form"],
    ["20221309T030000Z", "month 13"],
    ["20220230T030000Z", "February 30"],
    ["20220309T250000Z", "hour 25"],
    ["20220309T036000Z", "minute 60"],
    ["tomorrow", "free text"],
    ["20220309T030000z", "lowercase z"],
    ["20220309t030000Z", "lowercase t"],
    ["20220309t030000z", "lowercase t and z"],
    ["20220309T240000Z", "hour 24"],
  ])("rejects %j (%s)", (value) => {
    expect(parseTimestamp(value)).toBeNull();
  });

  it("reads other formats when one is passed in", () => {
    expect(parseTimestamp("2022-03-09 03:00", "yyyy-LL-dd HH:mm")?.toISO()).toBe("2022-03-09T03:00:00.000Z");
  });
});

describe("formatTimestamp", () => {
  it("writes the basic UTC form", () => {
    expect(formatTimestamp(DateTime.fromISO("2022-03-09T02:00:00Z"))).toBe("20220309T020000Z");
  });

  it("converts zoned times to UTC before writing", () => {
    const eastern = DateTime.fromISO("2022-03-08T22:00:00-05:00", { setZone: true });
    expect(formatTimestamp(eastern)).toBe("20220309T030000Z");
  });
});
