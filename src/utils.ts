import type { CalendarLine } from "./types.js";

const NEWLINE_REGEX = /\r\n|[\n\v\f\r\u0085\u2028\u2029]/;

export function splitCalendarLines(text: string): string[] {
    return text.split(NEWLINE_REGEX).filter((line) => line.length > 0);
}

export function splitCalendarLine(raw: string): CalendarLine {
    const colon = raw.indexOf(":");
    if (colon === -1) {
        return { key: raw, value: "", raw };
    }
    return { key: raw.slice(0, colon), value: raw.slice(colon + 1), raw };
}
