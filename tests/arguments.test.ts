import { describe, expect, it } from "vitest";

import { parseArguments, USAGE } from "../src/arguments.js";
import { CorrectorError } from "../src/errors.js";

function captureError(argv: string[]): CorrectorError | null {
  try {
    parseArguments(argv);
    return null;
  } catch (error) {
    return error instanceof CorrectorError ? error : null;
  }
}

describe("parseArguments", () => {
  it("takes the input path from the first argument", () => {
    expect(parseArguments(["schedule.ics"])).toEqual({ inputPath: "schedule.ics", outputPath: null });
  });

  it("takes an optional output path", () => {
    expect(parseArguments(["schedule.ics", "munged.ics"])).toEqual({
      inputPath: "schedule.ics",
      outputPath: "munged.ics",
    });
  });

  it.each([
    [[]],
    [["-h"]],
    [["--help"]],
    [["schedule.ics", "-H"]],
    [["--HELP", "schedule.ics"]],
    [["-hx"]],
    [["a.ics", "b.ics", "c.ics"]],
  ])("rejects %j with the usage text", (argv) => {
    const error = captureError(argv);
    expect(error?.kind).toBe("InvalidArguments");
    expect(error?.exitCode).toBe(1);
    expect(error?.message).toBe(USAGE);
  });

  it("does not treat other flags as help", () => {
    expect(parseArguments(["-x.ics"])).toEqual({ inputPath: "-x.ics", outputPath: null });
  });
});
