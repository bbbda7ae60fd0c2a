import { parseArguments, type CliOptions } from "./arguments.js";
import { QUIET_ENV_VAR } from "./constants.js";
import { run } from "./corrector.js";
import { CorrectorError } from "./errors.js";
import { writeCalendarFile } from "./files.js";
import { createConsoleLogger, type Logger } from "./logger.js";

export { classifyLine, correctCalendar, correctLine, run, type RunResult } from "./corrector.js";
export { DEFAULT_CORRECTION_RULE, ICS_UTC_FORMAT } from "./constants.js";
export { CorrectorError, type CorrectorErrorKind } from "./errors.js";
export { formatTimestamp, parseTimestamp } from "./timestamp.js";
export type * from "./types.js";

export interface CliIo {
  stdout: { write(chunk: string): unknown };
  logger: Logger;
}

function defaultIo(): CliIo {
  const quietFlag = process.env[QUIET_ENV_VAR];
  return {
    stdout: process.stdout,
    logger: createConsoleLogger({ quiet: quietFlag === "1" || quietFlag === "true" }),
  };
}

/** Runs the command line and resolves to the process exit code. */
export async function main(argv: readonly string[], io: CliIo = defaultIo()): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArguments(argv);
  } catch (error) {
    if (error instanceof CorrectorError) {
      io.stdout.write(`${error.message}\n`);
      return error.exitCode;
    }
    throw error;
  }

  const result = await run(options.inputPath);
  if (!result.ok) {
    io.logger.error(result.error.message, result.error.cause);
    return result.error.exitCode;
  }

  for (const entry of result.report.unparsable) {
    io.logger.warn(`line ${entry.index}: ${entry.key} value "${entry.value}" is not a UTC timestamp, left unchanged`);
  }

  if (options.outputPath !== null) {
    try {
      await writeCalendarFile(options.outputPath, result.output);
    } catch (error) {
      if (error instanceof CorrectorError) {
        io.logger.error(error.message, error.cause);
        return error.exitCode;
      }
      throw error;
    }
  } else {
    io.stdout.write(result.output);
  }

  io.logger.info(`corrected ${result.report.corrected} of ${result.report.lines} lines`);
  return 0;
}
