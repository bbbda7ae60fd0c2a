import { CorrectorError } from "./errors.js";

export interface CliOptions {
    inputPath: string;
    /** When null the corrected calendar goes to stdout. */
    outputPath: string | null;
}

export const USAGE = [
    "Usage: ics-timeshift <schedule.ics> [output.ics]",
    "",
    "Pass in a path to a schedule.ics file as first argument.",
    "The corrected calendar is written to stdout, or to output.ics when given.",
].join("\n");

function isHelpFlag(argument: string): boolean {
    const lowered = argument.toLowerCase();
    return lowered.startsWith("-h") || lowered.startsWith("--h");
}

export function parseArguments(argv: readonly string[]): CliOptions {
    if (argv.length === 0 || argv.length > 2 || argv.some(isHelpFlag)) {
        throw new CorrectorError("InvalidArguments", USAGE);
    }
    return {
        inputPath: argv[0],
        outputPath: argv.length === 2 ? argv[1] : null,
    };
}
