import { readFile, writeFile } from "node:fs/promises";
import { TextDecoder } from "node:util";
import { CorrectorError } from "./errors.js";

const UTF8_DECODER = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export async function readCalendarFile(path: string): Promise<string> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new CorrectorError("UnreadableFile", `Could not read calendar file: ${path}`, { cause: error });
  }

  try {
    return UTF8_DECODER.decode(bytes);
  } catch (error) {
    throw new CorrectorError("InvalidEncoding", `Calendar file is not valid UTF-8: ${path}`, { cause: error });
  }
}

/** Replaces whatever exists at `path`. */
export async function writeCalendarFile(path: string, contents: string): Promise<void> {
  try {
    await writeFile(path, contents, "utf8");
  } catch (error) {
    throw new CorrectorError("UnwritableFile", `Could not write output file: ${path}`, { cause: error });
  }
}
