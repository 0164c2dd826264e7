/**
 * Program reader
 *
 * Loads a G-code file in a single read and parses it.
 */

import * as fs from "fs/promises";
import { ProgramParseResult } from "@mewpath/types";
import { parseProgram } from "./parser";

/**
 * Read and parse a G-code file.
 *
 * @param filepath - Path to the G-code file (.gcode, .nc, .ngc, ...)
 * @returns Parsed commands and warnings
 * @throws Error if the file cannot be read
 */
export async function readProgram(filepath: string): Promise<ProgramParseResult> {
  const source = await fs.readFile(filepath, "utf8");
  return parseProgram(source);
}
