/**
 * @mewpath/gcode
 *
 * G-code line parser for melt-electrowriting printer programs.
 * Produces commands with their numeric words for motion tracing.
 */

// Export all types (re-exported from @mewpath/types)
export * from "@mewpath/types";

// Export parser functions
export { parseLine, parseProgram } from "./parser";
export { readProgram } from "./reader";
