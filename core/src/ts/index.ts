/**
 * @mewpath/core
 *
 * Traces melt-electrowriting G-code into an ordered point path, wraps it
 * around a tube if requested, and writes it as CSV.
 */

// Export all types (re-exported from @mewpath/types)
export * from "@mewpath/types";

export * from "./constants";
export { ArcSegment, ArcSegmentOptions, ArcCenterInput, PlaneAxes, getPlaneAxes, resolveArcCenter } from "./arcSampler";
export { countAxisWords, detectAxisLetters } from "./axisDetection";
export { MotionTracker, MotionTrackerOptions, createMachineState } from "./motionTracker";
export { remapAxes, toCylindrical, transformPath } from "./transform";
export { CSV_HEADER, formatPoints, writePoints } from "./pointSink";
export {
  isAxis,
  parseAxis,
  parseAxisLetter,
  parseAxisLetterSetting,
  resolveOptions,
} from "./options";
export {
  ConvertFileOptions,
  ConvertFileResult,
  convertCommands,
  convertFile,
  convertProgram,
  defaultOutputPath,
} from "./converter";
export { runCli } from "./cli";
