/**
 * Conversion pipeline
 *
 * parse -> trace (with arc sampling) -> transform -> write. Arcs are sampled
 * in machine space and the finished path is transformed once.
 */

import * as path from "path";
import {
  ConversionOptions,
  ConversionProgress,
  ConversionResult,
  PathPoint,
  ProgramParseResult,
  ResolvedConversionOptions,
} from "@mewpath/types";
import { parseProgram, readProgram } from "@mewpath/gcode";
import { detectAxisLetters } from "./axisDetection";
import { createMachineState, MotionTracker } from "./motionTracker";
import { resolveOptions } from "./options";
import { writePoints } from "./pointSink";
import { transformPath } from "./transform";

export interface ConvertFileOptions extends ConversionOptions {
  /** Where to write the CSV (default: input path with a .csv extension) */
  outputPath?: string;
}

export interface ConvertFileResult extends ConversionResult {
  outputPath: string;
}

/**
 * Reports progress at most `updates` times, on evenly spaced line counts.
 */
function createProgressReporter(
  totalLines: number,
  updates: number,
  onProgress?: (progress: ConversionProgress) => void
) {
  let lastBucket = 0;

  const report = (linesProcessed: number): void => {
    if (!onProgress) return;
    const bucket = Math.floor((linesProcessed / totalLines) * updates);
    if (bucket <= lastBucket) return;
    lastBucket = bucket;
    onProgress({
      linesProcessed,
      totalLines,
      percent: Math.round((linesProcessed / totalLines) * 100),
    });
  };

  return {
    update: report,
    finish: () => report(totalLines),
  };
}

/**
 * Trace parsed commands and transform the resulting path. Axis letters left
 * to detection are picked from the program first.
 *
 * @throws Error if an arc's geometry cannot be determined or an axis letter
 *   cannot be detected
 */
export function convertCommands(
  program: ProgramParseResult,
  options: ResolvedConversionOptions
): ConversionResult {
  const axisLetters = detectAxisLetters(program.commands, options.axisLetters);
  const tracker = new MotionTracker(createMachineState(), {
    axisLetters,
    curveResolution: options.curveResolution,
  });
  const progress = createProgressReporter(
    program.totalLines,
    options.progressUpdates,
    options.onProgress
  );

  const rawPath: PathPoint[] = [];
  for (const command of program.commands) {
    for (const point of tracker.consume(command)) {
      rawPath.push(point);
    }
    progress.update(command.lineNumber);
  }
  progress.finish();

  return {
    points: transformPath(rawPath, options.axisMapping, options.cylindrical),
    linearMoveCount: tracker.linearMoveCount,
    arcCount: tracker.arcCount,
    axisLetters,
    warnings: program.warnings,
  };
}

/**
 * Convert G-code text to transformed path points.
 *
 * @param source - Program text
 * @param options - Conversion options; validated before parsing starts
 *
 * @example
 * ```typescript
 * const { points } = convertProgram("G1 X5 U90", {
 *   axisLetters: { y: "U" },
 *   diameter: 3,
 * });
 * // points[0] is approximately { x: 5, y: 0, z: 1.5 }
 * ```
 */
export function convertProgram(
  source: string,
  options: ConversionOptions = {}
): ConversionResult {
  const resolved = resolveOptions(options);
  return convertCommands(parseProgram(source), resolved);
}

/**
 * Default output path: the input path with its extension replaced by .csv.
 */
export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.csv`);
}

/**
 * Convert a G-code file into a CSV point file.
 *
 * Options are validated before the input is read. The output is written in
 * a single operation once the whole path is known.
 *
 * @throws Error on invalid options, unreadable input, bad arc geometry or
 *   an unwritable output path
 */
export async function convertFile(
  inputPath: string,
  options: ConvertFileOptions = {}
): Promise<ConvertFileResult> {
  const resolved = resolveOptions(options);
  const outputPath = options.outputPath ?? defaultOutputPath(inputPath);

  const program = await readProgram(inputPath);
  const result = convertCommands(program, resolved);
  await writePoints(outputPath, result.points, resolved.precision);

  return { ...result, outputPath };
}
