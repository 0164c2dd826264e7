#!/usr/bin/env node
/**
 * mewpath command line
 *
 * Converts a G-code file into a CSV point file for visualization.
 */

import { parseArgs } from "util";
import { AXES, ConversionOptions } from "@mewpath/types";
import {
  AUTO_AXIS_LETTER,
  DEFAULT_CURVE_RESOLUTION,
  DEFAULT_PRECISION,
} from "./constants";
import { convertFile } from "./converter";
import { parseAxis } from "./options";

export const USAGE = `Usage: mewpath <file.gcode> [options]

Options:
  -o, --output <path>                 Output CSV (default: <file>.csv)
  -d, --diameter <mm>                 Tube diameter; 0 disables the cylindrical transform (default: 0)
  -t, --thickness <mm>                Tube wall thickness (default: 0)
  -x, --x-axis <letter|auto>          G-code letter for the x coordinate (default: X)
  -y, --y-axis <letter|auto>          G-code letter for the y coordinate (default: Y)
  -z, --z-axis <letter|auto>          G-code letter for the z coordinate (default: Z)
      --map-x <x|y|z>                 Coordinate written as output x (default: x)
      --map-y <x|y|z>                 Coordinate written as output y (default: y)
      --map-z <x|y|z>                 Coordinate written as output z (default: z)
  -c, --cylindrical-long-axis <x|y|z> Axis the tube runs along (default: x)
  -r, --curve-resolution <n>          Points per arc (default: ${DEFAULT_CURVE_RESOLUTION})
  -p, --precision <n>                 Decimal places in the output (default: ${DEFAULT_PRECISION})
  -v, --verbose                       Print parse warnings and progress
  -h, --help                          Show this help`;

class UsageError extends Error {}

function parseNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new UsageError(`--${name} expects a number, got '${value}'`);
  }
  return parsed;
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        output: { type: "string", short: "o" },
        diameter: { type: "string", short: "d" },
        thickness: { type: "string", short: "t" },
        "x-axis": { type: "string", short: "x" },
        "y-axis": { type: "string", short: "y" },
        "z-axis": { type: "string", short: "z" },
        "map-x": { type: "string" },
        "map-y": { type: "string" },
        "map-z": { type: "string" },
        "cylindrical-long-axis": { type: "string", short: "c" },
        "curve-resolution": { type: "string", short: "r" },
        precision: { type: "string", short: "p" },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

/**
 * Run the command line.
 *
 * @param argv - Arguments without the node executable and script path
 * @returns Process exit code: 0 on success, 1 on conversion errors, 2 on
 *   usage errors
 */
export async function runCli(argv: string[]): Promise<number> {
  try {
    const { values, positionals } = parseCommandLine(argv);

    if (values.help) {
      console.log(USAGE);
      return 0;
    }
    if (positionals.length !== 1) {
      throw new UsageError("Expected exactly one G-code file");
    }

    const mapAxis = (value: string | undefined, name: string) =>
      value === undefined ? undefined : parseAxis(value, name);

    const letterOptions = {
      x: values["x-axis"],
      y: values["y-axis"],
      z: values["z-axis"],
    };

    const options: ConversionOptions = {
      diameter: parseNumber(values.diameter, "diameter"),
      thickness: parseNumber(values.thickness, "thickness"),
      axisLetters: letterOptions,
      axisMapping: {
        xSource: mapAxis(values["map-x"], "--map-x"),
        ySource: mapAxis(values["map-y"], "--map-y"),
        zSource: mapAxis(values["map-z"], "--map-z"),
      },
      cylindricalLongAxis: mapAxis(
        values["cylindrical-long-axis"],
        "--cylindrical-long-axis"
      ),
      curveResolution: parseNumber(values["curve-resolution"], "curve-resolution"),
      precision: parseNumber(values.precision, "precision"),
    };

    if (values.verbose) {
      options.onProgress = (progress) => {
        console.log(
          `Traced ${progress.linesProcessed}/${progress.totalLines} lines (${progress.percent}%)`
        );
      };
    }

    const result = await convertFile(positionals[0], {
      ...options,
      outputPath: values.output,
    });

    if (values.verbose) {
      for (const warning of result.warnings) {
        console.warn(`Line ${warning.lineNumber}: ${warning.message}`);
      }
    } else if (result.warnings.length > 0) {
      console.warn(`Skipped ${result.warnings.length} malformed word(s); use --verbose for details`);
    }

    for (const axis of AXES) {
      if (letterOptions[axis]?.toLowerCase() === AUTO_AXIS_LETTER) {
        console.log(`Detected ${result.axisLetters[axis]} as the ${axis} axis letter`);
      }
    }

    console.log(
      `${result.linearMoveCount} moves and ${result.arcCount} arcs parsed from gcode`
    );
    console.log(`Exported ${result.points.length} points to ${result.outputPath}`);
    return 0;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    if (e instanceof UsageError) {
      console.error(`Error: ${message}\n\n${USAGE}`);
      return 2;
    }
    console.error(`Error: ${message}`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      console.error("Unexpected error:", e);
      process.exitCode = 1;
    });
}
