import {
  AXES,
  Axis,
  AxisLetterSelection,
  AxisMapping,
  ConversionOptions,
  ResolvedConversionOptions,
} from "@mewpath/types";
import {
  AUTO_AXIS_LETTER,
  DEFAULT_AXIS_LETTERS,
  DEFAULT_AXIS_MAPPING,
  DEFAULT_CURVE_RESOLUTION,
  DEFAULT_DIAMETER,
  DEFAULT_LONG_AXIS,
  DEFAULT_PRECISION,
  DEFAULT_PROGRESS_UPDATES,
  DEFAULT_THICKNESS,
  MAX_PRECISION,
  RESERVED_LETTERS,
} from "./constants";

function configError(message: string): Error {
  return new Error(`Invalid configuration: ${message}`);
}

export function isAxis(value: unknown): value is Axis {
  return typeof value === "string" && (AXES as readonly string[]).includes(value);
}

/**
 * Read an axis name ("x", "y" or "z", any case).
 * @throws Error for anything else
 */
export function parseAxis(value: string, name: string): Axis {
  const axis = value.toLowerCase();
  if (!isAxis(axis)) {
    throw configError(`${name} must be one of x, y, z (got '${value}')`);
  }
  return axis;
}

/**
 * Read a G-code letter that may feed a position axis.
 * @throws Error for multi-character, non-letter or reserved values
 */
export function parseAxisLetter(value: string, name: string): string {
  const letter = value.toUpperCase();
  if (!/^[A-Z]$/.test(letter)) {
    throw configError(`${name} must be a single letter (got '${value}')`);
  }
  if (RESERVED_LETTERS.includes(letter)) {
    throw configError(`${name} cannot use reserved letter '${letter}'`);
  }
  return letter;
}

/**
 * Read an axis letter option: a letter, or "auto" (any case) for detection
 * from the program, returned as `null`.
 */
export function parseAxisLetterSetting(value: string, name: string): string | null {
  if (value.toLowerCase() === AUTO_AXIS_LETTER) return null;
  return parseAxisLetter(value, name);
}

function nonNegative(value: number, name: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw configError(`${name} must be a finite number >= 0 (got ${value})`);
  }
  return value;
}

function integerInRange(value: number, name: string, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw configError(`${name} must be an integer between ${min} and ${max} (got ${value})`);
  }
  return value;
}

/**
 * Apply defaults to conversion options and validate every value.
 *
 * @throws Error prefixed "Invalid configuration:" on the first bad value
 */
export function resolveOptions(
  options: ConversionOptions = {}
): ResolvedConversionOptions {
  const letters: Partial<Record<Axis, string>> = options.axisLetters ?? {};
  const axisLetters: AxisLetterSelection = {
    x: parseAxisLetterSetting(letters.x ?? DEFAULT_AXIS_LETTERS.x, "x axis letter"),
    y: parseAxisLetterSetting(letters.y ?? DEFAULT_AXIS_LETTERS.y, "y axis letter"),
    z: parseAxisLetterSetting(letters.z ?? DEFAULT_AXIS_LETTERS.z, "z axis letter"),
  };
  for (const axis of AXES) {
    const letter = axisLetters[axis];
    const other = AXES.find((a) => a !== axis && axisLetters[a] === letter);
    if (letter !== null && other !== undefined) {
      throw configError(`${axis} and ${other} axes both use letter '${letter}'`);
    }
  }

  const mapping: Partial<AxisMapping> = options.axisMapping ?? {};
  const axisMapping: AxisMapping = {
    xSource: parseAxis(mapping.xSource ?? DEFAULT_AXIS_MAPPING.xSource, "x source"),
    ySource: parseAxis(mapping.ySource ?? DEFAULT_AXIS_MAPPING.ySource, "y source"),
    zSource: parseAxis(mapping.zSource ?? DEFAULT_AXIS_MAPPING.zSource, "z source"),
  };

  return {
    axisLetters,
    axisMapping,
    cylindrical: {
      diameter: nonNegative(options.diameter ?? DEFAULT_DIAMETER, "diameter"),
      thickness: nonNegative(options.thickness ?? DEFAULT_THICKNESS, "thickness"),
      longAxis: parseAxis(
        options.cylindricalLongAxis ?? DEFAULT_LONG_AXIS,
        "cylindrical long axis"
      ),
    },
    curveResolution: integerInRange(
      options.curveResolution ?? DEFAULT_CURVE_RESOLUTION,
      "curve resolution",
      1,
      Number.MAX_SAFE_INTEGER
    ),
    precision: integerInRange(
      options.precision ?? DEFAULT_PRECISION,
      "precision",
      0,
      MAX_PRECISION
    ),
    onProgress: options.onProgress,
    progressUpdates: integerInRange(
      options.progressUpdates ?? DEFAULT_PROGRESS_UPDATES,
      "progress updates",
      1,
      Number.MAX_SAFE_INTEGER
    ),
  };
}
