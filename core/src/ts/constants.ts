import { Axis, AxisLetters, AxisMapping } from "@mewpath/types";

/** Points sampled along each G2/G3 arc */
export const DEFAULT_CURVE_RESOLUTION = 20;

/** Decimal places written to the point file */
export const DEFAULT_PRECISION = 6;

/** Upper bound on onProgress callbacks per conversion */
export const DEFAULT_PROGRESS_UPDATES = 40;

export const DEFAULT_DIAMETER = 0;
export const DEFAULT_THICKNESS = 0;
export const DEFAULT_LONG_AXIS: Axis = "x";

export const DEFAULT_AXIS_LETTERS: Readonly<AxisLetters> = {
  x: "X",
  y: "Y",
  z: "Z",
};

export const DEFAULT_AXIS_MAPPING: Readonly<AxisMapping> = {
  xSource: "x",
  ySource: "y",
  zSource: "z",
};

export const MM_PER_INCH = 25.4;

/**
 * Arc start and end closer than this fraction of the radius, measured in the
 * arc plane, are the same point: the arc is a full circle.
 */
export const FULL_CIRCLE_TOLERANCE = 1e-9;

/**
 * Letters that carry command, feed or arc data and cannot be used as
 * position axes.
 */
export const RESERVED_LETTERS: readonly string[] = [
  "G",
  "M",
  "N",
  "F",
  "I",
  "J",
  "K",
  "R",
];

export const MAX_PRECISION = 15;

/** Axis letter option value that asks for detection from the program */
export const AUTO_AXIS_LETTER = "auto";

/** Source lines scanned when detecting an axis letter */
export const AXIS_DETECTION_LINES = 1000;

/** Spindle speed and dwell words, never position axes */
export const NON_AXIS_LETTERS: readonly string[] = [...RESERVED_LETTERS, "S", "P"];
