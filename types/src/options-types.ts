/**
 * Conversion Options Types
 */

import { ParseWarning } from "./gcode-types";
import {
  Axis,
  AxisLetterSelection,
  AxisLetters,
  AxisMapping,
  CylindricalConfig,
  PathPoint,
} from "./geometry-types";

/**
 * Progress information reported during conversion.
 */
export interface ConversionProgress {
  /** Number of source lines traced so far */
  linesProcessed: number;
  /** Total number of source lines */
  totalLines: number;
  /** 0-100 */
  percent: number;
}

/**
 * Options accepted by the conversion functions. Every field is optional
 * and falls back to its default.
 */
export interface ConversionOptions {
  /**
   * Letters feeding logical x/y/z (default X, Y, Z). "auto" picks the most
   * frequent free letter in the program.
   */
  axisLetters?: Partial<AxisLetters>;
  /** Remap of logical axes onto output axes (default identity) */
  axisMapping?: Partial<AxisMapping>;
  /** Tube diameter in mm (default 0, projection disabled) */
  diameter?: number;
  /** Tube wall thickness in mm (default 0) */
  thickness?: number;
  /** Axis the tube runs along (default "x") */
  cylindricalLongAxis?: Axis;
  /** Points sampled per arc (default 20) */
  curveResolution?: number;
  /** Decimal places written to the point file (default 6) */
  precision?: number;
  /** Called as lines are traced */
  onProgress?: (progress: ConversionProgress) => void;
  /** Maximum number of progress callbacks (default 40) */
  progressUpdates?: number;
}

/**
 * Options after defaults have been applied and values validated.
 */
export interface ResolvedConversionOptions {
  axisLetters: AxisLetterSelection;
  axisMapping: AxisMapping;
  cylindrical: CylindricalConfig;
  curveResolution: number;
  precision: number;
  onProgress?: (progress: ConversionProgress) => void;
  progressUpdates: number;
}

/**
 * Outcome of converting a program.
 */
export interface ConversionResult {
  /** Transformed points in path order */
  points: PathPoint[];
  /** Number of G0/G1 moves that emitted a point */
  linearMoveCount: number;
  /** Number of G2/G3 arcs sampled */
  arcCount: number;
  /** Letters that fed logical x/y/z, after detection */
  axisLetters: AxisLetters;
  /** Words dropped while parsing */
  warnings: ParseWarning[];
}
