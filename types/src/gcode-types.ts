/**
 * G-Code Types
 *
 * Defines the parsed representation of a G-code program line and the
 * modal state values that motion commands depend on.
 */

// ============================================================================
// Enums
// ============================================================================

/**
 * Active motion mode of the machine.
 */
export enum MotionMode {
  /** G0/G1 straight-line move */
  LINEAR = 1,
  /** G2 clockwise arc */
  ARC_CLOCKWISE = 2,
  /** G3 counterclockwise arc */
  ARC_COUNTERCLOCKWISE = 3,
}

/**
 * Plane selection for arc operations.
 */
export enum Plane {
  /** G17 */
  XY = 1,
  /** G18 */
  XZ = 2,
  /** G19 */
  YZ = 3,
}

/**
 * Whether axis words are absolute targets (G90) or increments (G91).
 */
export enum PositionMode {
  ABSOLUTE = 1,
  RELATIVE = 2,
}

/**
 * Length units used in the G-code program.
 */
export enum Units {
  MM = 1,
  INCHES = 2,
}

// ============================================================================
// Parsed Commands
// ============================================================================

/**
 * A single parsed G-code line.
 */
export interface GCodeCommand {
  /** Normalized command code, e.g. "G1", "G2", "M3" */
  code: string;
  /**
   * Numeric words on the line keyed by upper-case letter.
   * Only letters that appear on the line are present.
   */
  axisValues: Record<string, number>;
  /** 1-based source line number */
  lineNumber: number;
  /** Text following a ';' comment marker */
  comment?: string;
}

/**
 * A word that was dropped while parsing because its value was not a number.
 */
export interface ParseWarning {
  /** 1-based source line number */
  lineNumber: number;
  /** The offending word as written */
  word: string;
  message: string;
}

/**
 * Result of parsing one line.
 */
export interface LineParseResult {
  /** null for blank, comment-only and code-less lines */
  command: GCodeCommand | null;
  warnings: ParseWarning[];
}

/**
 * Result of parsing a whole program.
 */
export interface ProgramParseResult {
  commands: GCodeCommand[];
  warnings: ParseWarning[];
  /** Number of source lines, including blank ones */
  totalLines: number;
}
