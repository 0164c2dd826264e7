/**
 * Geometry Types
 *
 * Points, machine state and the axis / cylinder configuration used when
 * turning a toolpath into a point cloud.
 */

import { MotionMode, Plane, PositionMode, Units } from "./gcode-types";

/** Logical axis name */
export type Axis = "x" | "y" | "z";

export const AXES: readonly Axis[] = ["x", "y", "z"];

/**
 * A point on the traced path. Immutable once produced.
 */
export interface PathPoint {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** Mutable position triple */
export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Accumulated machine state while tracing a program.
 */
export interface MachineState {
  /** Current position in mm */
  position: Vec3;
  mode: MotionMode;
  plane: Plane;
  positionMode: PositionMode;
  units: Units;
  /** false until the first position-setting command (Idle) */
  tracking: boolean;
}

/**
 * Which G-code letter feeds each logical axis.
 * e.g. `{ x: "X", y: "U", z: "Z" }` for a rotational stage on U.
 */
export type AxisLetters = Record<Axis, string>;

/**
 * Axis letters after option validation; `null` marks an axis whose letter is
 * detected from the program.
 */
export type AxisLetterSelection = Record<Axis, string | null>;

/**
 * Which logical axis feeds each geometric output axis.
 */
export interface AxisMapping {
  xSource: Axis;
  ySource: Axis;
  zSource: Axis;
}

/**
 * Projection of the path onto a tube.
 */
export interface CylindricalConfig {
  /** Tube diameter in mm; 0 disables the projection */
  diameter: number;
  /** Wall thickness in mm added to the radius */
  thickness: number;
  /** Axis the tube runs along */
  longAxis: Axis;
}
