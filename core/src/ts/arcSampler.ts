import * as THREE from "three";
import { Axis, PathPoint, Plane } from "@mewpath/types";
import { DEFAULT_CURVE_RESOLUTION, FULL_CIRCLE_TOLERANCE } from "./constants";

/**
 * Axes of an arc plane. Angles are measured from `first` towards `second`,
 * so a positive sweep is counterclockwise when looking down `helix`.
 */
export interface PlaneAxes {
  first: Axis;
  second: Axis;
  helix: Axis;
  /** Center offset letters for `first` and `second` */
  offsetLetters: [string, string];
}

const PLANE_AXES: Record<Plane, PlaneAxes> = {
  [Plane.XY]: { first: "x", second: "y", helix: "z", offsetLetters: ["I", "J"] },
  // G18 is the ZX plane, viewed from +Y
  [Plane.XZ]: { first: "z", second: "x", helix: "y", offsetLetters: ["K", "I"] },
  [Plane.YZ]: { first: "y", second: "z", helix: "x", offsetLetters: ["J", "K"] },
};

export function getPlaneAxes(plane: Plane): PlaneAxes {
  return PLANE_AXES[plane];
}

export interface ArcSegmentOptions {
  start: PathPoint;
  end: PathPoint;
  /** Arc center; only the in-plane coordinates are used */
  center: PathPoint;
  clockwise: boolean;
  /** Plane the arc lies in (default XY) */
  plane?: Plane;
  /** Number of points to produce (default 20) */
  resolution?: number;
}

/**
 * A circular (or helical) arc sampled into a fixed number of points.
 *
 * Iterating yields exactly `resolution` points, starting one step after the
 * start point and ending exactly on the end point. The segment can be
 * iterated any number of times. An end point that coincides with the start
 * in the arc plane makes a full circle.
 *
 * @example
 * ```typescript
 * const arc = new ArcSegment({
 *   start: { x: 10, y: 0, z: 0 },
 *   end: { x: 0, y: 10, z: 0 },
 *   center: { x: 10, y: 10, z: 0 },
 *   clockwise: true,
 *   resolution: 4,
 * });
 * const points = [...arc]; // 4 points, the last at (0, 10, 0)
 * ```
 */
export class ArcSegment implements Iterable<PathPoint> {
  readonly resolution: number;
  readonly radius: number;
  /** Start angle in radians */
  readonly startAngle: number;
  /**
   * Distance from the center to the end point. Differs from `radius` when
   * the end is off the start circle; samples then spiral between the two.
   */
  readonly endRadius: number;
  /** Signed sweep in radians; negative for clockwise arcs */
  readonly sweep: number;

  private readonly start: THREE.Vector3;
  private readonly end: THREE.Vector3;
  private readonly center: THREE.Vector3;
  private readonly axes: PlaneAxes;

  constructor(options: ArcSegmentOptions) {
    const resolution = options.resolution ?? DEFAULT_CURVE_RESOLUTION;
    if (!Number.isInteger(resolution) || resolution < 1) {
      throw new Error(
        `Arc resolution must be a positive integer, got ${resolution}`
      );
    }

    this.resolution = resolution;
    this.axes = getPlaneAxes(options.plane ?? Plane.XY);
    this.start = new THREE.Vector3(options.start.x, options.start.y, options.start.z);
    this.end = new THREE.Vector3(options.end.x, options.end.y, options.end.z);
    this.center = new THREE.Vector3(options.center.x, options.center.y, options.center.z);

    const { first, second } = this.axes;
    const startFirst = this.start[first] - this.center[first];
    const startSecond = this.start[second] - this.center[second];
    const endFirst = this.end[first] - this.center[first];
    const endSecond = this.end[second] - this.center[second];

    this.radius = Math.hypot(startFirst, startSecond);
    this.endRadius = Math.hypot(endFirst, endSecond);
    this.startAngle = Math.atan2(startSecond, startFirst);
    const endAngle = Math.atan2(endSecond, endFirst);

    let sweep = endAngle - this.startAngle;
    if (options.clockwise && sweep > 0) sweep -= 2 * Math.PI;
    else if (!options.clockwise && sweep < 0) sweep += 2 * Math.PI;

    const gap = Math.hypot(endFirst - startFirst, endSecond - startSecond);
    if (gap <= FULL_CIRCLE_TOLERANCE * this.radius) {
      sweep = options.clockwise ? -2 * Math.PI : 2 * Math.PI;
    }
    this.sweep = sweep;
  }

  /** Arc length in the plane, ignoring helix travel */
  get length(): number {
    return Math.abs(this.sweep) * this.radius;
  }

  *[Symbol.iterator](): Iterator<PathPoint> {
    const { first, second, helix } = this.axes;
    const helixStart = this.start[helix];
    const helixDelta = this.end[helix] - helixStart;

    for (let i = 1; i <= this.resolution; i++) {
      if (i === this.resolution) {
        yield { x: this.end.x, y: this.end.y, z: this.end.z };
        return;
      }

      const t = i / this.resolution;
      const angle = this.startAngle + this.sweep * t;
      const radius = this.radius + (this.endRadius - this.radius) * t;

      const point = new THREE.Vector3();
      point[first] = this.center[first] + radius * Math.cos(angle);
      point[second] = this.center[second] + radius * Math.sin(angle);
      point[helix] = helixStart + helixDelta * t;
      yield { x: point.x, y: point.y, z: point.z };
    }
  }
}

export interface ArcCenterInput {
  start: PathPoint;
  end: PathPoint;
  /** In-plane center offsets from the start point (I/J/K words) */
  offsets: [number | undefined, number | undefined];
  /** R word; negative selects the larger of the two possible arcs */
  radius?: number;
  plane: Plane;
  clockwise: boolean;
}

/**
 * Locate the center of an arc from either its center offsets or its
 * radius. Offsets win when both are given.
 *
 * @throws Error if neither is given, or the geometry has no solution
 */
export function resolveArcCenter(input: ArcCenterInput): PathPoint {
  const { first, second } = getPlaneAxes(input.plane);
  const start = new THREE.Vector3(input.start.x, input.start.y, input.start.z);
  const [offsetFirst, offsetSecond] = input.offsets;

  if (offsetFirst !== undefined || offsetSecond !== undefined) {
    const center = start.clone();
    center[first] += offsetFirst ?? 0;
    center[second] += offsetSecond ?? 0;

    if (Math.hypot(center[first] - start[first], center[second] - start[second]) === 0) {
      throw new Error("center offsets describe an arc of zero radius");
    }
    return { x: center.x, y: center.y, z: center.z };
  }

  if (input.radius === undefined) {
    throw new Error("missing center offsets or R radius");
  }

  const chord = new THREE.Vector2(
    input.end[first] - input.start[first],
    input.end[second] - input.start[second]
  );
  const chordLength = chord.length();
  if (chordLength === 0) {
    throw new Error("R radius cannot describe a full circle");
  }

  const radius = Math.abs(input.radius);
  const halfChord = chordLength / 2;
  if (radius < halfChord - 1e-9) {
    throw new Error(
      `R radius ${radius} is smaller than half the distance between start and end (${halfChord})`
    );
  }

  const offset = Math.sqrt(Math.max(0, radius * radius - halfChord * halfChord));
  // Counterclockwise minor arcs have their center left of the chord
  let side = input.clockwise ? -1 : 1;
  if (input.radius < 0) side = -side;

  // Left-hand normal of the chord
  const normal = new THREE.Vector2(-chord.y, chord.x).normalize();
  const center = start.clone();
  center[first] += chord.x / 2 + side * offset * normal.x;
  center[second] += chord.y / 2 + side * offset * normal.y;
  return { x: center.x, y: center.y, z: center.z };
}
