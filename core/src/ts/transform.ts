import * as THREE from "three";
import { Axis, AxisMapping, CylindricalConfig, PathPoint } from "@mewpath/types";

/**
 * Select each output axis from a (possibly repeated) input axis.
 */
export function remapAxes(point: PathPoint, mapping: AxisMapping): PathPoint {
  return {
    x: point[mapping.xSource],
    y: point[mapping.ySource],
    z: point[mapping.zSource],
  };
}

interface CylinderAxes {
  /** Input coordinate read as an angle in degrees */
  angle: Axis;
  /** Input coordinate added to the radius (height above the tube) */
  radial: Axis;
  /** Output coordinate receiving r·cos(θ) */
  cos: Axis;
  /** Output coordinate receiving r·sin(θ) */
  sin: Axis;
}

const CYLINDER_AXES: Record<Axis, CylinderAxes> = {
  x: { angle: "y", radial: "z", cos: "y", sin: "z" },
  y: { angle: "x", radial: "z", cos: "z", sin: "x" },
  z: { angle: "y", radial: "x", cos: "x", sin: "y" },
};

/**
 * Wrap a point around a tube running along `config.longAxis`.
 *
 * The angle coordinate is in degrees. The effective radius is the tube
 * radius plus the wall thickness plus the point's radial coordinate. A
 * diameter of 0 returns the point unchanged.
 *
 * @example
 * ```typescript
 * toCylindrical({ x: 5, y: 90, z: 0 }, { diameter: 3, thickness: 0, longAxis: "x" });
 * // => approximately { x: 5, y: 0, z: 1.5 }
 * ```
 */
export function toCylindrical(
  point: PathPoint,
  config: CylindricalConfig
): PathPoint {
  if (config.diameter <= 0) {
    return { x: point.x, y: point.y, z: point.z };
  }

  const axes = CYLINDER_AXES[config.longAxis];
  const radius = config.diameter / 2 + config.thickness + point[axes.radial];
  const theta = THREE.MathUtils.degToRad(point[axes.angle]);

  // three's cylinder runs along y: x = r·sin(θ), z = r·cos(θ)
  const onCylinder = new THREE.Vector3().setFromCylindrical(
    new THREE.Cylindrical(radius, theta, point[config.longAxis])
  );

  const out = { x: 0, y: 0, z: 0 };
  out[config.longAxis] = onCylinder.y;
  out[axes.cos] = onCylinder.z;
  out[axes.sin] = onCylinder.x;
  return out;
}

/**
 * Remap and optionally wrap a whole path. One output point per input point,
 * in the same order.
 */
export function transformPath(
  points: readonly PathPoint[],
  mapping: AxisMapping,
  cylindrical: CylindricalConfig
): PathPoint[] {
  return points.map((point) => toCylindrical(remapAxes(point, mapping), cylindrical));
}
