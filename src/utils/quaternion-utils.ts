/**
 * Quaternion Utilities
 *
 * Orientation math used when reading body rotations.
 * Quaternions are stored as `[w, x, y, z]` and rotate vectors (not frames).
 */

import type { Quat, Vec3 } from '../schemas';

export const IDENTITY_QUATERNION: Quat = [1, 0, 0, 0];

/**
 * Converts an angle from degrees to radians.
 */
export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Hamilton product `a ⊗ b`.
 */
export function quatMultiply(a: Quat, b: Quat): Quat {
  const [aw, ax, ay, az] = a;
  const [bw, bx, by, bz] = b;
  return [
    aw * bw - ax * bx - ay * by - az * bz,
    aw * bx + ax * bw + ay * bz - az * by,
    aw * by - ax * bz + ay * bw + az * bx,
    aw * bz + ax * by - ay * bx + az * bw,
  ];
}

/**
 * Rotation by `angle` radians about a unit `axis`.
 */
export function quatFromAxisAngle(axis: Vec3, angle: number): Quat {
  const half = angle / 2;
  const s = Math.sin(half);
  return [Math.cos(half), axis[0] * s, axis[1] * s, axis[2] * s];
}

/**
 * Builds a quaternion from Euler angles in radians.
 *
 * Angles rotate about the fixed x, y and z axes in that order, so the result
 * is `qz ⊗ qy ⊗ qx`.
 */
export function quatFromEuler(angles: Vec3): Quat {
  const qx = quatFromAxisAngle([1, 0, 0], angles[0]);
  const qy = quatFromAxisAngle([0, 1, 0], angles[1]);
  const qz = quatFromAxisAngle([0, 0, 1], angles[2]);
  return quatMultiply(qz, quatMultiply(qy, qx));
}

/**
 * Scales a quaternion to unit length. Returns `undefined` for a zero quaternion.
 */
export function quatNormalize(q: Quat): Quat | undefined {
  const norm = Math.hypot(q[0], q[1], q[2], q[3]);
  if (norm === 0 || !Number.isFinite(norm)) {
    return undefined;
  }
  return [q[0] / norm, q[1] / norm, q[2] / norm, q[3] / norm];
}

/**
 * Orientation collaborator used by the tree walker.
 * Swap it out to follow a different Euler convention.
 */
export interface OrientationMath {
  /** Euler angles in radians to a unit quaternion */
  quatFromEuler(angles: Vec3): Quat;
}

export const defaultOrientationMath: OrientationMath = {
  quatFromEuler,
};
