/**
 * Joint Constants
 *
 * Number of velocity degrees of freedom contributed by each joint type.
 * The damping and armature vectors of a link have exactly this many entries.
 */
export const JOINT_DOF_WIDTHS = {
  free: 6,
  frozen: 0,
  spherical: 3,
  p3d: 3,
  px: 1,
  py: 1,
  pz: 1,
  rx: 1,
  ry: 1,
  rz: 1,
  hinge: 1,
  slide: 1,
} as const;

export type JointType = keyof typeof JOINT_DOF_WIDTHS;

/**
 * Type guard over the known joint types.
 */
export function isJointType(value: string): value is JointType {
  return Object.prototype.hasOwnProperty.call(JOINT_DOF_WIDTHS, value);
}

/**
 * Degrees of freedom of a joint type.
 */
export function jointDof(joint: JointType): number {
  return JOINT_DOF_WIDTHS[joint];
}
