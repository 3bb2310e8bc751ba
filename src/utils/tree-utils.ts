/**
 * Tree Utilities
 *
 * Lookups over a loaded `KinematicTree`.
 */

import type { KinematicTree } from '../interfaces';
import { jointDof } from '../constants/joints';

/**
 * Index of the link called `name`, or -1.
 */
export function findLinkIndex(tree: KinematicTree, name: string): number {
  return tree.names.indexOf(name);
}

/**
 * Start of each link's slice in `dampings`/`armatures`, plus the total
 * DOF count as the last entry. Link `i` owns `[offsets[i], offsets[i + 1])`.
 */
export function linkDofOffsets(tree: KinematicTree): number[] {
  const offsets = [0];
  for (const joint of tree.jointTypes) {
    offsets.push(offsets[offsets.length - 1] + jointDof(joint));
  }
  return offsets;
}
