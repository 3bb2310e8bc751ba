/**
 * Tree Flattener
 *
 * Turns walker records into the parent-indexed `KinematicTree`.
 */

import type { KinematicTree, LinkRecord } from '../../interfaces';
import type { SimulationOptions } from '../../schemas';
import { KinematicsErrorFactory } from '../../errors';
import { ERROR_MESSAGES } from '../../constants/errors';

/**
 * Throws `NonContiguousIds` unless record `i` has id `i` for every `i`.
 */
export function assertContiguousIds(links: readonly LinkRecord[]): void {
  const ids = links.map(link => link.id);
  if (ids.some((id, index) => id !== index)) {
    throw KinematicsErrorFactory.nonContiguousIds(
      `${ERROR_MESSAGES.NON_CONTIGUOUS_IDS}: [${ids.join(', ')}]`,
      ids
    );
  }
}

export function flattenTree(
  links: readonly LinkRecord[],
  options: SimulationOptions,
  model: string | undefined
): KinematicTree {
  assertContiguousIds(links);

  return {
    model,
    parents: links.map(link => link.parent),
    jointTypes: links.map(link => link.jointType),
    names: links.map(link => link.name),
    transforms: links.map(link => link.transform),
    geoms: links.map(link => link.geoms),
    dampings: links.flatMap(link => link.damping),
    armatures: links.flatMap(link => link.armature),
    options,
  };
}
