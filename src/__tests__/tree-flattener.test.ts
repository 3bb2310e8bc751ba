import { describe, it, expect } from 'vitest';
import { assertContiguousIds, flattenTree } from '../parsers/helpers/tree-flattener';
import { NonContiguousIdsError } from '../errors';
import type { LinkRecord } from '../interfaces';
import type { JointType } from '../constants/joints';
import type { SimulationOptions } from '../schemas';

function link(id: number, parent: number, jointType: JointType, damping: number[], armature: number[]): LinkRecord {
  return {
    id,
    parent,
    name: `link${id}`,
    jointType,
    transform: { pos: [0, 0, id], rot: [1, 0, 0, 0] },
    damping,
    armature,
    geoms: [],
  };
}

const options: SimulationOptions = { gravity: [0, 0, 9.81], dt: 0.01 };

describe('flattenTree', () => {
  it('orders per-link values by id and concatenates DOF vectors', () => {
    const tree = flattenTree(
      [
        link(0, -1, 'spherical', [1, 2, 3], [0, 0, 0]),
        link(1, 0, 'rx', [4], [0.5]),
        link(2, 0, 'frozen', [], []),
      ],
      options,
      'model'
    );

    expect(tree).toEqual({
      model: 'model',
      parents: [-1, 0, 0],
      jointTypes: ['spherical', 'rx', 'frozen'],
      names: ['link0', 'link1', 'link2'],
      transforms: [
        { pos: [0, 0, 0], rot: [1, 0, 0, 0] },
        { pos: [0, 0, 1], rot: [1, 0, 0, 0] },
        { pos: [0, 0, 2], rot: [1, 0, 0, 0] },
      ],
      geoms: [[], [], []],
      dampings: [1, 2, 3, 4],
      armatures: [0, 0, 0, 0.5],
      options,
    });
  });

  it('produces an empty tree for no links', () => {
    const tree = flattenTree([], options, undefined);
    expect(tree.parents).toEqual([]);
    expect(tree.dampings).toEqual([]);
    expect(tree.model).toBeUndefined();
  });
});

describe('assertContiguousIds', () => {
  it('rejects gaps and reordering', () => {
    expect(() => assertContiguousIds([link(0, -1, 'rx', [0], [0]), link(2, 0, 'rx', [0], [0])]))
      .toThrow(NonContiguousIdsError);
    expect(() => assertContiguousIds([link(1, -1, 'rx', [0], [0]), link(0, -1, 'rx', [0], [0])]))
      .toThrow(NonContiguousIdsError);
  });

  it('reports the ids it saw', () => {
    try {
      assertContiguousIds([link(0, -1, 'rx', [0], [0]), link(2, 0, 'rx', [0], [0])]);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ _tag: 'NonContiguousIds', ids: [0, 2] });
    }
  });
});
