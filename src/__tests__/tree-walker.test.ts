import { describe, it, expect, vi } from 'vitest';
import { parseXmlDocument } from '../parsers/xml-document';
import { coerceNumericAttributes } from '../parsers/helpers/numeric-coercion';
import { walkBodyTree } from '../parsers/helpers/tree-walker';
import type { WalkOptions } from '../parsers/helpers/tree-walker';
import { defaultOrientationMath } from '../utils/quaternion-utils';
import {
  ConflictingOrientationError,
  DuplicateLinkNameError,
  SchemaViolationError,
  UnknownGeomShapeError,
  UnknownJointTypeError,
} from '../errors';
import type { LinkRecord } from '../interfaces';
import type { Quat, Vec3 } from '../schemas';

const walkOptions: WalkOptions = {
  visualPrefix: 'vispy',
  enforceUniqueNames: true,
  orientationMath: defaultOrientationMath,
};

function walk(worldbody: string, options: Partial<WalkOptions> = {}): LinkRecord[] {
  const element = parseXmlDocument(`<worldbody>${worldbody}</worldbody>`);
  coerceNumericAttributes(element);
  return walkBodyTree(element, 'worldbody', { ...walkOptions, ...options });
}

function walkError(worldbody: string, options: Partial<WalkOptions> = {}): unknown {
  try {
    walk(worldbody, options);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('walkBodyTree', () => {
  it('assigns dense pre-order ids across root bodies', () => {
    const links = walk(`
      <body name="a" joint="free">
        <body name="a1" joint="rx">
          <body name="a11" joint="ry"/>
        </body>
        <body name="a2" joint="rz"/>
      </body>
      <body name="b" joint="free">
        <body name="b1" joint="px"/>
      </body>`);

    expect(links.map(link => link.id)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(links.map(link => link.name)).toEqual(['a', 'a1', 'a11', 'a2', 'b', 'b1']);
    expect(links.map(link => link.parent)).toEqual([-1, 0, 1, 0, -1, 4]);
  });

  it('defaults position and orientation', () => {
    const [link] = walk('<body name="a" joint="free"/>');
    expect(link.transform).toEqual({ pos: [0, 0, 0], rot: [1, 0, 0, 0] });
  });

  it('normalizes an explicit quaternion', () => {
    const [link] = walk('<body name="a" joint="free" pos="1 2 3" quat="2 0 0 0"/>');
    expect(link.transform).toEqual({ pos: [1, 2, 3], rot: [1, 0, 0, 0] });
  });

  it('rejects a zero quaternion', () => {
    const error = walkError('<body name="a" joint="free" quat="0 0 0 0"/>');
    expect(error).toBeInstanceOf(SchemaViolationError);
    expect(error).toMatchObject({ path: 'worldbody/body[0]@quat' });
  });

  it('converts euler degrees through the orientation collaborator', () => {
    const quatFromEuler = vi.fn((_angles: Vec3): Quat => [0, 1, 0, 0]);
    const [link] = walk('<body name="a" joint="free" euler="90 0 -180"/>', { orientationMath: { quatFromEuler } });

    expect(quatFromEuler).toHaveBeenCalledTimes(1);
    const [angles] = quatFromEuler.mock.calls[0];
    expect(angles[0]).toBeCloseTo(Math.PI / 2);
    expect(angles[1]).toBe(0);
    expect(angles[2]).toBeCloseTo(-Math.PI);
    expect(link.transform.rot).toEqual([0, 1, 0, 0]);
  });

  it('rejects quat and euler on the same body', () => {
    const error = walkError('<body name="a" joint="free" quat="1 0 0 0" euler="0 0 0"/>');
    expect(error).toBeInstanceOf(ConflictingOrientationError);
    expect(error).toMatchObject({ path: 'worldbody/body[0]' });
  });

  it('sizes damping and armature by the joint DOF', () => {
    const [free, spherical, frozen] = walk(`
      <body name="free" joint="free"/>
      <body name="spherical" joint="spherical" damping="0.3" armature="1 2 3"/>
      <body name="frozen" joint="frozen" damping="0.3"/>`);

    expect(free.damping).toEqual([0, 0, 0, 0, 0, 0]);
    expect(free.armature).toEqual([0, 0, 0, 0, 0, 0]);
    expect(spherical.damping).toEqual([0.3, 0.3, 0.3]);
    expect(spherical.armature).toEqual([1, 2, 3]);
    expect(frozen.damping).toEqual([]);
  });

  it('rejects a per-DOF vector of the wrong length', () => {
    const error = walkError('<body name="a" joint="spherical" damping="1 2"/>');
    expect(error).toBeInstanceOf(SchemaViolationError);
    expect(error).toMatchObject({ path: 'worldbody/body[0]@damping' });
  });

  it('rejects unknown and missing joint types', () => {
    expect(walkError('<body name="a" joint="ball"/>')).toMatchObject({
      _tag: 'UnknownJointType',
      value: 'ball',
      path: 'worldbody/body[0]@joint',
    });
    expect(walkError('<body name="a"/>')).toBeInstanceOf(UnknownJointTypeError);
  });

  it('requires a name', () => {
    expect(walkError('<body joint="free"/>')).toMatchObject({
      _tag: 'SchemaViolation',
      path: 'worldbody/body[0]@name',
    });
  });

  it('keeps numeric-looking names as text', () => {
    const [link] = walk('<body name="7" joint="free"/>');
    expect(link.name).toBe('7');
  });

  it('keeps names exactly as written', () => {
    const links = walk('<body name="01" joint="free"/><body name="1" joint="free"/><body name="1e3" joint="rx"/>');
    expect(links.map(link => link.name)).toEqual(['01', '1', '1e3']);
  });

  it('builds geometries in document order', () => {
    const [link] = walk(`
      <body name="a" joint="free">
        <geom type="box" mass="2" pos="0 0 1" dim="1 2 3"/>
        <geom type="sphere" mass="1" pos="0 0 0" dim="0.1" vispy_color="1 0 0"/>
        <geom type="cylinder" mass="0.5" pos="1 0 0" dim="0.2 4"/>
      </body>`);

    expect(link.geoms).toEqual([
      { shape: 'box', mass: 2, pos: [0, 0, 1], dimX: 1, dimY: 2, dimZ: 3, visualMetadata: {} },
      { shape: 'sphere', mass: 1, pos: [0, 0, 0], radius: 0.1, visualMetadata: { color: [1, 0, 0] } },
      { shape: 'cylinder', mass: 0.5, pos: [1, 0, 0], radius: 0.2, length: 4, visualMetadata: {} },
    ]);
  });

  it('rejects an unknown geometry shape', () => {
    const error = walkError('<body name="a" joint="free"><geom type="capsule" mass="1" pos="0 0 0" dim="1"/></body>');
    expect(error).toBeInstanceOf(UnknownGeomShapeError);
    expect(error).toMatchObject({ value: 'capsule', path: 'worldbody/body[0]/geom[0]@type' });
  });

  it('checks dim arity and required geometry attributes', () => {
    expect(
      walkError('<body name="a" joint="free"><geom type="box" mass="1" pos="0 0 0" dim="1 2"/></body>')
    ).toMatchObject({ _tag: 'SchemaViolation', path: 'worldbody/body[0]/geom[0]@dim' });
    expect(
      walkError('<body name="a" joint="free"><geom type="sphere" pos="0 0 0" dim="1"/></body>')
    ).toMatchObject({ _tag: 'SchemaViolation', path: 'worldbody/body[0]/geom[0]@mass' });
    expect(
      walkError('<body name="a" joint="free"><geom type="sphere" mass="heavy" pos="0 0 0" dim="1"/></body>')
    ).toBeInstanceOf(SchemaViolationError);
  });

  it('rejects duplicate names unless allowed', () => {
    const error = walkError('<body name="a" joint="free"><body name="a" joint="rx"/></body>');
    expect(error).toBeInstanceOf(DuplicateLinkNameError);
    expect(error).toMatchObject({ linkName: 'a', firstId: 0, secondId: 1 });

    const links = walk('<body name="a" joint="free"><body name="a" joint="rx"/></body>', { enforceUniqueNames: false });
    expect(links.map(link => link.name)).toEqual(['a', 'a']);
  });

  it('handles long chains without recursion', () => {
    const depth = 300;
    let markup = '';
    for (let i = depth - 1; i >= 0; i--) {
      markup = `<body name="l${i}" joint="rx">${markup}</body>`;
    }

    const links = walk(markup);
    expect(links).toHaveLength(depth);
    expect(links[depth - 1].parent).toBe(depth - 2);
    expect(links.every((link, i) => link.parent === i - 1)).toBe(true);
  });
});
