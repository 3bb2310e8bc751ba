/**
 * Geometry Builder
 *
 * Turns a `geom` element into one variant of `Geometry`, keyed by its
 * `type` attribute. `dim` arity depends on the shape.
 */

import type { Attributes, Geometry, XmlElement } from '../../interfaces';
import type { Vec3 } from '../../schemas';
import { KinematicsErrorFactory } from '../../errors';
import { ERROR_MESSAGES } from '../../constants/errors';
import { GEOM_DIM_ARITY, isGeomShape } from '../../constants/schema';
import type { GeomShape } from '../../constants/schema';
import { attributePath } from '../../utils/element-utils';
import { readNumbers, readScalar, readText, readVec3 } from './attribute-readers';
import { extractVisualMetadata } from './visual-metadata';

interface GeometryInput {
  mass: number;
  pos: Vec3;
  dim: number[];
  visualMetadata: Attributes;
}

type GeometryOf<S extends GeomShape> = Extract<Geometry, { shape: S }>;

const GEOMETRY_BUILDERS: { [S in GeomShape]: (input: GeometryInput) => GeometryOf<S> } = {
  box: ({ mass, pos, dim, visualMetadata }) => ({
    shape: 'box',
    mass,
    pos,
    dimX: dim[0],
    dimY: dim[1],
    dimZ: dim[2],
    visualMetadata,
  }),
  sphere: ({ mass, pos, dim, visualMetadata }) => ({
    shape: 'sphere',
    mass,
    pos,
    radius: dim[0],
    visualMetadata,
  }),
  cylinder: ({ mass, pos, dim, visualMetadata }) => ({
    shape: 'cylinder',
    mass,
    pos,
    radius: dim[0],
    length: dim[1],
    visualMetadata,
  }),
};

/**
 * Builds the geometry for one `geom` element.
 */
export function buildGeometry(element: XmlElement, path: string, visualPrefix: string): Geometry {
  const attributes = element.attributes;
  const shape = readText(element, 'type') ?? '';
  if (!isGeomShape(shape)) {
    throw KinematicsErrorFactory.unknownGeomShape(
      `${ERROR_MESSAGES.UNKNOWN_GEOM_SHAPE}: "${shape}"`,
      attributePath(path, 'type'),
      shape
    );
  }

  const input: GeometryInput = {
    mass: readScalar(attributes, 'mass', path),
    pos: readVec3(attributes, 'pos', path),
    dim: readNumbers(attributes, 'dim', GEOM_DIM_ARITY[shape], path),
    visualMetadata: extractVisualMetadata(attributes, visualPrefix),
  };
  return GEOMETRY_BUILDERS[shape](input);
}
