/**
 * Core Interfaces for the Kinematic Tree Loader
 */

import type { GeomShape } from '../constants/schema';
import type { JointType } from '../constants/joints';
import type { Quat, SimulationOptions, Vec3 } from '../schemas';

/**
 * Attribute value after numeric coercion. Numeric literals become arrays,
 * a scalar being an array of length one; everything else stays text.
 */
export type AttributeValue = string | number[];

export type Attributes = Record<string, AttributeValue>;

/**
 * Attribute values exactly as written in the document.
 */
export type AttributeText = Record<string, string>;

/**
 * Element of the tokenized document. `text` is never coerced, so names
 * such as `"01"` survive numeric coercion of `attributes`.
 */
export interface XmlElement {
  tag: string;
  attributes: Attributes;
  text: AttributeText;
  children: XmlElement[];
}

export type AttributeSource = Pick<XmlElement, 'attributes' | 'text'>;

/**
 * Default attribute sets declared under `defaults`, keyed by tag.
 */
export interface DefaultsTable {
  body: AttributeSource;
  geom: AttributeSource;
}

/**
 * Pose of a link relative to its parent.
 */
export interface Transform {
  pos: Vec3;
  /** Unit quaternion `[w, x, y, z]` */
  rot: Quat;
}

interface GeometryBase<S extends GeomShape> {
  shape: S;
  mass: number;
  /** Position in the link frame */
  pos: Vec3;
  /** `vispy_*` attributes with the prefix stripped, passed through untouched */
  visualMetadata: Attributes;
}

export interface BoxGeometry extends GeometryBase<'box'> {
  dimX: number;
  dimY: number;
  dimZ: number;
}

export interface SphereGeometry extends GeometryBase<'sphere'> {
  radius: number;
}

export interface CylinderGeometry extends GeometryBase<'cylinder'> {
  radius: number;
  length: number;
}

export type Geometry = BoxGeometry | SphereGeometry | CylinderGeometry;

/**
 * One visited body, as recorded by the tree walker.
 */
export interface LinkRecord {
  id: number;
  parent: number;
  name: string;
  jointType: JointType;
  transform: Transform;
  damping: number[];
  armature: number[];
  geoms: Geometry[];
}

/**
 * Flattened, parent-indexed output. Every per-link array has one entry per
 * link in pre-order; `dampings` and `armatures` concatenate the per-link
 * vectors in the same order.
 */
export interface KinematicTree {
  model: string | undefined;
  parents: number[];
  jointTypes: JointType[];
  names: string[];
  transforms: Transform[];
  geoms: Geometry[][];
  dampings: number[];
  armatures: number[];
  options: SimulationOptions;
}
