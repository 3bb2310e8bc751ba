/**
 * Core Types
 *
 * Re-export types from schemas and interfaces.
 */

export type {
  Vec3,
  Quat,
  LogLevelName,
  SimulationOptions,
  TreeLoaderConfig,
  TreeLoaderConfigInput,
} from './schemas';

export type {
  AttributeValue,
  Attributes,
  AttributeText,
  AttributeSource,
  XmlElement,
  DefaultsTable,
  Transform,
  Geometry,
  BoxGeometry,
  SphereGeometry,
  CylinderGeometry,
  LinkRecord,
  KinematicTree,
} from './interfaces';

export type { JointType } from './constants/joints';
export type { GeomShape } from './constants/schema';
