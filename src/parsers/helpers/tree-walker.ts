/**
 * Tree Walker
 *
 * Depth-first, pre-order traversal of the body hierarchy. Ids come from one
 * counter in the traversal context, so they are dense, start at 0 and every
 * parent id is smaller than its children's. An explicit stack keeps deep
 * chains off the call stack.
 */

import type { Attributes, Geometry, LinkRecord, Transform, XmlElement } from '../../interfaces';
import type { Quat } from '../../schemas';
import { KinematicsErrorFactory } from '../../errors';
import { ERROR_MESSAGES } from '../../constants/errors';
import { TAGS } from '../../constants/schema';
import { isJointType, jointDof } from '../../constants/joints';
import type { JointType } from '../../constants/joints';
import { attributePath, childPath } from '../../utils/element-utils';
import {
  IDENTITY_QUATERNION,
  degToRad,
  quatNormalize,
} from '../../utils/quaternion-utils';
import type { OrientationMath } from '../../utils/quaternion-utils';
import { readDofVector, readQuat, readText, readVec3 } from './attribute-readers';
import { buildGeometry } from './geometry-builder';

export interface WalkOptions {
  visualPrefix: string;
  enforceUniqueNames: boolean;
  orientationMath: OrientationMath;
}

/**
 * State owned by a single traversal. Never shared between loads.
 */
interface TraversalContext {
  nextId: number;
  links: LinkRecord[];
  idsByName: Map<string, number>;
}

interface PendingBody {
  element: XmlElement;
  path: string;
  parent: number;
}

function pendingChildren(element: XmlElement, path: string, parent: number): PendingBody[] {
  const bodies: PendingBody[] = [];
  let index = 0;
  for (const child of element.children) {
    if (child.tag !== TAGS.BODY) continue;
    bodies.push({ element: child, path: childPath(path, TAGS.BODY, index), parent });
    index++;
  }
  return bodies;
}

function resolveOrientation(attributes: Attributes, path: string, math: OrientationMath): Quat {
  const hasQuat = attributes.quat !== undefined;
  const hasEuler = attributes.euler !== undefined;

  if (hasQuat && hasEuler) {
    throw KinematicsErrorFactory.conflictingOrientation(ERROR_MESSAGES.CONFLICTING_ORIENTATION, path);
  }

  if (hasQuat) {
    const rot = quatNormalize(readQuat(attributes, 'quat', path));
    if (!rot) {
      throw KinematicsErrorFactory.schemaViolation(ERROR_MESSAGES.ZERO_QUATERNION, attributePath(path, 'quat'));
    }
    return rot;
  }

  if (hasEuler) {
    const [x, y, z] = readVec3(attributes, 'euler', path);
    return math.quatFromEuler([degToRad(x), degToRad(y), degToRad(z)]);
  }

  return [...IDENTITY_QUATERNION];
}

function resolveJointType(element: XmlElement, path: string): JointType {
  const joint = readText(element, 'joint') ?? '';
  if (!isJointType(joint)) {
    throw KinematicsErrorFactory.unknownJointType(
      `${ERROR_MESSAGES.UNKNOWN_JOINT_TYPE}: "${joint}"`,
      attributePath(path, 'joint'),
      joint
    );
  }
  return joint;
}

function resolveName(element: XmlElement, path: string): string {
  const name = readText(element, 'name');
  if (name === undefined) {
    throw KinematicsErrorFactory.schemaViolation(
      `${ERROR_MESSAGES.MISSING_ATTRIBUTE}: "name"`,
      attributePath(path, 'name')
    );
  }
  return name;
}

function visitBody(body: PendingBody, context: TraversalContext, options: WalkOptions): LinkRecord {
  const { element, path, parent } = body;
  const attributes = element.attributes;

  const id = context.nextId;
  context.nextId += 1;

  const name = resolveName(element, path);
  if (options.enforceUniqueNames) {
    const firstId = context.idsByName.get(name);
    if (firstId !== undefined) {
      throw KinematicsErrorFactory.duplicateLinkName(
        `${ERROR_MESSAGES.DUPLICATE_LINK_NAME}: "${name}"`,
        name,
        firstId,
        id
      );
    }
    context.idsByName.set(name, id);
  }

  const transform: Transform = {
    pos: attributes.pos === undefined ? [0, 0, 0] : readVec3(attributes, 'pos', path),
    rot: resolveOrientation(attributes, path, options.orientationMath),
  };

  const jointType = resolveJointType(element, path);
  const dof = jointDof(jointType);

  const geoms: Geometry[] = [];
  let geomIndex = 0;
  for (const child of element.children) {
    if (child.tag !== TAGS.GEOM) continue;
    geoms.push(buildGeometry(child, childPath(path, TAGS.GEOM, geomIndex), options.visualPrefix));
    geomIndex++;
  }

  return {
    id,
    parent,
    name,
    jointType,
    transform,
    damping: readDofVector(attributes, 'damping', dof, path),
    armature: readDofVector(attributes, 'armature', dof, path),
    geoms,
  };
}

/**
 * Visits every body under `worldbody` and returns one record per body in
 * pre-order. Top-level bodies get parent -1.
 */
export function walkBodyTree(worldbody: XmlElement, worldbodyPath: string, options: WalkOptions): LinkRecord[] {
  const context: TraversalContext = {
    nextId: 0,
    links: [],
    idsByName: new Map(),
  };

  const stack = pendingChildren(worldbody, worldbodyPath, -1).reverse();
  while (stack.length > 0) {
    const body = stack.pop();
    if (body === undefined) break;

    const link = visitBody(body, context, options);
    context.links.push(link);
    stack.push(...pendingChildren(body.element, body.path, link.id).reverse());
  }

  return context.links;
}
