/**
 * Attribute Readers
 *
 * Typed access to coerced attribute values. Shape problems surface as
 * `SchemaViolation` errors carrying the Zod issues.
 */

import { z } from 'zod';
import type { AttributeSource, Attributes } from '../../interfaces';
import { KinematicsErrorFactory } from '../../errors';
import { ERROR_MESSAGES } from '../../constants/errors';
import { QuatSchema, Vec3Schema } from '../../schemas';
import type { Quat, Vec3 } from '../../schemas';
import { attributePath, formatAttributeValue } from '../../utils/element-utils';

const ScalarSchema = z.tuple([z.number()]).transform(([value]) => value);

/**
 * Parses an attribute that must be present.
 */
export function readRequired<T extends z.ZodTypeAny>(
  schema: T,
  attributes: Attributes,
  name: string,
  elementPath: string
): z.infer<T> {
  const path = attributePath(elementPath, name);
  const value = attributes[name];
  if (value === undefined) {
    throw KinematicsErrorFactory.schemaViolation(`${ERROR_MESSAGES.MISSING_ATTRIBUTE}: "${name}"`, path);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw KinematicsErrorFactory.schemaViolation(
      `${ERROR_MESSAGES.INVALID_VECTOR}: "${name}" = "${formatAttributeValue(value)}"`,
      path,
      result.error
    );
  }
  return result.data;
}

export function readScalar(attributes: Attributes, name: string, elementPath: string): number {
  return readRequired(ScalarSchema, attributes, name, elementPath);
}

export function readVec3(attributes: Attributes, name: string, elementPath: string): Vec3 {
  return readRequired(Vec3Schema, attributes, name, elementPath);
}

export function readQuat(attributes: Attributes, name: string, elementPath: string): Quat {
  return readRequired(QuatSchema, attributes, name, elementPath);
}

export function readNumbers(attributes: Attributes, name: string, length: number, elementPath: string): number[] {
  return readRequired(z.array(z.number()).length(length), attributes, name, elementPath);
}

/**
 * Reads a textual attribute as the document wrote it, so `name="01"` stays
 * `"01"` even though numeric coercion turned the value into `[1]`.
 */
export function readText(source: AttributeSource, name: string): string | undefined {
  const value = source.attributes[name];
  if (value === undefined) {
    return undefined;
  }
  return Object.prototype.hasOwnProperty.call(source.text, name) ? source.text[name] : formatAttributeValue(value);
}

/**
 * Reads a per-DOF vector such as `damping`. Absent means zeros; a single
 * value is repeated across all DOFs.
 */
export function readDofVector(attributes: Attributes, name: string, dof: number, elementPath: string): number[] {
  const value = attributes[name];
  if (value === undefined) {
    return new Array<number>(dof).fill(0);
  }

  const values = readRequired(z.array(z.number()).min(1), attributes, name, elementPath);
  if (values.length === 1) {
    return new Array<number>(dof).fill(values[0]);
  }
  if (values.length !== dof) {
    throw KinematicsErrorFactory.schemaViolation(
      `${ERROR_MESSAGES.INVALID_VECTOR}: "${name}" has ${values.length} entries, joint has ${dof} degrees of freedom`,
      attributePath(elementPath, name)
    );
  }
  return values;
}
