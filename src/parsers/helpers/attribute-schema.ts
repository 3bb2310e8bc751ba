/**
 * Attribute Schema Validation
 *
 * Checks every tag and attribute of the document against the whitelist
 * before anything is interpreted.
 */

import type { XmlElement } from '../../interfaces';
import { KinematicsErrorFactory } from '../../errors';
import { ERROR_MESSAGES } from '../../constants/errors';
import { ALLOWED_ATTRIBUTES, ROOT_ATTRIBUTES, TAGS, isSectionTag } from '../../constants/schema';
import { attributePath, childPath } from '../../utils/element-utils';
import { isVisualAttribute } from './visual-metadata';

export interface SchemaOptions {
  rootTag: string;
  visualPrefix: string;
}

function allowedAttributesFor(tag: string, rootTag: string): readonly string[] | undefined {
  if (tag === rootTag) {
    return ROOT_ATTRIBUTES;
  }
  return isSectionTag(tag) ? ALLOWED_ATTRIBUTES[tag] : undefined;
}

/**
 * Throws a `SchemaViolation` for the first unknown tag or attribute found
 * in document order.
 */
export function validateDocumentSchema(root: XmlElement, options: SchemaOptions): void {
  const stack: Array<{ element: XmlElement; path: string }> = [{ element: root, path: root.tag }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const { element, path } = entry;

    const allowed = allowedAttributesFor(element.tag, options.rootTag);
    if (allowed === undefined) {
      throw KinematicsErrorFactory.schemaViolation(
        `${ERROR_MESSAGES.UNKNOWN_TAG}: <${element.tag}>`,
        path
      );
    }

    for (const attribute of Object.keys(element.attributes)) {
      if (allowed.includes(attribute)) continue;
      if (element.tag === TAGS.GEOM && isVisualAttribute(attribute, options.visualPrefix)) continue;
      throw KinematicsErrorFactory.schemaViolation(
        `${ERROR_MESSAGES.UNKNOWN_ATTRIBUTE}: "${attribute}" on <${element.tag}>`,
        attributePath(path, attribute)
      );
    }

    const seen = new Map<string, number>();
    const children = element.children.map(child => {
      const index = seen.get(child.tag) ?? 0;
      seen.set(child.tag, index + 1);
      return { element: child, path: childPath(path, child.tag, index) };
    });
    stack.push(...children.reverse());
  }
}
