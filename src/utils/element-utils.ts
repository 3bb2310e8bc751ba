/**
 * Element Utilities
 *
 * Lookups over the tokenized document and the path strings used in errors.
 */

import type { AttributeValue, XmlElement } from '../interfaces';
import { KinematicsErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';

/**
 * Path of a child element, e.g. `x_xy/worldbody/body[1]`.
 * `index` is the position among siblings with the same tag.
 */
export function childPath(parentPath: string, tag: string, index: number): string {
  return `${parentPath}/${tag}[${index}]`;
}

/**
 * Path of an attribute, e.g. `x_xy/worldbody/body[0]@quat`.
 */
export function attributePath(elementPath: string, attribute: string): string {
  return `${elementPath}@${attribute}`;
}

/**
 * Direct children with the given tag, in document order.
 */
export function childrenByTag(element: XmlElement, tag: string): XmlElement[] {
  return element.children.filter(child => child.tag === tag);
}

/**
 * Returns the only direct child with `tag`, or `undefined` if there is none.
 * More than one is a structural violation.
 */
export function findUniqueChild(element: XmlElement, tag: string, path: string): XmlElement | undefined {
  const matches = childrenByTag(element, tag);
  if (matches.length > 1) {
    throw KinematicsErrorFactory.structuralViolation(
      `${ERROR_MESSAGES.DUPLICATE_SINGLETON}: <${tag}> appears ${matches.length} times`,
      `${path}/${tag}`,
      { count: matches.length }
    );
  }
  return matches[0];
}

/**
 * Like `findUniqueChild`, but absence is a structural violation too.
 */
export function requireUniqueChild(element: XmlElement, tag: string, path: string): XmlElement {
  const match = findUniqueChild(element, tag, path);
  if (!match) {
    throw KinematicsErrorFactory.structuralViolation(
      `${ERROR_MESSAGES.MISSING_SINGLETON}: <${tag}>`,
      `${path}/${tag}`
    );
  }
  return match;
}

/**
 * Pre-order iteration over an element and all of its descendants.
 */
export function* iterateElements(root: XmlElement): Generator<XmlElement> {
  const stack: XmlElement[] = [root];
  while (stack.length > 0) {
    const element = stack.pop();
    if (element === undefined) break;
    yield element;
    for (let i = element.children.length - 1; i >= 0; i--) {
      stack.push(element.children[i]);
    }
  }
}

/**
 * Sets an own, enumerable entry. Plain assignment would treat a key named
 * `__proto__` as the prototype setter and drop it.
 */
export function setEntry<T>(record: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Readable form of an attribute value for messages.
 */
export function formatAttributeValue(value: AttributeValue): string {
  return typeof value === 'string' ? value : value.join(' ');
}
