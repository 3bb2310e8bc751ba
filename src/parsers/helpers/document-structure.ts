/**
 * Document Structure
 *
 * Cardinality and nesting rules: one `options`, at most one `defaults`,
 * one `worldbody`, and every element under a parent it may appear in.
 */

import type { XmlElement } from '../../interfaces';
import { KinematicsErrorFactory } from '../../errors';
import { ERROR_MESSAGES } from '../../constants/errors';
import { ALLOWED_PARENTS, TAGS, isSectionTag } from '../../constants/schema';
import type { SectionTag } from '../../constants/schema';
import { childPath, findUniqueChild, requireUniqueChild } from '../../utils/element-utils';

export interface DocumentSections {
  root: XmlElement;
  options: XmlElement;
  defaults: XmlElement | undefined;
  worldbody: XmlElement;
}

function assertNesting(root: XmlElement, rootTag: string): void {
  const stack: Array<{ element: XmlElement; parent: SectionTag | null; path: string }> = [];
  const pushChildren = (element: XmlElement, parent: SectionTag | null, path: string): void => {
    const seen = new Map<string, number>();
    const entries = element.children.map(child => {
      const index = seen.get(child.tag) ?? 0;
      seen.set(child.tag, index + 1);
      return { element: child, parent, path: childPath(path, child.tag, index) };
    });
    stack.push(...entries.reverse());
  };

  pushChildren(root, null, root.tag);

  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const { element, parent, path } = entry;

    // Schema validation has already rejected unknown tags, so anything
    // that is not a section tag here is a nested root tag.
    if (element.tag === rootTag || !isSectionTag(element.tag)) {
      throw KinematicsErrorFactory.structuralViolation(
        `${ERROR_MESSAGES.MISPLACED_ELEMENT}: <${element.tag}>`,
        path
      );
    }

    const tag = element.tag;
    if (!ALLOWED_PARENTS[tag].includes(parent)) {
      throw KinematicsErrorFactory.structuralViolation(
        `${ERROR_MESSAGES.MISPLACED_ELEMENT}: <${tag}> inside <${parent ?? rootTag}>`,
        path
      );
    }

    if (parent === TAGS.DEFAULTS && element.children.length > 0) {
      throw KinematicsErrorFactory.structuralViolation(
        `${ERROR_MESSAGES.UNEXPECTED_CHILDREN}: <${tag}>`,
        path
      );
    }

    pushChildren(element, tag, path);
  }
}

/**
 * Checks the root tag, section cardinality and nesting, and returns the
 * top-level sections.
 */
export function assertDocumentStructure(root: XmlElement, rootTag: string): DocumentSections {
  if (root.tag !== rootTag) {
    throw KinematicsErrorFactory.structuralViolation(
      `Root element must be <${rootTag}>, found <${root.tag}>`,
      root.tag
    );
  }

  const path = root.tag;
  const options = requireUniqueChild(root, TAGS.OPTIONS, path);
  const defaults = findUniqueChild(root, TAGS.DEFAULTS, path);
  const worldbody = requireUniqueChild(root, TAGS.WORLDBODY, path);

  if (defaults) {
    const defaultsPath = childPath(path, TAGS.DEFAULTS, 0);
    findUniqueChild(defaults, TAGS.BODY, defaultsPath);
    findUniqueChild(defaults, TAGS.GEOM, defaultsPath);
  }

  assertNesting(root, rootTag);

  return { root, options, defaults, worldbody };
}
