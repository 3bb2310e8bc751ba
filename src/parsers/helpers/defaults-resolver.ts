/**
 * Defaults Resolver
 *
 * `defaults` may hold one `body` and one `geom` element whose attributes
 * fill in whatever matching elements under `worldbody` leave out.
 */

import type { AttributeSource, AttributeValue, DefaultsTable, XmlElement } from '../../interfaces';
import { TAGS } from '../../constants/schema';
import { findUniqueChild, iterateElements, setEntry } from '../../utils/element-utils';

function copyValue(value: AttributeValue): AttributeValue {
  return typeof value === 'string' ? value : [...value];
}

function emptySource(): AttributeSource {
  return { attributes: {}, text: {} };
}

function copySource(element: XmlElement | undefined): AttributeSource {
  const source = emptySource();
  if (!element) return source;
  for (const [name, value] of Object.entries(element.attributes)) {
    setEntry(source.attributes, name, copyValue(value));
  }
  for (const [name, text] of Object.entries(element.text)) {
    setEntry(source.text, name, text);
  }
  return source;
}

/**
 * Reads the default attribute sets. A missing `defaults` element, or a
 * missing child for a tag, yields an empty set for that tag.
 */
export function buildDefaultsTable(defaults: XmlElement | undefined, path: string): DefaultsTable {
  if (!defaults) {
    return { body: emptySource(), geom: emptySource() };
  }
  return {
    body: copySource(findUniqueChild(defaults, TAGS.BODY, path)),
    geom: copySource(findUniqueChild(defaults, TAGS.GEOM, path)),
  };
}

/**
 * Adds each default attribute to every `body`/`geom` under `worldbody` that
 * does not set it. Explicit values are never replaced, so applying the same
 * table twice changes nothing.
 */
export function mixInDefaults(worldbody: XmlElement, table: DefaultsTable): void {
  for (const element of iterateElements(worldbody)) {
    let defaults: AttributeSource;
    if (element.tag === TAGS.BODY) {
      defaults = table.body;
    } else if (element.tag === TAGS.GEOM) {
      defaults = table.geom;
    } else {
      continue;
    }

    for (const [name, value] of Object.entries(defaults.attributes)) {
      if (Object.prototype.hasOwnProperty.call(element.attributes, name)) continue;
      setEntry(element.attributes, name, copyValue(value));
      const text = defaults.text[name];
      if (text !== undefined) {
        setEntry(element.text, name, text);
      }
    }
  }
}
