/**
 * Visual Metadata
 *
 * Geometry attributes named `<prefix>_<key>` are rendering hints. They skip
 * the attribute whitelist and reach the geometry as `{ key: value }`.
 */

import type { Attributes } from '../../interfaces';
import { VISUAL_SEPARATOR } from '../../constants/config';
import { setEntry } from '../../utils/element-utils';

export function isVisualAttribute(name: string, prefix: string): boolean {
  const marker = `${prefix}${VISUAL_SEPARATOR}`;
  return name.length > marker.length && name.startsWith(marker);
}

/**
 * Collects the visual attributes of a geometry with the prefix stripped.
 */
export function extractVisualMetadata(attributes: Attributes, prefix: string): Attributes {
  const offset = prefix.length + VISUAL_SEPARATOR.length;
  const metadata: Attributes = {};
  for (const [name, value] of Object.entries(attributes)) {
    if (isVisualAttribute(name, prefix)) {
      setEntry(metadata, name.slice(offset), value);
    }
  }
  return metadata;
}
