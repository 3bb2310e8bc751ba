/**
 * Numeric Coercion
 *
 * Turns whitespace-separated float literals into number arrays. A value that
 * does not parse completely stays text; that is not an error.
 */

import type { AttributeValue, XmlElement } from '../../interfaces';
import { iterateElements, setEntry } from '../../utils/element-utils';

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_LITERAL = /^([+-]?)(inf|infinity|nan)$/i;

function parseToken(token: string): number | undefined {
  if (DECIMAL_LITERAL.test(token)) {
    return Number(token);
  }
  const special = SPECIAL_LITERAL.exec(token);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return NaN;
    return special[1] === '-' ? -Infinity : Infinity;
  }
  return undefined;
}

/**
 * Parses `"0 0 -9.81"` into `[0, 0, -9.81]`. Returns `undefined` when any
 * token is not a float literal or the text is blank.
 */
export function parseNumericLiteral(text: string): number[] | undefined {
  const trimmed = text.trim();
  if (trimmed === '') {
    return undefined;
  }

  const values: number[] = [];
  for (const token of trimmed.split(/\s+/)) {
    const value = parseToken(token);
    if (value === undefined) {
      return undefined;
    }
    values.push(value);
  }
  return values;
}

/**
 * Replaces, in place, every numeric attribute value in the tree with its
 * number array. The element's `text` keeps the literal as written.
 */
export function coerceNumericAttributes(root: XmlElement): void {
  for (const element of iterateElements(root)) {
    for (const [name, value] of Object.entries(element.attributes)) {
      if (typeof value !== 'string') continue;
      const numeric = parseNumericLiteral(value);
      if (numeric !== undefined) {
        setEntry<AttributeValue>(element.attributes, name, numeric);
      }
    }
  }
}
