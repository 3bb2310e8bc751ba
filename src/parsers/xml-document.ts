/**
 * XML Document Reader
 *
 * Tokenizes the input with fast-xml-parser and converts the order-preserving
 * output into `XmlElement` trees. Attribute values stay text here; numeric
 * coercion happens later in the pipeline.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { AttributeSource, AttributeText, AttributeValue, Attributes, XmlElement } from '../interfaces';
import { KinematicsErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import { DEFAULT_CONFIG } from '../constants/config';
import { setEntry } from '../utils/element-utils';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

// preserveOrder keeps sibling bodies and geoms in document order
const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  preserveOrder: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  maxNestedTags: DEFAULT_CONFIG.MAX_NESTED_TAGS,
};

const xmlParser = new XMLParser(parserOptions);

interface PendingNodes {
  nodes: unknown;
  into: XmlElement[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): AttributeSource {
  const attributes: Attributes = {};
  const text: AttributeText = {};
  if (!isRecord(raw)) {
    return { attributes, text };
  }
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    setEntry<AttributeValue>(attributes, name, String(value));
    setEntry(text, name, String(value));
  }
  return { attributes, text };
}

function readElements(nodes: unknown): XmlElement[] {
  const roots: XmlElement[] = [];
  const stack: PendingNodes[] = [{ nodes, into: roots }];

  while (stack.length > 0) {
    const pending = stack.pop();
    if (pending === undefined) break;
    if (!Array.isArray(pending.nodes)) continue;

    for (const node of pending.nodes) {
      if (!isRecord(node)) continue;
      for (const [key, value] of Object.entries(node)) {
        // Text content carries no meaning in this format
        if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
        const element: XmlElement = { tag: key, ...readAttributes(node[ATTRIBUTES_KEY]), children: [] };
        pending.into.push(element);
        stack.push({ nodes: value, into: element.children });
      }
    }
  }
  return roots;
}

function tokenize(xml: string): unknown {
  try {
    return xmlParser.parse(xml);
  } catch (error) {
    throw KinematicsErrorFactory.documentParseError(
      `${ERROR_MESSAGES.MALFORMED_XML}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Parses XML text into its single root element.
 */
export function parseXmlDocument(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw KinematicsErrorFactory.documentParseError(
      `${ERROR_MESSAGES.MALFORMED_XML}: ${msg} (line ${line}, column ${col})`,
      line,
      col
    );
  }

  const roots = readElements(tokenize(xml));
  if (roots.length !== 1) {
    throw KinematicsErrorFactory.structuralViolation(
      `Document must have exactly one root element, found ${roots.length}`,
      '/'
    );
  }
  return roots[0];
}
