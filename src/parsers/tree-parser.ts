/**
 * Kinematic Tree Parser
 *
 * Runs the whole pipeline on XML text: tokenize, validate the schema and
 * structure, coerce numbers, merge defaults, walk the bodies and flatten.
 * Each call owns all of its state.
 */

import type { KinematicTree } from '../interfaces';
import type { TreeLoaderConfig } from '../schemas';
import { SimulationOptionsSchema } from '../schemas';
import { KinematicsErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import { TAGS } from '../constants/schema';
import { childPath } from '../utils/element-utils';
import type { Logger } from '../utils/logger';
import type { OrientationMath } from '../utils/quaternion-utils';
import { parseXmlDocument } from './xml-document';
import { validateDocumentSchema } from './helpers/attribute-schema';
import { assertDocumentStructure } from './helpers/document-structure';
import { coerceNumericAttributes } from './helpers/numeric-coercion';
import { buildDefaultsTable, mixInDefaults } from './helpers/defaults-resolver';
import { readText } from './helpers/attribute-readers';
import { walkBodyTree } from './helpers/tree-walker';
import { flattenTree } from './helpers/tree-flattener';

export interface ParseContext {
  config: TreeLoaderConfig;
  logger: Logger;
  orientationMath: OrientationMath;
}

export function parseKinematicTree(xml: string, context: ParseContext): KinematicTree {
  const { config, logger, orientationMath } = context;

  logger.logStage('tokenize', { length: xml.length });
  const root = parseXmlDocument(xml);

  logger.logStage('schema');
  validateDocumentSchema(root, { rootTag: config.rootTag, visualPrefix: config.visualPrefix });

  logger.logStage('structure');
  const sections = assertDocumentStructure(root, config.rootTag);
  const rootPath = root.tag;
  const optionsPath = childPath(rootPath, TAGS.OPTIONS, 0);

  logger.logStage('numeric-coercion');
  coerceNumericAttributes(root);

  const optionsResult = SimulationOptionsSchema.safeParse(sections.options.attributes);
  if (!optionsResult.success) {
    throw KinematicsErrorFactory.schemaViolation(ERROR_MESSAGES.INVALID_OPTIONS, optionsPath, optionsResult.error);
  }

  logger.logStage('defaults');
  const defaults = buildDefaultsTable(sections.defaults, childPath(rootPath, TAGS.DEFAULTS, 0));
  mixInDefaults(sections.worldbody, defaults);

  logger.logStage('walk');
  const links = walkBodyTree(sections.worldbody, childPath(rootPath, TAGS.WORLDBODY, 0), {
    visualPrefix: config.visualPrefix,
    enforceUniqueNames: config.enforceUniqueNames,
    orientationMath,
  });

  logger.logStage('flatten', { links: links.length });
  return flattenTree(links, optionsResult.data, readText(root, 'model'));
}
