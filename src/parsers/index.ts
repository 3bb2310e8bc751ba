/**
 * Document parsing pipeline
 */

export { parseKinematicTree } from './tree-parser';
export type { ParseContext } from './tree-parser';
export { parseXmlDocument } from './xml-document';
export { validateDocumentSchema } from './helpers/attribute-schema';
export { assertDocumentStructure } from './helpers/document-structure';
export { coerceNumericAttributes, parseNumericLiteral } from './helpers/numeric-coercion';
export { buildDefaultsTable, mixInDefaults } from './helpers/defaults-resolver';
export { extractVisualMetadata } from './helpers/visual-metadata';
export { walkBodyTree } from './helpers/tree-walker';
export type { WalkOptions } from './helpers/tree-walker';
export { flattenTree } from './helpers/tree-flattener';
