/**
 * Error Constants for the Kinematic Tree Loader
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  STRUCTURAL_VIOLATION: 'KT_STRUCTURAL_VIOLATION',
  SCHEMA_VIOLATION: 'KT_SCHEMA_VIOLATION',
  CONFLICTING_ORIENTATION: 'KT_CONFLICTING_ORIENTATION',
  UNKNOWN_JOINT_TYPE: 'KT_UNKNOWN_JOINT_TYPE',
  UNKNOWN_GEOM_SHAPE: 'KT_UNKNOWN_GEOM_SHAPE',
  NON_CONTIGUOUS_IDS: 'KT_NON_CONTIGUOUS_IDS',
  DUPLICATE_LINK_NAME: 'KT_DUPLICATE_LINK_NAME',
  DOCUMENT_PARSE_ERROR: 'KT_DOCUMENT_PARSE_ERROR',
  CONFIG_VALIDATION_ERROR: 'KT_CONFIG_VALIDATION_ERROR',
  FILE_SYSTEM_ERROR: 'KT_FILE_SYSTEM_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  MISSING_SINGLETON: 'Required element is missing',
  DUPLICATE_SINGLETON: 'Element must appear at most once',
  MISPLACED_ELEMENT: 'Element is not allowed at this position',
  UNEXPECTED_CHILDREN: 'Default declarations cannot have children',
  UNKNOWN_TAG: 'Unknown tag',
  UNKNOWN_ATTRIBUTE: 'Attribute is not allowed on this tag',
  MISSING_ATTRIBUTE: 'Required attribute is missing',
  INVALID_VECTOR: 'Attribute value has the wrong shape',
  INVALID_OPTIONS: 'Simulation options are invalid',
  CONFLICTING_ORIENTATION: 'Body declares both quat and euler',
  ZERO_QUATERNION: 'Quaternion has zero norm',
  UNKNOWN_JOINT_TYPE: 'Unknown joint type',
  UNKNOWN_GEOM_SHAPE: 'Unknown geometry shape',
  NON_CONTIGUOUS_IDS: 'Link ids are not contiguous',
  DUPLICATE_LINK_NAME: 'Body name is already in use',
  MALFORMED_XML: 'Document is not well-formed XML',
  INVALID_CONFIG: 'Invalid configuration provided',
  FILE_NOT_FOUND: 'File not found',
  FILE_READ_FAILED: 'File could not be read',
} as const;
