/**
 * Custom Error Classes for Kinematic Tree Loading
 *
 * Every failure is fatal and carries a tag, a stable code and the offending
 * document path so callers can report it without re-parsing.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base Error Class
 *
 * Base error class for all loader failures with tagged union pattern.
 */
export abstract class BaseKinematicsError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Structural Violation
 *
 * A required singleton element is missing, repeated, or nested in the wrong place.
 */
export class StructuralViolationError extends BaseKinematicsError {
  readonly _tag = 'StructuralViolation' as const;
  readonly code = ERROR_CODES.STRUCTURAL_VIOLATION;
  readonly path: string;

  constructor(message: string, path: string, context?: Record<string, unknown>) {
    super(message, { path, ...context });
    this.path = path;
  }
}

/**
 * Schema Violation
 *
 * Unknown tag, attribute outside the tag's whitelist, or an attribute value
 * with the wrong shape.
 */
export class SchemaViolationError extends BaseKinematicsError {
  readonly _tag = 'SchemaViolation' as const;
  readonly code = ERROR_CODES.SCHEMA_VIOLATION;
  readonly path: string;
  readonly zodError?: ZodError;

  constructor(message: string, path: string, zodError?: ZodError) {
    super(message, { path, zodError });
    this.path = path;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Conflicting Orientation
 */
export class ConflictingOrientationError extends BaseKinematicsError {
  readonly _tag = 'ConflictingOrientation' as const;
  readonly code = ERROR_CODES.CONFLICTING_ORIENTATION;
  readonly path: string;

  constructor(message: string, path: string) {
    super(message, { path });
    this.path = path;
  }
}

/**
 * Unknown Joint Type
 */
export class UnknownJointTypeError extends BaseKinematicsError {
  readonly _tag = 'UnknownJointType' as const;
  readonly code = ERROR_CODES.UNKNOWN_JOINT_TYPE;
  readonly path: string;
  readonly value: string;

  constructor(message: string, path: string, value: string) {
    super(message, { path, value });
    this.path = path;
    this.value = value;
  }
}

/**
 * Unknown Geometry Shape
 */
export class UnknownGeomShapeError extends BaseKinematicsError {
  readonly _tag = 'UnknownGeomShape' as const;
  readonly code = ERROR_CODES.UNKNOWN_GEOM_SHAPE;
  readonly path: string;
  readonly value: string;

  constructor(message: string, path: string, value: string) {
    super(message, { path, value });
    this.path = path;
    this.value = value;
  }
}

/**
 * Non-Contiguous Ids
 *
 * Link records do not form the sequence 0..N-1. Indicates a traversal bug.
 */
export class NonContiguousIdsError extends BaseKinematicsError {
  readonly _tag = 'NonContiguousIds' as const;
  readonly code = ERROR_CODES.NON_CONTIGUOUS_IDS;
  readonly ids: number[];

  constructor(message: string, ids: number[]) {
    super(message, { ids });
    this.ids = ids;
  }
}

/**
 * Duplicate Link Name
 */
export class DuplicateLinkNameError extends BaseKinematicsError {
  readonly _tag = 'DuplicateLinkName' as const;
  readonly code = ERROR_CODES.DUPLICATE_LINK_NAME;
  readonly linkName: string;
  readonly firstId: number;
  readonly secondId: number;

  constructor(message: string, linkName: string, firstId: number, secondId: number) {
    super(message, { linkName, firstId, secondId });
    this.linkName = linkName;
    this.firstId = firstId;
    this.secondId = secondId;
  }
}

/**
 * Document Parse Error
 *
 * The input text is not well-formed XML.
 */
export class DocumentParseError extends BaseKinematicsError {
  readonly _tag = 'DocumentParseError' as const;
  readonly code = ERROR_CODES.DOCUMENT_PARSE_ERROR;
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, line?: number, column?: number) {
    super(message, { line, column });
    this.line = line;
    this.column = column;
  }
}

/**
 * Configuration Error
 */
export class ConfigError extends BaseKinematicsError {
  readonly _tag = 'ConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * File System Error
 */
export class FileSystemError extends BaseKinematicsError {
  readonly _tag = 'FileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Union type for all loader errors
 */
export type KinematicsError =
  | StructuralViolationError
  | SchemaViolationError
  | ConflictingOrientationError
  | UnknownJointTypeError
  | UnknownGeomShapeError
  | NonContiguousIdsError
  | DuplicateLinkNameError
  | DocumentParseError
  | ConfigError
  | FileSystemError;

/**
 * Error factory functions
 */
export const KinematicsErrorFactory = {
  structuralViolation(message: string, path: string, context?: Record<string, unknown>): StructuralViolationError {
    return new StructuralViolationError(message, path, context);
  },

  schemaViolation(message: string, path: string, zodError?: ZodError): SchemaViolationError {
    return new SchemaViolationError(message, path, zodError);
  },

  conflictingOrientation(message: string, path: string): ConflictingOrientationError {
    return new ConflictingOrientationError(message, path);
  },

  unknownJointType(message: string, path: string, value: string): UnknownJointTypeError {
    return new UnknownJointTypeError(message, path, value);
  },

  unknownGeomShape(message: string, path: string, value: string): UnknownGeomShapeError {
    return new UnknownGeomShapeError(message, path, value);
  },

  nonContiguousIds(message: string, ids: number[]): NonContiguousIdsError {
    return new NonContiguousIdsError(message, ids);
  },

  duplicateLinkName(message: string, linkName: string, firstId: number, secondId: number): DuplicateLinkNameError {
    return new DuplicateLinkNameError(message, linkName, firstId, secondId);
  },

  documentParseError(message: string, line?: number, column?: number): DocumentParseError {
    return new DocumentParseError(message, line, column);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, context?: Record<string, unknown>): ConfigError {
    return new ConfigError(message, configKey, context);
  },

  /**
   * Create file system error
   */
  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): FileSystemError {
    return new FileSystemError(message, filePath, operation, context);
  },
};

/**
 * Narrow an unknown thrown value to one of the loader's errors.
 */
export function isKinematicsError(error: unknown): error is KinematicsError {
  return error instanceof BaseKinematicsError;
}
