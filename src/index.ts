/**
 * Kinematic Tree Loader
 *
 * Loads XML multibody descriptions into flat, parent-indexed kinematic trees.
 *
 * @example
 * ```typescript
 * import { createTreeLoader } from 'kinematic-tree-loader';
 *
 * const loader = createTreeLoader({ logLevel: 'info' });
 *
 * const tree = loader.loadFromFile('./pendulum.xml');
 * tree.parents; // [-1, 0]
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { KinematicsErrorFactory, isKinematicsError } from './errors';
import { ERROR_MESSAGES } from './constants/errors';
import { TreeLoaderConfigSchema, type TreeLoaderConfig, type TreeLoaderConfigInput } from './schemas';
import type { KinematicTree } from './interfaces';
import { parseKinematicTree } from './parsers';
import { Logger, LoggerFactory, toLogLevel } from './utils/logger';
import { defaultOrientationMath, type OrientationMath } from './utils/quaternion-utils';

/**
 * Collaborators the loader can be given besides its configuration.
 */
export interface TreeLoaderCollaborators {
  /** Replaces the logger built from `logLevel` */
  logger?: Logger;
  /** Euler-to-quaternion conversion */
  orientationMath?: OrientationMath;
  /** Applied to every loaded tree before it is returned */
  postProcess?: (tree: KinematicTree) => KinematicTree;
}

/**
 * Main loader class
 */
export class KinematicTreeLoader {
  private config: TreeLoaderConfig;
  private logger: Logger;
  private orientationMath: OrientationMath;
  private postProcess: (tree: KinematicTree) => KinematicTree;

  constructor(config: TreeLoaderConfigInput = {}, collaborators: TreeLoaderCollaborators = {}) {
    try {
      this.config = TreeLoaderConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw KinematicsErrorFactory.configError(
          ERROR_MESSAGES.INVALID_CONFIG,
          'TreeLoaderConfig',
          { zodError: error }
        );
      }
      throw error;
    }

    this.logger = collaborators.logger ?? LoggerFactory.forParsing(toLogLevel(this.config.logLevel));
    this.orientationMath = collaborators.orientationMath ?? defaultOrientationMath;
    this.postProcess = collaborators.postProcess ?? (tree => tree);
    this.logger.logConfig({ ...this.config });
  }

  /**
   * Load a tree from XML text
   *
   * @example
   * ```typescript
   * const tree = loader.loadFromString(`
   *   <x_xy model="pendulum">
   *     <options gravity="0 0 9.81" dt="0.01"/>
   *     <worldbody>
   *       <body name="arm" joint="ry"/>
   *     </worldbody>
   *   </x_xy>
   * `);
   * ```
   */
  loadFromString(xml: string): KinematicTree {
    try {
      const tree = this.logger.withTiming('load', () => parseKinematicTree(xml, {
        config: this.config,
        logger: this.logger,
        orientationMath: this.orientationMath,
      }));
      return this.postProcess(tree);
    } catch (error) {
      if (isKinematicsError(error)) {
        this.logger.logError(error, { tag: error._tag, ...error.context });
      }
      throw error;
    }
  }

  /**
   * Read a UTF-8 file and load it
   */
  loadFromFile(filePath: string): KinematicTree {
    const resolved = path.resolve(filePath);

    if (!fs.existsSync(resolved)) {
      throw KinematicsErrorFactory.fileSystemError(
        `${ERROR_MESSAGES.FILE_NOT_FOUND}: ${resolved}`,
        resolved,
        'read'
      );
    }

    let xml: string;
    try {
      xml = fs.readFileSync(resolved, 'utf8');
    } catch (error) {
      throw KinematicsErrorFactory.fileSystemError(
        `${ERROR_MESSAGES.FILE_READ_FAILED}: ${resolved}`,
        resolved,
        'read',
        { cause: error instanceof Error ? error.message : String(error) }
      );
    }

    this.logger.info(`Loading ${path.basename(resolved)}`, { filePath: resolved, fileSize: xml.length });
    return this.loadFromString(xml);
  }

  /**
   * Get current configuration
   */
  getConfig(): TreeLoaderConfig {
    return { ...this.config };
  }
}

/**
 * Create loader instance with configuration
 */
export function createTreeLoader(
  config: TreeLoaderConfigInput = {},
  collaborators: TreeLoaderCollaborators = {}
): KinematicTreeLoader {
  return new KinematicTreeLoader(config, collaborators);
}

/**
 * Load a tree from XML text with the default configuration
 */
export function loadTreeFromString(xml: string, config: TreeLoaderConfigInput = {}): KinematicTree {
  return createTreeLoader(config).loadFromString(xml);
}

/**
 * Load a tree from a file with the default configuration
 */
export function loadTreeFromFile(filePath: string, config: TreeLoaderConfigInput = {}): KinematicTree {
  return createTreeLoader(config).loadFromFile(filePath);
}

/**
 * TypeScript type exports
 */
export type * from './types';

export * from './errors';
export {
  TreeLoaderConfigSchema,
  SimulationOptionsSchema,
  Vec3Schema,
  QuatSchema,
  LogLevelNameSchema,
} from './validation';
export { JOINT_DOF_WIDTHS, isJointType, jointDof } from './constants/joints';
export { GEOM_DIM_ARITY, isGeomShape } from './constants/schema';
export {
  Logger,
  LogLevel,
  LoggerFactory,
  createLogger,
  quatFromEuler,
  quatNormalize,
  degToRad,
  IDENTITY_QUATERNION,
  findLinkIndex,
  linkDofOffsets,
} from './utils';
export type { OrientationMath, LoggerOptions, LoggerContext } from './utils';
export {
  parseNumericLiteral,
  coerceNumericAttributes,
  buildDefaultsTable,
  mixInDefaults,
  extractVisualMetadata,
  walkBodyTree,
  flattenTree,
} from './parsers';
