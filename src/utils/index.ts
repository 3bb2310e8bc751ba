/**
 * Utilities
 */

export { Logger, LogLevel, LoggerFactory, createLogger, toLogLevel } from './logger';
export type { LoggerOptions, LoggerContext } from './logger';
export {
  IDENTITY_QUATERNION,
  degToRad,
  quatMultiply,
  quatFromAxisAngle,
  quatFromEuler,
  quatNormalize,
  defaultOrientationMath,
} from './quaternion-utils';
export type { OrientationMath } from './quaternion-utils';
export { findLinkIndex, linkDofOffsets } from './tree-utils';
