/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  ROOT_TAG: 'x_xy',
  VISUAL_PREFIX: 'vispy',
  ENFORCE_UNIQUE_NAMES: true,
  LOG_LEVEL: 'warn' as const,
  LOGGER_PREFIX: 'Kinematics',
  // Body chains nest one element per link
  MAX_NESTED_TAGS: 10_000,
} as const;

/**
 * Separator between the visual prefix and the metadata key, e.g. `vispy_color`.
 */
export const VISUAL_SEPARATOR = '_';
