/**
 * Zod Schemas for the Kinematic Tree Loader
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { isSectionTag } from '../constants/schema';
import { LogLevelNameSchema, Vec3Schema } from './base-schemas';

/**
 * Loader Configuration Schema
 */
export const TreeLoaderConfigSchema = z.object({
  rootTag: z.string()
    .min(1, 'Root tag cannot be empty')
    .refine(tag => !isSectionTag(tag), 'Root tag cannot reuse a section tag name')
    .optional()
    .default(DEFAULT_CONFIG.ROOT_TAG),
  visualPrefix: z.string()
    .regex(/^[A-Za-z][A-Za-z0-9]*$/, 'Visual prefix must be alphanumeric and start with a letter')
    .optional()
    .default(DEFAULT_CONFIG.VISUAL_PREFIX),
  enforceUniqueNames: z.boolean().optional().default(DEFAULT_CONFIG.ENFORCE_UNIQUE_NAMES),
  logLevel: LogLevelNameSchema.optional().default(DEFAULT_CONFIG.LOG_LEVEL),
});

/**
 * Simulation Options Schema
 *
 * Applied to the `options` element after numeric coercion, where every
 * numeric attribute is an array.
 */
export const SimulationOptionsSchema = z.object({
  gravity: Vec3Schema,
  dt: z.tuple([z.number().positive('dt must be positive')]).transform(([dt]) => dt),
});

/**
 * Type exports for TypeScript inference
 */
export type TreeLoaderConfig = z.infer<typeof TreeLoaderConfigSchema>;
export type TreeLoaderConfigInput = z.input<typeof TreeLoaderConfigSchema>;
export type SimulationOptions = z.infer<typeof SimulationOptionsSchema>;

// Re-export base schemas
export {
  Vec3Schema,
  QuatSchema,
  LogLevelNameSchema,
  type Vec3,
  type Quat,
  type LogLevelName,
} from './base-schemas';
