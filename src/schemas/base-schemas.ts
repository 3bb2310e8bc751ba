/**
 * Base Schemas
 *
 * Vector shapes shared by the document and configuration schemas.
 */

import { z } from 'zod';

/**
 * Three numeric entries (positions, gravity).
 */
export const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

/**
 * Quaternion as `[w, x, y, z]`.
 */
export const QuatSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/**
 * Supported log levels
 */
export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type Vec3 = z.infer<typeof Vec3Schema>;
export type Quat = z.infer<typeof QuatSchema>;
export type LogLevelName = z.infer<typeof LogLevelNameSchema>;
