/**
 * Validation Schemas
 *
 * Re-export schemas from main schemas file.
 */

export {
  TreeLoaderConfigSchema,
  SimulationOptionsSchema,
  Vec3Schema,
  QuatSchema,
  LogLevelNameSchema,
} from './schemas';
