/**
 * Schemas module - config file shapes and their validators
 */

export type { UserConfig } from './user-config.schema';
export { exampleUserConfig } from './user-config.schema';

export type { ValidationResult } from './validators';
export {
  validateUserConfig,
  parseUserConfig,
  validateEffectiveConfig,
  userConfigSchema,
  effectiveConfigSchema,
  cidrSchema,
} from './validators';
