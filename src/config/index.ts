/**
 * Config module - configuration resolution and display
 */

export type { CliFlags, ResolveConfigOptions } from './resolve-config';
export { resolveConfig, loadUserConfig, getUserConfigPath, generateRunId } from './resolve-config';

export { formatEffectiveConfigForDisplay } from './format-effective-config';
