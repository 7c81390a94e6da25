/**
 * @neowatch/cli
 */

export { runCli, USAGE, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './run.js';
export type { CliIO } from './run.js';
export {
  ConfigError,
  DEFAULT_SETTINGS,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  resolveSettings,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions, Settings, SettingsOverrides } from './config.js';
