/**
 * Configuration module exports
 */

export {
  resolveAdminConfig,
  loadConfigFile,
  writeConfigFile,
  defaultConfigPath,
  configPathFrom,
  parseBoolEnv,
  parseTimeout,
  DEFAULT_ADMIN_URL,
  ENV,
  type ConfigFile,
  type AdminConfigFlags,
} from './admin.js';
