export { ConfigSchema, ConfigDefaults, cloneDefaults, type Config } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  setConfigValue,
  expandTilde,
  PATH_ENV_KEYS,
  type LoadConfigOptions,
  type LoadConfigResult,
  ConfigError,
} from './loader.js';
