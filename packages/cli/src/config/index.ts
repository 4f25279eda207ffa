export { ConfigSchema, ConfigDefaults, PROVIDER_PRIORITY, type RawConfig, type Config, type ProviderId } from './schema.js';
export {
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  expandTilde,
  maskKey,
  maskConfig,
  type LoadConfigOptions,
  type LoadConfigResult,
  ConfigError,
} from './loader.js';
