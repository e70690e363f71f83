/**
 * Config module exports.
 */

export type { GatewayConfig, GatewayConfigFile, LogLevel } from './config-schema.js';
export { DEFAULT_CONFIG, CONFIG_FILE_VERSION } from './config-schema.js';
export {
  ConfigError,
  ConfigLoader,
  CONFIG_FILE_NAME,
  createConfigLoader,
  loadConfig,
} from './config-loader.js';
