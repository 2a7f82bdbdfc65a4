/**
 * Config module exports.
 */

export type {
  MindConfigFile,
  MergedConfig,
  LogLevel,
  PeerAddress,
  InitialGoal,
  RetryConfig,
} from './config-schema.js';
export {
  DEFAULT_CONFIG,
  CONFIG_FILE_VERSION,
  mindConfigFileSchema,
  isLogLevel,
} from './config-schema.js';
export type { ConfigEnv, ConfigLoaderOptions } from './config-loader.js';
export {
  ConfigLoader,
  createConfigLoader,
  loadConfig,
  parsePeerList,
  parsePeerAddress,
} from './config-loader.js';
