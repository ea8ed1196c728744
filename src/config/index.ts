/**
 * Config module exports
 */

export {
  configSchema,
  outputConfigSchema,
  storageConfigSchema,
  watchConfigSchema,
  parserConfigSchema,
  type Config,
  type OutputConfig,
  type StorageConfig,
  type WatchConfig,
  type ParserConfig,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  parseConfig,
  CONFIG_FILE_NAMES,
} from './loader.js';
