/**
 * Library entry point.
 */

export { Extractor, type ExtractorOptions, type ConfigProvider } from './pipeline/index.js';
export * from './source/index.js';
export * from './normalization/index.js';
export * from './sinks/index.js';
export {
  loadConfig,
  applyEnvOverrides,
  redactConfig,
  ConfigError,
  ConfigFileSchema,
  DEFAULT_CONFIG_FILE,
  DEFAULT_IOC_TYPES,
  type LoadConfigOptions,
  type LoadedConfig,
} from './config/loader.js';
export {
  ExtractorError,
  ConnectionError,
  QueryError,
  MalformedRowError,
  StorageError,
} from './utils/errors.js';
export { createLogger, setLogLevel, setLogFile, setLogToStderr, type Logger, type LogLevel } from './utils/logger.js';
export type * from './types/index.js';
