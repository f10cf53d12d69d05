/**
 * Config module exports
 */

export {
  configSchema,
  outputConfigSchema,
  scannerConfigSchema,
  failPolicySchema,
  outputFormatSchema,
  DEFAULT_INCLUDE,
  DEFAULT_EXCLUDE,
  type Config,
  type OutputConfig,
  type OutputFormat,
  type ScannerConfigOptions,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  resolveScanSetup,
  CONFIG_FILE_NAMES,
  type LocatedConfig,
  type ScanSetup,
} from './loader.js';
