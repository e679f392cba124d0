/**
 * Configuration module exports
 */

// Schema types
export type {
  SearchConfigSchema,
  EvaluationConfigSchema,
  OutputConfigSchema,
  PawnPusherConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_EVALUATION_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  type PartialConfig,
  configSchema,
  partialConfigSchema,
  cliOptionsSchema,
  ConfigValidationError,
  validateConfig,
  parsePartialConfig,
  parseRawCliOptions,
} from './validation.js';

// Loader
export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mapCliToConfig,
  formatConfig,
} from './loader.js';
