/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, PawnPusherConfig } from './schema.js';
import {
  ConfigValidationError,
  type PartialConfig,
  parsePartialConfig,
  validateConfig,
} from './validation.js';

type ConfigSection = keyof PawnPusherConfig;

/**
 * Where an environment variable lands in the config, and how to read it
 */
interface EnvBinding {
  section: ConfigSection;
  key: string;
  type: 'number' | 'boolean';
}

/**
 * Environment variable mapping
 */
const ENV_VAR_MAP: Record<string, EnvBinding> = {
  // Search
  PAWNPUSHER_MIN_DEPTH: { section: 'search', key: 'minDepth', type: 'number' },
  PAWNPUSHER_MAX_DEPTH: { section: 'search', key: 'maxDepth', type: 'number' },
  PAWNPUSHER_TIME_LIMIT_MS: { section: 'search', key: 'timeLimitMs', type: 'number' },
  PAWNPUSHER_CHECK_INTERVAL: { section: 'search', key: 'checkInterval', type: 'number' },
  PAWNPUSHER_VERIFY_EXPANSION: { section: 'search', key: 'verifyExpansion', type: 'boolean' },

  // Evaluation
  PAWNPUSHER_MATERIAL_WEIGHT: { section: 'evaluation', key: 'materialWeight', type: 'number' },
  PAWNPUSHER_PAWN_STRUCTURE_WEIGHT: {
    section: 'evaluation',
    key: 'pawnStructureWeight',
    type: 'number',
  },
  PAWNPUSHER_MOBILITY_WEIGHT: { section: 'evaluation', key: 'mobilityWeight', type: 'number' },

  // Output
  PAWNPUSHER_VIEW: { section: 'output', key: 'view', type: 'boolean' },
  PAWNPUSHER_UNICODE: { section: 'output', key: 'unicode', type: 'boolean' },
};

/**
 * Deep clone the configuration
 */
function cloneConfig(config: PawnPusherConfig): PawnPusherConfig {
  return {
    search: { ...config.search },
    evaluation: { ...config.evaluation },
    output: { ...config.output },
  };
}

/**
 * Merge a partial configuration over a complete one
 * Source values override target values
 */
function mergeConfig(target: PawnPusherConfig, source: PartialConfig): PawnPusherConfig {
  const result = cloneConfig(target);

  if (source.search) {
    result.search = { ...result.search, ...source.search };
  }

  if (source.evaluation) {
    result.evaluation = { ...result.evaluation, ...source.evaluation };
  }

  if (source.output) {
    result.output = { ...result.output, ...source.output };
  }

  return result;
}

/**
 * Parse environment variable value based on expected type. Values that do
 * not parse are passed through so validation reports them.
 */
function parseEnvValue(value: string, type: EnvBinding['type']): unknown {
  if (type === 'boolean') {
    return value.toLowerCase() === 'true' || value === '1';
  }

  const num = Number(value);
  return value.trim() === '' || isNaN(num) ? value : num;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  const config: Record<ConfigSection, Record<string, unknown>> = {
    search: {},
    evaluation: {},
    output: {},
  };

  for (const [envVar, binding] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      config[binding.section][binding.key] = parseEnvValue(value, binding.type);
    }
  }

  return parsePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * Without an explicit path the usual places are searched and a missing
 * file is not an error.
 */
export async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  const explorer = cosmiconfig('pawnpusher', {
    searchPlaces: [
      'package.json',
      '.pawnpusherrc',
      '.pawnpusherrc.json',
      '.pawnpusherrc.yaml',
      '.pawnpusherrc.yml',
      '.pawnpusherrc.js',
      '.pawnpusherrc.cjs',
      'pawnpusher.config.js',
      'pawnpusher.config.cjs',
    ],
  });

  let loaded: unknown = null;
  try {
    const result = configPath ? await explorer.load(configPath) : await explorer.search();
    loaded = result?.config ?? null;
  } catch (error) {
    const location = configPath ? resolveAbsolutePath(configPath) : 'config file';
    throw new ConfigError(
      `Failed to load ${location}: ${error instanceof Error ? error.message : String(error)}`,
      'Check the file path and its syntax',
    );
  }

  if (loaded === null) {
    return null;
  }

  return parsePartialConfig(loaded);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialConfig {
  const search: NonNullable<PartialConfig['search']> = {};
  const output: NonNullable<PartialConfig['output']> = {};

  if (options.minDepth !== undefined) search.minDepth = options.minDepth;
  if (options.maxDepth !== undefined) search.maxDepth = options.maxDepth;
  if (options.timeLimit !== undefined) search.timeLimitMs = options.timeLimit;
  if (options.view !== undefined) output.view = options.view;
  if (options.ascii !== undefined) output.unicode = !options.ascii;

  return { search, output };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<PawnPusherConfig> {
  // 1. Start with defaults
  let config = cloneConfig(DEFAULT_CONFIG);

  // 2. Load and merge config file (if exists)
  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  // 3. Apply environment variables
  config = mergeConfig(config, loadEnvConfig(env));

  // 4. Apply CLI arguments (highest priority)
  config = mergeConfig(config, mapCliToConfig(cliOptions));

  // 5. Validate final config
  validateConfig(config);

  return config;
}

/**
 * Format configuration for display
 */
export function formatConfig(config: PawnPusherConfig): string {
  return JSON.stringify(config, null, 2);
}

export { ConfigValidationError };
