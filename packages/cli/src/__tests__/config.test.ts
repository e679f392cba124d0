/**
 * Configuration system tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  mapCliToConfig,
} from '../config/loader.js';
import {
  validateConfig,
  parsePartialConfig,
  ConfigValidationError,
} from '../config/validation.js';
import { ConfigError } from '../errors/cli-errors.js';

describe('Config Defaults', () => {
  it('should search depths 2 through 101 without a time limit', () => {
    expect(DEFAULT_CONFIG.search).toEqual({
      minDepth: 2,
      maxDepth: 101,
      checkInterval: 1024,
      verifyExpansion: false,
    });
  });

  it('should weight material 10, pawn structure 1 and mobility 5', () => {
    expect(DEFAULT_CONFIG.evaluation).toEqual({
      materialWeight: 10,
      pawnStructureWeight: 1,
      mobilityWeight: 5,
    });
  });

  it('should pass validation', () => {
    expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
  });
});

describe('Config Validation', () => {
  it('should reject maxDepth below minDepth', () => {
    const config = {
      ...DEFAULT_CONFIG,
      search: { ...DEFAULT_CONFIG.search, minDepth: 5, maxDepth: 4 },
    };

    try {
      validateConfig(config);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toMatchObject({
        errors: [{ path: 'search.maxDepth', message: 'maxDepth must be >= minDepth' }],
      });
    }
  });

  it('should reject a fractional depth', () => {
    const config = { ...DEFAULT_CONFIG, search: { ...DEFAULT_CONFIG.search, minDepth: 2.5 } };
    expect(() => validateConfig(config)).toThrow(ConfigValidationError);
  });

  it('should reject a non-finite weight', () => {
    const config = {
      ...DEFAULT_CONFIG,
      evaluation: { ...DEFAULT_CONFIG.evaluation, mobilityWeight: Infinity },
    };
    expect(() => validateConfig(config)).toThrow(ConfigValidationError);
  });

  it('should accept a partial config', () => {
    expect(parsePartialConfig({ search: { maxDepth: 6 } })).toEqual({ search: { maxDepth: 6 } });
  });

  it('should reject unknown keys in a partial config', () => {
    expect(() => parsePartialConfig({ search: { depth: 6 } })).toThrow(ConfigValidationError);
    expect(() => parsePartialConfig({ engine: {} })).toThrow(ConfigValidationError);
  });

  it('should list every problem in the formatted error', () => {
    const error = new ConfigValidationError([
      { path: 'search.minDepth', message: 'Expected number, received string' },
    ]);
    expect(error.format().split('\n').slice(0, 3)).toEqual([
      'Configuration validation failed:',
      '',
      '  search.minDepth: Expected number, received string',
    ]);
  });
});

describe('Environment config', () => {
  it('should map variables to config keys', () => {
    const config = loadEnvConfig({
      PAWNPUSHER_MAX_DEPTH: '8',
      PAWNPUSHER_TIME_LIMIT_MS: '1500',
      PAWNPUSHER_MOBILITY_WEIGHT: '2.5',
      PAWNPUSHER_VERIFY_EXPANSION: 'true',
      PAWNPUSHER_UNICODE: '0',
    });

    expect(config).toEqual({
      search: { maxDepth: 8, timeLimitMs: 1500, verifyExpansion: true },
      evaluation: { mobilityWeight: 2.5 },
      output: { unicode: false },
    });
  });

  it('should ignore empty and unrelated variables', () => {
    expect(loadEnvConfig({ PAWNPUSHER_MIN_DEPTH: '', HOME: '/home/test' })).toEqual({
      search: {},
      evaluation: {},
      output: {},
    });
  });

  it('should reject a value that is not a number', () => {
    expect(() => loadEnvConfig({ PAWNPUSHER_MIN_DEPTH: 'deep' })).toThrow(
      ConfigValidationError,
    );
  });
});

describe('CLI mapping', () => {
  it('should map time limit and ascii', () => {
    expect(mapCliToConfig({ timeLimit: 500, ascii: true, view: true })).toEqual({
      search: { timeLimitMs: 500 },
      output: { unicode: false, view: true },
    });
  });

  it('should leave unset options out', () => {
    expect(mapCliToConfig({ verbose: true })).toEqual({ search: {}, output: {} });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pawnpusher-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  }

  it('should read a config file', async () => {
    const file = writeConfig('.pawnpusherrc.json', { evaluation: { materialWeight: 12 } });
    expect(await loadConfigFile(file)).toEqual({ evaluation: { materialWeight: 12 } });
  });

  it('should apply file, then environment, then CLI options', async () => {
    const file = writeConfig('.pawnpusherrc.json', {
      search: { minDepth: 3, maxDepth: 9 },
      output: { view: true },
    });

    const config = await loadConfig(
      { config: file, maxDepth: 5 },
      { PAWNPUSHER_MAX_DEPTH: '7', PAWNPUSHER_MIN_DEPTH: '4' },
    );

    expect(config.search.minDepth).toBe(4);
    expect(config.search.maxDepth).toBe(5);
    expect(config.output.view).toBe(true);
    expect(config.evaluation).toEqual(DEFAULT_CONFIG.evaluation);
  });

  it('should not mutate the defaults', async () => {
    const file = writeConfig('.pawnpusherrc.json', { search: { maxDepth: 4 } });
    await loadConfig({ config: file }, {});
    expect(DEFAULT_CONFIG.search.maxDepth).toBe(101);
  });

  it('should validate the merged config', async () => {
    const file = writeConfig('.pawnpusherrc.json', { search: { minDepth: 10 } });
    await expect(loadConfig({ config: file, maxDepth: 5 }, {})).rejects.toThrow(
      ConfigValidationError,
    );
  });

  it('should report a missing config file', async () => {
    await expect(loadConfigFile(path.join(dir, 'missing.json'))).rejects.toThrow(ConfigError);
  });
});
