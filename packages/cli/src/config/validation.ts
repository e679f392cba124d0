/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

/**
 * Search depth schema (1-200)
 */
const depthSchema = z.number().int().min(1).max(200);

/**
 * Evaluation weight schema
 */
const weightSchema = z.number().finite();

/**
 * Base search configuration schema (without refinement)
 */
const baseSearchConfigSchema = z.object({
  minDepth: depthSchema,
  maxDepth: depthSchema,
  timeLimitMs: z.number().int().positive().optional(),
  checkInterval: z.number().int().min(1),
  verifyExpansion: z.boolean(),
});

/**
 * Search configuration schema with validation
 */
export const searchConfigSchema = baseSearchConfigSchema.refine(
  (data) => data.maxDepth >= data.minDepth,
  {
    message: 'maxDepth must be >= minDepth',
    path: ['maxDepth'],
  },
);

/**
 * Evaluation configuration schema
 */
export const evaluationConfigSchema = z.object({
  materialWeight: weightSchema,
  pawnStructureWeight: weightSchema,
  mobilityWeight: weightSchema,
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  view: z.boolean(),
  unicode: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  search: searchConfigSchema,
  evaluation: evaluationConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment)
 */
export const partialConfigSchema = z
  .object({
    search: baseSearchConfigSchema.partial().strict().optional(),
    evaluation: evaluationConfigSchema.partial().strict().optional(),
    output: outputConfigSchema.partial().strict().optional(),
  })
  .strict();

export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Raw command options as produced by Commander
 */
export const cliOptionsSchema = z.object({
  config: z.string().min(1).optional(),
  minDepth: depthSchema.optional(),
  maxDepth: depthSchema.optional(),
  timeLimit: z.number().int().positive().optional(),
  view: z.boolean().optional(),
  ascii: z.boolean().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
  showConfig: z.boolean().optional(),
  // Commander stores --no-color as color: false
  color: z.boolean().optional(),
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
}

/**
 * Validate a partial configuration (from config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function parsePartialConfig(config: unknown): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate raw command options
 * @throws ConfigValidationError if validation fails
 */
export function parseRawCliOptions(options: unknown): z.infer<typeof cliOptionsSchema> {
  const result = cliOptionsSchema.safeParse(options);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
