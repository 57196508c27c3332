/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

/**
 * Port number schema (1-65535)
 */
const portSchema = z.number().int().min(1).max(65535);

/**
 * Who plays a side
 */
export const sourceKindSchema = z.enum(['human', 'engine', 'advisor']);

/**
 * Seat presets offered on the command line
 */
export const sessionModeSchema = z.enum(['practice', 'analysis', 'duel']);

export const engineKindSchema = z.enum(['uci', 'grpc']);

/**
 * Engine configuration schema
 */
export const engineConfigSchema = z.object({
  kind: engineKindSchema,
  path: z.string().min(1),
  host: z.string().min(1),
  port: portSchema,
  timeBudgetMs: z.number().int().min(10).max(600000),
  skillLevel: z.number().int().min(0).max(20).optional(),
});

/**
 * LLM configuration schema
 */
export const llmConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  timeout: z.number().int().min(1000).max(300000),
});

/**
 * Session configuration schema
 */
export const sessionConfigSchema = z.object({
  white: sourceKindSchema,
  black: sourceKindSchema,
  startFen: z.string().min(1).optional(),
});

/**
 * Advisory configuration schema
 */
export const advisoryConfigSchema = z.object({
  transcriptCap: z.number().int().min(1).max(1000),
  historyWindow: z.number().int().min(0).max(500),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  engine: engineConfigSchema,
  llm: llmConfigSchema,
  session: sessionConfigSchema,
  advisory: advisoryConfigSchema,
});

/**
 * Partial configuration schema (for config files and the environment)
 */
export const partialConfigSchema = z.object({
  engine: engineConfigSchema.partial().optional(),
  llm: llmConfigSchema.partial().optional(),
  session: sessionConfigSchema.partial().optional(),
  advisory: advisoryConfigSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof partialConfigSchema>;

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

/**
 * Convert zod issues into a ConfigValidationError
 */
export function toValidationError(error: z.ZodError): ConfigValidationError {
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
 * @returns The configuration with unknown keys removed
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
