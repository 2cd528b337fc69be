/**
 * Environment Variable Schema and Validation
 *
 * Defines the Zod schema for every environment variable the engine reads,
 * validates them once, and exports a typed view.
 */

import { z } from 'zod';
import { getProcessEnv, isJestRuntime, parseFlag } from '../utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const FlagSchema = z
  .string()
  .optional()
  .transform((raw) => parseFlag(raw));

export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Minimum level written by the engine logger */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** `json` for structured output, `pretty` for a one-line console format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Log every accepted and rejected candidate cluster at debug level */
  ROYAL_TILES_TRACE_COMBINATIONS: FlagSchema,
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = getProcessEnv()
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables, throwing with every invalid key
 * listed when validation fails.
 */
export function loadEnvOrThrow(
  env: Record<string, string | undefined> = getProcessEnv()
): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    const details = (result.errors ?? [])
      .map((error) => `${error.path || 'root'}: ${error.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return result.data;
}

/**
 * Under Jest the environment is always treated as 'test', whatever NODE_ENV
 * says.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
