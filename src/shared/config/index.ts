/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from '../config';
 *
 * - `env.ts` - Raw environment variable schema definitions
 * - `index.ts` (this file) - Config assembly and re-exports
 */

import { getEffectiveNodeEnv, loadEnvOrThrow, LogFormat, LogLevel, NodeEnv, RawEnv } from './env';

export interface EngineConfig {
  nodeEnv: NodeEnv;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  diagnostics: {
    traceCombinations: boolean;
  };
}

export function buildConfig(rawEnv: RawEnv): EngineConfig {
  return {
    nodeEnv: getEffectiveNodeEnv(rawEnv),
    logging: {
      level: rawEnv.LOG_LEVEL,
      format: rawEnv.LOG_FORMAT,
    },
    diagnostics: {
      traceCombinations: rawEnv.ROYAL_TILES_TRACE_COMBINATIONS,
    },
  };
}

export const config: Readonly<EngineConfig> = Object.freeze(buildConfig(loadEnvOrThrow()));

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  parseEnv,
  loadEnvOrThrow,
  getEffectiveNodeEnv,
} from './env';

export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
