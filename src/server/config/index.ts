/**
 * Configuration Module - Canonical Entry Point
 *
 * All server code should import configuration from here:
 *
 *   import { config } from './config';
 *
 * - `env.ts` - Raw environment variable schema definitions
 * - `unified.ts` - Config assembly and validation logic
 */

export { config, buildConfig, loadConfig } from './unified';
export type { AppConfig, OpponentServiceSettings } from './unified';

export {
  EnvSchema,
  NodeEnvSchema,
  LogLevelSchema,
  LogFormatSchema,
  OpponentServiceKindSchema,
  DifficultySchema,
  parseEnv,
  formatEnvErrors,
  getEffectiveNodeEnv,
  isProduction,
  isDevelopment,
  isTest,
} from './env';

export type {
  RawEnv,
  EnvValidationResult,
  NodeEnv,
  LogLevel,
  LogFormat,
  OpponentServiceKind,
} from './env';
