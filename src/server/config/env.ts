/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables and the
 * helpers that validate them. All environment variables should be defined
 * here with appropriate validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Kinds of opponent service that can be configured as primary or fallback.
 */
export const OpponentServiceKindSchema = z.enum(['local', 'mock', 'remote']);
export type OpponentServiceKind = z.infer<typeof OpponentServiceKindSchema>;

export const DifficultySchema = z
  .string()
  .transform((val) => val.trim().toLowerCase())
  .pipe(z.enum(['easy', 'medium', 'hard']));

/**
 * Boolean flag with a default. Accepts true/false/1/0 in any case.
 */
const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val, ctx) => {
      if (val === undefined || val.trim() === '') return defaultValue;
      const normalized = val.trim().toLowerCase();
      if (normalized === 'true' || normalized === '1') return true;
      if (normalized === 'false' || normalized === '0') return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${val}"` });
      return z.NEVER;
    });

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT & SERVER
  // ===================================================================

  NODE_ENV: NodeEnvSchema.default('development'),

  /** HTTP server port */
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  HOST: z.string().default('0.0.0.0'),

  /** Allowed CORS origin; '*' allows any */
  CORS_ORIGIN: z.string().default('*'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // BATTLE SESSIONS
  // ===================================================================

  /** Maximum number of live battles held in memory */
  AI_BATTLE_MAX_SESSIONS: z.coerce.number().int().positive().default(100),

  /** Idle time after which a battle is swept (minutes) */
  AI_BATTLE_SESSION_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(30),

  /** Interval of the background idle sweep (minutes) */
  AI_BATTLE_CLEANUP_INTERVAL_MINUTES: z.coerce.number().int().positive().default(5),

  AI_BATTLE_ENABLE_SESSION_CLEANUP: booleanFlag(true),

  /** Difficulty used when a create request names none */
  AI_BATTLE_DEFAULT_DIFFICULTY: DifficultySchema.default('easy'),

  // ===================================================================
  // OPPONENT SERVICE
  // ===================================================================

  AI_SERVICE_TYPE: OpponentServiceKindSchema.default('local'),

  /** Base URL of the remote move service (required when AI_SERVICE_TYPE=remote) */
  AI_SERVICE_URL: z.string().url().optional(),

  /** Per-request time budget for the primary service (milliseconds) */
  AI_SERVICE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  /** Skip the simulated thinking delay of the local service */
  AI_FAST_MODE: booleanFlag(false),

  // ===================================================================
  // FALLBACK & RETRY
  // ===================================================================

  AI_FALLBACK_ENABLED: booleanFlag(true),

  AI_FALLBACK_SERVICE_TYPE: OpponentServiceKindSchema.default('local'),

  /** Per-request time budget for the fallback service (milliseconds) */
  AI_FALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  /** Attempts against the primary service before giving up */
  AI_FALLBACK_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),

  /** Back-off between attempts (milliseconds) */
  AI_FALLBACK_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path of a JSON log file; console only when unset */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // OBSERVABILITY
  // ===================================================================

  /** Expose Prometheus metrics on GET /metrics */
  ENABLE_METRICS: booleanFlag(true),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

export type EnvValidationResult =
  | { success: true; data: RawEnv }
  | { success: false; errors: Array<{ path: string; message: string }> };

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
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

  return { success: true, data: result.data };
}

/**
 * Render validation errors as the multi-line report printed at startup.
 */
export function formatEnvErrors(errors: Array<{ path: string; message: string }>): string {
  return [
    'Invalid environment configuration:',
    ...errors.map((error) => `  - ${error.path || 'root'}: ${error.message}`),
  ].join('\n');
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isDevelopment(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'development';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
