/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  NodeEnvSchema,
  LogFormatSchema,
  LogLevelSchema,
  OpponentServiceKindSchema,
  formatEnvErrors,
  getEffectiveNodeEnv,
  parseEnv,
  type RawEnv,
} from './env';

// Load .env into process.env before we read anything from it. Skipped in
// test mode so a developer's .env cannot override test-specific variables.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const OpponentServiceSettingsSchema = z.object({
  kind: OpponentServiceKindSchema,
  url: z.string().url().optional(),
  timeoutMs: z.number().int().positive(),
  fastMode: z.boolean(),
});

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
    corsOrigin: z.string().min(1),
  }),
  battle: z.object({
    maxSessions: z.number().int().positive(),
    sessionTimeoutMs: z.number().int().positive(),
    cleanupIntervalMs: z.number().int().positive(),
    enableSessionCleanup: z.boolean(),
    defaultDifficulty: z.enum(['easy', 'medium', 'hard']),
  }),
  opponent: z.object({
    primary: OpponentServiceSettingsSchema,
    fallback: OpponentServiceSettingsSchema,
  }),
  fallback: z.object({
    enabled: z.boolean(),
    maxAttempts: z.number().int().positive(),
    retryDelayMs: z.number().int().min(0),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  metrics: z.object({
    enabled: z.boolean(),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;
export type OpponentServiceSettings = z.infer<typeof OpponentServiceSettingsSchema>;

const MINUTE_MS = 60_000;

/**
 * Assemble the typed config from an already-validated raw environment.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const isTest = nodeEnv === 'test';
  // The simulated thinking delay only slows tests down.
  const fastMode = env.AI_FAST_MODE || isTest;
  const remoteUrl = env.AI_SERVICE_URL?.trim() || undefined;

  return ConfigSchema.parse({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isDevelopment: nodeEnv === 'development',
    isTest,
    app: {
      version: env.npm_package_version?.trim() || '1.0.0',
    },
    server: {
      port: env.PORT,
      host: env.HOST,
      corsOrigin: env.CORS_ORIGIN,
    },
    battle: {
      maxSessions: env.AI_BATTLE_MAX_SESSIONS,
      sessionTimeoutMs: env.AI_BATTLE_SESSION_TIMEOUT_MINUTES * MINUTE_MS,
      cleanupIntervalMs: env.AI_BATTLE_CLEANUP_INTERVAL_MINUTES * MINUTE_MS,
      enableSessionCleanup: env.AI_BATTLE_ENABLE_SESSION_CLEANUP,
      defaultDifficulty: env.AI_BATTLE_DEFAULT_DIFFICULTY,
    },
    opponent: {
      primary: {
        kind: env.AI_SERVICE_TYPE,
        url: remoteUrl,
        timeoutMs: env.AI_SERVICE_TIMEOUT_MS,
        fastMode,
      },
      fallback: {
        kind: env.AI_FALLBACK_SERVICE_TYPE,
        url: remoteUrl,
        timeoutMs: env.AI_FALLBACK_TIMEOUT_MS,
        fastMode,
      },
    },
    fallback: {
      enabled: env.AI_FALLBACK_ENABLED,
      maxAttempts: env.AI_FALLBACK_MAX_ATTEMPTS,
      retryDelayMs: env.AI_FALLBACK_RETRY_DELAY_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    },
    metrics: {
      enabled: env.ENABLE_METRICS,
    },
  });
}

/**
 * Parse and assemble config from an environment object, throwing with a
 * per-field report when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = parseEnv(env);
  if (!result.success) {
    throw new Error(formatEnvErrors(result.errors));
  }
  return buildConfig(result.data);
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(loadConfigOrExit());
