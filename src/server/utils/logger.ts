import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Request context stored in AsyncLocalStorage for automatic propagation
 * throughout the request lifecycle.
 */
export interface RequestContext {
  requestId: string;
  gameId?: string;
  method?: string;
  path?: string;
  startTime?: number;
}

// ============================================================================
// Request Context (AsyncLocalStorage)
// ============================================================================

/**
 * AsyncLocalStorage for propagating request context through async call
 * chains, including the opponent reply that outlives the synchronous part
 * of a move request.
 */
export const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Returns undefined if called outside of a request context.
 */
export const getRequestContext = (): RequestContext | undefined => {
  return requestContextStorage.getStore();
};

/**
 * Run a function within a request context. All logs and async operations
 * within the callback will have access to the context.
 */
export const runWithContext = <T>(context: RequestContext, fn: () => T): T => {
  return requestContextStorage.run(context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects (case-insensitive).
 */
const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /authorization/i,
  /credential/i,
  /cookie/i,
];

const isSensitiveKey = (key: string): boolean =>
  SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));

/**
 * Shows the first 4 characters of longer values for debugging.
 */
const redactSensitiveString = (value: string): string => {
  if (value.length <= 8) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...[REDACTED]`;
};

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 *
 * @param maxDepth - Recursion limit (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  if (obj instanceof Date) {
    return obj;
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!isSensitiveKey(key)) {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else if (value === null || value === undefined) {
      result[key] = value;
    } else if (typeof value === 'string') {
      result[key] = redactSensitiveString(value);
    } else if (typeof value === 'object') {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else {
      result[key] = '[REDACTED]';
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'reversi-arena';

/**
 * Custom format to add request context from AsyncLocalStorage to log entries.
 */
const addRequestContext = winston.format((info) => {
  const context = getRequestContext();
  if (context) {
    info.requestId = context.requestId;
    if (context.gameId) {
      info.gameId = context.gameId;
    }
    if (context.method) {
      info.method = context.method;
    }
    if (context.path) {
      info.path = context.path;
    }
  }
  return info;
});

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  const { level, message, timestamp, ...rest } = info;
  const masked = maskSensitiveData(rest);
  return {
    level,
    message,
    timestamp,
    ...(typeof masked === 'object' && masked !== null ? masked : {}),
  };
});

/**
 * Structured JSON (production and file transport).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addRequestContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Human-readable console output (development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addRequestContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, requestId, ...meta }) => {
    const reqIdStr = typeof requestId === 'string' ? ` [${requestId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${reqIdStr}: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ],
});

if (config.logging.file) {
  const logFile = path.resolve(config.logging.file);
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  logger.add(
    new winston.transports.File({
      filename: logFile,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Merge a per-request correlation id into log metadata when available.
 */
export const withRequestContext = (req: { requestId?: string }, meta: LogMeta = {}): LogMeta => {
  if (req.requestId) {
    return { requestId: req.requestId, ...meta };
  }
  return meta;
};

/**
 * Bind a game id to the current request context so that every log line
 * emitted for the rest of the request carries it.
 */
export const bindGameToContext = (gameId: string): void => {
  const context = getRequestContext();
  if (context) {
    context.gameId = gameId;
  }
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export { logger };
