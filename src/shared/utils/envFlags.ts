// Helpers for reading environment flags outside the validated config object,
// for code that must decide something before config/unified.ts has loaded.

type ProcessEnv = Record<string, string | undefined>;

export function readEnv(name: string, env: ProcessEnv = process.env): string | undefined {
  const value = env[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was configured differently (for example by a stray .env file).
 */
export function isJestRuntime(env: ProcessEnv = process.env): boolean {
  return readEnv('JEST_WORKER_ID', env) !== undefined;
}
