// Shared timeout helpers for async operations.
//
// A small, typed wrapper around Promise-based operations so that callers can
// enforce an explicit time budget (opponent move requests, health probes)
// and record the duration in milliseconds for logs and metrics.
//
// The helper does not abort in-flight work: when the budget is exceeded the
// caller gets `kind: 'timeout'` while the underlying promise keeps running
// and its eventual result is discarded.

export type TimedOperationResult<T> =
  | { kind: 'ok'; durationMs: number; value: T }
  | { kind: 'timeout'; durationMs: number };

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds. */
  timeoutMs: number;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
}

/**
 * Run an async operation with an upper time bound, returning a structured
 * result instead of throwing on timeout. Errors thrown by the operation
 * itself are rethrown unchanged.
 */
export function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  const { timeoutMs, now = Date.now } = options;
  const start = now();

  return new Promise<TimedOperationResult<T>>((resolve, reject) => {
    const timeoutHandle = setTimeout(() => {
      resolve({ kind: 'timeout', durationMs: now() - start });
    }, timeoutMs);

    void Promise.resolve()
      .then(operation)
      .then(
        (value) => {
          clearTimeout(timeoutHandle);
          resolve({ kind: 'ok', durationMs: now() - start, value });
        },
        (error: unknown) => {
          clearTimeout(timeoutHandle);
          reject(error);
        }
      );
  });
}

/**
 * Promise-based sleep. Resolves immediately for non-positive durations.
 */
export function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
