export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export type RetryOptions = {
  maxAttempts: number;
  /** Delay before the attempt that follows the failed attempt `attempt` (0-based). */
  backoffMs: (attempt: number) => number;
  onError?: (error: Error, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

const toError = (error: unknown) =>
  error instanceof Error ? error : new Error(String(error));

export const linearBackoff = (unitMs: number) => (attempt: number) => attempt * unitMs;

/**
 * Runs `operation` up to `maxAttempts` times. Never throws: the terminal
 * failure is returned so each call site decides whether it reaches the user.
 */
export const withRetry = async <T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> => {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError = new Error("operation was not attempted");

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    try {
      const value = await operation();
      return { ok: true, value, attempts: attempt + 1 };
    } catch (error) {
      lastError = toError(error);
      options.onError?.(lastError, attempt);
      if (attempt === maxAttempts - 1) {
        break;
      }
      const delay = options.backoffMs(attempt);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
};
