export type DelayStrategy = (attempt: number) => number;

export interface BackoffOptions {
  /** Total number of attempts, including the first one. */
  attempts?: number;
  baseDelayMs?: number;
  /** Delay after failed attempt `attempt` (0-based). Defaults to exponential. */
  delay?: DelayStrategy;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export const DEFAULT_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 2000;

export function exponentialDelay(baseDelayMs: number): DelayStrategy {
  return (attempt) => baseDelayMs * Math.pow(2, attempt);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation` up to `attempts` times. Between attempts it waits
 * `baseDelayMs * 2^attempt` (0-based), so three attempts wait base, then 2*base.
 * The last failure is rethrown as-is.
 */
export async function withBackoff<T>(
  operation: () => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts ?? DEFAULT_ATTEMPTS));
  const delay =
    options.delay ?? exponentialDelay(options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
  const wait = options.sleep ?? sleep;

  let attempt = 0;
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts - 1) {
        throw error;
      }
      const delayMs = delay(attempt);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
      attempt++;
    }
  }
}

export interface ResilientCaller {
  call<T>(operation: () => Promise<T>): Promise<T>;
}

export function createResilientCaller(options: BackoffOptions = {}): ResilientCaller {
  return {
    call<T>(operation: () => Promise<T>): Promise<T> {
      return withBackoff(operation, options);
    },
  };
}

/** Caller that runs each operation exactly once. */
export const directCaller: ResilientCaller = {
  call<T>(operation: () => Promise<T>): Promise<T> {
    return operation();
  },
};
