import { createLogger } from './logger.js';

const logger = createLogger('retry');

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryOn?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= opts.maxRetries) {
        throw lastError;
      }

      if (opts.retryOn && !opts.retryOn(lastError)) {
        throw lastError;
      }

      // Exponential backoff + 10% jitter
      const baseDelay = opts.baseDelayMs * Math.pow(opts.backoffMultiplier, attempt);
      const jitter = Math.random() * baseDelay * 0.1;
      const delay = Math.min(baseDelay + jitter, opts.maxDelayMs);

      attempt++;
      logger.warn(`Attempt ${attempt} failed, retrying in ${Math.round(delay)}ms`, {
        error: lastError.message,
        attempt,
        maxRetries: opts.maxRetries,
      });

      if (opts.onRetry) {
        opts.onRetry(lastError, attempt);
      }

      await sleep(delay);
    }
  }
}

export interface TimeoutOptions {
  timeoutMs: number;
  message?: string;
}

export async function withTimeout<T>(
  fn: () => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, message } = options;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(message ?? `Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  name?: string;
  now?: () => number;
  wait?: (ms: number) => Promise<void>;
}

export interface RateLimiter {
  acquire(): Promise<void>;
  reset(): void;
  readonly pending: number;
  readonly inWindow: number;
}

/**
 * Sliding-window limiter. `acquire` resolves once a slot is free; callers
 * are delayed, never rejected.
 */
export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const { maxRequests, windowMs } = options;
  const now = options.now ?? Date.now;
  const wait = options.wait ?? sleep;
  const timestamps: number[] = [];
  let pendingCount = 0;

  function cleanup(): void {
    const cutoff = now() - windowMs;
    while (timestamps.length > 0 && timestamps[0] <= cutoff) {
      timestamps.shift();
    }
  }

  async function acquire(): Promise<void> {
    pendingCount++;
    try {
      while (true) {
        cleanup();

        if (timestamps.length < maxRequests) {
          timestamps.push(now());
          return;
        }

        const oldestTimestamp = timestamps[0];
        const waitTime = oldestTimestamp + windowMs - now() + 1;

        if (waitTime > 0) {
          logger.debug(`Rate limiter: waiting ${waitTime}ms`, {
            limiter: options.name,
            currentRequests: timestamps.length,
            maxRequests,
          });
          await wait(waitTime);
        }
      }
    } finally {
      pendingCount--;
    }
  }

  function reset(): void {
    timestamps.length = 0;
  }

  return {
    acquire,
    reset,
    get pending() {
      return pendingCount;
    },
    get inWindow() {
      cleanup();
      return timestamps.length;
    },
  };
}
