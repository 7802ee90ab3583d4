import { RateLimitError } from './errors';
import { ResolvedSmartRetrySettings, SmartRetryConfig } from './types';

const DEFAULT_SETTINGS: ResolvedSmartRetrySettings = {
  drainIntervalMs: 500,
  defaultCapacity: 40,
  throttleDelayMs: 500,
};

export const coercePositiveNumber = (value?: number | string | null): number | undefined => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  const numeric = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(numeric) && numeric > 0 ? numeric : undefined;
};

export const coercePositiveInteger = (value?: number | string | null): number | undefined => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  const numeric = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isSafeInteger(numeric) && numeric > 0 ? numeric : undefined;
};

/**
 * Merge explicit config, SMART_RETRY_* environment variables and defaults
 */
export const resolveSmartRetrySettings = (
  config?: SmartRetryConfig
): ResolvedSmartRetrySettings => ({
  drainIntervalMs:
    coercePositiveNumber(config?.drainIntervalMs) ??
    coercePositiveNumber(process.env.SMART_RETRY_DRAIN_INTERVAL_MS) ??
    DEFAULT_SETTINGS.drainIntervalMs,
  defaultCapacity:
    coercePositiveInteger(config?.defaultCapacity) ??
    coercePositiveInteger(process.env.SMART_RETRY_DEFAULT_CAPACITY) ??
    DEFAULT_SETTINGS.defaultCapacity,
  throttleDelayMs:
    coercePositiveNumber(config?.throttleDelayMs) ??
    coercePositiveNumber(process.env.SMART_RETRY_THROTTLE_DELAY_MS) ??
    DEFAULT_SETTINGS.throttleDelayMs,
});

/**
 * For executors that throw on rejection instead of returning a `rate-limited` outcome
 */
export const isRateLimitError = (error: unknown): boolean => {
  if (error instanceof RateLimitError) {
    return true;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  const name = 'name' in error ? error.name : undefined;
  if (
    typeof name === 'string' &&
    ['RateLimitError', 'TooManyRequests'].some((n) => name.includes(n))
  ) {
    return true;
  }

  const status = 'status' in error ? error.status : undefined;
  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  return status === 429 || statusCode === 429;
};

/**
 * Resolve after `ms`, or reject with the abort reason as soon as `signal` aborts
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal` aborts
 */
export const abortable = <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
};
