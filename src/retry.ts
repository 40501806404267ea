import type { CapabilityResult } from './capabilities.js';
import { RETRY_ATTEMPTS, RETRY_BACKOFF_BASE } from './config.js';
import { TransientCapabilityError } from './errors.js';
import { logger } from './logger.js';

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  signal?: AbortSignal;
  label?: string;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn`, retrying only TransientCapabilityError with exponential backoff
 * (base, 2×base, 4×base...). Anything else is rethrown on first sight.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? RETRY_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? RETRY_BACKOFF_BASE;
  let lastError: TransientCapabilityError | null = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (attempt > 1) {
      const backoffMs = baseDelayMs * Math.pow(2, attempt - 2);
      logger.debug(
        { label: options.label, attempt, attempts, backoffMs },
        'Retrying after transient error',
      );
      await sleep(backoffMs, options.signal);
    }
    options.signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (err) {
      if (!(err instanceof TransientCapabilityError)) throw err;
      lastError = err;
      logger.warn(
        { label: options.label, attempt, attempts, err: err.message },
        'Transient capability error',
      );
    }
  }

  throw lastError ?? new TransientCapabilityError('Retries exhausted');
}

/**
 * Call a calendar/email/search provider, repeating the call while it
 * answers with a retryable failure. Resolves with the first success or
 * permanent failure, or with the last retryable failure once attempts run
 * out.
 */
export async function retryCapability<T>(
  call: () => Promise<CapabilityResult<T>>,
  options: RetryOptions = {},
): Promise<CapabilityResult<T>> {
  const attempt: { last: CapabilityResult<T> | null; error: Error | null } = { last: null, error: null };
  try {
    return await withRetry(async () => {
      const result = await call();
      if (!result.ok && result.retryable) {
        attempt.last = result;
        attempt.error = new TransientCapabilityError(result.summary);
        throw attempt.error;
      }
      return result;
    }, options);
  } catch (err) {
    if (attempt.last && err === attempt.error) return attempt.last;
    throw err;
  }
}
