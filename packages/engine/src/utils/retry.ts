import { abortError } from '../errors.js';
import { createLogger } from './logger.js';
import { errorMessage, sleep } from './helpers.js';

const log = createLogger('retry');

/**
 * Failure of a single call to an external provider or vector store.
 * `retryable` marks transient failures (timeouts, throttling, 5xx, network).
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly retryable = status === undefined || status === 408 || status === 429 || status >= 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }

  static async fromResponse(label: string, res: Response): Promise<ProviderError> {
    const body = await res.text().catch(() => '');
    return new ProviderError(`${label} error ${res.status}: ${body.slice(0, 500)}`, res.status);
  }
}

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  label?: string;
  isRetryable?: (e: unknown) => boolean;
}

export function isTransient(e: unknown): boolean {
  if (e instanceof ProviderError) return e.retryable;
  if (e instanceof Error) {
    // fetch() network failures and AbortSignal.timeout() expiries
    return e.name === 'TypeError' || e.name === 'TimeoutError';
  }
  return false;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempt(s): ${errorMessage(lastError)}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Run `fn` with exponential backoff. A caller abort stops the loop immediately and
 * surfaces as a typed CancelledError/TimeoutError; anything else that is still failing
 * after the budget is wrapped in RetryExhaustedError.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const isRetryable = opts.isRetryable ?? isTransient;
  let attempt = 0;
  for (;;) {
    if (opts.signal?.aborted) throw abortError(opts.signal);
    try {
      return await fn(attempt);
    } catch (e) {
      if (opts.signal?.aborted) throw abortError(opts.signal);
      attempt++;
      if (attempt > opts.retries || !isRetryable(e)) {
        throw new RetryExhaustedError(attempt, e);
      }
      const delay = Math.min(opts.baseDelayMs * 2 ** (attempt - 1), opts.maxDelayMs);
      log.warn({ label: opts.label, attempt, delay, error: errorMessage(e) }, 'Transient failure, retrying');
      try {
        await sleep(delay, opts.signal);
      } catch {
        throw opts.signal ? abortError(opts.signal) : e;
      }
    }
  }
}
