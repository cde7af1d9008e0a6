import { BackendError, StrataError } from '../errors.js';
import { errorMessage, withTimeoutSignal } from '../utils/helpers.js';
import { ProviderError, RetryExhaustedError, withRetry } from '../utils/retry.js';

export interface HttpJsonOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  body?: unknown;
  signal?: AbortSignal;
  /** Statuses answered as `{ status, data: undefined }` instead of thrown. */
  allowStatus?: readonly number[];
}

export interface HttpJsonResponse {
  status: number;
  data: unknown;
}

export interface HttpClientOptions {
  backend: string;
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs: number;
  retries: number;
}

/**
 * Minimal JSON-over-fetch client for vector store REST APIs. Transient failures are
 * retried; whatever is left surfaces as BackendError.
 */
export class HttpJsonClient {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  async request(path: string, opts: HttpJsonOptions = {}): Promise<HttpJsonResponse> {
    const { backend, timeoutMs, retries } = this.options;
    const method = opts.method ?? (opts.body === undefined ? 'GET' : 'POST');
    try {
      return await withRetry(
        async () => {
          const res = await fetch(`${this.baseUrl}${path}`, {
            method,
            headers: { 'Content-Type': 'application/json', ...this.options.headers },
            body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
            signal: withTimeoutSignal(timeoutMs, opts.signal),
          });
          if (opts.allowStatus?.includes(res.status)) {
            await res.body?.cancel();
            return { status: res.status, data: undefined };
          }
          if (!res.ok) throw await ProviderError.fromResponse(`${backend} ${method} ${path}`, res);
          const text = await res.text();
          const data: unknown = text ? JSON.parse(text) : undefined;
          return { status: res.status, data };
        },
        { retries, baseDelayMs: 200, maxDelayMs: 2000, signal: opts.signal, label: backend },
      );
    } catch (e) {
      if (e instanceof StrataError) throw e;
      const last = e instanceof RetryExhaustedError ? e.lastError : e;
      const status = last instanceof ProviderError ? last.status : undefined;
      throw new BackendError(backend, errorMessage(last), status, { cause: last });
    }
  }
}
