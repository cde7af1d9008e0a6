import { createHash } from 'node:crypto';
import { uuidv7 } from 'uuidv7';

export function generateId(): string {
  return uuidv7();
}

/**
 * Deterministic UUID-shaped id from an arbitrary seed. Backends such as Qdrant only
 * accept unsigned integers or UUIDs as point ids, so every derived id uses this shape.
 */
export function stableId(seed: string): string {
  const hex = createHash('md5').update(seed, 'utf8').digest('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

export function contentHash(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Rough token count estimation (1 token ≈ 4 chars for English, ≈ 1.5 chars for CJK)
 */
export function estimateTokens(text: string): number {
  const cjkChars = (text.match(/[\u3000-\u9fff\uf900-\ufaff]/g) || []).length;
  const otherChars = text.length - cjkChars;
  return Math.ceil(cjkChars / 1.5 + otherChars / 4);
}

/**
 * Cut text so that estimateTokens(result) <= maxTokens. Prefers a word boundary
 * when one is close to the cut.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (estimateTokens(text) <= maxTokens) return text;
  let lo = 0;
  let hi = text.length;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (estimateTokens(text.slice(0, mid) + '…') <= maxTokens) lo = mid;
    else hi = mid - 1;
  }
  let cut = text.slice(0, lo);
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > lo * 0.8) cut = cut.slice(0, lastSpace);
  return cut.trimEnd() + '…';
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
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

/** Combine a caller signal with a timeout into one signal for fetch. */
export function withTimeoutSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
