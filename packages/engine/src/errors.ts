/**
 * Typed errors for the knowledge store. Every failure that leaves the core is a
 * StrataError with a code from the closed ErrorCode union.
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'MODEL_UNAVAILABLE'
  | 'DIMENSION_MISMATCH'
  | 'UNSUPPORTED_FILTER'
  | 'UNSUPPORTED_BACKEND'
  | 'PARTIAL_BATCH_FAILURE'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'COLLECTION_NOT_FOUND'
  | 'NOT_FOUND'
  | 'BACKEND_ERROR'
  | 'VALIDATION_ERROR';

export class StrataError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StrataError';
    this.code = code;
  }
}

export class ConfigError extends StrataError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

export type ModelCapability = 'embedding' | 'sparse' | 'vlm' | 'rerank';

export class ModelUnavailableError extends StrataError {
  constructor(
    readonly capability: ModelCapability,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('MODEL_UNAVAILABLE', `${capability} provider unavailable after ${attempts} attempt(s)${reason}`, options);
    this.name = 'ModelUnavailableError';
  }
}

export class DimensionMismatchError extends StrataError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    context?: string,
  ) {
    super('DIMENSION_MISMATCH', `Vector dimension mismatch${context ? ` (${context})` : ''}: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

export class UnsupportedFilterError extends StrataError {
  constructor(
    readonly backend: string,
    readonly nodeKind: string,
    detail?: string,
  ) {
    super('UNSUPPORTED_FILTER', `Backend "${backend}" cannot express "${nodeKind}" filters${detail ? `: ${detail}` : ''}`);
    this.name = 'UnsupportedFilterError';
  }
}

export class UnsupportedBackendError extends StrataError {
  constructor(
    readonly backend: string,
    readonly available: string[],
  ) {
    super('UNSUPPORTED_BACKEND', `Vector backend "${backend}" is not supported. Available backends: ${available.join(', ')}`);
    this.name = 'UnsupportedBackendError';
  }
}

export type BatchOutcome =
  | { id: string; ok: true }
  | { id: string; ok: false; error: StrataError }
  | { id: string; ok: false; abandoned: true };

export class PartialBatchFailureError extends StrataError {
  constructor(readonly outcomes: BatchOutcome[]) {
    const failed = outcomes.filter(o => !o.ok).length;
    super('PARTIAL_BATCH_FAILURE', `${failed} of ${outcomes.length} record(s) failed`);
    this.name = 'PartialBatchFailureError';
  }

  get succeededIds(): string[] {
    return this.outcomes.filter(o => o.ok).map(o => o.id);
  }

  get failedIds(): string[] {
    return this.outcomes.filter(o => !o.ok).map(o => o.id);
  }
}

export class TimeoutError extends StrataError {
  constructor(message: string) {
    super('TIMEOUT', message);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends StrataError {
  constructor(message = 'Operation cancelled', options?: { cause?: unknown }) {
    super('CANCELLED', message, options);
    this.name = 'CancelledError';
  }
}

export class CollectionNotFoundError extends StrataError {
  constructor(readonly collection: string) {
    super('COLLECTION_NOT_FOUND', `Collection ${collection} does not exist`);
    this.name = 'CollectionNotFoundError';
  }
}

export class NotFoundError extends StrataError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export class BackendError extends StrataError {
  constructor(
    readonly backend: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super('BACKEND_ERROR', `${backend}: ${message}`, options);
    this.name = 'BackendError';
  }
}

export class ValidationError extends StrataError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export function isStrataError(e: unknown, code?: ErrorCode): e is StrataError {
  return e instanceof StrataError && (code === undefined || e.code === code);
}

/** Map an abort reason to a typed error. */
export function abortError(signal: AbortSignal): StrataError {
  const reason: unknown = signal.reason;
  if (reason instanceof StrataError) return reason;
  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return new TimeoutError(reason.message);
  }
  return new CancelledError(undefined, { cause: reason });
}
