import type { ModelErrorKind } from './types.js';

const RETRYABLE_KINDS: ReadonlySet<string> = new Set<ModelErrorKind>([
  'rate_limited',
  'overloaded',
  'server_error',
  'network_failure',
]);

/**
 * Error raised when a stream reports (or throws) a provider failure.
 */
export class ModelStreamError extends Error {
  readonly kind: ModelErrorKind;
  readonly status?: number;

  constructor(kind: ModelErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ModelStreamError';
    this.kind = kind;
    this.status = status;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

export function isRetryableKind(kind: string): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/**
 * Map an HTTP status to an error kind.
 * 529 is the provider's "overloaded" status.
 */
export function kindFromStatus(status: number): ModelErrorKind {
  if (status === 429) return 'rate_limited';
  if (status === 529) return 'overloaded';
  if (status === 401 || status === 403) return 'auth_failure';
  if (status >= 500) return 'server_error';
  if (status >= 400) return 'invalid_request';
  return 'unknown';
}

function readStatus(error: Error): number | undefined {
  const status = 'status' in error ? error.status : undefined;
  if (typeof status === 'number') return status;
  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  return typeof statusCode === 'number' ? statusCode : undefined;
}

/**
 * Classify an arbitrary thrown value.
 * Status codes win; otherwise fall back to well-known message fragments.
 */
export function classifyError(error: unknown): ModelErrorKind {
  if (error instanceof ModelStreamError) return error.kind;
  if (!(error instanceof Error)) return 'unknown';

  const status = readStatus(error);
  if (status !== undefined) {
    return kindFromStatus(status);
  }

  const message = error.message.toLowerCase();

  if (message.includes('overloaded') || message.includes('capacity')) {
    return 'overloaded';
  }

  if (message.includes('rate limit') || message.includes('too many requests')) {
    return 'rate_limited';
  }

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('network') ||
    message.includes('fetch failed') ||
    message.includes('socket hang up')
  ) {
    return 'network_failure';
  }

  if (message.includes('unauthorized') || message.includes('invalid api key')) {
    return 'auth_failure';
  }

  return 'unknown';
}
