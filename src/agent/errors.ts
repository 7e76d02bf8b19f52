import type { RunFailureKind } from './types.js';

/**
 * Failure raised inside a run attempt that is not a provider error.
 */
export class RunError extends Error {
  readonly kind: RunFailureKind;
  readonly retryable: boolean;

  constructor(kind: RunFailureKind, message: string, retryable = false) {
    super(message);
    this.name = 'RunError';
    this.kind = kind;
    this.retryable = retryable;
  }
}
