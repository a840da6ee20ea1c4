export type RelayErrorKind = 'input' | 'rate-limit' | 'transient' | 'permanent' | 'timeout' | 'cancelled';

export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rejected before any provider call. Never retried. */
export class InputError extends RelayError {
  readonly kind = 'input';
}

export class RateLimitError extends RelayError {
  readonly kind = 'rate-limit';
  readonly retryAfterMs: number | undefined;

  constructor(message: string, options: ErrorOptions & { retryAfterMs?: number | undefined } = {}) {
    super(message, options);
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Network or connection failure, or a 5xx from the provider. */
export class TransientProviderError extends RelayError {
  readonly kind = 'transient';
}

/** Authentication, authorization or malformed request. Surfaced immediately. */
export class PermanentProviderError extends RelayError {
  readonly kind = 'permanent';
  readonly status: number | undefined;

  constructor(message: string, options: ErrorOptions & { status?: number | undefined } = {}) {
    super(message, options);
    this.status = options.status;
  }
}

export class TimeoutError extends RelayError {
  readonly kind = 'timeout';
  readonly limitMs: number;
  readonly elapsedMs: number;

  constructor(message: string, options: ErrorOptions & { limitMs: number; elapsedMs: number }) {
    super(message, options);
    this.limitMs = options.limitMs;
    this.elapsedMs = options.elapsedMs;
  }
}

/** The caller withdrew, or every waiter on a shared call left before it settled. */
export class CancelledError extends RelayError {
  readonly kind = 'cancelled';
}

export function isRetryable(error: unknown): error is RateLimitError | TransientProviderError {
  return error instanceof RateLimitError || error instanceof TransientProviderError;
}

export function describeError(error: unknown): string {
  if (error instanceof RelayError) {
    return `${error.kind}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
