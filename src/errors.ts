/**
 * Error taxonomy shared by the encoder, the index gateway and the coordinators.
 *
 * Every error carries a stable `code`, a `retryable` flag and whatever is
 * known about where it happened (operation, document id, batch position).
 */

export type SearchErrorCode =
  | 'INVALID_INPUT'
  | 'DIMENSION_MISMATCH'
  | 'CONFIG_MISMATCH'
  | 'BACKEND_UNAVAILABLE'
  | 'ENCODING_FAILED'
  | 'CANCELLED'
  | 'BACKEND_TRANSIENT'
  | 'BACKEND_AUTH'
  | 'BACKEND_REJECTED';

export interface ErrorContext {
  operation?: string;
  id?: string;
  batchIndex?: number;
  [key: string]: unknown;
}

export abstract class SearchError extends Error {
  abstract readonly code: SearchErrorCode;
  abstract readonly retryable: boolean;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.context = context;
  }
}

/** Caller mistake: empty text, empty id, non-positive top-k, malformed metadata. */
export class InvalidInputError extends SearchError {
  readonly code = 'INVALID_INPUT';
  readonly retryable = false;

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'InvalidInputError';
  }
}

export class DimensionMismatchError extends SearchError {
  readonly code = 'DIMENSION_MISMATCH';
  readonly retryable = false;

  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context?: ErrorContext
  ) {
    const where = context?.id !== undefined ? ` for record '${context.id}'` : '';
    super(`Vector dimension ${actual} does not match configured dimension ${expected}${where}`, context);
    this.name = 'DimensionMismatchError';
  }
}

export class ConfigMismatchError extends SearchError {
  readonly code = 'CONFIG_MISMATCH';
  readonly retryable = false;

  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'ConfigMismatchError';
  }
}

/** The index service stayed unreachable after every retry attempt. */
export class BackendUnavailableError extends SearchError {
  readonly code = 'BACKEND_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    message: string,
    public readonly attempts: number,
    context?: ErrorContext,
    cause?: unknown
  ) {
    super(message, context, { cause });
    this.name = 'BackendUnavailableError';
  }
}

/** The embedding backend failed for a reason unrelated to the input. */
export class EncodingError extends SearchError {
  readonly code = 'ENCODING_FAILED';
  readonly retryable = false;

  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, context, { cause });
    this.name = 'EncodingError';
  }
}

/** The caller's signal or timeout aborted the request. */
export class CancelledError extends SearchError {
  readonly code = 'CANCELLED';
  readonly retryable = true;

  constructor(message = 'Operation was cancelled', context?: ErrorContext, cause?: unknown) {
    super(message, context, { cause });
    this.name = 'CancelledError';
  }
}

// Raised by index backends; the gateway decides what reaches the caller.

export class TransientBackendError extends SearchError {
  readonly code = 'BACKEND_TRANSIENT';
  readonly retryable = true;

  constructor(message: string, public readonly status?: number, context?: ErrorContext, cause?: unknown) {
    super(message, context, { cause });
    this.name = 'TransientBackendError';
  }
}

export class BackendAuthError extends SearchError {
  readonly code = 'BACKEND_AUTH';
  readonly retryable = false;

  constructor(message: string, public readonly status: number, context?: ErrorContext) {
    super(message, context);
    this.name = 'BackendAuthError';
  }
}

export class BackendRequestError extends SearchError {
  readonly code = 'BACKEND_REJECTED';
  readonly retryable = false;

  constructor(message: string, public readonly status: number, context?: ErrorContext) {
    super(message, context);
    this.name = 'BackendRequestError';
  }
}

export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}
