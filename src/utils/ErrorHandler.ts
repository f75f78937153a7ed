import type { Logger } from '../types/index.js';
import { isSearchError, type SearchErrorCode } from '../errors.js';

export type ErrorCategory = 'validation' | 'configuration' | 'encoding' | 'backend' | 'cancelled' | 'unknown';

export interface HandledError {
  status: number;
  code: SearchErrorCode | 'INTERNAL';
  category: ErrorCategory;
  recoverable: boolean;
  message: string;
}

const BY_CODE: Record<SearchErrorCode, { status: number; category: ErrorCategory }> = {
  INVALID_INPUT: { status: 400, category: 'validation' },
  DIMENSION_MISMATCH: { status: 500, category: 'configuration' },
  CONFIG_MISMATCH: { status: 500, category: 'configuration' },
  ENCODING_FAILED: { status: 502, category: 'encoding' },
  BACKEND_UNAVAILABLE: { status: 503, category: 'backend' },
  BACKEND_TRANSIENT: { status: 503, category: 'backend' },
  BACKEND_AUTH: { status: 502, category: 'backend' },
  BACKEND_REJECTED: { status: 502, category: 'backend' },
  CANCELLED: { status: 504, category: 'cancelled' }
};

/**
 * Turns any thrown value into a response shape and logs it once, at a level
 * that matches whose fault it was.
 */
export class UnifiedErrorHandler {
  constructor(private readonly logger: Logger) {}

  categorize(error: unknown): HandledError {
    if (isSearchError(error)) {
      const { status, category } = BY_CODE[error.code];
      return { status, code: error.code, category, recoverable: error.retryable, message: error.message };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { status: 500, code: 'INTERNAL', category: 'unknown', recoverable: false, message };
  }

  handleError(error: unknown, context?: Record<string, unknown>): HandledError {
    const handled = this.categorize(error);

    const meta = {
      code: handled.code,
      message: handled.message,
      context: isSearchError(error) ? { ...error.context, ...context } : context
    };

    if (handled.category === 'validation') {
      this.logger.debug('Rejected invalid input', meta);
    } else if (handled.category === 'cancelled' || handled.category === 'backend') {
      this.logger.warn(`${handled.category === 'backend' ? 'Index backend' : 'Request'} error`, meta);
    } else {
      this.logger.error(
        handled.category === 'unknown' ? 'Unhandled error' : `${handled.category} error`,
        { ...meta, stack: error instanceof Error ? error.stack : undefined }
      );
    }

    return handled;
  }
}
