import type { FastifyInstance, FastifyReply } from 'fastify';
import type { AppConfig, Logger } from '../../types/index.js';
import type { SemanticSearchService } from '../../SemanticSearchService.js';
import type { UnifiedErrorHandler } from '../../utils/ErrorHandler.js';

export interface ErrorBody {
  error: string;
  code: string;
  recoverable: boolean;
}

/**
 * Context shared across all route handlers
 */
export interface RouteContext {
  server: FastifyInstance;
  logger: Logger;
  config: AppConfig;
  service: SemanticSearchService;
  errorHandler: UnifiedErrorHandler;
  /** Per-request deadline handed to the service. */
  requestTimeoutMs: number;
  respondError: (reply: FastifyReply, status: number, body: ErrorBody) => FastifyReply;
}

export abstract class BaseRouteHandler {
  constructor(protected ctx: RouteContext) {}

  abstract setupRoutes(): void;

  /** Log through the shared handler and answer with the mapped status. */
  protected fail(reply: FastifyReply, error: unknown, context?: Record<string, unknown>): FastifyReply {
    const handled = this.ctx.errorHandler.handleError(error, context);
    return this.ctx.respondError(reply, handled.status, {
      error: handled.message,
      code: handled.code,
      recoverable: handled.recoverable
    });
  }

  protected badRequest(reply: FastifyReply, message: string): FastifyReply {
    return this.ctx.respondError(reply, 400, { error: message, code: 'INVALID_INPUT', recoverable: false });
  }
}
