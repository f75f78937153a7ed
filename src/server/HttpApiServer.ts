import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import type { AppConfig, Logger } from '../types/index.js';
import type { SemanticSearchService } from '../SemanticSearchService.js';
import { UnifiedErrorHandler } from '../utils/ErrorHandler.js';
import { createRequestId, runWithRequestId } from '../observability/requestContext.js';
import { HealthRoutes, SearchRoutes, type ErrorBody, type RouteContext } from './routes/index.js';

const REQUEST_ID_HEADER = 'x-request-id';

export class HttpApiServer {
  private server: FastifyInstance;
  private errorHandler: UnifiedErrorHandler;

  constructor(
    private config: AppConfig,
    private service: SemanticSearchService,
    private logger: Logger
  ) {
    this.server = Fastify({
      logger: false, // We'll use our own logger
      bodyLimit: config.server.bodyLimit
    });
    this.errorHandler = new UnifiedErrorHandler(logger);

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandlers();
  }

  /** The underlying Fastify instance, for `inject` in tests. */
  get instance(): FastifyInstance {
    return this.server;
  }

  async start(): Promise<string> {
    const { host, port } = this.config.server;
    try {
      const address = await this.server.listen({ host, port });
      this.logger.info(`HTTP API server started on ${address}`);
      return address;
    } catch (error) {
      this.logger.error('Failed to start HTTP API server', error);
      throw error;
    }
  }

  async stop(): Promise<void> {
    await this.server.close();
    this.logger.info('HTTP API server stopped');
  }

  private respondError(reply: FastifyReply, status: number, body: ErrorBody): FastifyReply {
    return reply.code(status).send(body);
  }

  private setupMiddleware(): void {
    const { server } = this.config;

    void this.server.register(helmet, {
      contentSecurityPolicy: false,
      hsts: server.host === '127.0.0.1' || server.host === 'localhost' ? false : { maxAge: 31536000 }
    });

    if (server.enableCors) {
      const allowed = new Set(server.corsOrigins.map((o) => o.replace(/\/$/, '')));
      void this.server.register(cors, {
        // No configured origins means any origin may call the API.
        origin: allowed.size === 0 ? true : (origin, cb) => {
          if (!origin) return cb(null, true);
          cb(null, allowed.has(origin.replace(/\/$/, '')));
        },
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
        exposedHeaders: ['X-Request-Id']
      });
    }

    // Run the rest of the request inside its own context so log lines carry the id.
    this.server.addHook('onRequest', (request, reply, done) => {
      const header = request.headers[REQUEST_ID_HEADER];
      const requestId = typeof header === 'string' && header.trim() ? header.trim() : createRequestId();
      reply.header(REQUEST_ID_HEADER, requestId);
      runWithRequestId(requestId, () => {
        this.logger.debug(`${request.method} ${request.url}`, { ip: request.ip });
        done();
      });
    });

    this.server.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
      this.logger.debug(`${request.method} ${request.url} - ${reply.statusCode}`, {
        responseTime: reply.elapsedTime
      });
    });
  }

  private setupRoutes(): void {
    const ctx: RouteContext = {
      server: this.server,
      logger: this.logger,
      config: this.config,
      service: this.service,
      errorHandler: this.errorHandler,
      requestTimeoutMs: this.config.server.requestTimeoutMs,
      respondError: this.respondError.bind(this)
    };

    new HealthRoutes(ctx).setupRoutes();
    new SearchRoutes(ctx).setupRoutes();
  }

  private setupErrorHandlers(): void {
    // Reaches here for framework errors: malformed JSON, oversized bodies, unsupported media types.
    this.server.setErrorHandler((error: FastifyError, request, reply) => {
      const status = error.statusCode ?? 500;
      if (status >= 400 && status < 500) {
        this.logger.debug('Rejected request', { url: request.url, message: error.message });
        return this.respondError(reply, status, { error: error.message, code: 'INVALID_INPUT', recoverable: false });
      }
      const handled = this.errorHandler.handleError(error, { url: request.url });
      return this.respondError(reply, handled.status, {
        error: handled.message,
        code: handled.code,
        recoverable: handled.recoverable
      });
    });

    this.server.setNotFoundHandler((request, reply) => {
      return this.respondError(reply, 404, {
        error: `Route ${request.method} ${request.url} not found`,
        code: 'NOT_FOUND',
        recoverable: false
      });
    });
  }
}
