import type { FastifyReply, FastifyRequest } from 'fastify';
import { BaseRouteHandler } from './RouteContext.js';

export const SERVICE_NAME = 'semantic-search';

export class HealthRoutes extends BaseRouteHandler {
  setupRoutes(): void {
    const { server } = this.ctx;

    server.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.send({
        service: SERVICE_NAME,
        index: this.ctx.config.index.name,
        endpoints: ['GET /health', 'POST /ingest', 'POST /query']
      });
    });

    // Always 200: an unreachable index is reported, not thrown.
    server.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
      const health = await this.ctx.service.health({ timeoutMs: this.ctx.requestTimeoutMs });
      return reply.send({
        status: health.indexReachable ? 'ok' : 'degraded',
        service: SERVICE_NAME,
        ...health
      });
    });
  }
}
