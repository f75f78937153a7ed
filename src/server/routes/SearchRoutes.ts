import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { MetadataSchema } from '../../types/index.js';
import { BaseRouteHandler } from './RouteContext.js';

const IngestBodySchema = z.object({
  documents: z
    .array(
      z.object({
        id: z.string(),
        text: z.string(),
        meta: MetadataSchema.optional()
      })
    )
    .min(1)
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Ingestion and query endpoints.
 */
export class SearchRoutes extends BaseRouteHandler {
  private readonly queryBodySchema = z.object({
    query_text: z.string().min(1),
    top_k: z.number().int().min(1).max(this.ctx.config.search.maxTopK).default(this.ctx.config.search.defaultTopK),
    filters: MetadataSchema.optional()
  });

  setupRoutes(): void {
    const { server } = this.ctx;

    server.post('/ingest', async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = IngestBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return this.badRequest(reply, `Invalid ingest payload: ${describeIssues(parsed.error)}`);
      }

      try {
        const result = await this.ctx.service.ingest(parsed.data.documents, {
          timeoutMs: this.ctx.requestTimeoutMs
        });
        return reply.send({ status: 'ok', ingested: result.accepted, rejected: result.rejected });
      } catch (error) {
        return this.fail(reply, error, { route: 'ingest', documents: parsed.data.documents.length });
      }
    });

    server.post('/query', async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = this.queryBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return this.badRequest(reply, `Invalid query payload: ${describeIssues(parsed.error)}`);
      }

      const { query_text: queryText, top_k: topK, filters } = parsed.data;
      try {
        const results = await this.ctx.service.search(queryText, topK, filters, {
          timeoutMs: this.ctx.requestTimeoutMs
        });
        return reply.send({ results });
      } catch (error) {
        return this.fail(reply, error, { route: 'query', topK });
      }
    });
  }
}
