import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

/**
 * Operational read-only routes.
 *
 * GET /health: pipeline status, trigger state and last checkpoint. 200 while
 * the pipeline is created or running (its trigger may be idle), 503 otherwise.
 * GET /api/v1/batches: most recent batch reports, newest first.
 * GET /api/v1/checkpoint: last committed checkpoint.
 */
async function opsRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const status = fastify.pipeline.getStatus();
    const checkpoint = fastify.pipeline.checkpoint();
    const healthy = status === 'running' || status === 'created';

    return reply.status(healthy ? 200 : 503).send({
      status,
      trigger: fastify.pipeline.triggerState(),
      analytical_backlog: fastify.pipeline.analyticalBacklog(),
      checkpoint: {
        batch_id: checkpoint.batch_id,
        committed_at: checkpoint.committed_at?.toISOString() ?? null,
      },
    });
  });

  fastify.get(
    '/api/v1/batches',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      let limit = DEFAULT_LIMIT;
      if (request.query.limit !== undefined) {
        const n = Number(request.query.limit);
        if (!Number.isInteger(n) || n < 1 || n > MAX_LIMIT) {
          return reply.status(400).send({ error: `limit must be an integer between 1 and ${MAX_LIMIT}` });
        }
        limit = n;
      }

      const batches = fastify.pipeline.recentReports(limit);
      return reply.status(200).send({ count: batches.length, batches });
    },
  );

  fastify.get('/api/v1/checkpoint', async (_request: FastifyRequest, reply: FastifyReply) => {
    const checkpoint = fastify.pipeline.checkpoint();
    return reply.status(200).send({
      batch_id: checkpoint.batch_id,
      offsets: checkpoint.offsets,
      committed_at: checkpoint.committed_at?.toISOString() ?? null,
    });
  });
}

export default fp(opsRoutes, {
  name: 'ops-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
