import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { PipelineView } from '../../application/index.js';
import pipelinePlugin from './pipeline-plugin.js';
import opsRoutes from './ops-routes.js';

/**
 * Builds the ops HTTP server around a pipeline view.
 * The caller decides whether to `listen()` or `inject()`.
 */
export async function buildOpsServer(
  pipeline: PipelineView,
  options: { logLevel: string },
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: options.logLevel,
    },
  });

  await fastify.register(pipelinePlugin, { pipeline });
  await fastify.register(opsRoutes);

  return fastify;
}
