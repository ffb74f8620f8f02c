import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { PipelineView } from '../../application/index.js';

export interface PipelinePluginOptions {
  pipeline: PipelineView;
}

/**
 * Fastify plugin that exposes the running pipeline to routes.
 *
 * Decorates `fastify.pipeline`; the pipeline's lifecycle stays with the worker.
 */
async function pipelinePlugin(fastify: FastifyInstance, opts: PipelinePluginOptions): Promise<void> {
  fastify.decorate('pipeline', opts.pipeline);
}

export default fp(pipelinePlugin, {
  name: 'pipeline',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.pipeline` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    pipeline: PipelineView;
  }
}
