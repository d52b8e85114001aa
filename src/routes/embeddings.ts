import type { FastifyInstance } from 'fastify';
import { requirePermission } from '../middleware/auth.js';
import { EmbeddingRequestSchema } from '../schemas/request.js';
import { handleProxy, type RouteDeps } from './proxy.js';

export async function embeddingRoutes(fastify: FastifyInstance, deps: RouteDeps): Promise<void> {
  fastify.post(
    '/v1/embeddings',
    { preHandler: requirePermission(deps.authenticator, 'embedding') },
    (request, reply) =>
      handleProxy(request, reply, deps, {
        endpoint: '/embeddings',
        schema: EmbeddingRequestSchema,
        streamable: false,
      })
  );
}
