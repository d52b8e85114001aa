import type { FastifyInstance } from 'fastify';
import { requirePermission } from '../middleware/auth.js';
import { CompletionRequestSchema } from '../schemas/request.js';
import { handleProxy, type RouteDeps } from './proxy.js';

export async function completionRoutes(fastify: FastifyInstance, deps: RouteDeps): Promise<void> {
  fastify.post(
    '/v1/completions',
    { preHandler: requirePermission(deps.authenticator, 'completion') },
    (request, reply) =>
      handleProxy(request, reply, deps, {
        endpoint: '/completions',
        schema: CompletionRequestSchema,
        streamable: true,
      })
  );
}
