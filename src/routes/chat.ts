import type { FastifyInstance } from 'fastify';
import { requirePermission } from '../middleware/auth.js';
import { ChatCompletionRequestSchema } from '../schemas/request.js';
import { handleProxy, type RouteDeps } from './proxy.js';

export async function chatRoutes(fastify: FastifyInstance, deps: RouteDeps): Promise<void> {
  fastify.post(
    '/v1/chat/completions',
    { preHandler: requirePermission(deps.authenticator, 'chat') },
    (request, reply) =>
      handleProxy(request, reply, deps, {
        endpoint: '/chat/completions',
        schema: ChatCompletionRequestSchema,
        streamable: true,
      })
  );
}
