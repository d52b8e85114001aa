import type { FastifyInstance } from 'fastify';
import { requirePermission } from '../middleware/auth.js';
import type { RouteDeps } from './proxy.js';

export async function modelRoutes(fastify: FastifyInstance, deps: RouteDeps): Promise<void> {
  fastify.get(
    '/v1/models',
    { preHandler: requirePermission(deps.authenticator, 'chat') },
    async () => deps.catalog.list()
  );
}
