import type { FastifyInstance } from 'fastify';
import type { AdapterManager } from '../services/adapter-manager.js';

export async function healthRoutes(fastify: FastifyInstance, manager: AdapterManager): Promise<void> {
  fastify.get('/health', async (_request, reply) => {
    const state = manager.state;
    const platform = manager.getModelInfo();

    return reply.code(state === 'active' ? 200 : 503).send({
      status: state === 'active' ? 'healthy' : 'degraded',
      state,
      platform: platform?.platform ?? null,
      timestamp: new Date().toISOString(),
    });
  });
}
