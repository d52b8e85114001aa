import type { FastifyInstance } from 'fastify';
import { getMetrics, getContentType } from '../middleware/metrics.js';

export async function metricsRoutes(app: FastifyInstance): Promise<void> {
  app.get('/metrics', async (_request, reply) => {
    const metrics = await getMetrics();
    return reply.type(getContentType()).send(metrics);
  });
}
