import { FastifyInstance } from 'fastify';
import type { HealthReporter } from '../health';

export async function registerHealthRoutes(app: FastifyInstance, health: HealthReporter) {
  app.get('/health', async (_req, reply) => {
    const report = await health.checkHealth();
    return reply.code(report.status === 'healthy' ? 200 : 500).send(report);
  });
}
