/**
 * Health check route handler.
 * GET /api/v1/health — liveness plus uptime and version. Does not call
 * the collaborators.
 */

import type { FastifyInstance } from 'fastify';
import type { HealthData } from '../../types/index.js';

/**
 * Register the health endpoint on the given Fastify instance.
 * @param version - Reported build version
 */
export function registerHealthRoutes(app: FastifyInstance, version: string): void {
  const startTime = Date.now();

  app.get<{ Reply: HealthData }>('/api/v1/health', async (_request, reply) => {
    const health: HealthData = {
      status: 'ok',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      version,
    };
    return reply.status(200).send(health);
  });
}
