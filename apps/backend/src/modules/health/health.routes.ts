import type { FastifyInstance } from 'fastify';
import { API_ROUTES } from '@agentic-retail/shared';
import { HealthController } from '../../controllers/health.controller.js';

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  const controller = new HealthController();

  fastify.get(API_ROUTES.HEALTH, async (request, reply) => {
    await controller.check(request, reply);
  });
}
