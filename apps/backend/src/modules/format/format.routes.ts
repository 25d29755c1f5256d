import type { FastifyInstance } from 'fastify';
import type { Logger } from '@agentic-retail/logger';
import { API_ROUTES } from '@agentic-retail/shared';
import { FormatController } from '../../controllers/format.controller.js';

export async function formatRoutes(fastify: FastifyInstance, logger: Logger): Promise<void> {
  const controller = new FormatController(logger);

  // Normalize a payload the caller already retrieved
  fastify.post(API_ROUTES.FORMAT, async (request, reply) => {
    await controller.format(request, reply);
  });
}
