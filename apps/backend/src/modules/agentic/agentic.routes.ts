import type { FastifyInstance } from 'fastify';
import type { Logger } from '@agentic-retail/logger';
import { API_ROUTES } from '@agentic-retail/shared';
import { AgenticController } from '../../controllers/agentic.controller.js';
import type { KnowledgeAgentGateway } from '../../lib/agent/knowledge-agent-client.js';
import type { AgenticSearchServiceOptions } from '../../services/agentic-search.service.js';

export async function agenticRoutes(
  fastify: FastifyInstance,
  logger: Logger,
  gateway: KnowledgeAgentGateway,
  options: AgenticSearchServiceOptions
): Promise<void> {
  const controller = new AgenticController(logger, gateway, options);

  // Retrieve and normalize in one response
  fastify.post(API_ROUTES.AGENTIC.SEARCH, async (request, reply) => {
    await controller.search(request, reply);
  });

  // Same search, summary delivered as server-sent events
  fastify.post(API_ROUTES.AGENTIC.STREAM, async (request, reply) => {
    await controller.stream(request, reply);
  });

  fastify.get(API_ROUTES.AGENTIC.STATUS, async (request, reply) => {
    await controller.status(request, reply);
  });

  fastify.post(API_ROUTES.AGENTIC.SETUP, async (request, reply) => {
    await controller.setup(request, reply);
  });
}
