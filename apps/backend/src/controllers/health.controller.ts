import type { FastifyRequest, FastifyReply } from 'fastify';
import { HTTP_STATUS } from '@agentic-retail/shared';
import { HealthService } from '../services/health.service.js';

export class HealthController {
  private healthService = new HealthService();

  async check(_request: FastifyRequest, reply: FastifyReply): Promise<void> {
    await reply.code(HTTP_STATUS.OK).send(this.healthService.getStatus());
  }
}
