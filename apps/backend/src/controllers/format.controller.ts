import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from '@agentic-retail/logger';
import { HTTP_STATUS, formatRequestSchema } from '@agentic-retail/shared';
import { FormatService } from '../services/format.service.js';
import { ValidationError } from '../lib/errors/index.js';

export class FormatController {
  private formatService: FormatService;

  constructor(logger: Logger) {
    this.formatService = new FormatService(logger);
  }

  async format(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const parseResult = formatRequestSchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new ValidationError('Invalid request body', parseResult.error.issues);
    }

    const result = this.formatService.format(parseResult.data);
    await reply.code(HTTP_STATUS.OK).send(result);
  }
}
