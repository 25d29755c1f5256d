import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from '@agentic-retail/logger';
import { HTTP_STATUS, agenticSearchRequestSchema, type AgenticSearchInput } from '@agentic-retail/shared';
import {
  AgenticSearchService,
  type AgenticSearchServiceOptions,
} from '../services/agentic-search.service.js';
import type { KnowledgeAgentGateway } from '../lib/agent/knowledge-agent-client.js';
import { DomainError, ValidationError } from '../lib/errors/index.js';
import { SseStream } from '../lib/http/index.js';
import { createRequestLogger } from '../lib/observability/index.js';

export class AgenticController {
  private agenticService: AgenticSearchService;

  constructor(private readonly logger: Logger, gateway: KnowledgeAgentGateway, options: AgenticSearchServiceOptions) {
    this.agenticService = new AgenticSearchService(gateway, logger, options);
  }

  async search(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const input = this.parseSearch(request);
    const requestLogger = createRequestLogger(this.logger, request);

    requestLogger.info({ queryLength: input.query.length }, 'Agentic search requested');
    const result = await this.agenticService.search(input);
    await reply.code(HTTP_STATUS.OK).send(result);
  }

  async stream(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const input = this.parseSearch(request);
    const requestLogger = createRequestLogger(this.logger, request);

    reply.hijack();
    const sse = new SseStream(reply.raw);
    const abort = new AbortController();
    reply.raw.on('close', () => {
      if (!sse.closed) {
        requestLogger.info('Client disconnected from stream');
      }
      abort.abort();
    });

    sse.init();
    try {
      for await (const event of this.agenticService.stream(input, abort.signal)) {
        if (sse.closed) break;
        sse.send(event);
      }
    } catch (error) {
      requestLogger.error(
        error instanceof Error ? error : new Error(String(error)),
        'Agentic stream failed'
      );
      if (!sse.closed) {
        sse.send({ error: error instanceof DomainError ? error.message : 'Streaming search failed' });
      }
    } finally {
      sse.close();
    }
  }

  async status(_request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const result = await this.agenticService.getStatus();
    await reply.code(HTTP_STATUS.OK).send(result);
  }

  async setup(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    createRequestLogger(this.logger, request).info('Knowledge agent setup requested');
    const result = await this.agenticService.setup();
    await reply.code(HTTP_STATUS.OK).send(result);
  }

  private parseSearch(request: FastifyRequest): AgenticSearchInput {
    const parseResult = agenticSearchRequestSchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new ValidationError('Invalid request body', parseResult.error.issues);
    }
    return parseResult.data;
  }
}
