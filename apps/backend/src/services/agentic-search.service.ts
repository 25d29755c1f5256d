import type { Logger } from '@agentic-retail/logger';
import {
  formatAgenticResponse,
  formatPendingResponse,
} from '@agentic-retail/formatter';
import type {
  AgentSetupResponse,
  AgentStatusResponse,
  AgenticSearchRequest,
  FormattedSearchResponse,
  StreamEvent,
} from '@agentic-retail/shared';
import type { KnowledgeAgentGateway } from '../lib/agent/knowledge-agent-client.js';
import { AgentPendingError, NotFoundError } from '../lib/errors/index.js';
import { streamChunks } from '../lib/streaming/word-chunker.js';

export const SETUP_PROBE_QUERY = 'What products are available?';

const SETUP_PROBE_PREVIEW = 200;

export interface AgenticSearchServiceOptions {
  autoCreateAgent: boolean;
  wordsPerChunk: number;
  chunkDelayMs: number;
  now?: () => Date;
}

export class AgenticSearchService {
  constructor(
    private readonly gateway: KnowledgeAgentGateway,
    private readonly logger: Logger,
    private readonly options: AgenticSearchServiceOptions
  ) {}

  /**
   * Retrieve and normalize. An agent that is still waiting on permissions
   * yields a pending response instead of an error.
   */
  async search(request: AgenticSearchRequest, signal?: AbortSignal): Promise<FormattedSearchResponse> {
    const startTime = Date.now();

    try {
      const raw = await this.retrieve(request, signal);
      const response = formatAgenticResponse(raw, request.query, {
        processingTimeMs: Date.now() - startTime,
        logger: this.logger,
        ...(this.options.now ? { now: this.options.now } : {}),
      });

      this.logger.info(
        {
          status: response.status,
          totalResults: response.metadata?.totalResults ?? 0,
          extractionStrategy: response.metadata?.extractionStrategy,
          processingTimeMs: response.metadata?.processingTimeMs,
        },
        'Agentic search completed'
      );
      return response;
    } catch (error) {
      if (error instanceof AgentPendingError) {
        this.logger.warn({ agentName: this.gateway.agentName }, 'Agentic search pending on agent permissions');
        return formatPendingResponse('agentic', request.query, error.message, Date.now() - startTime);
      }
      throw error;
    }
  }

  /**
   * Chunked delivery of the composed summary. Formatting happens once, before
   * the first chunk; aborting stops emission.
   */
  async *stream(request: AgenticSearchRequest, signal?: AbortSignal): AsyncGenerator<StreamEvent> {
    const response = await this.search(request, signal);

    if (!response.success || !response.result) {
      yield { error: response.error ?? 'Search failed' };
      return;
    }

    for await (const text of streamChunks(response.result.summary, {
      wordsPerChunk: this.options.wordsPerChunk,
      delayMs: this.options.chunkDelayMs,
      ...(signal ? { signal } : {}),
    })) {
      yield { text };
    }

    if (!signal?.aborted) {
      yield { completed: true };
    }
  }

  async getStatus(): Promise<AgentStatusResponse> {
    const agentName = this.gateway.agentName;

    try {
      await this.gateway.getAgent();
      return { success: true, status: 'available', agentName, message: 'Knowledge agent is available' };
    } catch (error) {
      if (error instanceof AgentPendingError) {
        return { success: true, status: 'pending', agentName, message: error.message };
      }
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
    }

    if (!this.options.autoCreateAgent) {
      return {
        success: false,
        status: 'missing',
        agentName,
        message: 'Knowledge agent not found. Use /agentic/setup to create one.',
      };
    }

    this.logger.info({ agentName }, 'Knowledge agent not found, creating new one');
    await this.gateway.createOrUpdateAgent();
    return { success: true, status: 'created', agentName, message: 'Knowledge agent created' };
  }

  /**
   * Create or update the agent, then probe it once. A probe rejected while
   * permissions propagate still counts as a completed setup.
   */
  async setup(): Promise<AgentSetupResponse> {
    const agentName = this.gateway.agentName;
    await this.gateway.createOrUpdateAgent();

    try {
      const raw = await this.gateway.retrieve(SETUP_PROBE_QUERY);
      const summary = formatAgenticResponse(raw, SETUP_PROBE_QUERY, { logger: this.logger, includeRaw: false })
        .result?.summary ?? '';
      return {
        success: true,
        message: 'Knowledge agent setup completed',
        agentName,
        testStatus: 'success',
        testResult: summary.length > SETUP_PROBE_PREVIEW ? `${summary.slice(0, SETUP_PROBE_PREVIEW)}...` : summary,
      };
    } catch (error) {
      if (!(error instanceof AgentPendingError)) {
        throw error;
      }
      this.logger.warn({ agentName }, 'Knowledge agent created but probe is pending');
      return {
        success: true,
        message: 'Knowledge agent setup completed',
        agentName,
        testStatus: 'created_but_test_pending',
        testResult:
          'Knowledge agent created successfully. Testing may be temporarily unavailable due to permission propagation. Please try again in a few minutes.',
      };
    }
  }

  private async retrieve(request: AgenticSearchRequest, signal?: AbortSignal): Promise<string> {
    const options = {
      ...(request.systemPrompt ? { systemPrompt: request.systemPrompt } : {}),
      ...(signal ? { signal } : {}),
    };

    try {
      return await this.gateway.retrieve(request.query, options);
    } catch (error) {
      if (!(error instanceof NotFoundError) || !this.options.autoCreateAgent) {
        throw error;
      }
      this.logger.info({ agentName: this.gateway.agentName }, 'Knowledge agent not found, creating new one');
      await this.gateway.createOrUpdateAgent();
      return this.gateway.retrieve(request.query, options);
    }
  }
}
