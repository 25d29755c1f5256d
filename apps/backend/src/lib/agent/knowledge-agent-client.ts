import type { Logger } from '@agentic-retail/logger';
import { HTTP_STATUS } from '@agentic-retail/shared';
import { AgentPendingError, ConfigurationError, NotFoundError, UpstreamError } from '../errors/index.js';

const DEFAULT_SYSTEM_PROMPT =
  'I am a professional retail product consultant with access to the product catalog. ' +
  'I recommend the two or three most suitable products with a short rationale, include pricing, ' +
  "and respect budget expressions such as 'under $50' or 'between $20-$100'. " +
  'When nothing matches exactly I suggest close alternatives.';

// Upstream error bodies are trimmed before they reach logs and responses
const MAX_ERROR_BODY = 500;

export interface RetrieveOptions {
  systemPrompt?: string;
  signal?: AbortSignal;
}

/**
 * Boundary to the knowledge agent. Every method resolves to the raw response
 * body; 403 surfaces as {@link AgentPendingError}, 404 as {@link NotFoundError}.
 */
export interface KnowledgeAgentGateway {
  readonly agentName: string;
  retrieve(query: string, options?: RetrieveOptions): Promise<string>;
  getAgent(): Promise<string>;
  createOrUpdateAgent(): Promise<string>;
}

export interface KnowledgeAgentClientConfig {
  endpoint: string;
  apiKey: string;
  agentName: string;
  indexName: string;
  apiVersion: string;
  openAIEndpoint?: string;
  deployment: string;
  fetch?: typeof fetch;
}

export class KnowledgeAgentClient implements KnowledgeAgentGateway {
  readonly agentName: string;
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;

  constructor(private readonly config: KnowledgeAgentClientConfig, private readonly logger: Logger) {
    this.agentName = config.agentName;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.baseUrl = config.endpoint.replace(/\/+$/, '');
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<string> {
    const prompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

    this.logger.info({ agentName: this.agentName, queryLength: query.length }, 'Performing agentic retrieval');

    return this.send('POST', '/retrieve', {
      messages: [
        {
          role: 'user',
          content: [{ type: 'text', text: `${prompt}\n\nUser query: ${query}` }],
        },
      ],
      targetIndexParams: [
        {
          indexName: this.config.indexName,
          includeReferenceSourceData: true,
          rerankerThreshold: 1.5,
          maxDocsForReranker: 300,
        },
      ],
    }, options.signal);
  }

  async getAgent(): Promise<string> {
    return this.send('GET', '');
  }

  async createOrUpdateAgent(): Promise<string> {
    const { openAIEndpoint, deployment, indexName } = this.config;
    if (!openAIEndpoint) {
      throw new ConfigurationError('AZURE_OPENAI_ENDPOINT is required to create the knowledge agent');
    }

    this.logger.info({ agentName: this.agentName, indexName }, 'Creating or updating knowledge agent');

    return this.send('PUT', '', {
      name: this.agentName,
      targetIndexes: [
        {
          indexName,
          defaultRerankerThreshold: 2.5,
          defaultIncludeReferenceSourceData: true,
          defaultMaxDocsForReranker: 200,
        },
      ],
      models: [
        {
          kind: 'azureOpenAI',
          azureOpenAIParameters: {
            resourceUri: openAIEndpoint,
            deploymentId: deployment,
            modelName: deployment,
          },
        },
      ],
      requestLimits: {
        maxOutputSize: 5000,
        maxRuntimeInSeconds: 60,
      },
    });
  }

  private url(suffix: string): string {
    const version = encodeURIComponent(this.config.apiVersion);
    return `${this.baseUrl}/agents/${encodeURIComponent(this.agentName)}${suffix}?api-version=${version}`;
  }

  private async send(method: 'GET' | 'POST' | 'PUT', suffix: string, body?: unknown, signal?: AbortSignal): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url(suffix), {
        method,
        headers: {
          'api-key': this.config.apiKey,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        ...(body === undefined ? {} : { body: JSON.stringify(body) }),
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ method, suffix, error: message }, 'Knowledge agent unreachable');
      throw new UpstreamError('Knowledge agent is unreachable', { cause: message });
    }

    const text = await response.text();
    if (response.ok) {
      return text;
    }

    const details = { status: response.status, body: text.slice(0, MAX_ERROR_BODY) };

    if (response.status === HTTP_STATUS.FORBIDDEN) {
      this.logger.warn({ agentName: this.agentName, ...details }, 'Knowledge agent permissions pending');
      throw new AgentPendingError(
        'Knowledge agent was found but its permissions are still propagating. Please try again in a few minutes.',
        details,
      );
    }

    if (response.status === HTTP_STATUS.NOT_FOUND) {
      throw new NotFoundError(`Knowledge agent '${this.agentName}' not found`, details);
    }

    this.logger.error({ method, suffix, ...details }, 'Knowledge agent request failed');
    throw new UpstreamError(`Knowledge agent request failed with status ${response.status}`, details);
  }
}
