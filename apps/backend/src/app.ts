import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { createLogger, type Logger } from '@agentic-retail/logger';
import { ERROR_CODES } from '@agentic-retail/shared';
import { isDevelopment, type Env } from './lib/env/index.js';
import { createErrorHandler } from './lib/errors/index.js';
import { getFeatureFlags, type FeatureFlags } from './lib/feature-flags.js';
import { KnowledgeAgentClient, type KnowledgeAgentGateway } from './lib/agent/knowledge-agent-client.js';
import { logRequestComplete } from './lib/observability/index.js';
import { requestIdMiddleware } from './middleware/index.js';

// Import route modules
import { healthRoutes } from './modules/health/health.routes.js';
import { agenticRoutes } from './modules/agentic/agentic.routes.js';
import { formatRoutes } from './modules/format/format.routes.js';

export interface BuildAppOptions {
  env: Env;
  logger?: Logger;
  /** Replaces the HTTP client of the knowledge agent. */
  gateway?: KnowledgeAgentGateway;
  flags?: FeatureFlags;
  now?: () => Date;
}

export async function buildApp(options: BuildAppOptions) {
  const { env } = options;

  // Create logger
  const logger = options.logger ?? createLogger({
    service: 'agentic-retail-backend',
    level: env.LOG_LEVEL,
    environment: env.NODE_ENV,
    prettyPrint: isDevelopment(env),
  });

  const flags = options.flags ?? getFeatureFlags();

  const gateway = options.gateway ?? new KnowledgeAgentClient(
    {
      endpoint: env.AZURE_SEARCH_ENDPOINT,
      apiKey: env.AZURE_SEARCH_API_KEY,
      agentName: env.AZURE_SEARCH_AGENT_NAME,
      indexName: env.AZURE_SEARCH_INDEX_NAME,
      apiVersion: env.AZURE_SEARCH_API_VERSION,
      deployment: env.AZURE_OPENAI_GPT_DEPLOYMENT,
      ...(env.AZURE_OPENAI_ENDPOINT ? { openAIEndpoint: env.AZURE_OPENAI_ENDPOINT } : {}),
    },
    logger.child({ component: 'knowledge-agent' })
  );

  // Create Fastify instance
  const app = Fastify({
    logger: false, // Use our custom logger instead
    requestIdLogLabel: 'requestId',
    requestIdHeader: 'x-request-id',
    bodyLimit: 5 * 1024 * 1024,
  });

  // Register request ID middleware
  app.addHook('preHandler', requestIdMiddleware);

  app.addHook('onResponse', async (request, reply) => {
    logRequestComplete(logger, request, reply.statusCode, reply.elapsedTime);
  });

  // Register security plugins
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
  });

  // Register rate limiting
  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
    errorResponseBuilder: () => ({
      error: 'Too many requests',
      code: ERROR_CODES.RATE_LIMIT,
    }),
  });

  // Register CORS
  const corsOrigin = env.CORS_ORIGIN;
  await app.register(cors, {
    origin: corsOrigin ? corsOrigin.split(',').map((o) => o.trim()) : true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS', 'HEAD'],
    allowedHeaders: ['Content-Type', 'X-Request-Id', 'X-Requested-With', 'Accept', 'Origin'],
  });

  // Register error handler
  app.setErrorHandler(createErrorHandler(logger, { exposeErrors: isDevelopment(env) }));

  // Register routes
  await app.register(async (instance) => {
    await healthRoutes(instance);
    await agenticRoutes(instance, logger, gateway, {
      autoCreateAgent: flags.autoCreateAgent,
      wordsPerChunk: env.STREAM_WORDS_PER_CHUNK,
      chunkDelayMs: env.STREAM_CHUNK_DELAY_MS,
      ...(options.now ? { now: options.now } : {}),
    });
    await formatRoutes(instance, logger);
  });

  return { app, logger };
}
