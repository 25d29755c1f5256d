import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3001'),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.string().default('info'),

  // Azure AI Search knowledge agent
  AZURE_SEARCH_ENDPOINT: z.string().url(),
  AZURE_SEARCH_API_KEY: z.string().min(1),
  AZURE_SEARCH_AGENT_NAME: z.string().min(1).default('retail-knowledge-agent'),
  AZURE_SEARCH_INDEX_NAME: z.string().min(1).default('rag-retail'),
  AZURE_SEARCH_API_VERSION: z.string().min(1).default('2025-05-01-preview'),

  // Model used by the agent for query planning
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_GPT_DEPLOYMENT: z.string().min(1).default('gpt-4o-mini'),

  // Chunked delivery
  STREAM_WORDS_PER_CHUNK: z.coerce.number().int().positive().default(3),
  STREAM_CHUNK_DELAY_MS: z.coerce.number().int().nonnegative().default(50),

  // CORS
  CORS_ORIGIN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export class EnvError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Invalid environment variables: ${issues
        .map((issue) => `${issue.path.join('.')} ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'EnvError';
  }
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new EnvError(result.error.issues);
  }

  return result.data;
}

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function getPort(env: Env = getEnv()): number {
  return parseInt(env.PORT, 10);
}

export function getHost(env: Env = getEnv()): string {
  return env.HOST;
}

export function isDevelopment(env: Env = getEnv()): boolean {
  return env.NODE_ENV === 'development';
}
