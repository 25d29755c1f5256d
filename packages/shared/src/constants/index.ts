// API Constants
export const API_ROUTES = {
  AGENTIC: {
    SEARCH: '/agentic/search',
    STREAM: '/agentic/stream',
    STATUS: '/agentic/status',
    SETUP: '/agentic/setup',
  },
  FORMAT: '/format',
  HEALTH: '/health',
} as const;

// Search Types
export const SEARCH_KINDS = {
  RAG: 'rag',
  AGENTIC: 'agentic',
  DATAVERSE: 'dataverse',
  GENERIC: 'generic',
} as const;

export const SEARCH_TYPE_LABELS = {
  rag: 'RAG Search',
  agentic: 'Agentic AI Search',
  dataverse: 'Dataverse Search',
  generic: 'Search',
} as const;

export const SEARCH_STRATEGY_LABELS = {
  rag: 'Semantic Vector Search with RAG',
  agentic: 'AI-Powered Query Planning with Parallel Retrieval',
  dataverse: 'Enterprise Data Search with Unified API',
  generic: 'Response Normalization',
} as const;

// Error Codes
export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  AGENT_PENDING: 'AGENT_PENDING',
  UPSTREAM_ERROR: 'UPSTREAM_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  RATE_LIMIT: 'RATE_LIMIT',
} as const;

// HTTP Status Codes
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
} as const;
