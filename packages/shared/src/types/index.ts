// JSON primitives used by the ingestion layer

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// API Request/Response DTOs

export interface AgenticSearchRequest {
  query: string;
  systemPrompt?: string;
}

export interface FormatRequest {
  searchType: SearchKind;
  query: string;
  rawResponse: string;
  processingTimeMs?: number;
}

export interface ErrorResponse {
  error: string;
  code?: string;
  details?: unknown;
}

export type AgentStatus = 'available' | 'created' | 'missing' | 'pending';

export interface AgentStatusResponse {
  success: boolean;
  status: AgentStatus;
  agentName: string;
  message: string;
}

export interface AgentSetupResponse {
  success: boolean;
  message: string;
  agentName: string;
  testStatus: 'success' | 'created_but_test_pending';
  testResult: string;
}

// Domain Types
export type SearchKind = 'rag' | 'agentic' | 'dataverse' | 'generic';

export type ExtractionStrategyName =
  | 'structured-array'
  | 'key-value'
  | 'free-text'
  | 'list'
  | 'catalog'
  | 'none';

export interface ProductRecord {
  refId?: string;
  name: string;
  productNumber?: string;
  /** Absent when the source price is missing or unparsable. */
  price?: number;
  description?: string;
  color?: string;
  size?: string;
  material?: string;
  imageUrls: string[];
  relevanceScore: number;
  /** Unrecognised `key: value` segments, kept verbatim for bullet-style display. */
  details?: string[];
}

export type ActivityKind = 'Planning' | 'Search' | 'SemanticRanking' | 'Other';

export interface ActivityQuery {
  search: string;
  filter?: string;
}

export interface ActivityRecord {
  kind: ActivityKind;
  id: string;
  type: string;
  targetIndex?: string;
  query?: ActivityQuery;
  resultCount?: number;
  elapsedMs?: number;
  queryTime?: string;
  inputTokens?: number;
  outputTokens?: number;
}

export interface SubQuery {
  index: number;
  /** Id of the search activity this sub-query came from. */
  activityId: string;
  query: string;
  filter?: string;
  resultCount: number;
  elapsedMs: number;
  queryTime: string;
  /**
   * True when the agent did not report a usable timestamp and `queryTime` is the
   * analysis time. Consumers needing exact timestamps should treat it as unknown.
   */
  queryTimeEstimated: boolean;
  purpose: string;
  sourceIds: string[];
}

export interface SourceReference {
  id: string;
  title: string;
  type: string;
  content?: string;
  activitySource?: string;
  relevanceScore: number;
}

export interface TokenCount {
  inputTokens: number;
  outputTokens: number;
}

export interface TokenUsage extends TokenCount {
  totalTokens: number;
  /** USD */
  estimatedCost: number;
  breakdown: {
    planning: TokenCount;
    search: TokenCount;
  };
}

export type InsightType = 'tip' | 'info' | 'warning' | 'comparison';

export interface InsightItem {
  type: InsightType;
  title: string;
  content: string;
  icon: string;
  color: string;
}

export interface RecommendationItem {
  title: string;
  description: string;
  icon: string;
  category: string;
  tags: string[];
}

export interface FormattedResult {
  summary: string;
  products: ProductRecord[];
  insights: InsightItem[];
  recommendations: RecommendationItem[];
  explanation: string;
}

export interface SearchStats {
  planningOperations: number;
  parallelQueries: number;
  documentsSearched: number;
  rankingOperations: number;
  totalElapsedMs: number;
}

export interface SearchMetadata {
  processingTimeMs: number;
  totalResults: number;
  searchStrategy: string;
  extractionStrategy: ExtractionStrategyName;
  subQueries: SubQuery[];
  tokenUsage: TokenUsage;
  sources: SourceReference[];
  stats: SearchStats;
}

export type ResponseStatus = 'complete' | 'pending' | 'failed';

export interface FormattedSearchResponse {
  success: boolean;
  status: ResponseStatus;
  searchType: string;
  query: string;
  result?: FormattedResult;
  metadata?: SearchMetadata;
  error?: string;
  /** Original payload, verbatim, for audit and debugging. */
  rawResponse?: string;
}

// Streaming events emitted by the chunked delivery route
export type StreamEvent =
  | { text: string }
  | { completed: true }
  | { error: string };
