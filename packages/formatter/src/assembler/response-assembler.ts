import { createSilentLogger, type Logger } from '@agentic-retail/logger';
import {
  SEARCH_STRATEGY_LABELS,
  SEARCH_TYPE_LABELS,
  type FormattedResult,
  type FormattedSearchResponse,
  type JsonValue,
  type SearchKind,
  type SearchMetadata,
  type SourceReference,
  type SubQuery,
} from '@agentic-retail/shared';
import { analyzeActivity, buildTokenUsage, type ActivityAnalysis } from '../activity/activity-analyzer.js';
import { extractCatalogProducts } from '../extract/catalog-records.js';
import { extractProducts, type ExtractionOutcome } from '../extract/product-extractor.js';
import { ingestResponse, type IngestedPayload } from '../ingest/response-ingester.js';
import { collectReferences } from '../references/reference-collector.js';
import {
  composeCatalogSummary,
  composeExplanation,
  composeProductSummary,
  composeRecommendations,
  composeTextSummary,
  enterpriseDataInsight,
  extractInsights,
} from '../summary/summary-composer.js';

export const FORMAT_FAILED_MESSAGE = 'Failed to format response';

export const PENDING_EXPLANATION =
  'The knowledge agent exists but its permissions are still propagating. Retry the search in a few minutes.';

export interface FormatOptions {
  processingTimeMs?: number;
  /** Keep the verbatim payload on the response. Defaults to true. */
  includeRaw?: boolean;
  /** Clock for sub-queries that carry no timestamp. */
  now?: () => Date;
  logger?: Logger;
}

interface Composition {
  result: FormattedResult;
  metadata: SearchMetadata;
}

const defaultLogger = createSilentLogger('formatter');

const decoder = new TextDecoder('utf-8');

/**
 * Normalize a raw search payload into a {@link FormattedSearchResponse}.
 *
 * Never throws. Anything that escapes the pipeline becomes a `failed` response
 * carrying the raw payload.
 */
export function formatSearchResponse(
  kind: SearchKind,
  raw: string | Uint8Array,
  query: string,
  options: FormatOptions = {},
): FormattedSearchResponse {
  const rawText = typeof raw === 'string' ? raw : decoder.decode(raw);
  let logger = options.logger ?? defaultLogger;

  try {
    logger = logger.child({ searchType: kind });
    const payload = ingestResponse(rawText);
    if (payload.kind === 'unparsed') {
      logger.debug({ parseError: payload.parseError }, 'Payload is not JSON, using text extraction');
    }

    const { result, metadata } = compose(kind, payload, query, options);

    logger.debug(
      { extractionStrategy: metadata.extractionStrategy, totalResults: metadata.totalResults },
      'Formatted search response',
    );

    const response: FormattedSearchResponse = {
      success: true,
      status: 'complete',
      searchType: SEARCH_TYPE_LABELS[kind],
      query,
      result,
      metadata,
    };
    if (options.includeRaw !== false) {
      response.rawResponse = rawText;
    }
    return response;
  } catch (error) {
    logger.error(
      { err: error instanceof Error ? error : new Error(String(error)), query },
      'Failed to format search response',
    );
    return {
      success: false,
      status: 'failed',
      searchType: SEARCH_TYPE_LABELS[kind],
      query,
      error: FORMAT_FAILED_MESSAGE,
      rawResponse: rawText,
    };
  }
}

export function formatAgenticResponse(
  raw: string | Uint8Array,
  query: string,
  options?: FormatOptions,
): FormattedSearchResponse {
  return formatSearchResponse('agentic', raw, query, options);
}

export function formatRagResponse(
  raw: string | Uint8Array,
  query: string,
  options?: FormatOptions,
): FormattedSearchResponse {
  return formatSearchResponse('rag', raw, query, options);
}

export function formatDataverseResponse(
  raw: string | Uint8Array,
  query: string,
  options?: FormatOptions,
): FormattedSearchResponse {
  return formatSearchResponse('dataverse', raw, query, options);
}

/**
 * Soft outcome for an agent that exists but cannot serve queries yet.
 */
export function formatPendingResponse(
  kind: SearchKind,
  query: string,
  message: string,
  processingTimeMs = 0,
): FormattedSearchResponse {
  return {
    success: true,
    status: 'pending',
    searchType: SEARCH_TYPE_LABELS[kind],
    query,
    result: {
      summary: message,
      products: [],
      insights: [],
      recommendations: [],
      explanation: PENDING_EXPLANATION,
    },
    metadata: emptyMetadata(kind, processingTimeMs),
  };
}

export function formatFailureResponse(
  kind: SearchKind,
  query: string,
  error: string,
  processingTimeMs?: number,
): FormattedSearchResponse {
  const response: FormattedSearchResponse = {
    success: false,
    status: 'failed',
    searchType: SEARCH_TYPE_LABELS[kind],
    query,
    error,
  };
  if (processingTimeMs !== undefined) {
    response.metadata = emptyMetadata(kind, processingTimeMs);
  }
  return response;
}

function compose(kind: SearchKind, payload: IngestedPayload, query: string, options: FormatOptions): Composition {
  // RAG results carry no agent trace
  const root = payload.kind === 'object' && kind !== 'rag' ? payload.root : undefined;
  const activity = analyzeActivity(arrayField(root?.activity), { now: options.now });
  const sources = collectReferences(arrayField(root?.references));
  const processingTimeMs = options.processingTimeMs ?? 0;

  let extraction: ExtractionOutcome;
  let summary: string;
  let insights = extractInsights(payload.text);
  let recommendations = composeRecommendations(payload.text);

  switch (kind) {
    case 'dataverse': {
      const catalog = extractCatalogProducts(payload);
      extraction = catalog ? { strategy: 'catalog', products: catalog } : extractProducts(payload);
      summary = composeCatalogSummary(extraction.products);
      insights = [enterpriseDataInsight(extraction.products.length)];
      recommendations = [];
      break;
    }
    case 'rag':
      extraction = extractProducts(payload);
      summary = composeTextSummary(payload.text);
      recommendations = [];
      break;
    default:
      extraction = extractProducts(payload);
      summary = composeProductSummary(extraction.products);
  }

  const { products } = extraction;

  return {
    result: {
      summary,
      products,
      insights,
      recommendations,
      explanation: composeExplanation(kind, query, products.length),
    },
    metadata: {
      processingTimeMs,
      totalResults: products.length,
      searchStrategy: SEARCH_STRATEGY_LABELS[kind],
      extractionStrategy: extraction.strategy,
      subQueries: linkSources(activity.subQueries, sources),
      tokenUsage: buildTokenUsage(activity),
      sources,
      stats: buildStats(activity, sources),
    },
  };
}

function linkSources(subQueries: readonly SubQuery[], sources: readonly SourceReference[]): SubQuery[] {
  return subQueries.map((subQuery) => ({
    ...subQuery,
    sourceIds: sources
      .filter((source) => source.activitySource === subQuery.activityId)
      .map((source) => source.id),
  }));
}

function buildStats(activity: ActivityAnalysis, sources: readonly SourceReference[]): SearchMetadata['stats'] {
  return {
    planningOperations: activity.counts.Planning,
    parallelQueries: activity.subQueries.length,
    documentsSearched: sources.length,
    rankingOperations: activity.counts.SemanticRanking,
    totalElapsedMs: activity.totalElapsedMs,
  };
}

function emptyMetadata(kind: SearchKind, processingTimeMs: number): SearchMetadata {
  const activity = analyzeActivity([]);
  return {
    processingTimeMs,
    totalResults: 0,
    searchStrategy: SEARCH_STRATEGY_LABELS[kind],
    extractionStrategy: 'none',
    subQueries: [],
    tokenUsage: buildTokenUsage(activity),
    sources: [],
    stats: buildStats(activity, []),
  };
}

function arrayField(value: JsonValue | undefined): JsonValue[] | undefined {
  return Array.isArray(value) ? value : undefined;
}
