import type { Logger } from '@agentic-retail/logger';
import { NO_PRODUCTS_SUMMARY } from '../summary/summary-composer.js';
import {
  FORMAT_FAILED_MESSAGE,
  formatAgenticResponse,
  formatDataverseResponse,
  formatFailureResponse,
  formatPendingResponse,
  formatRagResponse,
  formatSearchResponse,
} from './response-assembler.js';

const fixedNow = () => new Date('2025-06-01T00:00:00.000Z');

const AGENT_PAYLOAD = JSON.stringify({
  response: [{ role: 'assistant', content: [{ type: 'text', text: 'No matches.' }] }],
  activity: [
    { type: 'ModelQueryPlanning', id: 1, inputTokens: 100, outputTokens: 40 },
    { type: 'AzureSearchQuery', id: 2, query: { search: 'red shoes' }, queryTime: '2025-01-01T10:00:00Z', count: 5, elapsedMs: 120 },
    { type: 'AzureSearchQuery', id: 3, query: { search: 'running shoe features' }, count: 3, elapsedMs: 80 },
  ],
  references: [{ type: 'AzureSearchDoc', id: '0', activitySource: 2, docKey: 'doc-1', sourceData: { title: 'Red Runner' } }],
});

describe('formatAgenticResponse', () => {
  test('summarizes an empty result with the fixed message', () => {
    const response = formatAgenticResponse(AGENT_PAYLOAD, 'red shoes', { now: fixedNow });

    expect(response.success).toBe(true);
    expect(response.status).toBe('complete');
    expect(response.searchType).toBe('Agentic AI Search');
    expect(response.result?.summary).toBe(NO_PRODUCTS_SUMMARY);
    expect(response.result?.products).toEqual([]);
    expect(response.metadata?.extractionStrategy).toBe('none');
  });

  test('reports stats, token usage and linked sub-queries', () => {
    const metadata = formatAgenticResponse(AGENT_PAYLOAD, 'red shoes', { now: fixedNow, processingTimeMs: 42 }).metadata;

    expect(metadata?.processingTimeMs).toBe(42);
    expect(metadata?.stats).toEqual({
      planningOperations: 1,
      parallelQueries: 2,
      documentsSearched: 1,
      rankingOperations: 0,
      totalElapsedMs: 200,
    });
    expect(metadata?.tokenUsage.totalTokens).toBe(140);
    expect(metadata?.tokenUsage.breakdown.planning).toEqual({ inputTokens: 100, outputTokens: 40 });
    expect(metadata?.subQueries.map((subQuery) => subQuery.sourceIds)).toEqual([['0'], []]);
    expect(metadata?.sources[0].title).toBe('Red Runner');
  });

  test('is deterministic for the same input and clock', () => {
    const first = formatAgenticResponse(AGENT_PAYLOAD, 'red shoes', { now: fixedNow });
    const second = formatAgenticResponse(AGENT_PAYLOAD, 'red shoes', { now: fixedNow });

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  test('keeps the raw payload unless asked not to', () => {
    expect(formatAgenticResponse('plain', 'q').rawResponse).toBe('plain');
    expect(formatAgenticResponse('plain', 'q', { includeRaw: false }).rawResponse).toBeUndefined();
  });

  test('formats non-JSON input through the text strategies', () => {
    const response = formatAgenticResponse('Name: Sun Hat Price: $24.00', 'hats');

    expect(response.success).toBe(true);
    expect(response.metadata?.extractionStrategy).toBe('free-text');
    expect(response.result?.summary).toBe(
      'Found 1 product matching your criteria. The product is **Sun Hat** priced at $24.00.',
    );
    expect(response.metadata?.subQueries).toEqual([]);
  });
});

describe('formatRagResponse', () => {
  test('summarizes the text and reads insights', () => {
    const response = formatRagResponse(
      JSON.stringify({ content: 'Tip: Compare warranty terms.\nThe Trail gloves are warm.' }),
      'gloves',
    );

    expect(response.result?.summary).toBe('Tip: Compare warranty terms. The Trail gloves are warm.');
    expect(response.result?.insights.map((insight) => insight.title)).toEqual(['Tip']);
    expect(response.result?.explanation).toBe(
      "Used semantic vector search to find 0 relevant products for 'gloves'. " +
        'Results are ranked by semantic similarity to your query.',
    );
    expect(response.metadata?.searchStrategy).toBe('Semantic Vector Search with RAG');
  });
});

describe('formatDataverseResponse', () => {
  test('reads catalog rows', () => {
    const response = formatDataverseResponse(
      JSON.stringify({
        value: [
          { name: 'Laptop Stand', price: 49.5, productnumber: 'LS-1' },
          { name: 'Cookbook', price: '20' },
          { price: 5 },
        ],
      }),
      'desk',
    );

    expect(response.metadata?.extractionStrategy).toBe('catalog');
    expect(response.result?.products).toEqual([
      { name: 'Laptop Stand', price: 49.5, productNumber: 'LS-1', imageUrls: [], relevanceScore: 0.9 },
      { name: 'Cookbook', price: 20, imageUrls: [], relevanceScore: 0.9 },
    ]);
    expect(response.result?.summary).toBe(
      'Found 2 products across 2 categories. Average price: $34.75. Data retrieved from enterprise Dataverse.',
    );
    expect(response.result?.insights[0].content).toBe('Retrieved 2 products from enterprise database');
  });

  test('reads unified search results with their scores', () => {
    const response = formatDataverseResponse(
      JSON.stringify({ results: [{ title: 'Kettle', content: 'Steel kettle', score: 0.42 }] }),
      'kettle',
    );

    expect(response.result?.products).toEqual([
      { name: 'Kettle', description: 'Steel kettle', imageUrls: [], relevanceScore: 0.42 },
    ]);
  });
});

describe('formatSearchResponse', () => {
  test('turns an internal failure into a failed response', () => {
    const error = jest.fn();
    const logger: Logger = {
      info: jest.fn(),
      warn: jest.fn(),
      error,
      debug: () => {
        throw new Error('boom');
      },
      child: () => logger,
    };

    const response = formatSearchResponse('generic', 'not json', 'q', { logger });

    expect(response).toEqual({
      success: false,
      status: 'failed',
      searchType: 'Search',
      query: 'q',
      error: FORMAT_FAILED_MESSAGE,
      rawResponse: 'not json',
    });
    expect(error).toHaveBeenCalledTimes(1);
  });

  test('returns a failed response when the logger cannot create a child', () => {
    const error = jest.fn();
    const logger: Logger = {
      info: jest.fn(),
      warn: jest.fn(),
      error,
      debug: jest.fn(),
      child: () => {
        throw new Error('boom');
      },
    };

    const response = formatSearchResponse('generic', 'not json', 'q', { logger });

    expect(response.success).toBe(false);
    expect(response.status).toBe('failed');
    expect(response.error).toBe(FORMAT_FAILED_MESSAGE);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe('formatPendingResponse', () => {
  test('is a successful response with empty collections', () => {
    const response = formatPendingResponse('agentic', 'boots', 'Agent is warming up', 15);

    expect(response.success).toBe(true);
    expect(response.status).toBe('pending');
    expect(response.result?.summary).toBe('Agent is warming up');
    expect(response.result?.products).toEqual([]);
    expect(response.metadata?.processingTimeMs).toBe(15);
    expect(response.metadata?.tokenUsage.totalTokens).toBe(0);
  });
});

describe('formatFailureResponse', () => {
  test('adds metadata only when a processing time is given', () => {
    expect(formatFailureResponse('rag', 'q', 'Upstream failed').metadata).toBeUndefined();
    expect(formatFailureResponse('rag', 'q', 'Upstream failed', 9).metadata?.processingTimeMs).toBe(9);
  });
});
