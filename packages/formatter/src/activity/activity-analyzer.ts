import { z } from 'zod';
import type {
  ActivityKind,
  ActivityRecord,
  JsonValue,
  SubQuery,
  TokenCount,
  TokenUsage,
} from '@agentic-retail/shared';

// Roughly $0.02 per 1K tokens
export const COST_PER_1K_TOKENS = 0.02;

const EXACT_KINDS: ReadonlyMap<string, ActivityKind> = new Map([
  ['modelqueryplanning', 'Planning'],
  ['azuresearchquery', 'Search'],
  ['azuresearchsemanticranker', 'SemanticRanking'],
]);

// Ranker before search so "...SearchSemanticRanker" variants are not counted as retrieval
const SUBSTRING_KINDS: ReadonlyArray<[string, ActivityKind]> = [
  ['planning', 'Planning'],
  ['semanticranker', 'SemanticRanking'],
  ['search', 'Search'],
];

const countSchema = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().nonnegative())
  .optional()
  .catch(undefined);

const optionalText = z.string().optional().catch(undefined);

// Every field degrades to absent on its own so one bad value never drops the entry
const activityEntrySchema = z.object({
  type: z.string().catch(''),
  id: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  targetIndex: optionalText,
  query: z
    .object({
      search: z.string().catch(''),
      filter: optionalText,
    })
    .optional()
    .catch(undefined),
  queryTime: optionalText,
  count: countSchema,
  elapsedMs: countSchema,
  inputTokens: countSchema,
  outputTokens: countSchema,
});

export interface ActivityAnalysis {
  records: ActivityRecord[];
  counts: Record<ActivityKind, number>;
  totalElapsedMs: number;
  tokens: {
    total: TokenCount;
    planning: TokenCount;
    search: TokenCount;
  };
  subQueries: SubQuery[];
}

export interface AnalyzeOptions {
  /** Clock used when an activity has no usable `queryTime`. */
  now?: () => Date;
}

export function classifyActivityType(type: string): ActivityKind {
  const normalized = type.trim().toLowerCase();

  const exact = EXACT_KINDS.get(normalized);
  if (exact) return exact;

  for (const [token, kind] of SUBSTRING_KINDS) {
    if (normalized.includes(token)) return kind;
  }
  return 'Other';
}

export function describeQueryPurpose(query: string): string {
  const lower = query.toLowerCase();
  if (!lower.trim()) return 'General search';
  if (lower.includes('price')) return 'Price analysis';
  if (lower.includes('feature')) return 'Feature comparison';
  if (lower.includes('review')) return 'Review analysis';
  if (lower.includes('spec')) return 'Specification lookup';
  return 'Product discovery';
}

export function analyzeActivity(
  items: readonly JsonValue[] | undefined,
  options: AnalyzeOptions = {},
): ActivityAnalysis {
  const now = options.now ?? (() => new Date());

  const analysis: ActivityAnalysis = {
    records: [],
    counts: { Planning: 0, Search: 0, SemanticRanking: 0, Other: 0 },
    totalElapsedMs: 0,
    tokens: {
      total: { inputTokens: 0, outputTokens: 0 },
      planning: { inputTokens: 0, outputTokens: 0 },
      search: { inputTokens: 0, outputTokens: 0 },
    },
    subQueries: [],
  };

  (items ?? []).forEach((item, position) => {
    const record = toActivityRecord(item, position);
    if (!record) return;

    analysis.records.push(record);
    analysis.counts[record.kind] += 1;
    analysis.totalElapsedMs += record.elapsedMs ?? 0;

    addTokens(analysis.tokens.total, record);
    if (record.kind === 'Planning') {
      addTokens(analysis.tokens.planning, record);
    } else if (record.kind === 'Search') {
      addTokens(analysis.tokens.search, record);
    }

    const search = record.query?.search.trim();
    if (record.kind === 'Search' && search) {
      const timestamp = record.queryTime ?? now().toISOString();
      const subQuery: SubQuery = {
        index: analysis.subQueries.length + 1,
        activityId: record.id,
        query: search,
        resultCount: record.resultCount ?? 0,
        elapsedMs: record.elapsedMs ?? 0,
        queryTime: timestamp,
        queryTimeEstimated: record.queryTime === undefined,
        purpose: describeQueryPurpose(search),
        sourceIds: [],
      };
      if (record.query?.filter) {
        subQuery.filter = record.query.filter;
      }
      analysis.subQueries.push(subQuery);
    }
  });

  return analysis;
}

export function buildTokenUsage(analysis: ActivityAnalysis): TokenUsage {
  const { inputTokens, outputTokens } = analysis.tokens.total;
  const totalTokens = inputTokens + outputTokens;
  return {
    inputTokens,
    outputTokens,
    totalTokens,
    estimatedCost: roundTo((totalTokens * COST_PER_1K_TOKENS) / 1000, 6),
    breakdown: {
      planning: { ...analysis.tokens.planning },
      search: { ...analysis.tokens.search },
    },
  };
}

function toActivityRecord(item: JsonValue, position: number): ActivityRecord | null {
  const parsed = activityEntrySchema.safeParse(item);
  if (!parsed.success) {
    return null;
  }

  const entry = parsed.data;
  const record: ActivityRecord = {
    kind: classifyActivityType(entry.type),
    id: entry.id ?? String(position + 1),
    type: entry.type,
  };

  if (entry.targetIndex !== undefined) record.targetIndex = entry.targetIndex;
  if (entry.query) {
    record.query = entry.query.filter
      ? { search: entry.query.search, filter: entry.query.filter }
      : { search: entry.query.search };
  }
  if (entry.count !== undefined) record.resultCount = entry.count;
  if (entry.elapsedMs !== undefined) record.elapsedMs = entry.elapsedMs;
  if (entry.inputTokens !== undefined) record.inputTokens = entry.inputTokens;
  if (entry.outputTokens !== undefined) record.outputTokens = entry.outputTokens;

  const queryTime = normalizeTimestamp(entry.queryTime);
  if (queryTime !== undefined) record.queryTime = queryTime;

  return record;
}

function normalizeTimestamp(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const millis = Date.parse(value);
  return Number.isNaN(millis) ? undefined : new Date(millis).toISOString();
}

function addTokens(target: TokenCount, record: ActivityRecord): void {
  target.inputTokens += record.inputTokens ?? 0;
  target.outputTokens += record.outputTokens ?? 0;
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
