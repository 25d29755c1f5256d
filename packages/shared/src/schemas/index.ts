import { z } from 'zod';
import { SEARCH_KINDS } from '../constants/index.js';

// Search Schemas
export const agenticSearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query cannot be empty').max(1000, 'Query too long'),
  systemPrompt: z.string().max(8000, 'System prompt too long').optional(),
});

export const searchKindSchema = z.enum([
  SEARCH_KINDS.RAG,
  SEARCH_KINDS.AGENTIC,
  SEARCH_KINDS.DATAVERSE,
  SEARCH_KINDS.GENERIC,
]);

export const formatRequestSchema = z.object({
  searchType: searchKindSchema,
  query: z.string().max(1000, 'Query too long'),
  rawResponse: z.string(),
  processingTimeMs: z.number().int().nonnegative().optional(),
});

// Export inferred types
export type AgenticSearchInput = z.infer<typeof agenticSearchRequestSchema>;
export type FormatRequestInput = z.infer<typeof formatRequestSchema>;
