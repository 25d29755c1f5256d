import type { ExtractionStrategyName, ProductRecord } from '@agentic-retail/shared';
import type { IngestedPayload } from '../ingest/response-ingester.js';
import {
  freeTextStrategy,
  keyValueStrategy,
  listStrategy,
  structuredArrayStrategy,
  type ExtractionStrategy,
} from './strategies.js';

/** Evaluated in order; the first strategy returning products wins outright. */
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  structuredArrayStrategy,
  keyValueStrategy,
  freeTextStrategy,
  listStrategy,
];

export interface ExtractionOutcome {
  strategy: ExtractionStrategyName;
  products: ProductRecord[];
}

export function extractProducts(
  payload: IngestedPayload,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES,
): ExtractionOutcome {
  const input = {
    candidates: payload.kind === 'unparsed' ? [] : payload.candidates,
    text: payload.text,
  };

  for (const strategy of strategies) {
    const products = strategy.extract(input);
    if (products && products.length > 0) {
      return { strategy: strategy.name, products };
    }
  }

  return { strategy: 'none', products: [] };
}
