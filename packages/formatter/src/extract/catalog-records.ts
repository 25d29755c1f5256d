import { isJsonObject, type JsonObject, type JsonValue, type ProductRecord } from '@agentic-retail/shared';
import type { IngestedPayload } from '../ingest/response-ingester.js';
import { parsePrice } from './key-value-grammar.js';

export const CATALOG_RELEVANCE = 0.9;

/**
 * Products from an enterprise catalog payload: `value[]` rows (`name`, `price`,
 * `productnumber`, `description`) or unified-search `results[]` (`title`,
 * `content`, `score`). Null when the payload has neither array.
 */
export function extractCatalogProducts(payload: IngestedPayload): ProductRecord[] | null {
  if (payload.kind !== 'object') {
    return null;
  }

  const { value, results } = payload.root;

  if (Array.isArray(value)) {
    return collect(value, fromCatalogRow);
  }
  if (Array.isArray(results)) {
    return collect(results, fromSearchResult);
  }
  return null;
}

function collect(items: JsonValue[], read: (item: JsonObject) => ProductRecord | null): ProductRecord[] {
  const products: ProductRecord[] = [];
  for (const item of items) {
    if (!isJsonObject(item)) continue;
    const product = read(item);
    if (product) products.push(product);
  }
  return products;
}

function fromCatalogRow(row: JsonObject): ProductRecord | null {
  const name = stringField(row, 'name');
  if (!name) return null;

  const product: ProductRecord = { name, imageUrls: [], relevanceScore: CATALOG_RELEVANCE };

  const price = priceField(row.price);
  if (price !== undefined) product.price = price;

  const productNumber = stringField(row, 'productnumber');
  if (productNumber) product.productNumber = productNumber;

  const description = stringField(row, 'description');
  if (description) product.description = description;

  return product;
}

function fromSearchResult(result: JsonObject): ProductRecord | null {
  const name = stringField(result, 'title');
  const description = stringField(result, 'content');
  if (!name && !description) return null;

  const score = result.score;
  const product: ProductRecord = {
    name: name ?? '',
    imageUrls: [],
    relevanceScore: typeof score === 'number' && Number.isFinite(score) ? score : CATALOG_RELEVANCE,
  };

  const refId = stringField(result, 'id');
  if (refId) product.refId = refId;
  if (description) product.description = description;

  return product;
}

function stringField(item: JsonObject, key: string): string | undefined {
  const value = item[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function priceField(value: JsonValue | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }
  return typeof value === 'string' ? parsePrice(value) : undefined;
}
