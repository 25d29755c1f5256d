import {
  isJsonObject,
  type ExtractionStrategyName,
  type JsonObject,
  type JsonValue,
  type ProductRecord,
} from '@agentic-retail/shared';
import type { ArrayCandidate } from '../ingest/response-ingester.js';
import { hasNameKey, parseKeyValueContent, parsePrice, type ParsedFields } from './key-value-grammar.js';

export interface ExtractionInput {
  candidates: readonly ArrayCandidate[];
  text: string;
}

export interface ExtractionStrategy {
  name: Exclude<ExtractionStrategyName, 'none' | 'catalog'>;
  /** Products found, or null when the strategy does not apply. */
  extract(input: ExtractionInput): ProductRecord[] | null;
}

// Fixed per strategy; nothing is ranked at this layer
export const STRATEGY_RELEVANCE = {
  'structured-array': 0.9,
  'key-value': 0.9,
  'free-text': 0.8,
  list: 0.7,
} as const;

const FEATURE_KEYWORDS = [
  'wireless',
  'bluetooth',
  'waterproof',
  'rechargeable',
  'portable',
  'durable',
  'lightweight',
];

const STRUCTURED_KEYS = ['ref_id', 'content', 'title'];

// The description gap stops at the next name label
const FREE_TEXT_PATTERN =
  /\b(?:name|product|title)\s*:\**\s*([^\r\n]+?)\s*(?:[\r\n]+((?:(?!\b(?:name|product|title)\s*:)[\s\S])*?))?\b(?:price|cost)\s*:\**\s*\$?(\d+(?:\.\d{1,2})?)/gi;

const LIST_ITEM_PATTERN = /^[ \t]*(?:[-*•]|\d+\.)[ \t]*(.+?)[ \t]*$/gm;

const LIST_PRICE_PATTERN = /\$(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{2})?/;

export const structuredArrayStrategy: ExtractionStrategy = {
  name: 'structured-array',
  extract({ candidates }) {
    for (const candidate of candidates) {
      const products = candidate.items.flatMap((item) => {
        const product = productFromElement(item);
        return product ? [product] : [];
      });
      if (products.length > 0) {
        return products;
      }
    }
    return null;
  },
};

export const keyValueStrategy: ExtractionStrategy = {
  name: 'key-value',
  extract({ text }) {
    const products: ProductRecord[] = [];
    for (const line of text.split(/\r?\n/)) {
      if (!line.includes(';') || !hasNameKey(line)) continue;

      const product = newProduct('key-value');
      applyFields(product, parseKeyValueContent(line));
      if (isAcceptable(product)) {
        products.push(product);
      }
    }
    return products.length > 0 ? products : null;
  },
};

export const freeTextStrategy: ExtractionStrategy = {
  name: 'free-text',
  extract({ text }) {
    const products: ProductRecord[] = [];
    for (const match of text.matchAll(FREE_TEXT_PATTERN)) {
      const name = cleanProductName(match[1]);
      const price = Number.parseFloat(match[3]);
      if (!name || !Number.isFinite(price) || price < 0) continue;

      const product = newProduct('free-text');
      product.name = name;
      product.price = price;

      const description = match[2]?.replace(/\s+/g, ' ').trim();
      if (description) {
        product.description = description;
      }
      products.push(product);
    }
    return products.length > 0 ? products : null;
  },
};

export const listStrategy: ExtractionStrategy = {
  name: 'list',
  extract({ text }) {
    const products: ProductRecord[] = [];
    for (const match of text.matchAll(LIST_ITEM_PATTERN)) {
      const item = match[1];
      const priceMatch = LIST_PRICE_PATTERN.exec(item);
      const price = parsePrice(priceMatch?.[0]);
      if (!priceMatch || price === undefined) continue;

      const name = cleanProductName(
        item.replace(priceMatch[0], '').replace(/^[\s\-*•:]+|[\s\-*•:,]+$/g, ''),
      );
      if (!name) continue;

      const product = newProduct('list');
      product.name = name;
      product.price = price;

      const features = extractFeatures(item);
      if (features) {
        product.description = features;
      }
      products.push(product);
    }
    return products.length > 0 ? products : null;
  },
};

export function cleanProductName(name: string): string {
  return name
    .replace(/^\d+\.\s*/, '')
    .replace(/^[-*•]\s*/, '')
    .replace(/\*\*/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function extractFeatures(text: string): string {
  const lower = text.toLowerCase();
  return FEATURE_KEYWORDS.filter((keyword) => lower.includes(keyword)).join(', ');
}

function productFromElement(item: JsonValue): ProductRecord | null {
  if (!isJsonObject(item) || !STRUCTURED_KEYS.some((key) => key in item)) {
    return null;
  }

  const product = newProduct('structured-array');

  const refId = scalarText(item, 'ref_id');
  if (refId !== undefined) {
    product.refId = refId;
  }
  product.name = typeof item.title === 'string' ? item.title.trim() : '';

  if (typeof item.content === 'string') {
    applyFields(product, parseKeyValueContent(item.content));
  }

  return isAcceptable(product) ? product : null;
}

function newProduct(strategy: keyof typeof STRATEGY_RELEVANCE): ProductRecord {
  return { name: '', imageUrls: [], relevanceScore: STRATEGY_RELEVANCE[strategy] };
}

/** Parsed values win over what the record already holds. */
function applyFields(product: ProductRecord, fields: ParsedFields): void {
  if (fields.name !== undefined) product.name = fields.name;
  if (fields.productNumber !== undefined) product.productNumber = fields.productNumber;
  if (fields.price !== undefined) product.price = fields.price;
  if (fields.description !== undefined) product.description = fields.description;
  if (fields.color !== undefined) product.color = fields.color;
  if (fields.size !== undefined) product.size = fields.size;
  if (fields.material !== undefined) product.material = fields.material;

  for (const url of fields.imageUrls) {
    if (!product.imageUrls.includes(url)) {
      product.imageUrls.push(url);
    }
  }
  if (fields.details.length > 0) {
    product.details = [...(product.details ?? []), ...fields.details];
  }
}

function isAcceptable(product: ProductRecord): boolean {
  return product.name.trim() !== '' || (product.description ?? '').trim() !== '';
}

function scalarText(item: JsonObject, key: string): string | undefined {
  const value = item[key];
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  return undefined;
}
