/**
 * Micro-grammar used by retail indexes to flatten a product into one string:
 *
 *   ProductNumber: 67104; Price: 45.0; Name: Trail gloves; Description: ...;
 *   Attributes: [{'Name':'Color','TextValue':'Black'}, ...]; Images: ['a.png']
 */

export interface ParsedFields {
  name?: string;
  productNumber?: string;
  price?: number;
  description?: string;
  color?: string;
  size?: string;
  material?: string;
  imageUrls: string[];
  details: string[];
}

export interface Segment {
  key: string;
  value: string;
  /** The trimmed segment as it appeared in the content. */
  text: string;
}

const KNOWN_KEYS: ReadonlySet<string> = new Set(['name', 'price', 'productnumber', 'description']);

const ATTRIBUTE_PATTERN =
  /'Name'\s*:\s*'(Color|Size|AW Material|AW Fabric)'[^}]*?'TextValue'\s*:\s*'([^']*)'/gi;

const IMAGE_PATTERN = /['"]([^'"\s]+?\.png)['"]/gi;

const PRICE_PATTERN = /^\$?\s*(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?$/;

function knownKeyPattern(key: string): RegExp {
  return new RegExp(`(?:^|;)\\s*${key}\\s*:\\s*([^;]*)`, 'i');
}

const NAME_PATTERN = knownKeyPattern('Name');
const PRICE_KEY_PATTERN = knownKeyPattern('Price');
const PRODUCT_NUMBER_PATTERN = knownKeyPattern('ProductNumber');
const DESCRIPTION_PATTERN = knownKeyPattern('Description');

/**
 * Split on `;`, then each segment on its first `:`. Segments without a colon are
 * returned with an empty key.
 */
export function splitSegments(content: string): Segment[] {
  const segments: Segment[] = [];
  for (const part of content.split(';')) {
    const trimmed = part.trim();
    if (!trimmed) continue;

    const colon = trimmed.indexOf(':');
    if (colon === -1) {
      segments.push({ key: '', value: trimmed, text: trimmed });
    } else {
      segments.push({
        key: trimmed.slice(0, colon).trim(),
        value: trimmed.slice(colon + 1).trim(),
        text: trimmed,
      });
    }
  }
  return segments;
}

export function parsePrice(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const match = PRICE_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const value = Number.parseFloat(`${match[1].replace(/,/g, '')}${match[2] ?? ''}`);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

export function hasNameKey(content: string): boolean {
  return NAME_PATTERN.test(content);
}

export function parseKeyValueContent(content: string): ParsedFields {
  const fields: ParsedFields = { imageUrls: [], details: [] };

  const name = matchValue(NAME_PATTERN, content);
  if (name) fields.name = name;

  const price = parsePrice(matchValue(PRICE_KEY_PATTERN, content));
  if (price !== undefined) fields.price = price;

  const productNumber = matchValue(PRODUCT_NUMBER_PATTERN, content);
  if (productNumber) fields.productNumber = productNumber;

  const description = matchValue(DESCRIPTION_PATTERN, content);
  if (description) fields.description = description;

  for (const match of content.matchAll(ATTRIBUTE_PATTERN)) {
    const attribute = match[1].toLowerCase();
    const value = match[2].trim();
    if (!value) continue;

    if (attribute === 'color' && fields.color === undefined) {
      fields.color = value;
    } else if (attribute === 'size' && fields.size === undefined) {
      fields.size = value.split('|').map((part) => part.trim()).filter(Boolean).join(', ');
    } else if ((attribute === 'aw material' || attribute === 'aw fabric') && fields.material === undefined) {
      fields.material = value;
    }
  }

  fields.imageUrls = collectImageUrls(content);

  for (const segment of splitSegments(content)) {
    if (!isKnownKey(segment.key)) {
      fields.details.push(segment.text);
    }
  }

  return fields;
}

export function collectImageUrls(content: string): string[] {
  const seen = new Set<string>();
  for (const match of content.matchAll(IMAGE_PATTERN)) {
    seen.add(match[1]);
  }
  return [...seen];
}

function isKnownKey(key: string): boolean {
  return KNOWN_KEYS.has(key.toLowerCase());
}

function matchValue(pattern: RegExp, content: string): string | undefined {
  const match = pattern.exec(content);
  const value = match?.[1].trim();
  return value ? value : undefined;
}
