import type {
  InsightItem,
  InsightType,
  ProductRecord,
  RecommendationItem,
  SearchKind,
} from '@agentic-retail/shared';

export const NO_PRODUCTS_SUMMARY =
  'No products found that exactly match your request. Try rephrasing your query or adjusting the price range.';

export const NO_CATALOG_PRODUCTS_SUMMARY = 'No products found in the enterprise database.';

const MAX_TEXT_SUMMARY_LENGTH = 500;
const NAMED_PRODUCTS = 3;

interface InsightPattern {
  pattern: RegExp;
  type: InsightType;
  icon: string;
  color: string;
}

const INSIGHT_PATTERNS: readonly InsightPattern[] = [
  { pattern: /\b(tip|advice|recommendation):\s*(.+?)\s*$/gim, type: 'tip', icon: 'fa-lightbulb', color: 'success' },
  { pattern: /\b(note|important|remember):\s*(.+?)\s*$/gim, type: 'info', icon: 'fa-info-circle', color: 'info' },
  {
    pattern: /\b(warning|caution|be aware):\s*(.+?)\s*$/gim,
    type: 'warning',
    icon: 'fa-exclamation-triangle',
    color: 'warning',
  },
  {
    pattern: /\b(comparison|vs|versus):\s*(.+?)\s*$/gim,
    type: 'comparison',
    icon: 'fa-balance-scale',
    color: 'primary',
  },
];

const CATEGORY_KEYWORDS: ReadonlyArray<[string, string]> = [
  ['laptop', 'Electronics'],
  ['phone', 'Electronics'],
  ['book', 'Books'],
  ['clothing', 'Apparel'],
  ['shoe', 'Footwear'],
  ['kitchen', 'Home & Kitchen'],
  ['toy', 'Toys & Games'],
];

export function composeExplanation(kind: SearchKind, query: string, resultCount: number): string {
  switch (kind) {
    case 'rag':
      return (
        `Used semantic vector search to find ${resultCount} relevant products for '${query}'. ` +
        'Results are ranked by semantic similarity to your query.'
      );
    case 'agentic':
      return (
        `AI agent analyzed your query '${query}' and created optimized sub-queries to find ${resultCount} products. ` +
        'The agent used intelligent query planning and parallel search for comprehensive results.'
      );
    case 'dataverse':
      return (
        `Searched enterprise database for '${query}' and found ${resultCount} products. ` +
        'Results include complete product information from our business systems.'
      );
    default:
      return `Found ${resultCount} results for your query '${query}'.`;
  }
}

export function composeProductSummary(products: readonly ProductRecord[]): string {
  if (products.length === 0) {
    return NO_PRODUCTS_SUMMARY;
  }

  const heading = `Found ${products.length} product${products.length > 1 ? 's' : ''} matching your criteria.`;

  if (products.length === 1) {
    const [product] = products;
    const price = product.price !== undefined ? ` priced at ${formatPrice(product.price)}` : '';
    return `${heading} The product is **${displayName(product)}**${price}.`;
  }

  const names = products
    .slice(0, NAMED_PRODUCTS)
    .map((product) => `**${displayName(product)}**`)
    .join(', ');
  const range = priceRange(products);

  if (products.length <= NAMED_PRODUCTS) {
    return `${heading} Products include: ${names}${range ? ` with prices ranging from ${range}` : ''}.`;
  }

  const remaining = products.length - NAMED_PRODUCTS;
  return `${heading} Top products include: ${names} and ${remaining} more${
    range ? `, with prices ranging from ${range}` : ''
  }.`;
}

/**
 * `$min - $max` over products with a positive price, or undefined when none has one.
 */
export function priceRange(products: readonly ProductRecord[]): string | undefined {
  const prices = products
    .map((product) => product.price)
    .filter((price): price is number => price !== undefined && price > 0);

  if (prices.length === 0) {
    return undefined;
  }
  return `${formatPrice(Math.min(...prices))} - ${formatPrice(Math.max(...prices))}`;
}

export function composeTextSummary(text: string): string {
  const cleaned = cleanText(text);
  return cleaned.length > MAX_TEXT_SUMMARY_LENGTH
    ? `${cleaned.slice(0, MAX_TEXT_SUMMARY_LENGTH - 3)}...`
    : cleaned;
}

export function composeCatalogSummary(products: readonly ProductRecord[]): string {
  if (products.length === 0) {
    return NO_CATALOG_PRODUCTS_SUMMARY;
  }

  const categories = new Set(products.map((product) => categorize(product.name)));
  const prices = products
    .map((product) => product.price)
    .filter((price): price is number => price !== undefined && price > 0);
  const average = prices.length > 0 ? prices.reduce((sum, price) => sum + price, 0) / prices.length : 0;

  return (
    `Found ${products.length} products across ${categories.size} categor${categories.size === 1 ? 'y' : 'ies'}. ` +
    `Average price: ${formatPrice(average)}. Data retrieved from enterprise Dataverse.`
  );
}

export function extractInsights(text: string): InsightItem[] {
  const insights: InsightItem[] = [];
  for (const { pattern, type, icon, color } of INSIGHT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      insights.push({ type, title: match[1], content: match[2].trim(), icon, color });
    }
  }
  return insights;
}

export function composeRecommendations(text: string): RecommendationItem[] {
  const lower = text.toLowerCase();
  const recommendations: RecommendationItem[] = [];

  if (lower.includes('budget') || lower.includes('under $')) {
    recommendations.push({
      title: 'Budget-Friendly Options',
      description: 'Consider these cost-effective alternatives that provide great value',
      icon: 'fa-dollar-sign',
      category: 'Budget',
      tags: ['affordable', 'value', 'savings'],
    });
  }

  if (lower.includes('feature') || lower.includes('quality')) {
    recommendations.push({
      title: 'Feature Comparison',
      description: 'Compare key features to find the best fit for your needs',
      icon: 'fa-list-check',
      category: 'Features',
      tags: ['comparison', 'features', 'analysis'],
    });
  }

  return recommendations;
}

export function enterpriseDataInsight(productCount: number): InsightItem {
  return {
    type: 'info',
    title: 'Enterprise Data',
    content: `Retrieved ${productCount} products from enterprise database`,
    icon: 'fa-database',
    color: 'info',
  };
}

export function categorize(productName: string): string {
  const lower = productName.toLowerCase();
  const hit = CATEGORY_KEYWORDS.find(([keyword]) => lower.includes(keyword));
  return hit ? hit[1] : 'General';
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

function displayName(product: ProductRecord): string {
  return product.name || 'Unnamed product';
}
