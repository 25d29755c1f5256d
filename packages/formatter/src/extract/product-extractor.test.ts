import { ingestResponse } from '../ingest/response-ingester.js';
import { extractProducts } from './product-extractor.js';
import { cleanProductName, extractFeatures, freeTextStrategy } from './strategies.js';

describe('extractProducts', () => {
  test('reads a structured array element', () => {
    const payload = ingestResponse(
      '[{"ref_id":"1","title":"Widget","content":"Name: Widget; Price: 19.99; Description: basic widget"}]',
    );

    const outcome = extractProducts(payload);

    expect(outcome.strategy).toBe('structured-array');
    expect(outcome.products).toEqual([
      {
        refId: '1',
        name: 'Widget',
        price: 19.99,
        description: 'basic widget',
        imageUrls: [],
        relevanceScore: 0.9,
      },
    ]);
  });

  test('falls through to free text when no array is present', () => {
    const outcome = extractProducts(ingestResponse('Name: Sun Hat Price: $24.00'));

    expect(outcome.strategy).toBe('free-text');
    expect(outcome.products).toEqual([{ name: 'Sun Hat', price: 24, imageUrls: [], relevanceScore: 0.8 }]);
  });

  test('content fields override the element title', () => {
    const payload = ingestResponse('[{"ref_id":7,"title":"Listing title","content":"Name: Real Name; Price: 5"}]');

    const [product] = extractProducts(payload).products;

    expect(product.refId).toBe('7');
    expect(product.name).toBe('Real Name');
  });

  test('keeps a product whose price cannot be parsed', () => {
    const payload = ingestResponse('[{"ref_id":"2","content":"Name: Mystery Box; Price: abc"}]');

    const [product] = extractProducts(payload).products;

    expect(product.name).toBe('Mystery Box');
    expect('price' in product).toBe(false);
  });

  test('drops an element with nothing recoverable', () => {
    const outcome = extractProducts(ingestResponse('[{"ref_id":"3","content":"Price: abc"}]'));

    expect(outcome).toEqual({ strategy: 'none', products: [] });
  });

  test('moves on to the next array when every element is rejected', () => {
    const raw = JSON.stringify({
      first: [{ ref_id: '3', content: 'Price: abc' }],
      items: [{ title: 'Boot', content: 'Price: 80' }],
    });

    const outcome = extractProducts(ingestResponse(raw));

    expect(outcome).toEqual({
      strategy: 'structured-array',
      products: [{ name: 'Boot', price: 80, imageUrls: [], relevanceScore: 0.9 }],
    });
  });

  test('an unpriced product does not take the next product price', () => {
    const outcome = extractProducts(ingestResponse('Name: Rain Cap\nPrice: TBD\n\nName: Sun Hat\nPrice: $24.00'));

    expect(outcome).toEqual({
      strategy: 'free-text',
      products: [{ name: 'Sun Hat', price: 24, imageUrls: [], relevanceScore: 0.8 }],
    });
  });

  test('reads list prices with thousands separators', () => {
    const outcome = extractProducts(ingestResponse('- Laptop Pro $1,299.99'));

    expect(outcome).toEqual({
      strategy: 'list',
      products: [{ name: 'Laptop Pro', price: 1299.99, imageUrls: [], relevanceScore: 0.7 }],
    });
  });

  test('the first strategy with products wins', () => {
    const raw = JSON.stringify({
      response: [
        {
          role: 'assistant',
          content: [{ type: 'text', text: '[{"title":"Boot","content":"Price: 80"}]\nName: Other Price: $10' }],
        },
      ],
      items: [{ title: 'Boot', content: 'Price: 80' }],
    });

    const outcome = extractProducts(ingestResponse(raw));

    expect(outcome.strategy).toBe('structured-array');
    expect(outcome.products.map((product) => product.name)).toEqual(['Boot']);
  });

  test('reads semicolon lines with a Name key', () => {
    const outcome = extractProducts(ingestResponse('Name: A; Price: 5\nName: B; Price: 7.5'));

    expect(outcome.strategy).toBe('key-value');
    expect(outcome.products).toEqual([
      { name: 'A', price: 5, imageUrls: [], relevanceScore: 0.9 },
      { name: 'B', price: 7.5, imageUrls: [], relevanceScore: 0.9 },
    ]);
  });

  test('reads priced bullet lists last', () => {
    const outcome = extractProducts(ingestResponse('Options:\n- Trail Gloves waterproof $29.99\n- No price here'));

    expect(outcome.strategy).toBe('list');
    expect(outcome.products).toEqual([
      {
        name: 'Trail Gloves waterproof',
        price: 29.99,
        description: 'waterproof',
        imageUrls: [],
        relevanceScore: 0.7,
      },
    ]);
  });

  test('reports no strategy when nothing matches', () => {
    const outcome = extractProducts(
      ingestResponse('{"response":[{"role":"assistant","content":[{"type":"text","text":"No matches."}]}]}'),
    );

    expect(outcome).toEqual({ strategy: 'none', products: [] });
  });
});

describe('freeTextStrategy', () => {
  test('captures the lines between name and price as description', () => {
    const products = freeTextStrategy.extract({
      candidates: [],
      text: 'Product: **Rain Jacket**\nLight and packable\nPrice: $59.99',
    });

    expect(products).toEqual([
      {
        name: 'Rain Jacket',
        price: 59.99,
        description: 'Light and packable',
        imageUrls: [],
        relevanceScore: 0.8,
      },
    ]);
  });
});

describe('helpers', () => {
  test('cleanProductName strips numbering and emphasis', () => {
    expect(cleanProductName('2. **Camp  Stove**')).toBe('Camp Stove');
  });

  test('extractFeatures lists known keywords', () => {
    expect(extractFeatures('Wireless and Portable speaker')).toBe('wireless, portable');
  });
});
