import { collectImageUrls, parseKeyValueContent, parsePrice, splitSegments } from './key-value-grammar.js';

const GLOVES =
  "ProductNumber: 67104; Price: 45.0; Name: Trail gloves; Description: Warm gloves; " +
  "Attributes: [{'Name':'Color','TextValue':'Black'},{'Name':'Size','TextValue':'S|M|L'}]; " +
  "Images: ['a.png','b.png']";

describe('parseKeyValueContent', () => {
  test('reads known keys, attributes and images', () => {
    const fields = parseKeyValueContent(GLOVES);

    expect(fields.name).toBe('Trail gloves');
    expect(fields.productNumber).toBe('67104');
    expect(fields.price).toBe(45);
    expect(fields.description).toBe('Warm gloves');
    expect(fields.color).toBe('Black');
    expect(fields.size).toBe('S, M, L');
    expect(fields.imageUrls).toEqual(['a.png', 'b.png']);
  });

  test('keeps unknown segments verbatim as details', () => {
    const fields = parseKeyValueContent(GLOVES);

    expect(fields.details).toEqual([
      "Attributes: [{'Name':'Color','TextValue':'Black'},{'Name':'Size','TextValue':'S|M|L'}]",
      "Images: ['a.png','b.png']",
    ]);
  });

  test('leaves price absent when the text is not a number', () => {
    const fields = parseKeyValueContent('Name: Mystery Box; Price: abc');

    expect(fields.name).toBe('Mystery Box');
    expect(fields.price).toBeUndefined();
  });

  test('first occurrence of a key wins', () => {
    expect(parseKeyValueContent('Name: First; Name: Second').name).toBe('First');
  });
});

describe('parsePrice', () => {
  test('accepts plain, dollar and grouped values', () => {
    expect(parsePrice('19.99')).toBe(19.99);
    expect(parsePrice('$24')).toBe(24);
    expect(parsePrice('1,299.50')).toBe(1299.5);
  });

  test('rejects negative and malformed values', () => {
    expect(parsePrice('-5')).toBeUndefined();
    expect(parsePrice('abc')).toBeUndefined();
    expect(parsePrice('')).toBeUndefined();
    expect(parsePrice(undefined)).toBeUndefined();
  });
});

describe('splitSegments', () => {
  test('splits on the first colon of each segment', () => {
    expect(splitSegments('Url: http://x; loose ;')).toEqual([
      { key: 'Url', value: 'http://x', text: 'Url: http://x' },
      { key: '', value: 'loose', text: 'loose' },
    ]);
  });
});

describe('collectImageUrls', () => {
  test('deduplicates image references', () => {
    expect(collectImageUrls(`['x.png', "x.png", 'y.png']`)).toEqual(['x.png', 'y.png']);
  });
});
