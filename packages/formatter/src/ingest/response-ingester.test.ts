import { extractAssistantText, ingestResponse, ROOT_CANDIDATE } from './response-ingester.js';

describe('ingestResponse', () => {
  test('keeps non-JSON input as text', () => {
    const payload = ingestResponse('Name: Sun Hat Price: $24.00');

    expect(payload.kind).toBe('unparsed');
    expect(payload.text).toBe('Name: Sun Hat Price: $24.00');
    expect(payload.raw).toBe('Name: Sun Hat Price: $24.00');
  });

  test('treats a bare array as the only candidate', () => {
    const payload = ingestResponse('[{"ref_id":"1"}]');

    expect(payload.kind).toBe('array');
    if (payload.kind !== 'array') return;
    expect(payload.candidates).toEqual([{ source: ROOT_CANDIDATE, items: [{ ref_id: '1' }] }]);
  });

  test('rejects scalar JSON roots', () => {
    const payload = ingestResponse('42');

    expect(payload.kind).toBe('unparsed');
    if (payload.kind !== 'unparsed') return;
    expect(payload.parseError).toBe('Unsupported JSON root: number');
  });

  test('decodes byte input as UTF-8', () => {
    const payload = ingestResponse(new TextEncoder().encode('[]'));

    expect(payload.kind).toBe('array');
    expect(payload.raw).toBe('[]');
  });

  test('collects array properties and an array embedded in the assistant text', () => {
    const raw = JSON.stringify({
      response: [
        {
          role: 'assistant',
          content: [{ type: 'text', text: '[{"ref_id":1,"title":"Widget"}]' }],
        },
      ],
      activity: [],
    });

    const payload = ingestResponse(raw);

    expect(payload.kind).toBe('object');
    if (payload.kind !== 'object') return;
    expect(payload.candidates.map((candidate) => candidate.source)).toEqual([
      'response',
      'activity',
      'response:text',
    ]);
    expect(payload.candidates[2].items).toEqual([{ ref_id: 1, title: 'Widget' }]);
    expect(payload.text).toBe('[{"ref_id":1,"title":"Widget"}]');
  });

  test('joins text items of an array content field', () => {
    const raw = JSON.stringify({
      content: [
        { type: 'text', text: 'Name: Sun Hat' },
        { type: 'text', text: 'Price: $24.00' },
      ],
    });

    expect(ingestResponse(raw).text).toBe('Name: Sun Hat\nPrice: $24.00');
  });
});

describe('extractAssistantText', () => {
  test('joins assistant messages and ignores other roles', () => {
    const text = extractAssistantText({
      response: [
        { role: 'user', content: 'ignored' },
        { role: 'assistant', content: 'first' },
        { role: 'assistant', content: [{ type: 'text', text: 'second' }, { type: 'image' }] },
      ],
    });

    expect(text).toBe('first\nsecond');
  });

  test('returns undefined without a response array', () => {
    expect(extractAssistantText({ content: 'plain' })).toBeUndefined();
  });
});
