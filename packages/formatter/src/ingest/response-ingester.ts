import { isJsonObject, type JsonObject, type JsonValue } from '@agentic-retail/shared';

export const ROOT_CANDIDATE = '$root';

export interface ArrayCandidate {
  /** Property the array was found under, `$root` for a bare array payload. */
  source: string;
  items: JsonValue[];
}

export type IngestedPayload =
  | { kind: 'unparsed'; raw: string; text: string; parseError: string }
  | { kind: 'array'; raw: string; root: JsonValue[]; candidates: ArrayCandidate[]; text: string }
  | { kind: 'object'; raw: string; root: JsonObject; candidates: ArrayCandidate[]; text: string };

const decoder = new TextDecoder('utf-8');

/**
 * Parse a retrieval-agent payload without ever throwing.
 *
 * Object payloads are scanned one level deep: every array-valued property becomes a
 * candidate in property order, followed by any JSON array embedded as text in a
 * string `content` field or in the assistant message.
 */
export function ingestResponse(input: string | Uint8Array): IngestedPayload {
  const raw = typeof input === 'string' ? input : decoder.decode(input);

  const parsed = tryParseJson(raw);
  if (!parsed.ok) {
    return { kind: 'unparsed', raw, text: raw, parseError: parsed.error };
  }

  const root = parsed.value;

  if (Array.isArray(root)) {
    return {
      kind: 'array',
      raw,
      root,
      candidates: [{ source: ROOT_CANDIDATE, items: root }],
      text: raw,
    };
  }

  if (!isJsonObject(root)) {
    return { kind: 'unparsed', raw, text: raw, parseError: `Unsupported JSON root: ${describe(root)}` };
  }

  const candidates: ArrayCandidate[] = [];
  for (const [key, value] of Object.entries(root)) {
    if (Array.isArray(value)) {
      candidates.push({ source: key, items: value });
    }
  }

  const assistantText = extractAssistantText(root);
  const contentText = typeof root.content === 'string' ? root.content : joinTextItems(root.content);

  for (const [source, embedded] of [
    ['content', contentText],
    ['response', assistantText],
  ] as const) {
    const items = embedded === undefined ? undefined : parseEmbeddedArray(embedded);
    if (items) {
      candidates.push({ source: `${source}:text`, items });
    }
  }

  return {
    kind: 'object',
    raw,
    root,
    candidates,
    text: assistantText ?? contentText ?? raw,
  };
}

/**
 * Text of every `text` content item of assistant messages, joined by newlines.
 */
export function extractAssistantText(root: JsonObject): string | undefined {
  const response = root.response;
  if (!Array.isArray(response)) {
    return undefined;
  }

  const texts: string[] = [];
  for (const message of response) {
    if (!isJsonObject(message) || message.role !== 'assistant') continue;

    const content = message.content;
    if (typeof content === 'string') {
      texts.push(content);
      continue;
    }
    const joined = joinTextItems(content);
    if (joined !== undefined) {
      texts.push(joined);
    }
  }

  return texts.length > 0 ? texts.join('\n') : undefined;
}

/**
 * `text` of every `{ type: 'text', text }` item, joined by newlines.
 */
function joinTextItems(content: JsonValue | undefined): string | undefined {
  if (!Array.isArray(content)) {
    return undefined;
  }

  const texts: string[] = [];
  for (const item of content) {
    if (isJsonObject(item) && typeof item.text === 'string') {
      texts.push(item.text);
    }
  }
  return texts.length > 0 ? texts.join('\n') : undefined;
}

function parseEmbeddedArray(text: string): JsonValue[] | undefined {
  if (!text.trimStart().startsWith('[')) {
    return undefined;
  }
  const parsed = tryParseJson(text);
  return parsed.ok && Array.isArray(parsed.value) ? parsed.value : undefined;
}

type ParseOutcome = { ok: true; value: JsonValue } | { ok: false; error: string };

function tryParseJson(text: string): ParseOutcome {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

function describe(value: JsonValue): string {
  return value === null ? 'null' : typeof value;
}
