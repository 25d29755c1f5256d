import { isJsonObject, type JsonObject, type JsonValue, type SourceReference } from '@agentic-retail/shared';

// No ranking signal reaches this layer
export const DEFAULT_REFERENCE_RELEVANCE = 0.8;

export function collectReferences(items: readonly JsonValue[] | undefined): SourceReference[] {
  const references: SourceReference[] = [];

  (items ?? []).forEach((item, position) => {
    if (!isJsonObject(item)) return;

    const sourceData = isJsonObject(item.sourceData) ? item.sourceData : undefined;
    const docKey = text(item, 'docKey');

    const reference: SourceReference = {
      id: text(item, 'id') ?? docKey ?? `reference-${position + 1}`,
      title: (sourceData && text(sourceData, 'title')) ?? docKey ?? '',
      type: text(item, 'type') ?? 'document',
      relevanceScore: DEFAULT_REFERENCE_RELEVANCE,
    };

    const content = sourceData ? text(sourceData, 'content') : undefined;
    if (content !== undefined) reference.content = content;

    const activitySource = text(item, 'activitySource');
    if (activitySource !== undefined) reference.activitySource = activitySource;

    references.push(reference);
  });

  return references;
}

function text(item: JsonObject, key: string): string | undefined {
  const value = item[key];
  if (typeof value === 'string' && value.trim() !== '') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}
