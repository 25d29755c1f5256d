import { setTimeout as sleep } from 'timers/promises';

export interface ChunkOptions {
  wordsPerChunk: number;
  delayMs: number;
  signal?: AbortSignal;
}

/**
 * Groups of `wordsPerChunk` words. Every chunk but the last keeps a trailing
 * space so the concatenation reads like the source with whitespace collapsed.
 */
export function splitIntoChunks(text: string, wordsPerChunk: number): string[] {
  const size = Math.max(1, Math.floor(wordsPerChunk));
  const words = text.split(/\s+/).filter(Boolean);
  const chunks: string[] = [];

  for (let i = 0; i < words.length; i += size) {
    const chunk = words.slice(i, i + size).join(' ');
    chunks.push(i + size < words.length ? `${chunk} ` : chunk);
  }

  return chunks;
}

/**
 * Yields the chunks of an already composed text with a fixed pause between
 * them. Stops quietly once `signal` aborts.
 */
export async function* streamChunks(text: string, options: ChunkOptions): AsyncGenerator<string> {
  const { wordsPerChunk, delayMs, signal } = options;
  const chunks = splitIntoChunks(text, wordsPerChunk);

  for (const [index, chunk] of chunks.entries()) {
    if (signal?.aborted) return;
    yield chunk;

    if (index < chunks.length - 1 && delayMs > 0) {
      try {
        await sleep(delayMs, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) return;
        throw error;
      }
    }
  }
}
