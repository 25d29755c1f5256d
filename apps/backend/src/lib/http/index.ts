import type { ServerResponse } from 'http';
import type { StreamEvent } from '@agentic-retail/shared';

/**
 * Server-sent events over a raw response. Every payload goes out as a
 * `message` event whose data is one JSON object.
 */
export class SseStream {
  private initialized = false;

  constructor(private readonly res: ServerResponse) {}

  init(): void {
    if (this.initialized) return;

    this.res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache, no-transform',
      Connection: 'keep-alive',
    });

    this.initialized = true;
  }

  send(event: StreamEvent): void {
    if (!this.initialized) this.init();
    this.res.write(`event: message\ndata: ${JSON.stringify(event)}\n\n`);
  }

  close(): void {
    if (!this.initialized) this.init();
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }

  /** True once the client went away or the stream was closed. */
  get closed(): boolean {
    return this.res.writableEnded || this.res.destroyed;
  }
}
