import type { HttpClient, HttpResponse } from '../types.js';
import { TransportError } from '../util/http.js';

type StubReply = { status: number; body?: string } | 'transport-error';

/**
 * In-process HttpClient that answers from a URL table and records every
 * request in order. Unlisted URLs get a 404.
 */
export class StubHttpClient implements HttpClient {
  readonly calls: Array<{ url: string; timeoutMs: number }> = [];
  private readonly replies = new Map<string, StubReply>();

  reply(url: string, reply: StubReply): this {
    this.replies.set(url, reply);
    return this;
  }

  get requestedUrls(): string[] {
    return this.calls.map((call) => call.url);
  }

  async get(url: string, timeoutMs: number): Promise<HttpResponse> {
    this.calls.push({ url, timeoutMs });
    const reply = this.replies.get(url) ?? { status: 404, body: '404: Not Found' };
    if (reply === 'transport-error') {
      throw new TransportError('Request failed: getaddrinfo ENOTFOUND', url);
    }
    return { url, status: reply.status, ok: reply.status >= 200 && reply.status < 300, body: reply.body ?? '' };
  }
}
