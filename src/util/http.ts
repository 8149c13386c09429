import type { HttpClient, HttpResponse } from '../types.js';
import { logger } from './logger.js';

const log = logger.scoped('HttpFetcher');

/**
 * Raised when a request produced no HTTP response at all:
 * DNS or connection failure, reset, or timeout.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timedOut: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

// fetch rejects with a DOMException named AbortError when the signal fires
function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    // undici reports the socket-level reason in `cause`
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Fetch with timeout support. Status codes are returned to the caller
 * as data; only a missing response becomes a TransportError.
 */
export class HttpFetcher implements HttpClient {
  constructor(private readonly userAgent?: string) {}

  async get(url: string, timeoutMs: number): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const headers: Record<string, string> = {};
    if (this.userAgent) {
      headers['User-Agent'] = this.userAgent;
    }

    try {
      log.debug(`GET ${url} (timeout ${timeoutMs}ms)`);
      const response = await fetch(url, { headers, signal: controller.signal });
      const body = await response.text();
      return { url, status: response.status, ok: response.ok, body };
    } catch (error) {
      if (isAbortError(error)) {
        throw new TransportError(`Request timed out after ${timeoutMs}ms`, url, true, { cause: error });
      }
      throw new TransportError(`Request failed: ${describeCause(error)}`, url, false, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
