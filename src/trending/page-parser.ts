import { JSDOM } from 'jsdom';
import { buildTrendingUrl, GITHUB_BASE_URL } from '../config.js';
import { SINCE_VALUES } from '../types.js';
import type { HttpClient, Since, SkippedFragment, TrendingEntry, TrendingOutcome, TrendingQuery } from '../types.js';
import { TransportError } from '../util/http.js';
import { logger } from '../util/logger.js';
import { TrendingEntryExtractor } from './entry-extractor.js';

const log = logger.scoped('TrendingPageParser');

export const FRAGMENT_SELECTOR = 'article.Box-row';

export interface TrendingPageParserOptions {
  timeoutMs?: number;
  noDescription?: string;
  unknownLanguage?: string;
}

export function isSince(value: string): value is Since {
  return SINCE_VALUES.some((since) => since === value);
}

/**
 * Fetches the trending listing for a window and optional language and
 * turns every project fragment into a TrendingEntry, in listing order.
 */
export class TrendingPageParser {
  private readonly timeoutMs: number;

  constructor(
    private readonly http: HttpClient,
    private readonly options: TrendingPageParserOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async parse(since: string, language: string = ''): Promise<TrendingOutcome> {
    if (!isSince(since)) {
      log.debug(`Rejected since value: ${since}`);
      return { status: 'invalid-since', since, accepted: SINCE_VALUES };
    }

    const languageLabel = language.trim();
    const query: TrendingQuery = { since, language: languageLabel.toLowerCase(), languageLabel };
    const url = buildTrendingUrl(query.since, query.language);

    let body: string;
    try {
      const response = await this.http.get(url, this.timeoutMs);
      if (!response.ok) {
        log.warn(`Trending page returned HTTP ${response.status}: ${url}`);
        return { status: 'http-error', url, httpStatus: response.status };
      }
      body = response.body;
    } catch (error) {
      if (error instanceof TransportError) {
        log.warn(`Trending page unreachable: ${url}`, error.message);
        return { status: 'transport-error', url, message: error.message };
      }
      throw error;
    }

    const fragments = Array.from(new JSDOM(body).window.document.querySelectorAll(FRAGMENT_SELECTOR));
    if (fragments.length === 0) {
      log.info(`No project fragments found at ${url}`);
      return { status: 'empty', url };
    }

    const extractor = new TrendingEntryExtractor({
      since: query.since,
      siteRoot: GITHUB_BASE_URL,
      noDescription: this.options.noDescription,
      unknownLanguage: this.options.unknownLanguage,
    });

    const entries: TrendingEntry[] = [];
    const skipped: SkippedFragment[] = [];

    fragments.forEach((fragment, index) => {
      const position = index + 1;
      try {
        const result = extractor.extract(fragment);
        if (result.ok) {
          entries.push(result.entry);
        } else {
          log.debug(`Skipped fragment ${position}: ${result.reason}`);
          skipped.push({ position, reason: result.reason, detail: result.detail });
        }
      } catch (error) {
        log.debug(`Fragment ${position} failed:`, error);
        skipped.push({
          position,
          reason: 'extraction-error',
          detail: error instanceof Error ? error.message : String(error),
        });
      }
    });

    log.info(`Extracted ${entries.length}/${fragments.length} entries from ${url}`);
    return { status: 'ok', url, query, fragmentCount: fragments.length, entries, skipped };
  }
}
