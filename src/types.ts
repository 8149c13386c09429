export const SINCE_VALUES = ['daily', 'weekly', 'monthly'] as const;

export type Since = (typeof SINCE_VALUES)[number];

export type Locale = 'en' | 'zh';

export interface TrendingQuery {
  since: Since;
  /** Lower-cased language slug, empty for all languages */
  language: string;
  /** Language filter as the caller wrote it, trimmed */
  languageLabel: string;
}

export interface TrendingEntry {
  title: string;
  projectUrl: string;
  description: string;
  primaryLanguage: string;
  totalStars: string;
  totalForks: string;
  /** Stars gained within the requested window */
  periodStars: string;
}

/** A listed project that produced no entry */
export interface SkippedFragment {
  /** 1-based position in the listing */
  position: number;
  reason: 'missing-title' | 'missing-link' | 'extraction-error';
  detail?: string;
}

export type TrendingOutcome =
  | { status: 'invalid-since'; since: string; accepted: readonly Since[] }
  | { status: 'transport-error'; url: string; message: string }
  | { status: 'http-error'; url: string; httpStatus: number }
  | { status: 'empty'; url: string }
  | {
      status: 'ok';
      url: string;
      query: TrendingQuery;
      fragmentCount: number;
      entries: TrendingEntry[];
      skipped: SkippedFragment[];
    };

export type ReadmeLookupError =
  | { kind: 'invalid-format' }
  | { kind: 'not-found'; branches: readonly string[]; filenames: readonly string[] }
  | { kind: 'failed'; message: string };

export interface ReadmeLookupResult {
  repository: string;
  found: boolean;
  sourceLocation?: string;
  content?: string;
  truncated: boolean;
  error?: ReadmeLookupError;
}

export interface HttpResponse {
  url: string;
  status: number;
  ok: boolean;
  body: string;
}

/** Single bounded GET; rejects with TransportError when no response arrives */
export interface HttpClient {
  get(url: string, timeoutMs: number): Promise<HttpResponse>;
}
