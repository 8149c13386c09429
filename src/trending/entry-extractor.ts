import { GITHUB_BASE_URL } from '../config.js';
import type { Since, SkippedFragment, TrendingEntry } from '../types.js';
import { logger } from '../util/logger.js';

const log = logger.scoped('TrendingEntryExtractor');

type OptionalField = Exclude<keyof TrendingEntry, 'title' | 'projectUrl'>;

interface FieldRule {
  locate(fragment: Element): string | undefined;
  fallback: string;
}

export interface ExtractorOptions {
  since: Since;
  /** Root that relative project links resolve against */
  siteRoot?: string;
  noDescription?: string;
  unknownLanguage?: string;
}

export type ExtractionResult =
  | { ok: true; entry: TrendingEntry }
  | { ok: false; reason: SkippedFragment['reason']; detail?: string };

/** Phrase GitHub prints next to the star delta for each window */
export const WINDOW_PHRASES: Record<Since, string> = {
  daily: 'today',
  weekly: 'this week',
  monthly: 'this month',
};

const PERIOD_STARS_PATTERN = /(\d[\d,]*)\s*stars?/i;

export function collapseWhitespace(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

function textOf(fragment: Element, selector: string): string | undefined {
  const element = fragment.querySelector(selector);
  return element ? collapseWhitespace(element.textContent) : undefined;
}

/**
 * Finds the first span mentioning stars together with the window phrase and
 * pulls the number in front of "stars" out of it. Only the first such span
 * is considered, even when it holds no number.
 */
export function locatePeriodStars(fragment: Element, since: Since): string | undefined {
  const phrase = WINDOW_PHRASES[since];
  for (const span of Array.from(fragment.querySelectorAll('span'))) {
    const text = collapseWhitespace(span.textContent);
    const lower = text.toLowerCase();
    if (lower.includes('stars') && lower.includes(phrase)) {
      return PERIOD_STARS_PATTERN.exec(text)?.[1];
    }
  }
  return undefined;
}

/**
 * Extracts one TrendingEntry from an `article.Box-row` fragment.
 *
 * Title and link are mandatory. Every other field has its own locator and
 * fallback, so a missing or malformed element only costs that one field.
 */
export class TrendingEntryExtractor {
  private readonly siteRoot: string;
  private readonly rules: Record<OptionalField, FieldRule>;

  constructor(options: ExtractorOptions) {
    this.siteRoot = options.siteRoot ?? GITHUB_BASE_URL;
    this.rules = {
      description: {
        locate: (fragment) => textOf(fragment, 'p.col-9'),
        fallback: options.noDescription ?? 'No description',
      },
      primaryLanguage: {
        locate: (fragment) => textOf(fragment, '[itemprop="programmingLanguage"]'),
        fallback: options.unknownLanguage ?? 'Unknown',
      },
      totalStars: {
        locate: (fragment) => textOf(fragment, 'a[href$="/stargazers"]'),
        fallback: '0',
      },
      totalForks: {
        locate: (fragment) => textOf(fragment, 'a[href$="/forks"]'),
        fallback: '0',
      },
      periodStars: {
        locate: (fragment) => locatePeriodStars(fragment, options.since),
        fallback: '0',
      },
    };
  }

  extract(fragment: Element): ExtractionResult {
    let anchor: Element | null;
    let title: string;
    let href: string | null;
    try {
      anchor = fragment.querySelector('h2.h3 a');
      title = collapseWhitespace(anchor?.textContent);
      href = anchor ? anchor.getAttribute('href') : null;
    } catch (error) {
      return { ok: false, reason: 'extraction-error', detail: error instanceof Error ? error.message : String(error) };
    }

    if (!anchor || !title) {
      return { ok: false, reason: 'missing-title' };
    }

    const projectUrl = this.resolveLink(href);
    if (!projectUrl) {
      return { ok: false, reason: 'missing-link' };
    }

    const field = (name: OptionalField): string => this.resolveField(fragment, name);

    return {
      ok: true,
      entry: {
        title,
        projectUrl,
        description: field('description'),
        primaryLanguage: field('primaryLanguage'),
        totalStars: field('totalStars'),
        totalForks: field('totalForks'),
        periodStars: field('periodStars'),
      },
    };
  }

  private resolveLink(href: string | null): string | undefined {
    const trimmed = href?.trim();
    if (!trimmed) {
      return undefined;
    }
    try {
      return new URL(trimmed, `${this.siteRoot}/`).toString();
    } catch {
      log.debug(`Unresolvable project link: ${trimmed}`);
      return undefined;
    }
  }

  private resolveField(fragment: Element, name: OptionalField): string {
    const rule = this.rules[name];
    try {
      const value = rule.locate(fragment);
      return value ? value : rule.fallback;
    } catch (error) {
      log.debug(`Locator for ${name} failed, using fallback:`, error);
      return rule.fallback;
    }
  }
}
