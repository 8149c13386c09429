import { StubHttpClient } from '../__mocks__/http.js';
import { buildArticle, buildTrendingPage } from '../__mocks__/trending-html.js';
import { isSince, TrendingPageParser } from './page-parser.js';

const DAILY_URL = 'https://github.com/trending?since=daily';

describe('TrendingPageParser', () => {
  let http: StubHttpClient;
  let parser: TrendingPageParser;

  beforeEach(() => {
    http = new StubHttpClient();
    parser = new TrendingPageParser(http);
  });

  describe('since validation', () => {
    it.each(['hourly', 'DAILY', '', 'yearly'])('should reject %j without a network call', async (since) => {
      const outcome = await parser.parse(since);

      expect(outcome).toEqual({ status: 'invalid-since', since, accepted: ['daily', 'weekly', 'monthly'] });
      expect(http.calls).toHaveLength(0);
    });

    it.each(['daily', 'weekly', 'monthly'])('should accept %s', (since) => {
      expect(isSince(since)).toBe(true);
    });
  });

  describe('request URL', () => {
    it('should request the unfiltered listing when no language is given', async () => {
      await parser.parse('weekly');

      expect(http.requestedUrls).toEqual(['https://github.com/trending?since=weekly']);
    });

    it('should lower-case and trim the language filter', async () => {
      await parser.parse('monthly', '  Python ');

      expect(http.requestedUrls).toEqual(['https://github.com/trending/python?since=monthly']);
    });

    it('should encode language segments with reserved characters', async () => {
      await parser.parse('daily', 'C#');

      expect(http.requestedUrls).toEqual(['https://github.com/trending/c%23?since=daily']);
    });

    it('should use a 30 second timeout by default', async () => {
      await parser.parse('daily');

      expect(http.calls[0].timeoutMs).toBe(30_000);
    });

    it('should use the configured timeout', async () => {
      const custom = new TrendingPageParser(http, { timeoutMs: 5_000 });
      await custom.parse('daily');

      expect(http.calls[0].timeoutMs).toBe(5_000);
    });
  });

  describe('fetch failures', () => {
    it('should report a non-2xx status with the attempted URL', async () => {
      http.reply(DAILY_URL, { status: 500, body: 'Server Error' });

      const outcome = await parser.parse('daily');

      expect(outcome).toEqual({ status: 'http-error', url: DAILY_URL, httpStatus: 500 });
    });

    it('should report a transport failure with the attempted URL', async () => {
      http.reply(DAILY_URL, 'transport-error');

      const outcome = await parser.parse('daily');

      expect(outcome).toEqual({
        status: 'transport-error',
        url: DAILY_URL,
        message: 'Request failed: getaddrinfo ENOTFOUND',
      });
    });

    it('should rethrow errors that are not transport failures', async () => {
      const failing = new TrendingPageParser({ get: vi.fn().mockRejectedValue(new TypeError('bad state')) });

      await expect(failing.parse('daily')).rejects.toThrow('bad state');
    });
  });

  describe('parsing', () => {
    it('should report an empty listing distinctly', async () => {
      http.reply(DAILY_URL, { status: 200, body: buildTrendingPage([]) });

      const outcome = await parser.parse('daily');

      expect(outcome).toEqual({ status: 'empty', url: DAILY_URL });
    });

    it('should yield one entry per fragment in document order', async () => {
      const repos = ['alpha', 'beta', 'gamma', 'delta'];
      http.reply(DAILY_URL, { status: 200, body: buildTrendingPage(repos.map((repo) => buildArticle({ repo }))) });

      const outcome = await parser.parse('daily');

      expect(outcome.status).toBe('ok');
      if (outcome.status !== 'ok') return;
      expect(outcome.fragmentCount).toBe(4);
      expect(outcome.skipped).toEqual([]);
      expect(outcome.entries.map((entry) => entry.projectUrl)).toEqual([
        'https://github.com/acme/alpha',
        'https://github.com/acme/beta',
        'https://github.com/acme/gamma',
        'https://github.com/acme/delta',
      ]);
      for (const entry of outcome.entries) {
        expect(Object.values(entry).every((value) => value.length > 0)).toBe(true);
      }
    });

    it('should populate defaults for fragments with missing optional fields', async () => {
      http.reply(DAILY_URL, {
        status: 200,
        body: buildTrendingPage([buildArticle({ repo: 'bare', description: null, language: null, stars: null, forks: null })]),
      });

      const outcome = await parser.parse('daily');

      expect(outcome.status === 'ok' && outcome.entries).toEqual([
        {
          title: 'acme / bare',
          projectUrl: 'https://github.com/acme/bare',
          description: 'No description',
          primaryLanguage: 'Unknown',
          totalStars: '0',
          totalForks: '0',
          periodStars: '1,024',
        },
      ]);
    });

    it('should skip a fragment without a title and keep its siblings', async () => {
      http.reply(DAILY_URL, {
        status: 200,
        body: buildTrendingPage([
          buildArticle({ repo: 'first' }),
          buildArticle({ repo: 'broken', withTitle: false }),
          buildArticle({ repo: 'third' }),
        ]),
      });

      const outcome = await parser.parse('daily');

      expect(outcome.status).toBe('ok');
      if (outcome.status !== 'ok') return;
      expect(outcome.fragmentCount).toBe(3);
      expect(outcome.entries.map((entry) => entry.title)).toEqual(['acme / first', 'acme / third']);
      expect(outcome.skipped).toEqual([{ position: 2, reason: 'missing-title' }]);
    });

    it('should pass the requested window to period star extraction', async () => {
      const weeklyUrl = 'https://github.com/trending?since=weekly';
      http.reply(weeklyUrl, {
        status: 200,
        body: buildTrendingPage([buildArticle({ periodLabel: '3,300 stars this week' })]),
      });

      const outcome = await parser.parse('weekly');

      expect(outcome.status === 'ok' && outcome.entries[0].periodStars).toBe('3,300');
    });

    it('should carry the normalized query on success', async () => {
      const url = 'https://github.com/trending/rust?since=daily';
      http.reply(url, { status: 200, body: buildTrendingPage([buildArticle()]) });

      const outcome = await parser.parse('daily', 'Rust');

      expect(outcome.status === 'ok' && outcome.query).toEqual({ since: 'daily', language: 'rust', languageLabel: 'Rust' });
      expect(outcome.status === 'ok' && outcome.url).toBe(url);
    });

    it('should use configured sentinels', async () => {
      const localized = new TrendingPageParser(http, { noDescription: '无描述', unknownLanguage: '未知' });
      http.reply(DAILY_URL, { status: 200, body: buildTrendingPage([buildArticle({ description: null, language: null })]) });

      const outcome = await localized.parse('daily');

      expect(outcome.status === 'ok' && outcome.entries[0].description).toBe('无描述');
      expect(outcome.status === 'ok' && outcome.entries[0].primaryLanguage).toBe('未知');
    });
  });
});
