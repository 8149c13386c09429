import {
  buildRawContentUrl,
  buildTrendingUrl,
  defaultConfig,
  loadConfig,
  README_BRANCHES,
  README_FILENAMES,
} from './config.js';

describe('Configuration', () => {
  describe('loadConfig', () => {
    it('should use defaults when no variables are set', () => {
      expect(loadConfig({})).toEqual({
        locale: 'en',
        userAgent: 'github-trending-mcp/1.0.0',
        trendingTimeoutMs: 30_000,
        readmeTimeoutMs: 20_000,
        maxReadmeLength: 50_000,
      });
    });

    it('should read every supported variable', () => {
      const config = loadConfig({
        TRENDING_MCP_LOCALE: 'zh',
        TRENDING_MCP_USER_AGENT: 'test-agent/2.0',
        TRENDING_MCP_TRENDING_TIMEOUT_MS: '5000',
        TRENDING_MCP_README_TIMEOUT_MS: '2500',
        TRENDING_MCP_MAX_README_LENGTH: '1000',
      });

      expect(config).toEqual({
        locale: 'zh',
        userAgent: 'test-agent/2.0',
        trendingTimeoutMs: 5000,
        readmeTimeoutMs: 2500,
        maxReadmeLength: 1000,
      });
    });

    it('should treat empty variables as unset', () => {
      const config = loadConfig({ TRENDING_MCP_LOCALE: '', TRENDING_MCP_MAX_README_LENGTH: '' });

      expect(config.locale).toBe('en');
      expect(config.maxReadmeLength).toBe(50_000);
    });

    it('should ignore unrelated variables', () => {
      expect(loadConfig({ PATH: '/usr/bin', LOG_LEVEL: 'debug' })).toEqual(defaultConfig());
    });

    it('should reject an unsupported locale', () => {
      expect(() => loadConfig({ TRENDING_MCP_LOCALE: 'fr' })).toThrow(/^Invalid configuration: TRENDING_MCP_LOCALE: /);
    });

    it('should reject non-positive numbers', () => {
      expect(() => loadConfig({ TRENDING_MCP_README_TIMEOUT_MS: '-5' })).toThrow(
        'Invalid configuration: TRENDING_MCP_README_TIMEOUT_MS: Number must be greater than 0'
      );
    });

    it('should name every invalid variable', () => {
      let message = '';
      try {
        loadConfig({ TRENDING_MCP_TRENDING_TIMEOUT_MS: 'soon', TRENDING_MCP_MAX_README_LENGTH: '1.5' });
      } catch (error) {
        message = error instanceof Error ? error.message : String(error);
      }

      expect(message).toContain('TRENDING_MCP_TRENDING_TIMEOUT_MS: ');
      expect(message).toContain('TRENDING_MCP_MAX_README_LENGTH: ');
    });
  });

  describe('defaultConfig', () => {
    it('should return a fresh copy each time', () => {
      const first = defaultConfig();
      first.locale = 'zh';

      expect(defaultConfig().locale).toBe('en');
    });
  });

  describe('buildTrendingUrl', () => {
    it('should build the unfiltered listing URL', () => {
      expect(buildTrendingUrl('daily', '')).toBe('https://github.com/trending?since=daily');
    });

    it('should add the language as a path segment', () => {
      expect(buildTrendingUrl('weekly', 'python')).toBe('https://github.com/trending/python?since=weekly');
    });

    it('should encode reserved characters in the language', () => {
      expect(buildTrendingUrl('monthly', 'c++')).toBe('https://github.com/trending/c%2B%2B?since=monthly');
    });
  });

  describe('buildRawContentUrl', () => {
    it('should address a file on a branch head', () => {
      expect(buildRawContentUrl('acme', 'rocket', 'main', 'README.md')).toBe(
        'https://raw.githubusercontent.com/acme/rocket/refs/heads/main/README.md'
      );
    });
  });

  describe('README candidates', () => {
    it('should try main before master', () => {
      expect(README_BRANCHES).toEqual(['main', 'master']);
    });

    it('should list filenames in priority order', () => {
      expect(README_FILENAMES).toEqual(['README.md', 'readme.md', 'Readme.md', 'README.txt', 'readme.txt']);
    });
  });
});
