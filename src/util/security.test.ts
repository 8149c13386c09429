import {
  GetGithubTrendingArgsSchema,
  GetRepositoryReadmeArgsSchema,
  redactForLogging,
  sanitizeErrorMessage,
  validateToolArgs,
} from './security.js';

describe('Security Utilities', () => {
  describe('validateToolArgs', () => {
    describe('get_github_trending', () => {
      it('should apply defaults when arguments are missing', () => {
        expect(validateToolArgs(undefined, GetGithubTrendingArgsSchema)).toEqual({ since: 'daily', language: '' });
      });

      it('should keep since as given so the parser can report it', () => {
        expect(validateToolArgs({ since: 'hourly' }, GetGithubTrendingArgsSchema)).toEqual({
          since: 'hourly',
          language: '',
        });
      });

      it('should strip unknown keys', () => {
        expect(validateToolArgs({ since: 'weekly', extra: true }, GetGithubTrendingArgsSchema)).toEqual({
          since: 'weekly',
          language: '',
        });
      });

      it('should reject a non-string since', () => {
        expect(() => validateToolArgs({ since: 7 }, GetGithubTrendingArgsSchema)).toThrow(
          'Invalid arguments: since: Expected string, received number'
        );
      });

      it('should reject an oversized language', () => {
        expect(() => validateToolArgs({ language: 'x'.repeat(101) }, GetGithubTrendingArgsSchema)).toThrow(
          /^Invalid arguments: language: /
        );
      });
    });

    describe('get_repository_readme', () => {
      it('should default to an empty list', () => {
        expect(validateToolArgs({}, GetRepositoryReadmeArgsSchema)).toEqual({ repositories: [] });
      });

      it('should accept a list of identifiers', () => {
        expect(validateToolArgs({ repositories: ['acme/rocket', 'bad'] }, GetRepositoryReadmeArgsSchema)).toEqual({
          repositories: ['acme/rocket', 'bad'],
        });
      });

      it('should reject a bare string', () => {
        expect(() => validateToolArgs({ repositories: 'acme/rocket' }, GetRepositoryReadmeArgsSchema)).toThrow(
          'Invalid arguments: repositories: Expected array, received string'
        );
      });

      it('should name the offending element', () => {
        expect(() => validateToolArgs({ repositories: ['acme/rocket', 42] }, GetRepositoryReadmeArgsSchema)).toThrow(
          'Invalid arguments: repositories.1: Expected string, received number'
        );
      });

      it('should leave list size and identifier length to the resolver', () => {
        const repositories = [...Array.from({ length: 51 }, (_, index) => `acme/repo-${index}`), 'x'.repeat(301)];

        expect(validateToolArgs({ repositories }, GetRepositoryReadmeArgsSchema)).toEqual({ repositories });
      });
    });
  });

  describe('sanitizeErrorMessage', () => {
    it('should return plain messages unchanged', () => {
      expect(sanitizeErrorMessage(new Error('socket hang up'))).toBe('socket hang up');
      expect(sanitizeErrorMessage('connection reset')).toBe('connection reset');
    });

    it('should redact credentials', () => {
      expect(sanitizeErrorMessage(new Error('rejected token=test-secret'))).toBe('rejected [REDACTED]');
      expect(sanitizeErrorMessage(new Error('header Bearer test-secret failed'))).toBe('header [REDACTED] failed');
      expect(sanitizeErrorMessage('password: hunter2')).toBe('[REDACTED]');
    });

    it('should redact home directory paths', () => {
      expect(sanitizeErrorMessage(new Error('/home/alice/app/cache missing'))).toBe('[REDACTED]/app/cache missing');
    });

    it('should keep only the first line', () => {
      expect(sanitizeErrorMessage(new Error('first line\n    at stack frame'))).toBe('first line');
    });

    it('should cap long messages', () => {
      expect(sanitizeErrorMessage(new Error('x'.repeat(250)))).toBe('x'.repeat(200) + '...');
    });

    it('should use a generic message for unknown values', () => {
      expect(sanitizeErrorMessage(42)).toBe('An unexpected error occurred');
      expect(sanitizeErrorMessage(null)).toBe('An unexpected error occurred');
    });
  });

  describe('redactForLogging', () => {
    it('should redact tokens in strings', () => {
      expect(redactForLogging('fetch with token=test-secret')).toBe('fetch with token=[REDACTED]');
    });

    it('should redact bearer values in serialized objects', () => {
      expect(redactForLogging({ header: 'Bearer test-secret' })).toBe('{"header":"Bearer [REDACTED]"}');
    });

    it('should redact GitHub personal access tokens', () => {
      expect(redactForLogging(`using ghp_${'x'.repeat(36)}`)).toBe('using [GITHUB_TOKEN_REDACTED]');
    });

    it('should log the message of an Error', () => {
      expect(redactForLogging(new Error('secret=test-secret leaked'))).toBe('secret=[REDACTED] leaked');
    });

    it('should stringify values JSON cannot represent', () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;

      expect(redactForLogging(undefined)).toBe('undefined');
      expect(redactForLogging(circular)).toBe('[object Object]');
    });
  });
});
