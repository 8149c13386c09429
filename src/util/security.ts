/**
 * Input validation and output sanitization for the tool boundary
 */

import { z } from 'zod';

// ============ Tool Argument Schemas ============

/**
 * Schema for get_github_trending tool arguments.
 * `since` stays a free string here: an unsupported window is reported
 * as a text line by the trending parser, not as a protocol error.
 */
export const GetGithubTrendingArgsSchema = z.object({
  since: z.string().max(32).default('daily'),
  language: z.string().max(100).default(''),
});

export type GetGithubTrendingArgs = z.infer<typeof GetGithubTrendingArgsSchema>;

/**
 * Schema for get_repository_readme tool arguments.
 * Identifiers are checked one by one by the resolver, so a malformed
 * entry never rejects the rest of the batch.
 */
export const GetRepositoryReadmeArgsSchema = z.object({
  repositories: z.array(z.string()).default([]),
});

export type GetRepositoryReadmeArgs = z.infer<typeof GetRepositoryReadmeArgsSchema>;

/**
 * Validate MCP tool arguments against a schema
 * @param args - Raw arguments from MCP request
 * @returns Validated and typed arguments
 * @throws Error with user-friendly message if validation fails
 */
export function validateToolArgs<T>(args: Record<string, unknown> | undefined, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid arguments: ${errors}`);
  }
  return result.data;
}

// ============ Error Sanitization ============

/** Patterns that indicate sensitive information in error messages */
const SENSITIVE_ERROR_PATTERNS = [
  /password[=:]\s*\S+/gi,
  /token[=:]\s*\S+/gi,
  /secret[=:]\s*\S+/gi,
  /cookie[=:]\s*\S+/gi,
  /authorization[=:]\s*\S+/gi,
  /bearer\s+\S+/gi,
  /api[_-]?key[=:]\s*\S+/gi,
  // File paths that might reveal system info
  /\/Users\/[^/\s]+/g,
  /\/home\/[^/\s]+/g,
  /C:\\Users\\[^\\\s]+/gi,
];

const MAX_ERROR_LENGTH = 200;

/**
 * Sanitize an error message for safe return to clients.
 * Removes credentials and home directory paths, and keeps only the first line.
 */
export function sanitizeErrorMessage(error: unknown): string {
  let message: string;

  if (error instanceof Error) {
    message = error.message;
  } else if (typeof error === 'string') {
    message = error;
  } else {
    return 'An unexpected error occurred';
  }

  message = redactSensitivePatterns(message);

  if (message.length > MAX_ERROR_LENGTH || message.includes('\n')) {
    const firstLine = message.split('\n')[0];
    return firstLine.length > MAX_ERROR_LENGTH ? firstLine.substring(0, MAX_ERROR_LENGTH) + '...' : firstLine;
  }

  return message;
}

function redactSensitivePatterns(text: string): string {
  let result = text;
  for (const pattern of SENSITIVE_ERROR_PATTERNS) {
    result = result.replace(pattern, '[REDACTED]');
  }
  return result;
}

// ============ Log Sanitization ============

/** Patterns to redact in log output */
const SENSITIVE_LOG_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /cookie[s]?[=:]\s*[^\s,}\]]+/gi, replacement: 'cookies=[REDACTED]' },
  { pattern: /bearer\s+[a-zA-Z0-9._-]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /token[=:]\s*[a-zA-Z0-9._-]+/gi, replacement: 'token=[REDACTED]' },
  { pattern: /api[_-]?key[=:]\s*[a-zA-Z0-9._-]+/gi, replacement: 'apiKey=[REDACTED]' },
  { pattern: /password[=:]\s*[^\s,}\]]+/gi, replacement: 'password=[REDACTED]' },
  { pattern: /secret[=:]\s*[^\s,}\]]+/gi, replacement: 'secret=[REDACTED]' },
  { pattern: /authorization[=:]\s*[^\s,}\]]+/gi, replacement: 'authorization=[REDACTED]' },
  // GitHub personal access tokens
  { pattern: /\bgh[pousr]_[A-Za-z0-9]{20,}\b/g, replacement: '[GITHUB_TOKEN_REDACTED]' },
];

/**
 * Redact sensitive information from log messages.
 * @returns Sanitized string safe for logging
 */
export function redactForLogging(data: unknown): string {
  let text: string;

  if (typeof data === 'string') {
    text = data;
  } else if (data instanceof Error) {
    text = data.message;
  } else {
    try {
      text = JSON.stringify(data) ?? String(data);
    } catch {
      text = String(data);
    }
  }

  for (const { pattern, replacement } of SENSITIVE_LOG_PATTERNS) {
    text = text.replace(pattern, replacement);
  }

  return text;
}
