import { z } from 'zod';
import type { Locale } from './types.js';

export const SERVER_NAME = 'github-trending-mcp';
export const SERVER_VERSION = '1.0.0';

export interface ServerConfig {
  locale: Locale;
  userAgent: string;
  trendingTimeoutMs: number;
  readmeTimeoutMs: number;
  maxReadmeLength: number;
}

const DEFAULT_CONFIG: ServerConfig = {
  locale: 'en',
  userAgent: `${SERVER_NAME}/${SERVER_VERSION}`,
  trendingTimeoutMs: 30_000,
  readmeTimeoutMs: 20_000,
  maxReadmeLength: 50_000,
};

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  TRENDING_MCP_LOCALE: z.enum(['en', 'zh']).optional(),
  TRENDING_MCP_USER_AGENT: z.string().trim().min(1).max(256).optional(),
  TRENDING_MCP_TRENDING_TIMEOUT_MS: positiveInt.optional(),
  TRENDING_MCP_README_TIMEOUT_MS: positiveInt.optional(),
  TRENDING_MCP_MAX_README_LENGTH: positiveInt.optional(),
});

/**
 * Build the server configuration from environment variables.
 * Empty variables count as unset.
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const present = Object.fromEntries(
    Object.keys(EnvSchema.shape)
      .map((key) => [key, env[key]] as const)
      .filter(([, value]) => value !== undefined && value !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  const parsed = result.data;
  return {
    locale: parsed.TRENDING_MCP_LOCALE ?? DEFAULT_CONFIG.locale,
    userAgent: parsed.TRENDING_MCP_USER_AGENT ?? DEFAULT_CONFIG.userAgent,
    trendingTimeoutMs: parsed.TRENDING_MCP_TRENDING_TIMEOUT_MS ?? DEFAULT_CONFIG.trendingTimeoutMs,
    readmeTimeoutMs: parsed.TRENDING_MCP_README_TIMEOUT_MS ?? DEFAULT_CONFIG.readmeTimeoutMs,
    maxReadmeLength: parsed.TRENDING_MCP_MAX_README_LENGTH ?? DEFAULT_CONFIG.maxReadmeLength,
  };
}

export function defaultConfig(): ServerConfig {
  return { ...DEFAULT_CONFIG };
}

// GitHub endpoints
export const GITHUB_BASE_URL = 'https://github.com';
export const TRENDING_BASE_URL = `${GITHUB_BASE_URL}/trending`;
export const RAW_CONTENT_BASE = 'https://raw.githubusercontent.com';

// README candidates, in priority order. Branch is the outer loop.
export const README_BRANCHES = ['main', 'master'] as const;
export const README_FILENAMES = ['README.md', 'readme.md', 'Readme.md', 'README.txt', 'readme.txt'] as const;

// Utility function to build the trending listing URL
export function buildTrendingUrl(since: string, language: string): string {
  const path = language ? `${TRENDING_BASE_URL}/${encodeURIComponent(language)}` : TRENDING_BASE_URL;
  return `${path}?since=${encodeURIComponent(since)}`;
}

// Utility function to build a raw-content URL for one README candidate
export function buildRawContentUrl(owner: string, repo: string, branch: string, filename: string): string {
  return `${RAW_CONTENT_BASE}/${owner}/${repo}/refs/heads/${branch}/${filename}`;
}
