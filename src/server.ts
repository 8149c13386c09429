import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { buildTrendingUrl, SERVER_NAME, SERVER_VERSION, type ServerConfig } from './config.js';
import { ReadmeResolver } from './readme/resolver.js';
import { ReportFormatter } from './report/formatter.js';
import { isSince, TrendingPageParser } from './trending/page-parser.js';
import type { HttpClient } from './types.js';
import { HttpFetcher } from './util/http.js';
import { logger } from './util/logger.js';
import {
  type GetGithubTrendingArgs,
  GetGithubTrendingArgsSchema,
  type GetRepositoryReadmeArgs,
  GetRepositoryReadmeArgsSchema,
  sanitizeErrorMessage,
  validateToolArgs,
} from './util/security.js';

const log = logger.scoped('TrendingServer');

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
};

export interface ServerDependencies {
  http?: HttpClient;
  clock?: () => Date;
}

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'get_github_trending',
    description: `Get GitHub trending repositories.

Scrapes the GitHub trending page and returns, for each listed project, its name, link, description, primary language, total stars, forks and the stars gained in the selected time range.

Call this first to discover projects, then use get_repository_readme for the ones worth a closer look.`,
    inputSchema: {
      type: 'object',
      properties: {
        since: {
          type: 'string',
          enum: ['daily', 'weekly', 'monthly'],
          description: 'Time range (default: daily)',
        },
        language: {
          type: 'string',
          description: 'Programming language filter, e.g. "python", "javascript", "go". Empty for all languages.',
        },
      },
    },
  },
  {
    name: 'get_repository_readme',
    description:
      'Get the README of one or more GitHub repositories. Tries README.md, readme.md, Readme.md, README.txt and readme.txt on the main branch, then on master.',
    inputSchema: {
      type: 'object',
      properties: {
        repositories: {
          type: 'array',
          items: { type: 'string' },
          description: 'Repository names in "owner/repository-name" format',
        },
      },
      required: ['repositories'],
    },
  },
];

export class TrendingServer {
  private server: McpServer;
  private trending: TrendingPageParser;
  private readmes: ReadmeResolver;
  private formatter: ReportFormatter;

  constructor(config: ServerConfig, deps: ServerDependencies = {}) {
    const http = deps.http ?? new HttpFetcher(config.userAgent);
    this.formatter = new ReportFormatter(config.locale, deps.clock);

    this.trending = new TrendingPageParser(http, {
      timeoutMs: config.trendingTimeoutMs,
      noDescription: this.formatter.messages.noDescription,
      unknownLanguage: this.formatter.messages.unknownLanguage,
    });
    this.readmes = new ReadmeResolver(http, {
      timeoutMs: config.readmeTimeoutMs,
      maxLength: config.maxReadmeLength,
      truncationMarker: this.formatter.messages.truncationMarker,
    });

    this.server = new McpServer(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();

    this.server.server.onerror = (error: Error) => log.error('[MCP Error]', error);
  }

  private setupToolHandlers(): void {
    this.server.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOL_DEFINITIONS,
    }));

    this.server.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments)
    );
  }

  /**
   * Dispatch a tool call. Tool failures come back as report text;
   * only an unknown tool name is a protocol error.
   */
  async callTool(name: string, args: Record<string, unknown> | undefined): Promise<ToolResponse> {
    switch (name) {
      case 'get_github_trending':
        return this.handleGetGithubTrending(args);
      case 'get_repository_readme':
        return this.handleGetRepositoryReadme(args);
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  }

  private async handleGetGithubTrending(args: Record<string, unknown> | undefined): Promise<ToolResponse> {
    let validatedArgs: GetGithubTrendingArgs;
    try {
      validatedArgs = validateToolArgs(args, GetGithubTrendingArgsSchema);
    } catch (error) {
      return textResponse(this.formatter.formatInvalidArguments(sanitizeErrorMessage(error)));
    }

    const { since, language } = validatedArgs;
    log.info(`get_github_trending since=${since} language=${language || '(all)'}`);

    try {
      const outcome = await this.trending.parse(since, language);
      log.info(`get_github_trending finished: ${outcome.status}`);
      return textResponse(this.formatter.formatTrending(outcome));
    } catch (error) {
      log.error('get_github_trending failed:', error);
      const url = isSince(since) ? buildTrendingUrl(since, language.trim().toLowerCase()) : undefined;
      return textResponse(this.formatter.formatExecutionError(sanitizeErrorMessage(error), url));
    }
  }

  private async handleGetRepositoryReadme(args: Record<string, unknown> | undefined): Promise<ToolResponse> {
    let validatedArgs: GetRepositoryReadmeArgs;
    try {
      validatedArgs = validateToolArgs(args, GetRepositoryReadmeArgsSchema);
    } catch (error) {
      return textResponse(this.formatter.formatInvalidArguments(sanitizeErrorMessage(error)));
    }

    const { repositories } = validatedArgs;
    if (repositories.length === 0) {
      return textResponse(this.formatter.formatEmptyRepositories());
    }

    log.info(`get_repository_readme for ${repositories.length} repositories`);

    try {
      const results = await this.readmes.resolveAll(repositories);
      log.info(`get_repository_readme found ${results.filter((result) => result.found).length}/${results.length}`);
      return textResponse(this.formatter.formatReadme(results));
    } catch (error) {
      log.error('get_repository_readme failed:', error);
      return textResponse(this.formatter.formatExecutionError(sanitizeErrorMessage(error)));
    }
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    log.info('GitHub trending MCP server running on stdio');
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}

function textResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}
