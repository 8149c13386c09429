import { buildRawContentUrl, README_BRANCHES, README_FILENAMES } from '../config.js';
import type { HttpClient, ReadmeLookupResult } from '../types.js';
import { TransportError } from '../util/http.js';
import { logger } from '../util/logger.js';
import { sanitizeErrorMessage } from '../util/security.js';

const log = logger.scoped('ReadmeResolver');

const REPOSITORY_PATTERN = /^([^/\s]+)\/([^/\s]+)$/;

export interface ReadmeCandidate {
  branch: string;
  filename: string;
  url: string;
}

export interface ReadmeResolverOptions {
  timeoutMs?: number;
  maxLength?: number;
  truncationMarker?: string;
  branches?: readonly string[];
  filenames?: readonly string[];
}

export function parseRepository(identifier: string): { owner: string; repo: string } | null {
  const match = REPOSITORY_PATTERN.exec(identifier);
  return match ? { owner: match[1], repo: match[2] } : null;
}

/**
 * Candidate locations in probe order: every filename on the first branch,
 * then every filename on the next.
 */
export function* readmeCandidates(
  owner: string,
  repo: string,
  branches: readonly string[] = README_BRANCHES,
  filenames: readonly string[] = README_FILENAMES
): Generator<ReadmeCandidate> {
  for (const branch of branches) {
    for (const filename of filenames) {
      yield { branch, filename, url: buildRawContentUrl(owner, repo, branch, filename) };
    }
  }
}

/**
 * Cuts `content` to `maxLength` characters, counted in code points so a
 * surrogate pair is never split.
 */
export function truncateContent(content: string, maxLength: number, marker: string): { content: string; truncated: boolean } {
  // Fewer code units than the limit means fewer code points too
  if (content.length <= maxLength) {
    return { content, truncated: false };
  }

  let count = 0;
  let offset = 0;
  for (const char of content) {
    if (count === maxLength) {
      return { content: content.slice(0, offset) + marker, truncated: true };
    }
    count++;
    offset += char.length;
  }
  return { content, truncated: false };
}

/**
 * Looks up a repository's README on the raw-content host by probing
 * branch and filename candidates in a fixed order.
 */
export class ReadmeResolver {
  private readonly timeoutMs: number;
  private readonly maxLength: number;
  private readonly truncationMarker: string;
  private readonly branches: readonly string[];
  private readonly filenames: readonly string[];

  constructor(
    private readonly http: HttpClient,
    options: ReadmeResolverOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.maxLength = options.maxLength ?? 50_000;
    this.truncationMarker = options.truncationMarker ?? '\n\n... [Content too long, truncated] ...';
    this.branches = options.branches ?? README_BRANCHES;
    this.filenames = options.filenames ?? README_FILENAMES;
  }

  /**
   * @returns null for a blank identifier, which produces no result at all
   */
  async resolve(identifier: string): Promise<ReadmeLookupResult | null> {
    const repository = identifier.trim();
    if (!repository) {
      return null;
    }

    const parsed = parseRepository(repository);
    if (!parsed) {
      log.debug(`Invalid repository identifier: ${repository}`);
      return { repository, found: false, truncated: false, error: { kind: 'invalid-format' } };
    }

    for (const candidate of readmeCandidates(parsed.owner, parsed.repo, this.branches, this.filenames)) {
      let status: number;
      let body: string;
      try {
        ({ status, body } = await this.http.get(candidate.url, this.timeoutMs));
      } catch (error) {
        if (error instanceof TransportError) {
          log.debug(`Candidate unreachable, trying next: ${candidate.url}`, error.message);
          continue;
        }
        throw error;
      }

      if (status !== 200) {
        log.debug(`Candidate returned HTTP ${status}: ${candidate.url}`);
        continue;
      }

      const { content, truncated } = truncateContent(body, this.maxLength, this.truncationMarker);
      log.info(`Found README for ${repository} at ${candidate.url}${truncated ? ' (truncated)' : ''}`);
      return { repository, found: true, sourceLocation: candidate.url, content, truncated };
    }

    log.info(`No README found for ${repository}`);
    return {
      repository,
      found: false,
      truncated: false,
      error: { kind: 'not-found', branches: this.branches, filenames: this.filenames },
    };
  }

  /**
   * Resolves each identifier in turn, keeping input order.
   * Blank identifiers are dropped; an unexpected failure is recorded
   * against its repository and the batch moves on.
   */
  async resolveAll(identifiers: readonly string[]): Promise<ReadmeLookupResult[]> {
    const results: ReadmeLookupResult[] = [];
    for (const identifier of identifiers) {
      try {
        const result = await this.resolve(identifier);
        if (result) {
          results.push(result);
        }
      } catch (error) {
        log.error(`Error resolving ${identifier.trim()}:`, error);
        results.push({
          repository: identifier.trim(),
          found: false,
          truncated: false,
          error: { kind: 'failed', message: sanitizeErrorMessage(error) },
        });
      }
    }
    return results;
  }
}
