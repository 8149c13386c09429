import type { Locale, ReadmeLookupResult, TrendingOutcome } from '../types.js';
import { getMessages, type ReportMessages } from './messages.js';

/**
 * Renders trending and README outcomes as the plain-text reports
 * returned to the MCP client. All failure kinds become prefixed lines.
 */
export class ReportFormatter {
  readonly messages: ReportMessages;

  constructor(
    locale: Locale = 'en',
    private readonly clock: () => Date = () => new Date()
  ) {
    this.messages = getMessages(locale);
  }

  formatTrending(outcome: TrendingOutcome): string {
    const m = this.messages;

    switch (outcome.status) {
      case 'invalid-since':
        return m.invalidSince(outcome.accepted);
      case 'transport-error':
        return [m.networkError(outcome.message), m.requestedUrl(outcome.url), m.networkHint].join('\n');
      case 'http-error':
        return [m.httpError(outcome.httpStatus), m.requestedUrl(outcome.url), m.networkHint].join('\n');
      case 'empty':
        return [m.noProjectsFound, m.requestedUrl(outcome.url)].join('\n');
      case 'ok':
        break;
    }

    const now = this.clock();
    const periodLabel = m.sinceLabel[outcome.query.since];
    const lines: string[] = [
      m.trendingHeader,
      m.retrievedOn(m.formatDate(now), m.weekdays[now.getDay()]),
      m.timeRange(periodLabel),
    ];
    if (outcome.query.languageLabel) {
      lines.push(m.languageFilter(outcome.query.languageLabel));
    }
    lines.push(m.foundProjects(outcome.fragmentCount), '');

    // Numbering follows listing position so gaps show where fragments were skipped
    const skippedAt = new Map(outcome.skipped.map((skip) => [skip.position, skip]));
    let entryIndex = 0;
    for (let position = 1; position <= outcome.fragmentCount; position++) {
      const skip = skippedAt.get(position);
      if (skip) {
        lines.push(skip.reason === 'extraction-error' ? m.entryError(position, skip.detail ?? '') : m.entrySkipped(position));
        continue;
      }

      const entry = outcome.entries[entryIndex++];
      if (!entry) {
        continue;
      }
      lines.push(
        `${position}. ${entry.title}`,
        `   🔗 ${entry.projectUrl}`,
        `   📝 ${entry.description}`,
        m.entryStats({
          language: entry.primaryLanguage,
          stars: entry.totalStars,
          forks: entry.totalForks,
          periodLabel,
          periodStars: entry.periodStars,
        })
      );
    }

    lines.push('', m.nextStepsHeading, ...m.trendingNextSteps);
    return lines.join('\n');
  }

  formatReadme(results: readonly ReadmeLookupResult[]): string {
    const m = this.messages;
    const lines: string[] = [m.readmeHeader];

    for (const result of results) {
      if (result.found) {
        lines.push(
          m.readmeFound(result.sourceLocation ?? ''),
          m.repositoryLabel(result.repository),
          m.readmeLabel,
          result.content ?? '',
          '---\n\n'
        );
        continue;
      }

      const error = result.error;
      switch (error?.kind) {
        case 'invalid-format':
          lines.push(m.invalidRepositoryFormat(result.repository), m.expectedRepositoryFormat, '---', '');
          break;
        case 'not-found':
          lines.push(
            m.readmeNotFound,
            m.triedBranches(error.branches),
            m.triedFiles(error.filenames),
            m.repositoryLabel(result.repository),
            m.readmeMissingBody,
            '---\n\n'
          );
          break;
        case 'failed':
          lines.push(
            m.repositoryError(result.repository, error.message),
            m.repositoryLabel(result.repository),
            m.readmeFailedBody(error.message),
            '---'
          );
          break;
        case undefined:
          lines.push(m.readmeNotFound, m.repositoryLabel(result.repository), m.readmeMissingBody, '---\n\n');
          break;
      }
    }

    lines.push(m.nextStepsHeading, ...m.readmeNextSteps);
    return lines.join('\n');
  }

  formatEmptyRepositories(): string {
    return this.messages.emptyRepositories;
  }

  formatInvalidArguments(message: string): string {
    return this.messages.invalidArguments(message);
  }

  formatExecutionError(message: string, url?: string): string {
    const lines = [this.messages.executionError(message)];
    if (url) {
      lines.push(this.messages.requestedUrl(url));
    }
    return lines.join('\n');
  }
}
