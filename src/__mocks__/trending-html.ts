/**
 * Builders for trending listing markup, shaped like GitHub's article rows.
 * Passing null for a field leaves its element out.
 */

export interface ArticleFixture {
  owner?: string;
  repo?: string;
  /** Overrides the link target; null drops the href attribute */
  href?: string | null;
  /** false drops the heading and its link entirely */
  withTitle?: boolean;
  description?: string | null;
  language?: string | null;
  stars?: string | null;
  forks?: string | null;
  /** Full text of the star-delta label, e.g. "1,024 stars today" */
  periodLabel?: string | null;
}

export function buildArticle(fixture: ArticleFixture = {}): string {
  const owner = fixture.owner ?? 'acme';
  const repo = fixture.repo ?? 'rocket';
  const href = fixture.href === undefined ? `/${owner}/${repo}` : fixture.href;
  const description = fixture.description === undefined ? 'A fast rocket engine' : fixture.description;
  const language = fixture.language === undefined ? 'TypeScript' : fixture.language;
  const stars = fixture.stars === undefined ? '12,345' : fixture.stars;
  const forks = fixture.forks === undefined ? '678' : fixture.forks;
  const periodLabel = fixture.periodLabel === undefined ? '1,024 stars today' : fixture.periodLabel;

  const hrefAttr = href === null ? '' : ` href="${href}"`;
  const title =
    fixture.withTitle === false
      ? ''
      : `
  <h2 class="h3 lh-condensed">
    <a data-view-component="true"${hrefAttr} class="Link">
      <svg class="octicon octicon-repo mr-1 color-fg-muted"></svg>
      <span data-view-component="true" class="text-normal">
        ${owner} /
      </span>
      ${repo}
    </a>
  </h2>`;

  const parts = [
    '<article class="Box-row">',
    '  <div class="float-right d-flex"><a href="/login" class="btn-sm btn">Star</a></div>',
    title,
    description === null ? '' : `  <p class="col-9 color-fg-muted my-1 pr-4">\n    ${description}\n  </p>`,
    '  <div class="f6 color-fg-muted mt-2">',
    language === null
      ? ''
      : `    <span class="d-inline-block ml-0 mr-3">
      <span class="repo-language-color"></span>
      <span itemprop="programmingLanguage">${language}</span>
    </span>`,
    stars === null
      ? ''
      : `    <a href="/${owner}/${repo}/stargazers" class="Link Link--muted d-inline-block mr-3">
      <svg class="octicon octicon-star"></svg>
      ${stars}
    </a>`,
    forks === null
      ? ''
      : `    <a href="/${owner}/${repo}/forks" class="Link Link--muted d-inline-block mr-3">
      <svg class="octicon octicon-repo-forked"></svg>
      ${forks}
    </a>`,
    `    <span class="d-inline-block mr-3">
      Built by
      <a href="/${owner}"><img class="avatar mb-1" alt="@${owner}"></a>
    </span>`,
    periodLabel === null
      ? ''
      : `    <span class="d-inline-block float-sm-right">
      <svg class="octicon octicon-star"></svg>
      ${periodLabel}
    </span>`,
    '  </div>',
    '</article>',
  ];

  return parts.filter(Boolean).join('\n');
}

export function buildTrendingPage(articles: string[]): string {
  return `<!DOCTYPE html>
<html lang="en">
  <head><title>Trending repositories on GitHub today</title></head>
  <body>
    <main>
      <div class="Box">
        <div class="Box-header">Trending</div>
        <div>
${articles.join('\n')}
        </div>
      </div>
    </main>
  </body>
</html>`;
}
