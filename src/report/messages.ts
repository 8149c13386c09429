import type { Locale, Since } from '../types.js';

export interface ReportMessages {
  weekdays: readonly string[];
  formatDate(date: Date): string;
  sinceLabel: Record<Since, string>;

  // Extraction sentinels
  noDescription: string;
  unknownLanguage: string;

  // Trending report
  trendingHeader: string;
  retrievedOn(date: string, weekday: string): string;
  timeRange(label: string): string;
  languageFilter(language: string): string;
  foundProjects(count: number): string;
  entryStats(entry: { language: string; stars: string; forks: string; periodLabel: string; periodStars: string }): string;
  entryError(position: number, detail: string): string;
  entrySkipped(position: number): string;
  trendingNextSteps: readonly string[];

  // Trending errors
  invalidSince(accepted: readonly string[]): string;
  noProjectsFound: string;
  networkError(message: string): string;
  httpError(status: number): string;
  networkHint: string;
  executionError(message: string): string;
  requestedUrl(url: string): string;

  // README report
  readmeHeader: string;
  emptyRepositories: string;
  invalidRepositoryFormat(repository: string): string;
  expectedRepositoryFormat: string;
  readmeFound(url: string): string;
  repositoryLabel(repository: string): string;
  readmeLabel: string;
  readmeNotFound: string;
  triedBranches(branches: readonly string[]): string;
  triedFiles(files: readonly string[]): string;
  readmeMissingBody: string;
  repositoryError(repository: string, message: string): string;
  readmeFailedBody(message: string): string;
  truncationMarker: string;
  readmeNextSteps: readonly string[];

  nextStepsHeading: string;
  invalidArguments(message: string): string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

const en: ReportMessages = {
  weekdays: ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'],
  formatDate: (date) => `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`,
  sinceLabel: { daily: 'Today', weekly: 'This Week', monthly: 'This Month' },

  noDescription: 'No description',
  unknownLanguage: 'Unknown',

  trendingHeader: '🌟 GitHub Trending Repositories',
  retrievedOn: (date, weekday) => `📅 Retrieved on: ${date} ${weekday}`,
  timeRange: (label) => `⏰ Time Range: ${label}`,
  languageFilter: (language) => `💻 Language: ${language}`,
  foundProjects: (count) => `📊 Found ${count} trending projects`,
  entryStats: ({ language, stars, forks, periodLabel, periodStars }) =>
    `   💻 Language: ${language} | ⭐ Total Stars: ${stars} | 🍴 Forks: ${forks} | 🔥 ${periodLabel}: +${periodStars}`,
  entryError: (position, detail) => `❌ Error parsing project ${position}: ${detail}`,
  entrySkipped: (position) => `⚠️ Skipped project ${position}: title or link not found`,
  trendingNextSteps: [
    '1. Analyze GitHub trending project trends',
    '2. If interested in specific projects, use get_repository_readme tool to get detailed documentation',
  ],

  invalidSince: (accepted) => `❌ Error: since parameter must be one of: ${accepted.join(', ')}`,
  noProjectsFound: '❌ No trending projects found, possible page structure change or empty trending period',
  networkError: (message) => `❌ Network request error: ${message}`,
  httpError: (status) => `❌ Network request error: HTTP ${status}`,
  networkHint: 'Suggest checking network connection or retry later',
  executionError: (message) => `❌ Program execution error: ${message}`,
  requestedUrl: (url) => `Requested URL: ${url}`,

  readmeHeader: '📚 GitHub Repository README Documents',
  emptyRepositories: '❌ Error: repositories parameter cannot be empty, please provide at least one repository name',
  invalidRepositoryFormat: (repository) => `❌ Invalid repository name format: ${repository}`,
  expectedRepositoryFormat: '   Correct format should be: owner/repository-name',
  readmeFound: (url) => `✅ Successfully retrieved (Source: ${url})`,
  repositoryLabel: (repository) => `Repository: ${repository}`,
  readmeLabel: 'README:',
  readmeNotFound: '❌ README file not found',
  triedBranches: (branches) => `   Tried branches: ${branches.join(', ')}`,
  triedFiles: (files) => `   Tried files: ${files.join(', ')}`,
  readmeMissingBody: 'README: No readable README file found',
  repositoryError: (repository, message) => `❌ Error processing repository ${repository}: ${message}`,
  readmeFailedBody: (message) => `README: Failed to retrieve - ${message}`,
  truncationMarker: '\n\n... [Content too long, truncated] ...',
  readmeNextSteps: [
    '- 1. Analyze detailed information and technical features of each project',
    '- 2. If particularly interested in a project, further study its implementation details',
    '- 3. Summarize technical highlights and application scenarios of the projects',
  ],

  nextStepsHeading: '💡 Suggested next steps:',
  invalidArguments: (message) => `❌ Error: ${message}`,
};

const zh: ReportMessages = {
  weekdays: ['星期日', '星期一', '星期二', '星期三', '星期四', '星期五', '星期六'],
  formatDate: (date) => `${date.getFullYear()}年${pad(date.getMonth() + 1)}月${pad(date.getDate())}日`,
  sinceLabel: { daily: '今日', weekly: '本周', monthly: '本月' },

  noDescription: '无描述',
  unknownLanguage: '未知',

  trendingHeader: '🌟 GitHub Trending Repositories',
  retrievedOn: (date, weekday) => `📅 获取时间: ${date} ${weekday}`,
  timeRange: (label) => `⏰ 时间范围: ${label}`,
  languageFilter: (language) => `💻 编程语言: ${language}`,
  foundProjects: (count) => `📊 共发现 ${count} 个热门项目`,
  entryStats: ({ language, stars, forks, periodLabel, periodStars }) =>
    `   💻 语言: ${language} | ⭐ 总星数: ${stars} | 🍴 Forks: ${forks} | 🔥 ${periodLabel}: +${periodStars}`,
  entryError: (position, detail) => `❌ 解析第 ${position} 个项目时出错: ${detail}`,
  entrySkipped: (position) => `⚠️ 已跳过第 ${position} 个项目: 未找到标题或链接`,
  trendingNextSteps: ['1. 分析GitHub热门项目趋势', '2. 如有特别关注的项目，可使用 get_repository_readme 工具获取该项目详细文档'],

  invalidSince: (accepted) => `❌ 错误：since参数必须是以下值之一: ${accepted.join(', ')}`,
  noProjectsFound: '❌ 未找到任何trending项目，可能页面结构已更改或该时间段暂无热门项目',
  networkError: (message) => `❌ 网络请求错误: ${message}`,
  httpError: (status) => `❌ 网络请求错误: HTTP ${status}`,
  networkHint: '建议检查网络连接或稍后重试',
  executionError: (message) => `❌ 程序执行错误: ${message}`,
  requestedUrl: (url) => `请求URL: ${url}`,

  readmeHeader: '📚 GitHub Repository README Documents',
  emptyRepositories: '❌ 错误：repositories参数不能为空，请提供至少一个仓库名称',
  invalidRepositoryFormat: (repository) => `❌ 仓库名称格式错误: ${repository}`,
  expectedRepositoryFormat: '   正确格式应为: owner/repository-name',
  readmeFound: (url) => `✅ 成功获取 (来源: ${url})`,
  repositoryLabel: (repository) => `仓库名称: ${repository}`,
  readmeLabel: 'README:',
  readmeNotFound: '❌ 未找到README文件',
  triedBranches: (branches) => `   已尝试分支: ${branches.join(', ')}`,
  triedFiles: (files) => `   已尝试文件: ${files.join(', ')}`,
  readmeMissingBody: 'README: 未找到可读取的README文件',
  repositoryError: (repository, message) => `❌ 处理仓库 ${repository} 时出错: ${message}`,
  readmeFailedBody: (message) => `README: 获取失败 - ${message}`,
  truncationMarker: '\n\n... [内容过长，已截断] ...',
  readmeNextSteps: [
    '- 1. 分析每个项目的详细信息和技术特点',
    '- 2. 如对某个项目特别感兴趣，可进一步研究其实现细节',
    '- 3. 总结项目的技术亮点和应用场景',
  ],

  nextStepsHeading: '💡 建议下一步操作：',
  invalidArguments: (message) => `❌ 错误：${message}`,
};

const CATALOGS: Record<Locale, ReportMessages> = { en, zh };

export function getMessages(locale: Locale): ReportMessages {
  return CATALOGS[locale];
}
