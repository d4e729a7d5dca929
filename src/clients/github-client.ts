/**
 * GitHub REST API Client
 *
 * Uses native fetch (Node 18+). All methods return typed responses
 * mapped to our internal types. Handles pagination with a page cap.
 */

import type {
  GitHubApiRepo,
  GitHubApiCommit,
  GitHubApiStargazer,
  RepositoryInfo,
  CommitInfo,
} from './types.js';

const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const PER_PAGE = 100;
const DEFAULT_MAX_PAGES = 10;
/** GitHub rejects stargazer pages past this one. */
const MAX_STARGAZER_PAGE = 400;

const JSON_MEDIA_TYPE = 'application/vnd.github+json';
const STAR_MEDIA_TYPE = 'application/vnd.github.star+json';

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

export interface PageOptions {
  /** Upper bound on pages fetched per call. */
  maxPages?: number;
}

export class GitHubClient {
  private getToken: () => Promise<string>;

  constructor(tokenOrProvider: string | (() => Promise<string>)) {
    if (typeof tokenOrProvider === 'string') {
      const token = tokenOrProvider;
      this.getToken = () => Promise.resolve(token);
    } else {
      this.getToken = tokenOrProvider;
    }
  }

  // ─── Data Fetching Methods ───────────────────────────────

  async getRepository(fullName: string): Promise<RepositoryInfo> {
    const repo = await this.get<GitHubApiRepo>(`/repos/${repoPath(fullName)}`);
    return {
      fullName: repo.full_name,
      url: repo.html_url,
      description: repo.description,
      primaryLanguage: repo.language,
      topics: repo.topics ?? [],
      starsTotal: repo.stargazers_count,
      forksTotal: repo.forks_count,
    };
  }

  /**
   * Commits on the default branch since the given instant, newest first.
   * Stops at the first short page or at the page cap; a full page at the
   * cap is logged, since later commits are then missing.
   */
  async getCommitsSince(
    fullName: string,
    since: Date,
    options: PageOptions = {}
  ): Promise<CommitInfo[]> {
    const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    const results: CommitInfo[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const query = new URLSearchParams();
      query.set('since', since.toISOString());
      query.set('per_page', String(PER_PAGE));
      query.set('page', String(page));

      const commits = await this.get<GitHubApiCommit[]>(
        `/repos/${repoPath(fullName)}/commits?${query.toString()}`
      );

      for (const c of commits) {
        results.push({
          sha: c.sha.slice(0, 7),
          subject: c.commit.message.split('\n')[0] ?? '',
          authorId: c.author?.login ?? c.commit.author?.email ?? c.commit.author?.name ?? 'unknown',
          date: c.commit.author?.date ?? '',
        });
      }

      if (commits.length < PER_PAGE) break;
      if (page === maxPages) {
        console.error(
          `[momentum] ${fullName}: stopped after ${maxPages} pages of commits; older commits since ${since.toISOString()} were not read`
        );
      }
    }

    return results;
  }

  /**
   * Star timestamps at or after `since`.
   *
   * The stargazers endpoint lists oldest first, so pages are walked from the
   * last one (derived from `starsTotal`) backwards until a page reaches
   * past `since` or the page cap is hit. GitHub serves at most
   * MAX_STARGAZER_PAGE pages, so for larger repositories the walk starts
   * there and the most recent stars are not visible.
   */
  async getStargazersSince(
    fullName: string,
    since: Date,
    starsTotal: number,
    options: PageOptions = {}
  ): Promise<string[]> {
    const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    const lastPage = Math.min(Math.ceil(starsTotal / PER_PAGE), MAX_STARGAZER_PAGE);
    if (starsTotal > MAX_STARGAZER_PAGE * PER_PAGE) {
      console.error(
        `[momentum] ${fullName}: GitHub lists only the first ${MAX_STARGAZER_PAGE * PER_PAGE} of ${starsTotal} stargazers; recent stars are under-counted`
      );
    }
    const cutoff = since.getTime();
    const results: string[] = [];

    for (let page = lastPage, fetched = 0; page >= 1 && fetched < maxPages; page--, fetched++) {
      const query = new URLSearchParams();
      query.set('per_page', String(PER_PAGE));
      query.set('page', String(page));

      const stars = await this.get<GitHubApiStargazer[]>(
        `/repos/${repoPath(fullName)}/stargazers?${query.toString()}`,
        STAR_MEDIA_TYPE
      );

      let reachedCutoff = false;
      for (const s of stars) {
        if (Date.parse(s.starred_at) >= cutoff) {
          results.push(s.starred_at);
        } else {
          reachedCutoff = true;
        }
      }

      if (reachedCutoff) break;
    }

    return results.sort();
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async get<T>(path: string, accept = JSON_MEDIA_TYPE): Promise<T> {
    const url = `${GITHUB_API}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);
    const token = await this.getToken();

    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: accept,
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${path}`,
          response.status,
          retryable
        );
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeout);
    }
  }
}

function repoPath(fullName: string): string {
  const [owner = '', repo = ''] = fullName.split('/');
  return `${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}
