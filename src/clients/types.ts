/**
 * API Response Types
 *
 * Shapes of the raw GitHub REST API responses the collector reads.
 * They get mapped to our internal types by the client.
 */

export interface GitHubApiRepo {
  full_name: string;
  html_url: string;
  description: string | null;
  language: string | null;
  topics?: string[];
  stargazers_count: number;
  forks_count: number;
}

export interface GitHubApiCommit {
  sha: string;
  commit: {
    message: string;
    author: {
      name: string;
      email: string;
      date: string;
    } | null;
  };
  author: { login: string; id: number } | null;
}

/** Returned by the stargazers endpoint under the `star+json` media type. */
export interface GitHubApiStargazer {
  starred_at: string;
  user: { login: string } | null;
}

// ─── Mapped Types ────────────────────────────────────────────

export interface RepositoryInfo {
  fullName: string;
  url: string;
  description: string | null;
  primaryLanguage: string | null;
  topics: string[];
  starsTotal: number;
  forksTotal: number;
}

export interface CommitInfo {
  sha: string;
  /** First line of the commit message. */
  subject: string;
  /** GitHub login when linked, otherwise the git author email or name. */
  authorId: string;
  date: string;
}
