import { z } from 'zod';

// ============================================================================
// GitHub Configuration
// ============================================================================

/**
 * Configuration for GitHub API client
 */
export const gitHubConfigSchema = z.object({
  /** Personal Access Token with 'repo' scope */
  token: z.string().min(1),
  /** Base URL for GitHub API (for Enterprise, defaults to api.github.com) */
  baseUrl: z.string().url().optional(),
});

export type GitHubConfig = z.infer<typeof gitHubConfigSchema>;

/**
 * Owner and name of a GitHub repository
 */
export interface RepositoryCoordinates {
  owner: string;
  repo: string;
}

// ============================================================================
// GitHub Pull Request
// ============================================================================

/**
 * GitHub pull request metadata
 */
export const gitHubPullRequestSchema = z.object({
  /** PR number */
  number: z.number(),
  /** URL to the PR on GitHub */
  url: z.string().url(),
  /** PR title */
  title: z.string(),
  /** Source branch */
  head: z.string(),
  /** Target branch */
  base: z.string(),
});

export type GitHubPullRequest = z.infer<typeof gitHubPullRequestSchema>;

// ============================================================================
// Create Pull Request Options
// ============================================================================

/**
 * Options for creating a pull request
 */
export const createPullRequestOptionsSchema = z.object({
  /** Repository owner */
  owner: z.string(),
  /** Repository name */
  repo: z.string(),
  /** PR title */
  title: z.string(),
  /** PR body/description */
  body: z.string().optional(),
  /** Source branch (the branch with changes) */
  head: z.string(),
  /** Target branch (usually 'main') */
  base: z.string().default('main'),
});

export type CreatePullRequestOptions = z.input<typeof createPullRequestOptionsSchema>;

// ============================================================================
// GitHub Error Types
// ============================================================================

/**
 * GitHub API error codes
 */
export const GitHubErrorCode = {
  /** Token is invalid or expired */
  UNAUTHORIZED: 'unauthorized',
  /** Token lacks required permissions */
  FORBIDDEN: 'forbidden',
  /** Repository not found */
  NOT_FOUND: 'not_found',
  /** Validation error (e.g., pull request already exists, no commits) */
  VALIDATION_FAILED: 'validation_failed',
  /** Rate limit exceeded */
  RATE_LIMITED: 'rate_limited',
  /** Network or other error */
  NETWORK_ERROR: 'network_error',
} as const;

export type GitHubErrorCode = (typeof GitHubErrorCode)[keyof typeof GitHubErrorCode];

/**
 * GitHub API error
 */
export class GitHubError extends Error {
  constructor(
    message: string,
    public readonly code: GitHubErrorCode,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'GitHubError';
  }
}
