import type { Octokit } from '@octokit/rest';
import type { GitHubPullRequest, RepositoryCoordinates } from '../types/github.js';
import {
  PullRequestState,
  type DescriptionSource,
  type Folder,
  type PullRequestResult,
} from '../types/index.js';
import {
  createPullRequest,
  findOpenPullRequest,
  getDefaultBranch,
  isPullRequestAlreadyExists,
} from '../workspace/github.js';
import { createLogger } from '../utils/logger.js';
import { resolveDescription } from './description.js';

const log = createLogger('pr-requester');

export interface NewPullRequest {
  title: string;
  body: string;
  head: string;
  base: string;
}

/**
 * Hosting service operations needed to open pull requests
 */
export interface PullRequestGateway {
  defaultBranch(): Promise<string>;
  findOpen(head: string): Promise<GitHubPullRequest | null>;
  create(request: NewPullRequest): Promise<GitHubPullRequest>;
}

/**
 * PullRequestGateway backed by the GitHub REST API
 */
export class GitHubPullRequestGateway implements PullRequestGateway {
  private defaultBranchName: string | undefined;

  constructor(
    private readonly client: Octokit,
    private readonly coordinates: RepositoryCoordinates
  ) {}

  async defaultBranch(): Promise<string> {
    if (this.defaultBranchName === undefined) {
      this.defaultBranchName = await getDefaultBranch(this.client, this.coordinates);
    }
    return this.defaultBranchName;
  }

  findOpen(head: string): Promise<GitHubPullRequest | null> {
    return findOpenPullRequest(this.client, this.coordinates, head);
  }

  create(request: NewPullRequest): Promise<GitHubPullRequest> {
    return createPullRequest(this.client, {
      owner: this.coordinates.owner,
      repo: this.coordinates.repo,
      ...request,
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Opens pull requests from pushed custom branches into the repository's
 * default branch. The PR title is the branch name.
 */
export class PullRequestRequester {
  constructor(
    private readonly gateway: PullRequestGateway,
    private readonly description: DescriptionSource,
    /** Base used when the default branch cannot be looked up */
    private readonly fallbackBase: string
  ) {}

  async request(folder: Folder, branch: string): Promise<PullRequestResult> {
    const body = await resolveDescription(folder, this.description);
    if (body === null) {
      log.warn({ branch }, 'Description missing, pull request not requested');
      return { state: PullRequestState.SKIPPED_MISSING_DESCRIPTION };
    }

    const base = await this.resolveBase();

    try {
      const existing = await this.gateway.findOpen(branch);
      if (existing) {
        log.info({ branch, number: existing.number }, 'Pull request already open');
        return { state: PullRequestState.ALREADY_EXISTS, number: existing.number, url: existing.url };
      }
    } catch (error) {
      log.warn({ branch, error: errorMessage(error) }, 'Pull request lookup failed, creating anyway');
    }

    try {
      const pr = await this.gateway.create({ title: branch, body, head: branch, base });
      log.info({ branch, number: pr.number, base }, 'Pull request created');
      return { state: PullRequestState.CREATED, number: pr.number, url: pr.url };
    } catch (error) {
      if (isPullRequestAlreadyExists(error)) {
        return { state: PullRequestState.ALREADY_EXISTS };
      }
      log.error({ branch, error: errorMessage(error) }, 'Pull request creation failed');
      return { state: PullRequestState.FAILED, error: errorMessage(error) };
    }
  }

  private async resolveBase(): Promise<string> {
    try {
      return await this.gateway.defaultBranch();
    } catch (error) {
      log.warn(
        { error: errorMessage(error), fallback: this.fallbackBase },
        'Default branch lookup failed, using main folder branch'
      );
      return this.fallbackBase;
    }
  }
}
