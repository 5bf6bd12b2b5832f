/**
 * Publish Types
 *
 * Types shared by the branch resolver, snapshotter, change detector,
 * push negotiator and outcome aggregator.
 */

import type { Folder } from './folder.js';

// ============================================================================
// Branch Targets
// ============================================================================

/**
 * Where the history of a published branch starts
 */
export type BranchBase =
  | { kind: 'orphan' }
  | { kind: 'remote-branch'; commit: string }
  | { kind: 'remote-main'; commit: string }
  | { kind: 'unresolvable'; reason: string };

export type ResolvedBranchBase = Exclude<BranchBase, { kind: 'unresolvable' }>;

export interface BranchTarget {
  branch: string;
  base: BranchBase;
}

export interface ResolvedBranchTarget {
  branch: string;
  base: ResolvedBranchBase;
}

/**
 * Remote branch name to tip commit, as seen by the scratch repository
 */
export type RemoteBranchState = ReadonlyMap<string, string>;

// ============================================================================
// Snapshots
// ============================================================================

export interface Snapshot {
  branch: string;
  /** Commit the local branch points at */
  commit: string;
  /** Tree of that commit */
  tree: string;
  base: ResolvedBranchBase;
  /** Tree identical to the base commit's tree; `commit` is then the base commit */
  noDiff: boolean;
  message: string;
}

// ============================================================================
// Push Results
// ============================================================================

export const SkipReason = {
  NO_CHANGE: 'no-change',
  MISSING_FILE: 'missing-file',
  MISSING_DESCRIPTION: 'missing-description',
  REMOTE_MAIN_MISSING: 'remote-main-missing',
} as const;

export type SkipReason = (typeof SkipReason)[keyof typeof SkipReason];

export type PushResult =
  | { status: 'skipped'; reason: SkipReason; detail?: string }
  | { status: 'pushed-fast-forward'; commit: string }
  | { status: 'pushed-forced'; commit: string }
  | { status: 'needs-force'; commit: string; remoteTip: string }
  | { status: 'failed'; reason: string };

export type PushStatus = PushResult['status'];

/**
 * Outcome of a single `git push` attempt
 */
export type PushAttempt = { accepted: true } | { accepted: false; rejection: string };

// ============================================================================
// Pull Requests
// ============================================================================

export const PullRequestState = {
  NOT_APPLICABLE: 'not-applicable',
  CREATED: 'created',
  ALREADY_EXISTS: 'already-exists',
  SKIPPED_MISSING_DESCRIPTION: 'skipped-missing-description',
  FAILED: 'failed',
} as const;

export type PullRequestState = (typeof PullRequestState)[keyof typeof PullRequestState];

export interface PullRequestResult {
  state: PullRequestState;
  number?: number;
  url?: string;
  error?: string;
}

// ============================================================================
// Reports
// ============================================================================

export interface FolderReport {
  folder: Folder;
  branch: string;
  /** Base selected by the resolver, absent when the folder was excluded earlier */
  base?: BranchBase;
  push: PushResult;
  pullRequest: PullRequestResult;
  dryRun: boolean;
}

export interface RunSummary {
  total: number;
  pushed: number;
  skipped: number;
  needsForce: number;
  failed: number;
  exitCode: number;
  reports: FolderReport[];
}

export interface PublishOptions {
  /** Operator authorized forced pushes for this run */
  force: boolean;
  /** Resolve and detect only; no push or pull request side effects */
  dryRun: boolean;
  createPullRequests: boolean;
}
