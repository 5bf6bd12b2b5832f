import type {
  FileEntry,
  PushAttempt,
  RemoteBranchState,
  ResolvedBranchTarget,
} from '../types/index.js';

/**
 * The local repository a run publishes from, connected to one remote.
 *
 * Implemented over a scratch git checkout by GitPublishRepository and by an
 * in-memory stand-in in tests. Everything except `push` works on local
 * objects only.
 */
export interface PublishRepository {
  /** Remote branch tips as last fetched, updated after every accepted push */
  remoteBranches(): RemoteBranchState;

  /** Check out `target.branch` at its base commit, or as an orphan branch */
  prepareBranch(target: ResolvedBranchTarget): Promise<void>;

  /** Replace the checked out content with `files` and stage it; returns the staged tree */
  writeContent(files: FileEntry[]): Promise<string>;

  /** Commit the staged tree on the checked out branch; returns the commit */
  commit(message: string): Promise<string>;

  /** Tree of a commit that is known locally */
  treeOf(commit: string): Promise<string>;

  /** Whether `ancestor` is reachable from `descendant` */
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;

  /** Push the local branch to the remote branch of the same name */
  push(branch: string, options: { force: boolean }): Promise<PushAttempt>;

  /**
   * Dry run: treat `commit` as the remote tip of `branch` for the rest of the
   * run, as an accepted push would. Nothing leaves the local repository.
   */
  recordPredictedTip(branch: string, commit: string): void;
}
