import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import type { PushAttempt } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('git-ops');

/**
 * Author/committer identity passed to git as `-c user.name=... -c user.email=...`
 */
export interface CommitIdentity {
  name: string;
  email: string;
}

function getGit(path: string, identity?: CommitIdentity): SimpleGit {
  const options: Partial<SimpleGitOptions> = {
    baseDir: path,
    binary: 'git',
    maxConcurrentProcesses: 6,
  };
  if (identity) {
    options.config = [`user.name=${identity.name}`, `user.email=${identity.email}`];
  }
  return simpleGit(options);
}

/**
 * Initialize a new git repository
 */
export async function initRepo(path: string, bare = false): Promise<void> {
  log.debug({ path, bare }, 'Initializing git repository');
  const git = getGit(path);
  await git.init(bare);
  log.debug({ path }, 'Git repository initialized');
}

/**
 * Get the current HEAD SHA
 */
export async function getCurrentSha(path: string): Promise<string> {
  const git = getGit(path);
  const sha = await git.revparse(['HEAD']);
  return sha.trim();
}

/**
 * Resolve a ref to its commit SHA
 */
export async function resolveRef(path: string, ref: string): Promise<string> {
  const git = getGit(path);
  const sha = await git.revparse(['--verify', ref]);
  return sha.trim();
}

/**
 * Stage all changes, including deletions
 */
export async function stageAll(path: string): Promise<void> {
  const git = getGit(path);
  await git.add(['-A']);
  log.debug({ path }, 'Staged all changes');
}

/**
 * Commit staged changes
 * @returns The full commit SHA
 */
export async function commit(
  path: string,
  message: string,
  identity?: CommitIdentity
): Promise<string> {
  const git = getGit(path, identity);
  await git.commit(message);
  const sha = await getCurrentSha(path);
  log.debug({ path, sha, message }, 'Created commit');
  return sha;
}

/**
 * Write the index as a tree object
 * @returns The tree SHA
 */
export async function writeTree(path: string): Promise<string> {
  const git = getGit(path);
  const tree = await git.raw(['write-tree']);
  return tree.trim();
}

/**
 * Resolve the tree of a commit
 */
export async function getTree(path: string, ref: string): Promise<string> {
  const git = getGit(path);
  const tree = await git.revparse([`${ref}^{tree}`]);
  return tree.trim();
}

/**
 * Switch to a new branch with no history. The index keeps the previous
 * branch's entries until the next `stageAll`.
 */
export async function checkoutOrphan(path: string, branchName: string): Promise<void> {
  const git = getGit(path);
  await git.raw(['checkout', '-f', '--orphan', branchName]);
  log.debug({ path, branchName }, 'Checked out orphan branch');
}

/**
 * Create or reset a local branch at a commit and check it out
 */
export async function checkoutBranchAt(
  path: string,
  branchName: string,
  startPoint: string
): Promise<void> {
  const git = getGit(path);
  await git.raw(['checkout', '-f', '-B', branchName, startPoint]);
  log.debug({ path, branchName, startPoint }, 'Checked out branch at commit');
}

/**
 * Whether `ancestor` is reachable from `descendant`
 */
export async function isAncestor(
  path: string,
  ancestor: string,
  descendant: string
): Promise<boolean> {
  const git = getGit(path);
  // Commits reachable from ancestor but not from descendant
  const count = await git.raw(['rev-list', '--count', `${descendant}..${ancestor}`]);
  return count.trim() === '0';
}

// ============================================================================
// Remote Operations
// ============================================================================

/**
 * Add a remote to the repository
 */
export async function addRemote(path: string, name: string, url: string): Promise<void> {
  const git = getGit(path);
  await git.addRemote(name, url);
  log.debug({ path, name }, 'Added remote');
}

/**
 * Fetch all branches of a remote, pruning deleted ones
 */
export async function fetch(path: string, remote: string): Promise<void> {
  const git = getGit(path);
  await git.fetch([remote, '--prune']);
  log.debug({ path, remote }, 'Fetched from remote');
}

/**
 * Remote-tracking branches of a remote, keyed by branch name
 */
export async function getRemoteBranchTips(
  path: string,
  remote: string
): Promise<Map<string, string>> {
  const git = getGit(path);
  const prefix = `refs/remotes/${remote}/`;
  const output = await git.raw(['for-each-ref', '--format=%(refname) %(objectname)', prefix]);

  const tips = new Map<string, string>();
  for (const line of output.split('\n')) {
    const [ref, sha] = line.trim().split(' ');
    if (!ref || !sha || !ref.startsWith(prefix)) {
      continue;
    }
    const branch = ref.slice(prefix.length);
    if (branch !== 'HEAD') {
      tips.set(branch, sha);
    }
  }
  return tips;
}

const NON_FAST_FORWARD_PATTERNS = [
  /!\s*\[rejected\]/,
  /non-fast-forward/,
  /Updates were rejected because/,
];

/**
 * Whether a push error is the remote refusing a non-fast-forward update
 * (as opposed to auth, network or server-side hook failures)
 */
export function isNonFastForwardRejection(message: string): boolean {
  return NON_FAST_FORWARD_PATTERNS.some((pattern) => pattern.test(message));
}

export interface PushOptions {
  /** Force push (use with caution) */
  force?: boolean;
}

/**
 * Push a local branch to the branch of the same name on a remote.
 *
 * A non-fast-forward rejection is returned as a result; every other failure
 * is thrown.
 */
export async function push(
  path: string,
  remote: string,
  branch: string,
  options: PushOptions = {}
): Promise<PushAttempt> {
  const git = getGit(path);
  const args: string[] = [];

  if (options.force) {
    args.push('--force');
  }

  try {
    await git.push(remote, `${branch}:refs/heads/${branch}`, args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (!options.force && isNonFastForwardRejection(message)) {
      log.info({ path, remote, branch }, 'Push rejected as non-fast-forward');
      return { accepted: false, rejection: message.trim() };
    }
    throw error;
  }

  log.info({ path, remote, branch, force: options.force ?? false }, 'Pushed to remote');
  return { accepted: true };
}
