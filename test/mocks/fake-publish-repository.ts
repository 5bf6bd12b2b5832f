/**
 * In-memory PublishRepository
 *
 * Models a local object store, the remote-tracking view fetched at open, and
 * the remote itself. The remote can be advanced behind the fetched view to
 * simulate a diverged branch.
 */

import { createHash } from 'node:crypto';
import type { FileEntry, PushAttempt, ResolvedBranchTarget } from '../../src/types/index.js';
import type { PublishRepository } from '../../src/publish/repository.js';

interface FakeCommit {
  sha: string;
  tree: string;
  parent: string | null;
  message: string;
}

export function treeHash(files: FileEntry[]): string {
  const entries = files.length > 0 ? files : [{ path: '.gitkeep', content: Buffer.alloc(0) }];
  const hash = createHash('sha1');
  for (const file of [...entries].sort((a, b) => (a.path < b.path ? -1 : 1))) {
    hash.update(file.path);
    hash.update('\0');
    hash.update(file.content);
    hash.update('\0');
  }
  return hash.digest('hex');
}

export function textFiles(files: Record<string, string>): FileEntry[] {
  return Object.entries(files).map(([path, content]) => ({ path, content: Buffer.from(content) }));
}

export class FakePublishRepository implements PublishRepository {
  readonly commits = new Map<string, FakeCommit>();
  /** Branch tips on the remote itself */
  readonly remote = new Map<string, string>();
  /** Remote-tracking view */
  readonly tips = new Map<string, string>();
  readonly pushCalls: Array<{ branch: string; force: boolean }> = [];
  readonly commitCalls: string[] = [];
  /** Branches whose pushes throw */
  readonly failingBranches = new Set<string>();

  private readonly localBranches = new Map<string, string | null>();
  private current: string | null = null;
  private stagedTree: string | null = null;
  private counter = 0;

  /**
   * Create a commit that exists on the remote and in the fetched view
   */
  seedRemote(branch: string, files: FileEntry[], parent: string | null = null): string {
    const sha = this.store(treeHash(files), parent, `seed ${branch}`);
    this.remote.set(branch, sha);
    this.tips.set(branch, sha);
    return sha;
  }

  /**
   * Add a commit to a remote branch without updating the fetched view
   */
  advanceRemote(branch: string, files: FileEntry[]): string {
    const sha = this.store(treeHash(files), this.remote.get(branch) ?? null, `remote ${branch}`);
    this.remote.set(branch, sha);
    return sha;
  }

  /**
   * A fresh scratch repository against the same remote, as a new run sees it
   */
  reopen(): FakePublishRepository {
    const next = new FakePublishRepository();
    for (const [sha, commit] of this.commits) {
      next.commits.set(sha, commit);
    }
    for (const [branch, sha] of this.remote) {
      next.remote.set(branch, sha);
      next.tips.set(branch, sha);
    }
    next.counter = this.counter;
    return next;
  }

  remoteBranches(): ReadonlyMap<string, string> {
    return this.tips;
  }

  async prepareBranch(target: ResolvedBranchTarget): Promise<void> {
    if (target.base.kind === 'orphan') {
      if (this.localBranches.has(target.branch)) {
        throw new Error(`branch '${target.branch}' already exists`);
      }
      this.localBranches.set(target.branch, null);
    } else {
      this.requireCommit(target.base.commit);
      this.localBranches.set(target.branch, target.base.commit);
    }
    this.current = target.branch;
    this.stagedTree = null;
  }

  async writeContent(files: FileEntry[]): Promise<string> {
    this.stagedTree = treeHash(files);
    return this.stagedTree;
  }

  async commit(message: string): Promise<string> {
    if (this.current === null || this.stagedTree === null) {
      throw new Error('nothing staged');
    }
    const parent = this.localBranches.get(this.current) ?? null;
    const sha = this.store(this.stagedTree, parent, message);
    this.localBranches.set(this.current, sha);
    this.commitCalls.push(message);
    return sha;
  }

  async treeOf(commit: string): Promise<string> {
    return this.requireCommit(commit).tree;
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    let cursor: string | null = descendant;
    while (cursor !== null) {
      if (cursor === ancestor) {
        return true;
      }
      cursor = this.requireCommit(cursor).parent;
    }
    return false;
  }

  async push(branch: string, options: { force: boolean }): Promise<PushAttempt> {
    this.pushCalls.push({ branch, force: options.force });

    if (this.failingBranches.has(branch)) {
      throw new Error('fatal: unable to access remote: connection reset');
    }

    const local = this.localBranches.get(branch);
    if (!local) {
      throw new Error(`src refspec ${branch} does not match any`);
    }

    const remoteTip = this.remote.get(branch);
    if (!options.force && remoteTip && !(await this.isAncestor(remoteTip, local))) {
      return { accepted: false, rejection: ` ! [rejected]        ${branch} -> ${branch} (non-fast-forward)` };
    }

    this.remote.set(branch, local);
    this.tips.set(branch, local);
    return { accepted: true };
  }

  recordPredictedTip(branch: string, commit: string): void {
    this.requireCommit(commit);
    this.tips.set(branch, commit);
  }

  /**
   * Local branch head, undefined when the branch was never prepared
   */
  head(branch: string): string | null | undefined {
    return this.localBranches.get(branch);
  }

  commitOf(sha: string): FakeCommit {
    return this.requireCommit(sha);
  }

  private store(tree: string, parent: string | null, message: string): string {
    this.counter++;
    const sha = createHash('sha1')
      .update(`${tree}:${parent ?? ''}:${message}:${this.counter}`)
      .digest('hex');
    this.commits.set(sha, { sha, tree, parent, message });
    return sha;
  }

  private requireCommit(sha: string): FakeCommit {
    const found = this.commits.get(sha);
    if (!found) {
      throw new Error(`unknown commit ${sha}`);
    }
    return found;
  }
}
