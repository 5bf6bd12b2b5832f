import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type {
  FileEntry,
  PushAttempt,
  RemoteBranchState,
  ResolvedBranchTarget,
} from '../types/index.js';
import {
  addRemote,
  checkoutBranchAt,
  checkoutOrphan,
  commit,
  fetch,
  getRemoteBranchTips,
  getTree,
  initRepo,
  isAncestor,
  push,
  resolveRef,
  stageAll,
  writeTree,
  type CommitIdentity,
} from '../workspace/git-ops.js';
import { stripTokenFromUrl } from '../workspace/github.js';
import { createTempDir, removeTempDir } from '../utils/temp.js';
import { createLogger } from '../utils/logger.js';
import type { PublishRepository } from './repository.js';

const log = createLogger('git-repository');

const REMOTE = 'origin';
const EMPTY_PLACEHOLDER = '.gitkeep';

export interface OpenRepositoryOptions {
  /** Remote URL, already authenticated where needed */
  remoteUrl: string;
  identity?: CommitIdentity;
}

/**
 * PublishRepository over a scratch clone-less repository in a temp directory:
 * `git init`, add the remote, fetch every branch once, then build and push
 * one branch per folder.
 */
export class GitPublishRepository implements PublishRepository {
  private readonly tips: Map<string, string>;

  private constructor(
    readonly path: string,
    tips: Map<string, string>,
    private readonly identity: CommitIdentity | undefined
  ) {
    this.tips = tips;
  }

  /**
   * Create the scratch repository and fetch the remote's branches.
   *
   * A failed fetch (empty remote, auth problems) is logged and leaves the
   * remote branch state empty; pushes will surface the real error per folder.
   */
  static async open(options: OpenRepositoryOptions): Promise<GitPublishRepository> {
    const path = await createTempDir('push');
    const safeUrl = stripTokenFromUrl(options.remoteUrl);

    try {
      await initRepo(path);
      await addRemote(path, REMOTE, options.remoteUrl);

      try {
        await fetch(path, REMOTE);
      } catch (error) {
        log.warn(
          { remote: safeUrl, error: error instanceof Error ? stripTokenFromUrl(error.message) : String(error) },
          'Fetch failed, continuing with no known remote branches'
        );
      }

      const tips = await getRemoteBranchTips(path, REMOTE);
      log.info({ path, remote: safeUrl, branches: [...tips.keys()] }, 'Scratch repository ready');

      return new GitPublishRepository(path, tips, options.identity);
    } catch (error) {
      await removeTempDir(path);
      throw error;
    }
  }

  recordPredictedTip(branch: string, commit: string): void {
    this.tips.set(branch, commit);
  }

  remoteBranches(): RemoteBranchState {
    return this.tips;
  }

  async prepareBranch(target: ResolvedBranchTarget): Promise<void> {
    if (target.base.kind === 'orphan') {
      await checkoutOrphan(this.path, target.branch);
    } else {
      await checkoutBranchAt(this.path, target.branch, target.base.commit);
    }
  }

  async writeContent(files: FileEntry[]): Promise<string> {
    await this.clearWorkingTree();

    const entries: FileEntry[] =
      files.length > 0 ? files : [{ path: EMPTY_PLACEHOLDER, content: Buffer.alloc(0) }];

    for (const file of entries) {
      const destination = join(this.path, ...file.path.split('/'));
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, file.content);
    }

    await stageAll(this.path);
    return writeTree(this.path);
  }

  async commit(message: string): Promise<string> {
    return commit(this.path, message, this.identity);
  }

  async treeOf(commitSha: string): Promise<string> {
    return getTree(this.path, commitSha);
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return isAncestor(this.path, ancestor, descendant);
  }

  async push(branch: string, options: { force: boolean }): Promise<PushAttempt> {
    const attempt = await push(this.path, REMOTE, branch, { force: options.force });
    if (attempt.accepted) {
      this.tips.set(branch, await resolveRef(this.path, `refs/heads/${branch}`));
    }
    return attempt;
  }

  /**
   * Remove the scratch directory
   */
  async close(): Promise<void> {
    await removeTempDir(this.path);
  }

  private async clearWorkingTree(): Promise<void> {
    const entries = await readdir(this.path);
    for (const entry of entries) {
      if (entry === '.git') {
        continue;
      }
      await rm(join(this.path, entry), { recursive: true, force: true });
    }
  }
}
