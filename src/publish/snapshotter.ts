import type { FileEntry, ResolvedBranchTarget, Snapshot } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { PublishRepository } from './repository.js';

const log = createLogger('snapshotter');

/**
 * Commit a folder's resolved files onto the target branch.
 *
 * When the staged tree equals the base commit's tree no commit is created:
 * the snapshot reuses the base commit and is tagged `noDiff`.
 */
export async function takeSnapshot(
  repository: PublishRepository,
  target: ResolvedBranchTarget,
  files: FileEntry[],
  message: string
): Promise<Snapshot> {
  await repository.prepareBranch(target);
  const tree = await repository.writeContent(files);

  if (target.base.kind !== 'orphan') {
    const baseTree = await repository.treeOf(target.base.commit);
    if (baseTree === tree) {
      log.debug({ branch: target.branch, tree }, 'Content identical to base, no commit created');
      return {
        branch: target.branch,
        commit: target.base.commit,
        tree,
        base: target.base,
        noDiff: true,
        message,
      };
    }
  }

  const commit = await repository.commit(message);
  log.debug({ branch: target.branch, commit, base: target.base.kind }, 'Snapshot committed');

  return {
    branch: target.branch,
    commit,
    tree,
    base: target.base,
    noDiff: false,
    message,
  };
}
