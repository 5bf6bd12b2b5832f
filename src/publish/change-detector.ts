import type { Snapshot } from '../types/index.js';
import type { PublishRepository } from './repository.js';

/**
 * Whether a snapshot would change the remote branch.
 *
 * A missing remote branch always differs (first push). A `noDiff` snapshot
 * never does once the branch exists. Otherwise the trees are compared using
 * the fetched remote-tracking state, without touching the network.
 */
export async function contentDiffers(
  repository: PublishRepository,
  snapshot: Snapshot,
  remoteTip: string | undefined
): Promise<boolean> {
  if (!remoteTip) {
    return true;
  }

  if (snapshot.noDiff) {
    return false;
  }

  if (remoteTip === snapshot.commit) {
    return false;
  }

  const remoteTree = await repository.treeOf(remoteTip);
  return remoteTree !== snapshot.tree;
}
