import {
  FolderKind,
  type BranchTarget,
  type Folder,
  type RemoteBranchState,
} from '../types/index.js';

/**
 * Decide where the history of a folder's branch starts.
 *
 * - template folder: orphan branch, independent minimal history
 * - custom folder with a remote branch: that branch's tip, so incremental
 *   updates fast-forward
 * - custom folder without one: the remote main tip, or unresolvable when
 *   remote main does not exist either
 */
export function resolveBranchTarget(
  folder: Folder,
  remote: RemoteBranchState,
  mainBranch: string
): BranchTarget {
  const branch = folder.name;

  if (folder.kind === FolderKind.TEMPLATE) {
    return { branch, base: { kind: 'orphan' } };
  }

  const ownTip = remote.get(branch);
  if (ownTip) {
    return { branch, base: { kind: 'remote-branch', commit: ownTip } };
  }

  const mainTip = remote.get(mainBranch);
  if (mainTip) {
    return { branch, base: { kind: 'remote-main', commit: mainTip } };
  }

  return {
    branch,
    base: {
      kind: 'unresolvable',
      reason:
        `remote ${mainBranch} branch is missing; push the ${mainBranch} folder first ` +
        '(run a full push) before pushing custom folders',
    },
  };
}

/**
 * Commit message convention: `input data` for the template, the folder name otherwise
 */
export function snapshotMessage(folder: Folder): string {
  return folder.kind === FolderKind.TEMPLATE ? 'input data' : folder.name;
}
