// Git operations
export {
  initRepo,
  getCurrentSha,
  resolveRef,
  stageAll,
  commit,
  writeTree,
  getTree,
  checkoutOrphan,
  checkoutBranchAt,
  isAncestor,
  addRemote,
  fetch,
  getRemoteBranchTips,
  isNonFastForwardRejection,
  push,
  type CommitIdentity,
  type PushOptions,
} from './git-ops.js';

// Folders
export {
  isDirectory,
  toFolder,
  customFolderNames,
  ensureFolders,
  resolvePublishFolders,
  type EnsureFoldersResult,
} from './folders.js';

// File collection
export {
  listFolderFiles,
  selectFolderFiles,
  collectFolderFiles,
  type CollectOptions,
} from './file-collector.js';

// Required files
export { readNonBlank, checkRequiredFiles, type RequiredFileCheck } from './required-files.js';

// Template sync
export {
  listTemplateFiles,
  syncTemplate,
  type SyncCopy,
  type SyncTargetResult,
  type SyncOptions,
} from './sync.js';

// GitHub operations
export {
  createGitHubClient,
  toGitHubError,
  getDefaultBranch,
  findOpenPullRequest,
  createPullRequest,
  isPullRequestAlreadyExists,
  getAuthenticatedRemoteUrl,
  stripTokenFromUrl,
  parseGitHubUrl,
} from './github.js';

export * as gitOps from './git-ops.js';
export * as gitHub from './github.js';
