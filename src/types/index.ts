// Folder Types
export {
  FolderKind,
  FilterMode,
  type Folder,
  type FileEntry,
  type CollectedFiles,
  type DescriptionSource,
} from './folder.js';

// Publish Types
export {
  SkipReason,
  PullRequestState,
  type BranchBase,
  type ResolvedBranchBase,
  type BranchTarget,
  type ResolvedBranchTarget,
  type RemoteBranchState,
  type Snapshot,
  type PushResult,
  type PushStatus,
  type PushAttempt,
  type PullRequestResult,
  type FolderReport,
  type RunSummary,
  type PublishOptions,
} from './publish.js';

// GitHub Types
export {
  gitHubConfigSchema,
  gitHubPullRequestSchema,
  createPullRequestOptionsSchema,
  GitHubErrorCode,
  GitHubError,
  type GitHubConfig,
  type GitHubPullRequest,
  type CreatePullRequestOptions,
  type RepositoryCoordinates,
} from './github.js';

// Artifact Types
export {
  sessionEventSchema,
  sessionPathSchema,
  chatSessionSchema,
  chatRequestSchema,
  workspaceStorageSchema,
  type SessionEvent,
  type SessionPath,
  type ChatSession,
  type ChatRequest,
  type SessionTiming,
  type FolderArtifacts,
  type CollectSummary,
} from './artifacts.js';
