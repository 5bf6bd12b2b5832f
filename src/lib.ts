/**
 * variant-publish Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Configuration
export {
  ConfigError,
  loadConfig,
  getConfig,
  resetConfig,
  requireFolderConfig,
  requireRepoUrl,
  requireGitHubToken,
  requireEditorDataDir,
  splitCsv,
  type VariantPublishConfig,
  type FolderConfig,
  type GitIdentity,
} from './config/index.js';

// Publish engine
export * from './publish/index.js';

// Chat transcript and session time collection
export * as artifacts from './artifacts/index.js';

// Workspace folders, git and GitHub access
export * as workspace from './workspace/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
export { createTempDir, removeTempDir } from './utils/temp.js';
