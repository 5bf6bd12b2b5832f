// Commands
export { executeCreate } from './commands/create.js';
export { executeSync } from './commands/sync.js';
export { executePush, type PushCommandOptions } from './commands/push.js';
export { executeCollect, type CollectCommandOptions } from './commands/collect.js';

// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  blue,
  shortSha,
  formatSuccess,
  formatError,
  formatWarning,
  formatInfo,
  describePushResult,
  describePullRequest,
  formatFolderReport,
  formatRunSummary,
  formatArtifactReport,
  print,
  printError,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createCreateCommand,
  createSyncCommand,
  createPushCommand,
  createPushPrCommand,
  createCollectCommand,
} from './cli.js';
