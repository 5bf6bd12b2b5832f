import { Command } from 'commander';
import {
  getConfig,
  requireFolderConfig,
  requireGitHubToken,
  requireRepoUrl,
  type VariantPublishConfig,
} from '../../config/index.js';
import type { FolderReport, RunSummary } from '../../types/index.js';
import { resolvePublishFolders } from '../../workspace/folders.js';
import {
  createGitHubClient,
  getAuthenticatedRemoteUrl,
  parseGitHubUrl,
  stripTokenFromUrl,
} from '../../workspace/github.js';
import { GitPublishRepository } from '../../publish/git-repository.js';
import { GitHubPullRequestGateway, PullRequestRequester } from '../../publish/pr-requester.js';
import { Publisher } from '../../publish/publisher.js';
import { createLogger } from '../../utils/logger.js';
import {
  print,
  printError,
  formatError,
  formatFolderReport,
  formatInfo,
  formatRunSummary,
} from '../formatter.js';

const log = createLogger('push-command');

export interface PushCommandOptions {
  repoUrl?: string;
  folders?: string[];
  mainName?: string;
  force?: boolean;
  dryRun?: boolean;
  createPr?: boolean;
}

function addPushOptions(command: Command): Command {
  return command
    .option('--repo-url <url>', 'Remote repository URL (overrides DEFAULT_REPO_URL)')
    .option('--folders <names...>', 'Only publish these folders')
    .option('--main-name <name>', 'Template folder name (overrides MAIN_FOLDER_NAME)')
    .option('--force', 'Allow forced pushes when a remote branch has diverged', false)
    .option('--dry-run', 'Decide what would be pushed without pushing', false);
}

async function runPushAction(options: PushCommandOptions): Promise<void> {
  try {
    if (options.dryRun) {
      print(formatInfo('Dry run: nothing will be pushed'));
    }
    const summary = await executePush(process.cwd(), getConfig(), options, (report) => {
      print(formatFolderReport(report));
    });
    print('');
    print(formatRunSummary(summary, options.dryRun ?? false));
    if (summary.exitCode !== 0) {
      process.exitCode = summary.exitCode;
    }
  } catch (error) {
    printError(formatError(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  }
}

/**
 * Create the push command.
 */
export function createPushCommand(): Command {
  return addPushOptions(
    new Command('push').description('Publish the template and custom folders as branches')
  )
    .option('--create-pr', 'Open a pull request for every pushed custom branch', false)
    .action(runPushAction);
}

/**
 * Create the push-pr command: push with pull request creation enabled.
 */
export function createPushPrCommand(): Command {
  return addPushOptions(
    new Command('push-pr').description('Publish folders and open pull requests for custom branches')
  ).action((options: PushCommandOptions) => runPushAction({ ...options, createPr: true }));
}

/**
 * Execute a publish run.
 *
 * Fatal problems (configuration, no folders, scratch repository setup) are
 * thrown before any folder is processed; per-folder outcomes are in the summary.
 */
export async function executePush(
  root: string,
  config: VariantPublishConfig,
  options: PushCommandOptions,
  onReport?: (report: FolderReport) => void
): Promise<RunSummary> {
  const folderConfig = requireFolderConfig(config, options.mainName);
  const repoUrl = requireRepoUrl(config, options.repoUrl);
  const createPullRequests = options.createPr ?? false;
  const dryRun = options.dryRun ?? false;
  const token = createPullRequests ? requireGitHubToken(config) : config.githubToken;

  const folders = await resolvePublishFolders(root, folderConfig, options.folders ?? []);
  if (folders.length === 0) {
    throw new Error('No folders to push.');
  }

  let pullRequests: PullRequestRequester | undefined;
  if (createPullRequests && token) {
    const client = createGitHubClient({ token, baseUrl: config.githubApiUrl });
    pullRequests = new PullRequestRequester(
      new GitHubPullRequestGateway(client, parseGitHubUrl(repoUrl)),
      config.description,
      folderConfig.mainFolderName
    );
  }

  const remoteUrl = token ? getAuthenticatedRemoteUrl(repoUrl, token) : repoUrl;
  log.info(
    { remote: stripTokenFromUrl(remoteUrl), folders: folders.map((f) => f.name), dryRun },
    'Starting publish run'
  );

  const repository = await GitPublishRepository.open({
    remoteUrl,
    identity: config.gitIdentity,
  });

  try {
    const publisher = new Publisher({
      repository,
      mainBranch: folderConfig.mainFolderName,
      excludeNames: config.excludeNames,
      description: config.description,
      pullRequests,
      onReport,
    });

    return await publisher.run(folders, {
      force: options.force ?? false,
      dryRun,
      createPullRequests,
    });
  } finally {
    await repository.close();
  }
}
