import {
  FolderKind,
  PullRequestState,
  SkipReason,
  type DescriptionSource,
  type Folder,
  type FolderReport,
  type PublishOptions,
  type PullRequestResult,
  type PushResult,
  type RunSummary,
} from '../types/index.js';
import { collectFolderFiles } from '../workspace/file-collector.js';
import { checkRequiredFiles } from '../workspace/required-files.js';
import { stripTokenFromUrl } from '../workspace/github.js';
import { createLogger } from '../utils/logger.js';
import { resolveBranchTarget, snapshotMessage } from './branch-resolver.js';
import { contentDiffers } from './change-detector.js';
import { OutcomeAggregator, isPushed } from './outcome-aggregator.js';
import type { PullRequestRequester } from './pr-requester.js';
import { negotiatePush } from './push-negotiator.js';
import type { PublishRepository } from './repository.js';
import { takeSnapshot } from './snapshotter.js';

const log = createLogger('publisher');

export interface PublisherOptions {
  repository: PublishRepository;
  /** Branch name of the template folder */
  mainBranch: string;
  excludeNames: string[];
  description: DescriptionSource;
  /** Required when a run requests pull requests */
  pullRequests?: PullRequestRequester;
  /** Called with each folder's report as soon as it is recorded */
  onReport?: (report: FolderReport) => void;
}

const NOT_APPLICABLE: PullRequestResult = { state: PullRequestState.NOT_APPLICABLE };

/**
 * Runs the publish pipeline over a list of folders, one at a time.
 *
 * Every folder ends in exactly one report. An error thrown while handling a
 * folder becomes that folder's `failed` result and the run moves on.
 */
export class Publisher {
  constructor(private readonly options: PublisherOptions) {}

  async run(folders: Folder[], options: PublishOptions): Promise<RunSummary> {
    if (options.createPullRequests && !options.dryRun && !this.options.pullRequests) {
      throw new Error('Pull request creation requested without a pull request requester');
    }

    const aggregator = new OutcomeAggregator();

    for (const folder of folders) {
      const report = await this.publishFolder(folder, options);
      aggregator.record(report);
      this.options.onReport?.(report);
    }

    const summary = aggregator.summary();
    log.info(
      {
        total: summary.total,
        pushed: summary.pushed,
        skipped: summary.skipped,
        needsForce: summary.needsForce,
        failed: summary.failed,
      },
      'Publish run finished'
    );
    return summary;
  }

  private async publishFolder(folder: Folder, options: PublishOptions): Promise<FolderReport> {
    const report = (push: PushResult, extra: Partial<FolderReport> = {}): FolderReport => ({
      folder,
      branch: folder.name,
      push,
      pullRequest: NOT_APPLICABLE,
      dryRun: options.dryRun,
      ...extra,
    });

    try {
      const check = await checkRequiredFiles(folder, this.options.description);
      if (!check.ok) {
        log.warn({ folder: folder.name, file: check.file, reason: check.reason }, 'Folder excluded');
        const pullRequest: PullRequestResult =
          check.reason === SkipReason.MISSING_DESCRIPTION && options.createPullRequests
            ? { state: PullRequestState.SKIPPED_MISSING_DESCRIPTION }
            : NOT_APPLICABLE;
        return report({ status: 'skipped', reason: check.reason, detail: check.file }, { pullRequest });
      }

      const remote = this.options.repository.remoteBranches();
      const target = resolveBranchTarget(folder, remote, this.options.mainBranch);
      const base = target.base;

      if (base.kind === 'unresolvable') {
        log.warn({ folder: folder.name, reason: base.reason }, 'Branch base unresolvable');
        return report(
          { status: 'skipped', reason: SkipReason.REMOTE_MAIN_MISSING, detail: base.reason },
          { base }
        );
      }

      const { files } = await collectFolderFiles(folder.path, {
        excludeNames: this.options.excludeNames,
      });

      const snapshot = await takeSnapshot(
        this.options.repository,
        { branch: target.branch, base },
        files,
        snapshotMessage(folder)
      );

      const remoteTip = remote.get(target.branch);
      const differs = await contentDiffers(this.options.repository, snapshot, remoteTip);

      const push = await negotiatePush(this.options.repository, {
        snapshot,
        remoteTip,
        differs,
        force: options.force,
        dryRun: options.dryRun,
      });

      // Later folders resolve against the tip this run would have pushed
      if (options.dryRun && (push.status === 'pushed-fast-forward' || push.status === 'pushed-forced')) {
        this.options.repository.recordPredictedTip(target.branch, push.commit);
      }

      const pullRequest = await this.requestPullRequest(folder, push, options);
      return report(push, { base, pullRequest });
    } catch (error) {
      const reason = stripTokenFromUrl(error instanceof Error ? error.message : String(error));
      log.error({ folder: folder.name, error: reason }, 'Folder failed');
      return report({ status: 'failed', reason });
    }
  }

  private async requestPullRequest(
    folder: Folder,
    push: PushResult,
    options: PublishOptions
  ): Promise<PullRequestResult> {
    const requester = this.options.pullRequests;
    if (
      !requester ||
      !options.createPullRequests ||
      options.dryRun ||
      folder.kind !== FolderKind.CUSTOM ||
      !isPushed(push.status)
    ) {
      return NOT_APPLICABLE;
    }
    return requester.request(folder, folder.name);
  }
}
