/**
 * Git-backed Publish Tests
 *
 * Publishes into a local bare repository that stands in for the remote.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { simpleGit } from 'simple-git';
import { loadConfig, type VariantPublishConfig } from '../src/config/index.js';
import { executePush } from '../src/control-plane/commands/push.js';
import { GitPublishRepository } from '../src/publish/git-repository.js';
import { Publisher } from '../src/publish/publisher.js';
import { toFolder } from '../src/workspace/folders.js';
import { initRepo, isNonFastForwardRejection } from '../src/workspace/git-ops.js';
import type { RunSummary } from '../src/types/index.js';

function gitAvailable(): boolean {
  try {
    execFileSync('git', ['--version'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

const hasGit = gitAvailable();
const identity = { name: 'Test Publisher', email: 'publisher@example.com' };

describe('isNonFastForwardRejection', () => {
  it('should recognize non-fast-forward rejections', () => {
    expect(
      isNonFastForwardRejection(' ! [rejected]        main -> main (non-fast-forward)\nerror: failed to push some refs')
    ).toBe(true);
    expect(
      isNonFastForwardRejection(
        ' ! [rejected]        main -> main (fetch first)\nhint: Updates were rejected because the remote contains work'
      )
    ).toBe(true);
  });

  it('should not treat other push failures as rejections', () => {
    expect(isNonFastForwardRejection(' ! [remote rejected] main -> main (pre-receive hook declined)')).toBe(
      false
    );
    expect(isNonFastForwardRejection("fatal: repository '/nowhere' does not exist")).toBe(false);
  });
});

describe.skipIf(!hasGit)('git-backed publishing', () => {
  let root: string;
  let remote: string;
  let config: VariantPublishConfig;

  async function write(relativePath: string, content: string): Promise<void> {
    const target = join(root, relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }

  async function remoteTip(branch: string): Promise<string | null> {
    const output = await simpleGit(remote).raw(['for-each-ref', '--format=%(objectname)', `refs/heads/${branch}`]);
    return output.trim() || null;
  }

  async function remoteFiles(branch: string): Promise<string[]> {
    const output = await simpleGit(remote).raw(['ls-tree', '-r', '--name-only', branch]);
    return output.split('\n').filter((line) => line !== '');
  }

  async function parentsOf(commit: string): Promise<string[]> {
    const output = await simpleGit(remote).raw(['rev-list', '--parents', '-n', '1', commit]);
    return output.trim().split(' ').slice(1);
  }

  function statuses(summary: RunSummary): Record<string, string> {
    return Object.fromEntries(summary.reports.map((r) => [r.branch, r.push.status]));
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'git-publish-root-'));
    remote = await mkdtemp(join(tmpdir(), 'git-publish-remote-'));
    await initRepo(remote, true);

    config = loadConfig({
      DEFAULT_REPO_URL: remote,
      MAIN_FOLDER_NAME: 'main',
      CUSTOM_FOLDERS: 'alpha,beta',
      EXCLUDE_NAMES: 'node_modules',
      VARIANT_PUBLISH_GIT_USER_NAME: identity.name,
      VARIANT_PUBLISH_GIT_USER_EMAIL: identity.email,
    });

    await write('main/data.csv', 'a,b');
    await write('alpha/alpha.txt', 'variant alpha');
    await write('alpha/data.csv', 'a,b,c');
    await write('alpha/node_modules/pkg/index.js', 'ignored');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    await rm(remote, { recursive: true, force: true });
  });

  it('should publish the template as an orphan and custom folders on top of it', async () => {
    const summary = await executePush(root, config, {});

    expect(statuses(summary)).toEqual({ main: 'pushed-fast-forward', alpha: 'pushed-fast-forward' });
    const mainTip = await remoteTip('main');
    const alphaTip = await remoteTip('alpha');
    expect(mainTip).not.toBeNull();
    expect(await parentsOf(mainTip ?? '')).toEqual([]);
    expect(await parentsOf(alphaTip ?? '')).toEqual([mainTip]);
    expect(await remoteFiles('alpha')).toEqual(['alpha.txt', 'data.csv']);
    expect(await simpleGit(remote).raw(['log', '-1', '--format=%s', 'main'])).toBe('input data\n');
  });

  it('should skip every folder on an unchanged second run', async () => {
    await executePush(root, config, {});
    const before = [await remoteTip('main'), await remoteTip('alpha')];

    const summary = await executePush(root, config, {});

    expect(summary.reports.map((r) => r.push)).toEqual([
      { status: 'skipped', reason: 'no-change' },
      { status: 'skipped', reason: 'no-change' },
    ]);
    expect([await remoteTip('main'), await remoteTip('alpha')]).toEqual(before);
    expect(summary.exitCode).toBe(0);
  });

  it('should need force to replace changed template content', async () => {
    await executePush(root, config, {});
    const originalMain = await remoteTip('main');
    await write('main/data.csv', 'a,b,changed');

    const refused = await executePush(root, config, {});
    expect(statuses(refused)).toEqual({ main: 'needs-force', alpha: 'skipped' });
    expect(refused.exitCode).toBe(1);
    expect(await remoteTip('main')).toBe(originalMain);

    const forced = await executePush(root, config, { force: true });
    expect(statuses(forced).main).toBe('pushed-forced');
    expect(await remoteTip('main')).not.toBe(originalMain);
    expect(forced.exitCode).toBe(0);
  });

  it('should fast-forward incremental custom updates', async () => {
    await executePush(root, config, {});
    const firstAlpha = await remoteTip('alpha');
    await write('alpha/data.csv', 'a,b,c,d');

    const summary = await executePush(root, config, { folders: ['alpha'] });

    expect(statuses(summary)).toEqual({ alpha: 'pushed-fast-forward' });
    const alphaTip = await remoteTip('alpha');
    expect(await parentsOf(alphaTip ?? '')).toEqual([firstAlpha]);
  });

  it('should skip custom folders while the remote main branch is missing', async () => {
    const summary = await executePush(root, config, { folders: ['alpha'] });

    expect(summary.reports[0]?.push).toMatchObject({ status: 'skipped', reason: 'remote-main-missing' });
    expect(await remoteTip('alpha')).toBeNull();
  });

  it('should publish an empty folder with a placeholder file', async () => {
    await rm(join(root, 'main', 'data.csv'));

    const summary = await executePush(root, config, { folders: ['main'] });

    expect(statuses(summary)).toEqual({ main: 'pushed-fast-forward' });
    expect(await remoteFiles('main')).toEqual(['.gitkeep']);
  });

  it('should leave the remote untouched in a dry run', async () => {
    const summary = await executePush(root, config, { dryRun: true });

    expect(statuses(summary)).toEqual({ main: 'pushed-fast-forward', alpha: 'pushed-fast-forward' });
    expect(await remoteTip('main')).toBeNull();
    expect(await remoteTip('alpha')).toBeNull();
  });

  it('should predict the statuses a real run reports on a fresh remote', async () => {
    const dry = await executePush(root, config, { dryRun: true });
    const real = await executePush(root, config, {});

    expect(statuses(dry)).toEqual(statuses(real));
    expect(statuses(real)).toEqual({ main: 'pushed-fast-forward', alpha: 'pushed-fast-forward' });
  });

  it('should fail fast when no folder exists', async () => {
    await expect(executePush(root, config, { folders: ['missing'] })).rejects.toThrow('No folders to push.');
  });

  it('should report needs-force when the remote moved after the fetch', async () => {
    await executePush(root, config, { folders: ['main'] });
    await write('beta/beta.txt', 'first writer');

    const first = await GitPublishRepository.open({ remoteUrl: remote, identity });
    const second = await GitPublishRepository.open({ remoteUrl: remote, identity });
    try {
      const beta = toFolder(root, 'beta', 'main');
      const options = { mainBranch: 'main', excludeNames: [], description: { kind: 'default' } as const };

      const firstRun = await new Publisher({ ...options, repository: first }).run([beta], {
        force: false,
        dryRun: false,
        createPullRequests: false,
      });
      await write('beta/beta.txt', 'second writer');
      const secondRun = await new Publisher({ ...options, repository: second }).run([beta], {
        force: false,
        dryRun: false,
        createPullRequests: false,
      });

      expect(firstRun.reports[0]?.push.status).toBe('pushed-fast-forward');
      expect(secondRun.reports[0]?.push.status).toBe('needs-force');
    } finally {
      await first.close();
      await second.close();
    }
  });
});
