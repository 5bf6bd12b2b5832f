/**
 * CLI Command Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, loadConfig } from '../src/config/index.js';
import { executeCreate } from '../src/control-plane/commands/create.js';
import { executeSync } from '../src/control-plane/commands/sync.js';
import { executePush } from '../src/control-plane/commands/push.js';
import { executeCollect } from '../src/control-plane/commands/collect.js';
import { workspaceUriForFolder } from '../src/artifacts/workspace-storage.js';
import { createProgram } from '../src/control-plane/cli.js';
import { isDirectory } from '../src/workspace/folders.js';

describe('CLI commands', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'commands-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  describe('program', () => {
    it('should register every command', () => {
      const names = createProgram().commands.map((command) => command.name());
      expect(names).toEqual(['create', 'sync', 'collect', 'push', 'push-pr']);
    });

    it('should offer --create-pr on push only', () => {
      const program = createProgram();
      const optionsOf = (name: string): string[] =>
        program.commands.find((command) => command.name() === name)?.options.map((option) => option.long ?? '') ?? [];

      expect(optionsOf('push')).toEqual([
        '--repo-url',
        '--folders',
        '--main-name',
        '--force',
        '--dry-run',
        '--create-pr',
      ]);
      expect(optionsOf('push-pr')).not.toContain('--create-pr');
      expect(optionsOf('collect')).toEqual(['--main-name', '--data-dir', '--variants']);
    });
  });

  describe('create', () => {
    it('should create the template and custom folders', async () => {
      const config = loadConfig({ MAIN_FOLDER_NAME: 'main', CUSTOM_FOLDERS: 'alpha,beta' });

      const result = await executeCreate(root, config);

      expect(result).toEqual({ template: 'main', custom: ['alpha', 'beta'] });
      for (const name of ['main', 'alpha', 'beta']) {
        expect(await isDirectory(join(root, name))).toBe(true);
      }
    });

    it('should fail without a folder configuration', async () => {
      await expect(executeCreate(root, loadConfig({}))).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('sync', () => {
    beforeEach(async () => {
      await mkdir(join(root, 'main'), { recursive: true });
      await mkdir(join(root, 'alpha'), { recursive: true });
      await mkdir(join(root, 'beta'), { recursive: true });
      await writeFile(join(root, 'main', 'config.yaml'), 'model: base');
    });

    it('should copy the template into every configured custom folder', async () => {
      const config = loadConfig({ MAIN_FOLDER_NAME: 'main', CUSTOM_FOLDERS: 'alpha,beta' });

      const results = await executeSync(root, config);

      expect(results.map((r) => r.target)).toEqual([join(root, 'alpha'), join(root, 'beta')]);
      expect(await readFile(join(root, 'beta', 'config.yaml'), 'utf8')).toBe('model: base');
    });

    it('should only update the requested targets', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const config = loadConfig({ MAIN_FOLDER_NAME: 'main', CUSTOM_FOLDERS: 'alpha,beta' });

      const results = await executeSync(root, config, { targets: ['beta', 'main', 'missing'] });

      expect(results.map((r) => r.target)).toEqual([join(root, 'beta')]);
      expect(await isDirectory(join(root, 'missing'))).toBe(false);
    });

    it('should fail when the template folder is missing', async () => {
      const config = loadConfig({ MAIN_FOLDER_NAME: 'baseline', CUSTOM_FOLDERS: 'alpha' });

      await expect(executeSync(root, config)).rejects.toThrow(
        `Template folder not found: ${join(root, 'baseline')}`
      );
    });
  });

  describe('push', () => {
    it('should require the repository URL', async () => {
      const config = loadConfig({ MAIN_FOLDER_NAME: 'main', CUSTOM_FOLDERS: 'alpha' });

      await expect(executePush(root, config, {})).rejects.toThrow('DEFAULT_REPO_URL is not configured');
    });

    it('should require a token for pull requests', async () => {
      const config = loadConfig({
        MAIN_FOLDER_NAME: 'main',
        CUSTOM_FOLDERS: 'alpha',
        DEFAULT_REPO_URL: 'https://github.com/acme/variants.git',
      });

      await expect(executePush(root, config, { createPr: true })).rejects.toThrow(
        'GITHUB_TOKEN is not configured'
      );
    });
  });

  describe('collect', () => {
    let dataDir: string;

    beforeEach(async () => {
      dataDir = join(root, 'editor-data');
      const storage = join(dataDir, 'VSCodium', 'User', 'workspaceStorage', 'w1');
      await mkdir(join(root, 'alpha'), { recursive: true });
      await mkdir(join(root, 'beta'), { recursive: true });
      await mkdir(join(storage, 'chatSessions'), { recursive: true });
      await writeFile(join(root, 'prompt.md'), 'Build the variant');
      await writeFile(
        join(storage, 'workspace.json'),
        JSON.stringify({ folder: workspaceUriForFolder(join(root, 'alpha')) })
      );
      await writeFile(
        join(storage, 'chatSessions', 'one.json'),
        JSON.stringify({
          requests: [
            {
              timestamp: new Date(2024, 5, 1, 8, 0, 0).getTime(),
              message: { text: 'Start' },
              response: [{ value: 'Started.' }],
              result: { timings: { totalElapsed: 60_000 } },
            },
          ],
        })
      );
    });

    it('should collect into the existing custom folders of the configured editor', async () => {
      const config = loadConfig({
        MAIN_FOLDER_NAME: 'main',
        CUSTOM_FOLDERS: 'alpha,beta,gamma',
        PR_DESCRIPTION_FILE: 'prompt.md',
        VSCODE_DATA_DIR: dataDir,
        VSCODE_VARIANTS: 'VSCodium',
      });

      const summary = await executeCollect(root, config);

      expect(summary.folders.map((f) => [f.folder, f.transcript, f.promptCopied])).toEqual([
        ['alpha', 'written', true],
        ['beta', 'empty', true],
      ]);
      expect(await readFile(join(root, 'alpha', 'alpha.txt'), 'utf8')).toBe(
        'User: Start\nGitHub Copilot: Started.\n\n---\n'
      );
      expect(await readFile(join(root, 'beta', 'prompt.md'), 'utf8')).toBe('Build the variant');
      expect(await readFile(join(root, 'time.txt'), 'utf8')).toBe(
        'alpha:2024-06-01 08:00:00,2024-06-01 08:01:00\n'
      );
    });

    it('should let the options override the data directory and variants', async () => {
      const config = loadConfig({
        MAIN_FOLDER_NAME: 'main',
        CUSTOM_FOLDERS: 'alpha',
        VSCODE_DATA_DIR: join(root, 'elsewhere'),
      });

      const summary = await executeCollect(root, config, { dataDir, variants: ['Code'] });

      expect(summary.folders).toHaveLength(1);
      expect(summary.folders[0]?.transcript).toBe('empty');
      expect(await readFile(join(root, 'time.txt'), 'utf8')).toBe('');
    });
  });
});
