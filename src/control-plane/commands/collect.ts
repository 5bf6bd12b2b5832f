import { Command } from 'commander';
import { homedir } from 'node:os';
import { relative } from 'node:path';
import {
  getConfig,
  requireEditorDataDir,
  requireFolderConfig,
  type VariantPublishConfig,
} from '../../config/index.js';
import type { CollectSummary, Folder } from '../../types/index.js';
import { collectArtifacts, DEFAULT_PROMPT_FILE } from '../../artifacts/collector.js';
import {
  DEFAULT_EDITOR_VARIANTS,
  defaultEditorDataDir,
  storageRoots,
} from '../../artifacts/workspace-storage.js';
import { customFolderNames, isDirectory, toFolder } from '../../workspace/folders.js';
import { createLogger } from '../../utils/logger.js';
import {
  print,
  printError,
  formatArtifactReport,
  formatError,
  formatSuccess,
  formatWarning,
} from '../formatter.js';

const log = createLogger('collect-command');

export interface CollectCommandOptions {
  mainName?: string;
  dataDir?: string;
  variants?: string[];
  platform?: NodeJS.Platform;
}

/**
 * Create the collect command.
 */
export function createCollectCommand(): Command {
  const command = new Command('collect')
    .description('Export editor chat transcripts and session times into the custom folders')
    .option('--main-name <name>', 'Template folder name (overrides MAIN_FOLDER_NAME)')
    .option('--data-dir <path>', 'Editor user data directory (overrides VSCODE_DATA_DIR)')
    .option('--variants <names...>', 'Editor variants to search (overrides VSCODE_VARIANTS)')
    .action(async (options: CollectCommandOptions) => {
      try {
        const root = process.cwd();
        const summary = await executeCollect(root, getConfig(), options);
        for (const report of summary.folders) {
          print(formatArtifactReport(report));
        }
        if (summary.folders.length === 0) {
          print(formatWarning('No custom folders to collect into.'));
        }
        print('');
        print(formatSuccess(`Wrote ${relative(root, summary.timeFile)}`));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the collect command.
 */
export async function executeCollect(
  root: string,
  config: VariantPublishConfig,
  options: CollectCommandOptions = {}
): Promise<CollectSummary> {
  const layout = requireFolderConfig(config, options.mainName);
  const platform = options.platform ?? process.platform;
  const dataDir = requireEditorDataDir(
    config,
    options.dataDir,
    defaultEditorDataDir(platform, homedir(), process.env)
  );

  const variants =
    options.variants && options.variants.length > 0
      ? options.variants
      : config.editorVariants.length > 0
        ? config.editorVariants
        : DEFAULT_EDITOR_VARIANTS;

  const folders: Folder[] = [];
  for (const name of customFolderNames(layout)) {
    const folder = toFolder(root, name, layout.mainFolderName);
    if (await isDirectory(folder.path)) {
      folders.push(folder);
    } else {
      log.warn({ folder: name, path: folder.path }, 'Folder directory not found, ignoring');
    }
  }

  const promptFile =
    config.description.kind === 'file' ? config.description.fileName : DEFAULT_PROMPT_FILE;

  return collectArtifacts(root, folders, {
    promptFile,
    storageRoots: storageRoots(dataDir, variants),
    platform,
  });
}
