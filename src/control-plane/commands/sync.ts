import { Command } from 'commander';
import { relative } from 'node:path';
import { getConfig, requireFolderConfig, type VariantPublishConfig } from '../../config/index.js';
import { FolderKind } from '../../types/index.js';
import { customFolderNames, isDirectory, toFolder } from '../../workspace/folders.js';
import { syncTemplate, type SyncTargetResult } from '../../workspace/sync.js';
import {
  print,
  printError,
  formatError,
  formatInfo,
  formatSuccess,
  formatWarning,
  bold,
  dim,
} from '../formatter.js';

interface SyncCommandOptions {
  mainName?: string;
  targets?: string[];
  dryRun?: boolean;
}

/**
 * Create the sync command.
 */
export function createSyncCommand(): Command {
  const command = new Command('sync')
    .description('Copy the template folder content into custom folders')
    .option('--main-name <name>', 'Template folder name (overrides MAIN_FOLDER_NAME)')
    .option('--targets <names...>', 'Custom folders to update (default: all configured)')
    .option('--dry-run', 'Show the copies without writing anything', false)
    .action(async (options: SyncCommandOptions) => {
      try {
        const root = process.cwd();
        const results = await executeSync(root, getConfig(), options);
        for (const result of results) {
          if (options.dryRun) {
            print(formatInfo(`${bold(relative(root, result.target))} would receive ${result.copies.length} file(s)`));
            for (const copy of result.copies) {
              print(`  ${dim(`${relative(root, copy.source)} -> ${relative(root, copy.destination)}`)}`);
            }
          } else {
            print(formatSuccess(`${bold(relative(root, result.target))} updated (${result.copies.length} file(s))`));
          }
        }
        if (results.length === 0) {
          print(formatWarning('No target folders to sync.'));
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the sync command.
 */
export async function executeSync(
  root: string,
  config: VariantPublishConfig,
  options: SyncCommandOptions = {}
): Promise<SyncTargetResult[]> {
  const folders = requireFolderConfig(config, options.mainName);
  const template = toFolder(root, folders.mainFolderName, folders.mainFolderName);

  if (!(await isDirectory(template.path))) {
    throw new Error(`Template folder not found: ${template.path}`);
  }

  const requested =
    options.targets && options.targets.length > 0 ? options.targets : customFolderNames(folders);

  const targets: string[] = [];
  for (const name of requested) {
    const folder = toFolder(root, name.trim(), folders.mainFolderName);
    if (folder.name === '' || folder.kind === FolderKind.TEMPLATE) {
      continue;
    }
    if (await isDirectory(folder.path)) {
      targets.push(folder.path);
    } else {
      printError(formatWarning(`Target folder not found, skipping: ${folder.name}`));
    }
  }

  return syncTemplate(template.path, targets, {
    excludeNames: config.excludeNames,
    dryRun: options.dryRun ?? false,
  });
}
