import { Command } from 'commander';
import { getConfig, requireFolderConfig, type VariantPublishConfig } from '../../config/index.js';
import { ensureFolders, type EnsureFoldersResult } from '../../workspace/folders.js';
import { print, printError, formatError, formatSuccess, bold } from '../formatter.js';

interface CreateCommandOptions {
  mainName?: string;
}

/**
 * Create the create command.
 */
export function createCreateCommand(): Command {
  const command = new Command('create')
    .description('Create the template folder and every configured custom folder')
    .option('--main-name <name>', 'Template folder name (overrides MAIN_FOLDER_NAME)')
    .action(async (options: CreateCommandOptions) => {
      try {
        const result = await executeCreate(process.cwd(), getConfig(), options);
        print(formatSuccess(`Template folder: ${bold(result.template)}`));
        for (const name of result.custom) {
          print(formatSuccess(`Custom folder: ${bold(name)}`));
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the create command.
 */
export async function executeCreate(
  root: string,
  config: VariantPublishConfig,
  options: CreateCommandOptions = {}
): Promise<EnsureFoldersResult> {
  const folders = requireFolderConfig(config, options.mainName);
  return ensureFolders(root, folders);
}
