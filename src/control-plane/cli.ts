import { Command } from 'commander';
import { createCreateCommand } from './commands/create.js';
import { createSyncCommand } from './commands/sync.js';
import { createPushCommand, createPushPrCommand } from './commands/push.js';
import { createCollectCommand } from './commands/collect.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.3.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('variant-publish')
    .description('Publish a template folder and its variants as branches of a Git repository')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createCreateCommand());
  program.addCommand(createSyncCommand());
  program.addCommand(createCollectCommand());
  program.addCommand(createPushCommand());
  program.addCommand(createPushPrCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createCreateCommand } from './commands/create.js';
export { createSyncCommand } from './commands/sync.js';
export { createPushCommand, createPushPrCommand } from './commands/push.js';
export { createCollectCommand } from './commands/collect.js';
