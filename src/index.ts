#!/usr/bin/env node

// Populates process.env from .env before any other module is evaluated
import 'dotenv/config';

import { runCli } from './control-plane/cli.js';

/**
 * Main entry point for the variant-publish CLI.
 */
async function main(): Promise<void> {
  try {
    await runCli();
  } catch (error) {
    // eslint-disable-next-line no-console -- CLI error output
    console.error(
      'Fatal error:',
      error instanceof Error ? error.message : String(error)
    );
    process.exitCode = 1;
  }
}

void main();
