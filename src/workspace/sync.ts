import { copyFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import fg from 'fast-glob';
import { createLogger } from '../utils/logger.js';

const log = createLogger('sync');

export interface SyncCopy {
  source: string;
  destination: string;
}

export interface SyncTargetResult {
  target: string;
  copies: SyncCopy[];
}

export interface SyncOptions {
  excludeNames: string[];
  dryRun: boolean;
}

/**
 * Template files copied into targets: hidden directories, `.git` and
 * excluded names are left out; hidden files at any level are kept.
 */
export async function listTemplateFiles(
  templatePath: string,
  excludeNames: string[]
): Promise<string[]> {
  const excluded = new Set(excludeNames);
  const entries = await fg('**/*', {
    cwd: templatePath,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
  });

  return entries
    .filter((entry) => {
      const segments = entry.split('/');
      const fileName = segments.pop() ?? '';
      if (excluded.has(fileName)) {
        return false;
      }
      return segments.every((dir) => !dir.startsWith('.') && !excluded.has(dir));
    })
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Copy the template folder's content into each target folder.
 *
 * Existing files are overwritten; files only present in a target are kept.
 */
export async function syncTemplate(
  templatePath: string,
  targets: string[],
  options: SyncOptions
): Promise<SyncTargetResult[]> {
  const files = await listTemplateFiles(templatePath, options.excludeNames);
  const results: SyncTargetResult[] = [];

  for (const target of targets) {
    const copies: SyncCopy[] = [];
    if (!options.dryRun) {
      await mkdir(target, { recursive: true });
    }

    for (const file of files) {
      const copy = { source: join(templatePath, file), destination: join(target, file) };
      if (!options.dryRun) {
        await mkdir(dirname(copy.destination), { recursive: true });
        await copyFile(copy.source, copy.destination);
      }
      copies.push(copy);
    }

    log.info({ target, files: copies.length, dryRun: options.dryRun }, 'Synced template into target');
    results.push({ target, copies });
  }

  return results;
}
