import { join } from 'node:path';
import type { DescriptionSource, Folder } from '../types/index.js';
import { readNonBlank } from '../workspace/required-files.js';

export function defaultDescription(branch: string): string {
  return `Auto-generated PR for branch: ${branch}`;
}

/**
 * Pull request body for a folder.
 *
 * @returns null when the configured description file is missing or blank
 */
export async function resolveDescription(
  folder: Folder,
  source: DescriptionSource
): Promise<string | null> {
  switch (source.kind) {
    case 'file':
      return readNonBlank(join(folder.path, source.fileName));
    case 'static':
      return source.text;
    case 'default':
      return defaultDescription(folder.name);
  }
}
