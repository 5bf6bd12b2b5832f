import { mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { FolderConfig } from '../config/index.js';
import { FolderKind, type Folder } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('folders');

/**
 * Check if a path is an existing directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  const stats = await stat(path).catch(() => null);
  return stats?.isDirectory() ?? false;
}

/**
 * Build the folder descriptor for a name under the workspace root
 */
export function toFolder(root: string, name: string, mainFolderName: string): Folder {
  const isTemplate = name === mainFolderName;
  return {
    name,
    path: join(root, name),
    kind: isTemplate ? FolderKind.TEMPLATE : FolderKind.CUSTOM,
    requiredFile: isTemplate ? null : `${name}.txt`,
  };
}

/**
 * Custom folder names, without blanks and without the template name
 */
export function customFolderNames(config: FolderConfig): string[] {
  return config.customFolders
    .map((name) => name.trim())
    .filter((name) => name !== '' && name !== config.mainFolderName);
}

export interface EnsureFoldersResult {
  template: string;
  custom: string[];
}

/**
 * Create the template folder and every custom folder (existing ones are kept)
 */
export async function ensureFolders(
  root: string,
  config: FolderConfig
): Promise<EnsureFoldersResult> {
  await mkdir(join(root, config.mainFolderName), { recursive: true });

  const custom: string[] = [];
  for (const name of customFolderNames(config)) {
    await mkdir(join(root, name), { recursive: true });
    custom.push(name);
  }

  log.info({ root, template: config.mainFolderName, custom }, 'Folders ensured');
  return { template: config.mainFolderName, custom };
}

/**
 * Enumerate the folders of a publish run.
 *
 * Without a selection: the template folder first (when its directory exists),
 * then the configured custom folders that exist. With a selection: exactly the
 * named folders that exist, in the given order, each once.
 */
export async function resolvePublishFolders(
  root: string,
  config: FolderConfig,
  selected: string[] = []
): Promise<Folder[]> {
  const names =
    selected.length > 0
      ? [...new Set(selected.map((name) => name.trim()).filter((name) => name !== ''))]
      : [config.mainFolderName, ...customFolderNames(config)];

  const folders: Folder[] = [];
  for (const name of names) {
    const folder = toFolder(root, name, config.mainFolderName);
    if (await isDirectory(folder.path)) {
      folders.push(folder);
    } else {
      log.warn({ folder: name, path: folder.path }, 'Folder directory not found, ignoring');
    }
  }

  return folders;
}
