import { readFile } from 'node:fs/promises';
import { dirname, join, posix, win32 } from 'node:path';
import fg from 'fast-glob';
import { workspaceStorageSchema } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workspace-storage');

/** Editor installations searched by default */
export const DEFAULT_EDITOR_VARIANTS = ['Code', 'Code - Insiders'];

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

/**
 * The folder URI the editor records in `workspace.json`:
 * `file:///c%3A/Users/me/alpha` on Windows, `file:///home/me/alpha` elsewhere.
 */
export function workspaceUriForFolder(
  folderPath: string,
  platform: NodeJS.Platform = process.platform
): string {
  if (platform === 'win32') {
    const resolved = win32.resolve(folderPath);
    const match = /^([A-Za-z]):(.*)$/.exec(resolved);
    if (!match?.[1]) {
      throw new Error(`Unexpected drive in path: ${resolved}`);
    }
    const rest = (match[2] ?? '').replace(/\\/g, '/');
    return `file:///${match[1].toLowerCase()}%3A${encodePath(rest)}`;
  }
  return `file://${encodePath(posix.resolve(folderPath))}`;
}

/**
 * Default user data directory of the editor, null when it cannot be derived
 */
export function defaultEditorDataDir(
  platform: NodeJS.Platform,
  home: string,
  env: NodeJS.ProcessEnv
): string | null {
  switch (platform) {
    case 'win32':
      return env['APPDATA'] ?? null;
    case 'darwin':
      return join(home, 'Library', 'Application Support');
    default:
      return env['XDG_CONFIG_HOME'] ?? join(home, '.config');
  }
}

/**
 * `workspaceStorage` directories of every editor variant under a data directory
 */
export function storageRoots(dataDir: string, variants: string[]): string[] {
  return variants.map((variant) => join(dataDir, variant, 'User', 'workspaceStorage'));
}

/**
 * Workspace storage directory whose `workspace.json` names `folderUri`, null when none
 */
export async function findWorkspaceStorageDir(
  storageRoot: string,
  folderUri: string
): Promise<string | null> {
  const manifests = (await fg('*/workspace.json', { cwd: storageRoot, onlyFiles: true })).sort();

  for (const manifest of manifests) {
    const path = join(storageRoot, manifest);
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      log.debug({ path, error }, 'Unreadable workspace.json, skipping');
      continue;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      log.debug({ path }, 'Malformed workspace.json, skipping');
      continue;
    }

    const parsed = workspaceStorageSchema.safeParse(json);
    if (parsed.success && parsed.data.folder === folderUri) {
      return dirname(path);
    }
  }
  return null;
}

/**
 * First matching storage directory across editor variants
 */
export async function locateWorkspaceStorage(
  roots: string[],
  folderUri: string
): Promise<string | null> {
  for (const root of roots) {
    const found = await findWorkspaceStorageDir(root, folderUri);
    if (found) {
      return found;
    }
  }
  return null;
}
