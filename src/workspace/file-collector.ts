import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import fg from 'fast-glob';
import ignore from 'ignore';
import { FilterMode, type CollectedFiles, type FileEntry } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('file-collector');

const GIT_DIR = '.git';
const GITIGNORE_FILE = '.gitignore';

type Ignore = ReturnType<typeof ignore>;

export interface CollectOptions {
  /** File or directory names excluded when the folder has no .gitignore */
  excludeNames: string[];
}

/**
 * Whether a relative path is, or lives inside, a `.git` entry
 */
function isGitMetadata(relativePath: string): boolean {
  return relativePath.split('/').includes(GIT_DIR);
}

/**
 * Parse the folder's own .gitignore, null when absent or unreadable
 */
async function loadGitignore(folderPath: string): Promise<Ignore | null> {
  let content: string;
  try {
    content = await readFile(join(folderPath, GITIGNORE_FILE), 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    log.warn({ folderPath, error }, 'Failed to read .gitignore, falling back to other filters');
    return null;
  }
  return ignore().add(content);
}

/**
 * List every file under a folder (POSIX relative paths, sorted), `.git` excluded
 */
export async function listFolderFiles(folderPath: string): Promise<string[]> {
  const entries = await fg('**/*', {
    cwd: folderPath,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore: [`**/${GIT_DIR}/**`],
  });

  return entries
    .filter((entry) => !isGitMetadata(entry))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Decide which files of a folder are published.
 *
 * Precedence: the folder's .gitignore, then the exclude-name list, then
 * everything. Only the `.git` directory is always left out.
 */
export async function selectFolderFiles(
  folderPath: string,
  options: CollectOptions
): Promise<{ mode: FilterMode; paths: string[] }> {
  const all = await listFolderFiles(folderPath);

  const gitignore = await loadGitignore(folderPath);
  if (gitignore) {
    return {
      mode: FilterMode.GITIGNORE,
      paths: all.filter((path) => !gitignore.ignores(path)),
    };
  }

  if (options.excludeNames.length > 0) {
    const excluded = new Set(options.excludeNames);
    return {
      mode: FilterMode.EXCLUDE_NAMES,
      paths: all.filter((path) => !path.split('/').some((segment) => excluded.has(segment))),
    };
  }

  return { mode: FilterMode.ALL, paths: all };
}

/**
 * Read the publishable files of a folder into memory
 */
export async function collectFolderFiles(
  folderPath: string,
  options: CollectOptions
): Promise<CollectedFiles> {
  const { mode, paths } = await selectFolderFiles(folderPath, options);

  const files: FileEntry[] = [];
  for (const path of paths) {
    try {
      const content = await readFile(join(folderPath, path));
      files.push({ path, content });
    } catch (error) {
      log.warn({ folderPath, path, error }, 'Failed to read file, skipping it');
    }
  }

  log.debug({ folderPath, mode, files: files.length }, 'Collected folder files');
  return { mode, files };
}
