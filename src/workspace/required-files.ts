import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { FolderKind, SkipReason, type DescriptionSource, type Folder } from '../types/index.js';

export type RequiredFileCheck =
  | { ok: true }
  | {
      ok: false;
      reason: typeof SkipReason.MISSING_FILE | typeof SkipReason.MISSING_DESCRIPTION;
      file: string;
    };

/**
 * Read a file and return its trimmed content, null when absent, unreadable or blank
 */
export async function readNonBlank(path: string): Promise<string | null> {
  const content = await readFile(path, 'utf8').catch(() => null);
  if (content === null) {
    return null;
  }
  const trimmed = content.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Check the files a custom folder must carry before it may be published:
 * its `<name>.txt` and, when a description file is configured, that file.
 * The template folder has no requirements.
 */
export async function checkRequiredFiles(
  folder: Folder,
  description: DescriptionSource
): Promise<RequiredFileCheck> {
  if (folder.kind === FolderKind.TEMPLATE) {
    return { ok: true };
  }

  if (folder.requiredFile) {
    const content = await readNonBlank(join(folder.path, folder.requiredFile));
    if (content === null) {
      return { ok: false, reason: SkipReason.MISSING_FILE, file: folder.requiredFile };
    }
  }

  if (description.kind === 'file') {
    const content = await readNonBlank(join(folder.path, description.fileName));
    if (content === null) {
      return { ok: false, reason: SkipReason.MISSING_DESCRIPTION, file: description.fileName };
    }
  }

  return { ok: true };
}
