import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve, sep } from 'node:path';
import { createLogger } from './logger.js';

const log = createLogger('temp');

const TEMP_PREFIX = 'variant-publish';

export async function createTempDir(prefix: string): Promise<string> {
  const dirPath = await mkdtemp(join(tmpdir(), `${TEMP_PREFIX}-${prefix}-`));
  log.debug({ dirPath }, 'Created temp directory');
  return dirPath;
}

export async function removeTempDir(path: string): Promise<void> {
  const tmpRoot = resolve(tmpdir());
  const resolved = resolve(path);

  // Safety check: only remove our own directories under the system temp dir
  if (!resolved.startsWith(`${tmpRoot}${sep}${TEMP_PREFIX}-`)) {
    throw new Error(`Refusing to remove directory outside tmp: ${path}`);
  }

  try {
    await rm(resolved, { recursive: true, force: true });
    log.debug({ path: resolved }, 'Removed temp directory');
  } catch (error) {
    log.warn({ path: resolved, error }, 'Failed to remove temp directory');
  }
}
