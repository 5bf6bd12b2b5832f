import { appendFile, copyFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CollectSummary, Folder, FolderArtifacts, SessionTiming } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { loadChatSessions } from './chat-sessions.js';
import { messageWindowTiming, formatTimeFile } from './timing.js';
import { exportTranscript, relativizeTranscript } from './transcript.js';
import { locateWorkspaceStorage, workspaceUriForFolder } from './workspace-storage.js';

const log = createLogger('artifact-collector');

/** Prompt file copied into the folders when no description file is configured */
export const DEFAULT_PROMPT_FILE = 'final_prompt.txt';

export const TIME_FILE = 'time.txt';

const CHAT_SESSIONS_DIR = 'chatSessions';

export interface CollectOptions {
  /** Prompt file at the workspace root, copied into folders that lack it */
  promptFile: string;
  /** `workspaceStorage` directories searched for each folder's chat sessions */
  storageRoots: string[];
  platform?: NodeJS.Platform;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Gather the artifacts of each custom folder before publishing: the prompt
 * file, `<name>.txt` with the folder's chat transcript (left empty when there
 * is none) and one `time.txt` line at the root per folder with timed sessions.
 */
export async function collectArtifacts(
  root: string,
  folders: Folder[],
  options: CollectOptions
): Promise<CollectSummary> {
  const promptSource = join(root, options.promptFile);
  const hasPrompt = await isFile(promptSource);
  log.info({ root, promptFile: options.promptFile, hasPrompt, folders: folders.length }, 'Collecting artifacts');

  const results: FolderArtifacts[] = [];
  const timings = new Map<string, SessionTiming>();

  for (const folder of folders) {
    const result = await collectFolder(root, folder, options, hasPrompt ? promptSource : null);
    results.push(result);
    if (result.timing) {
      timings.set(folder.name, result.timing);
    }
  }

  const timeFile = join(root, TIME_FILE);
  await writeFile(timeFile, formatTimeFile(timings), 'utf8');
  log.info(
    {
      timeFile,
      timed: timings.size,
      transcripts: results.filter((r) => r.transcript === 'written').length,
      empty: results.filter((r) => r.transcript === 'empty').length,
    },
    'Artifacts collected'
  );

  return { folders: results, timeFile };
}

async function collectFolder(
  root: string,
  folder: Folder,
  options: CollectOptions,
  promptSource: string | null
): Promise<FolderArtifacts> {
  let promptCopied = false;
  if (promptSource) {
    const destination = join(folder.path, options.promptFile);
    if (!(await exists(destination))) {
      await copyFile(promptSource, destination);
      promptCopied = true;
      log.debug({ folder: folder.name, destination }, 'Copied prompt file');
    }
  }

  const folderUri = workspaceUriForFolder(folder.path, options.platform);
  const storageDir = await locateWorkspaceStorage(options.storageRoots, folderUri);

  let transcript: string | null = null;
  let timing: SessionTiming | null = null;

  if (storageDir) {
    const sessions = await loadChatSessions(join(storageDir, CHAT_SESSIONS_DIR));
    const exported = exportTranscript(sessions);
    transcript = exported === null ? null : relativizeTranscript(exported, folder.path, root);
    timing = messageWindowTiming(sessions);
  } else {
    log.warn({ folder: folder.name, folderUri }, 'No workspace storage found for folder');
  }

  const transcriptFile = join(folder.path, `${folder.name}.txt`);
  if (transcript) {
    await writeFile(transcriptFile, transcript, 'utf8');
    const bytes = Buffer.byteLength(transcript, 'utf8');
    log.info({ folder: folder.name, bytes }, 'Wrote transcript');
    return { folder: folder.name, storageDir, transcript: 'written', transcriptBytes: bytes, promptCopied, timing };
  }

  // Created when missing, existing content is kept
  await appendFile(transcriptFile, '', 'utf8');
  log.warn({ folder: folder.name, file: transcriptFile }, 'No transcript found, transcript file left as is');
  return { folder: folder.name, storageDir, transcript: 'empty', transcriptBytes: 0, promptCopied, timing };
}
