import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import fg from 'fast-glob';
import {
  chatSessionSchema,
  sessionEventSchema,
  sessionPathSchema,
  type ChatSession,
  type SessionPath,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('chat-sessions');

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Step one key into a container, undefined when the key does not fit it
 */
function child(container: unknown, key: string | number): unknown {
  if (typeof key === 'number') {
    return Array.isArray(container) && key >= 0 && key < container.length ? container[key] : undefined;
  }
  return isRecord(container) && key in container ? container[key] : undefined;
}

function resolvePath(root: unknown, path: SessionPath): unknown {
  let cursor = root;
  for (const key of path) {
    cursor = child(cursor, key);
    if (cursor === undefined) {
      return undefined;
    }
  }
  return cursor;
}

/**
 * Replace the value at `path`. Paths that do not exist are ignored.
 */
export function setPath(root: JsonRecord, path: SessionPath, value: unknown): void {
  const last = path.at(-1);
  if (last === undefined) {
    return;
  }
  const parent = resolvePath(root, path.slice(0, -1));

  if (typeof last === 'number') {
    if (Array.isArray(parent) && last >= 0 && last < parent.length) {
      parent[last] = value;
    }
  } else if (isRecord(parent)) {
    parent[last] = value;
  }
}

/**
 * Splice `values` into the array at `path`, index clamped to its bounds
 */
export function insertPath(root: JsonRecord, path: SessionPath, index: number, values: unknown[]): void {
  const target = resolvePath(root, path);
  if (!Array.isArray(target)) {
    return;
  }
  const at = Math.min(Math.max(index, 0), target.length);
  target.splice(at, 0, ...values);
}

/**
 * Rebuild a session from its `.jsonl` event log. Unparseable lines are skipped.
 */
export function replaySessionLog(text: string): JsonRecord | null {
  let session: JsonRecord | null = null;

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') {
      continue;
    }
    const parsed = sessionEventSchema.safeParse(parseJson(trimmed));
    if (!parsed.success) {
      continue;
    }
    const event = parsed.data;

    if (event.kind === 0) {
      if (isRecord(event.v)) {
        session = event.v;
      }
      continue;
    }
    if (session === null) {
      continue;
    }

    const path = sessionPathSchema.safeParse(event.k);
    if (!path.success) {
      continue;
    }

    const value = event.v ?? null;
    if (event.kind === 1) {
      setPath(session, path.data, value);
    } else if (event.kind === 2) {
      if (event.i === undefined) {
        setPath(session, path.data, value);
      } else if (typeof event.i === 'number' && Number.isInteger(event.i)) {
        insertPath(session, path.data, event.i, Array.isArray(value) ? value : [value]);
      }
    }
  }

  return session;
}

/**
 * Load one session file (`.json` snapshot or `.jsonl` event log), null when
 * it cannot be read or is not a session object
 */
export async function loadChatSession(path: string): Promise<ChatSession | null> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    log.warn({ path, error }, 'Failed to read chat session');
    return null;
  }

  const raw = path.toLowerCase().endsWith('.jsonl') ? replaySessionLog(text) : parseJson(text);
  const parsed = chatSessionSchema.safeParse(raw);
  if (!parsed.success) {
    log.debug({ path }, 'Not a chat session, skipping');
    return null;
  }
  return parsed.data;
}

/**
 * Session files of a `chatSessions` directory, oldest first
 */
export async function listChatSessionFiles(dir: string): Promise<string[]> {
  const names = await fg(['*.json', '*.jsonl'], { cwd: dir, onlyFiles: true, caseSensitiveMatch: false });

  const entries = await Promise.all(
    names.map(async (name) => {
      const path = join(dir, name);
      return { path, mtimeMs: (await stat(path)).mtimeMs };
    })
  );

  return entries
    .sort((a, b) => a.mtimeMs - b.mtimeMs || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map((entry) => entry.path);
}

/**
 * Every loadable session of a `chatSessions` directory, oldest first
 */
export async function loadChatSessions(dir: string): Promise<ChatSession[]> {
  const sessions: ChatSession[] = [];
  for (const path of await listChatSessionFiles(dir)) {
    const session = await loadChatSession(path);
    if (session) {
      sessions.push(session);
    }
  }
  log.debug({ dir, sessions: sessions.length }, 'Loaded chat sessions');
  return sessions;
}
