/**
 * Artifact Types
 *
 * Chat session exports and timings gathered into the custom folders before
 * they are published.
 */

import { z } from 'zod';

// ============================================================================
// Chat Session Files
// ============================================================================

/** Drops a field whose value has an unexpected shape instead of rejecting the record */
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

/**
 * One line of a `.jsonl` session log.
 *
 * `kind` 0 carries the initial session in `v`, 1 sets the value at path `k`,
 * 2 inserts `v` into the array at `k` at index `i` (or sets it without `i`).
 */
export const sessionEventSchema = z.object({
  kind: z.number().int(),
  k: z.unknown(),
  v: z.unknown(),
  i: z.unknown(),
});

export type SessionEvent = z.infer<typeof sessionEventSchema>;

export const sessionPathSchema = z.array(z.union([z.string(), z.number().int()]));

export type SessionPath = z.infer<typeof sessionPathSchema>;

/**
 * A chat session as stored by the editor
 */
export const chatSessionSchema = z.object({
  customTitle: lenient(z.string()),
  requests: lenient(z.array(z.unknown())),
});

export type ChatSession = z.infer<typeof chatSessionSchema>;

/**
 * One request of a chat session: the user message and the assistant response
 */
export const chatRequestSchema = z.object({
  message: z.unknown(),
  response: z.unknown(),
  /** Epoch ms when the message was sent */
  timestamp: lenient(z.number().int()),
  /** Duration in ms; some editor builds store an epoch here instead */
  timeSpentWaiting: lenient(z.number().int()),
  result: lenient(
    z.object({
      timings: lenient(
        z.object({
          totalElapsed: lenient(z.number().int()),
        })
      ),
    })
  ),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

/**
 * The `workspace.json` the editor keeps in each workspace storage directory
 */
export const workspaceStorageSchema = z.object({
  folder: lenient(z.string()),
});

// ============================================================================
// Collection Results
// ============================================================================

/**
 * First message sent to last response completed, epoch ms
 */
export interface SessionTiming {
  startMs: number;
  endMs: number;
}

export interface FolderArtifacts {
  folder: string;
  /** Workspace storage directory matched to the folder, null when none */
  storageDir: string | null;
  /** `written` with the transcript, `empty` when no transcript was found */
  transcript: 'written' | 'empty';
  /** Bytes written to `<name>.txt`, 0 when empty */
  transcriptBytes: number;
  /** Prompt file copied into the folder during this run */
  promptCopied: boolean;
  timing: SessionTiming | null;
}

export interface CollectSummary {
  folders: FolderArtifacts[];
  /** Path of the written `time.txt` */
  timeFile: string;
}
