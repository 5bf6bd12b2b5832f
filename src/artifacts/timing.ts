import { chatRequestSchema, type ChatSession, type SessionTiming } from '../types/index.js';

/** Longest `timeSpentWaiting` read as a duration; larger values are epochs */
const MAX_WAIT_MS = 86_400_000;

/**
 * Active time across sessions: the first message sent to the last response
 * completed. A response ends at `timestamp + totalElapsed`, or later when
 * `timeSpentWaiting` says so. Null when no request carries a timestamp.
 */
export function messageWindowTiming(sessions: ChatSession[]): SessionTiming | null {
  let startMs = Infinity;
  let endMs = -Infinity;

  for (const session of sessions) {
    for (const raw of session.requests ?? []) {
      const parsed = chatRequestSchema.safeParse(raw);
      if (!parsed.success) {
        continue;
      }
      const request = parsed.data;
      const sent = request.timestamp;
      if (sent === undefined) {
        continue;
      }

      let end = sent;
      const elapsed = request.result?.timings?.totalElapsed;
      if (elapsed !== undefined && elapsed >= 0) {
        end = sent + elapsed;
      }
      const waiting = request.timeSpentWaiting;
      if (waiting !== undefined && waiting >= 0 && waiting <= MAX_WAIT_MS) {
        end = Math.max(end, sent + waiting);
      }

      startMs = Math.min(startMs, sent);
      endMs = Math.max(endMs, end);
    }
  }

  return Number.isFinite(startMs) ? { startMs, endMs } : null;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatLocalTimestamp(ms: number): string {
  const date = new Date(ms);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Content of `time.txt`: one `name:start,end` line per timed folder, by name
 */
export function formatTimeFile(timings: ReadonlyMap<string, SessionTiming>): string {
  const lines = [...timings.entries()]
    .sort(([a], [b]) => {
      const left = a.toLowerCase();
      const right = b.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    })
    .map(
      ([name, timing]) =>
        `${name}:${formatLocalTimestamp(timing.startMs)},${formatLocalTimestamp(timing.endMs)}`
    );
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
