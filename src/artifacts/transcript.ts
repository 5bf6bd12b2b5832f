import { z } from 'zod';
import { chatRequestSchema, type ChatSession } from '../types/index.js';

/** Speaker label of assistant turns; the sessions are Copilot chat logs */
export const ASSISTANT_LABEL = 'GitHub Copilot';

const markdownSchema = z.union([z.string(), z.object({ value: z.string() })]);

const userMessageSchema = z.union([
  z.string(),
  z.object({
    text: z.string().optional().catch(undefined),
    parts: z.array(z.unknown()).optional().catch(undefined),
  }),
]);

const textPartSchema = z.object({ text: z.string() });

const responsePartSchema = z.object({
  kind: z.unknown(),
  value: z.unknown(),
  toolId: z.unknown(),
  pastTenseMessage: z.unknown(),
  invocationMessage: z.unknown(),
  resultDetails: z.unknown(),
  toolSpecificData: z.unknown(),
});

type ResponsePart = z.infer<typeof responsePartSchema>;

const resultDetailsSchema = z.object({
  input: z.unknown(),
  output: z.unknown(),
});

const terminalDataSchema = z.object({ commandLine: z.unknown() });

/**
 * Trimmed text of a plain or `{ value }` markdown string, '' otherwise
 */
function markdownText(value: unknown): string {
  const parsed = markdownSchema.safeParse(value);
  if (!parsed.success) {
    return '';
  }
  return (typeof parsed.data === 'string' ? parsed.data : parsed.data.value).trim();
}

function stringText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function extractUserText(message: unknown): string {
  const parsed = userMessageSchema.safeParse(message);
  if (!parsed.success) {
    return '';
  }
  const data = parsed.data;
  if (typeof data === 'string') {
    return data.trim();
  }
  if (data.text !== undefined) {
    return data.text.trim();
  }
  if (data.parts !== undefined) {
    return data.parts
      .map((part) => (typeof part === 'string' ? part : partText(part)))
      .join('')
      .trim();
  }
  return '';
}

function partText(part: unknown): string {
  const parsed = textPartSchema.safeParse(part);
  return parsed.success ? parsed.data.text : '';
}

/**
 * Lines describing one tool invocation, most readable form first
 */
function toolLines(part: ResponsePart): string[] {
  const pastTense = markdownText(part.pastTenseMessage);
  if (pastTense) {
    return [pastTense];
  }

  const lines: string[] = [];
  const invocation = markdownText(part.invocationMessage);
  if (invocation) {
    lines.push(invocation);
  }

  const details = resultDetailsSchema.safeParse(part.resultDetails);
  if (details.success) {
    const input = stringText(details.data.input);
    if (input) {
      lines.push(`Completed with input: ${input}`);
    }
    const output = details.data.output;
    if (Array.isArray(output)) {
      // First line of the first output only; outputs run long
      const header = markdownText(output[0]).split('\n')[0] ?? '';
      if (header) {
        lines.push(header);
      }
    }
    return lines;
  }

  if (part.toolId === 'run_in_terminal') {
    const terminal = terminalDataSchema.safeParse(part.toolSpecificData);
    const command = terminal.success ? stringText(terminal.data.commandLine) : '';
    if (command) {
      lines.push(`Ran terminal command: ${command}`);
    }
  }

  return lines;
}

export function extractAssistantText(response: unknown): string {
  if (!Array.isArray(response)) {
    return markdownText(response);
  }

  const chunks: string[] = [];
  const push = (line: string): void => {
    if (line && chunks.at(-1) !== line) {
      chunks.push(line);
    }
  };

  for (const raw of response) {
    const parsed = responsePartSchema.safeParse(raw);
    if (!parsed.success) {
      continue;
    }
    const part = parsed.data;

    if (part.kind === undefined || part.kind === null) {
      push(stringText(part.value));
    } else if (part.kind === 'toolInvocationSerialized') {
      toolLines(part).forEach(push);
    }
  }

  return chunks.join('\n').trim();
}

/**
 * Render sessions as a plain-text transcript, null when nothing was said
 */
export function exportTranscript(sessions: ChatSession[]): string | null {
  const lines: string[] = [];

  for (const session of sessions) {
    const title = session.customTitle?.trim();
    if (title) {
      lines.push(`Session: ${title}`);
    }
    if (session.requests === undefined) {
      continue;
    }

    for (const raw of session.requests) {
      const request = chatRequestSchema.safeParse(raw);
      if (!request.success) {
        continue;
      }
      const user = extractUserText(request.data.message);
      const assistant = extractAssistantText(request.data.response);
      if (user) {
        lines.push(`User: ${user}`);
      }
      if (assistant) {
        lines.push(`${ASSISTANT_LABEL}: ${assistant}`);
      }
      lines.push('');
    }

    lines.push('---', '');
  }

  const transcript = `${lines.join('\n').trimEnd()}\n`;
  return transcript.replace(/[\n\- ]/g, '') === '' ? null : transcript;
}

function toForwardSlashes(path: string): string {
  return path.replace(/\\/g, '/');
}

function decodeUri(uri: string): string {
  try {
    return decodeURIComponent(uri);
  } catch {
    return uri;
  }
}

/**
 * Path of `target` below `base` (both forward-slashed, no leading slash), null outside it
 */
function relativeBelow(target: string, base: string): string | null {
  const prefix = base.replace(/^\/+/, '').replace(/\/+$/, '');
  if (!target.toLowerCase().startsWith(prefix.toLowerCase())) {
    return null;
  }
  const rest = target.slice(prefix.length);
  if (rest !== '' && !rest.startsWith('/')) {
    return null;
  }
  return rest.replace(/^\/+/, '');
}

/**
 * Rewrite absolute paths and `(file:///...)` links under the folder or the
 * workspace root as paths relative to them. The folder wins over the root.
 */
export function relativizeTranscript(text: string, folderPath: string, rootPath: string): string {
  const bases = [folderPath, rootPath];

  const linked = text.replace(/\((file:\/\/\/[^)]+)\)/g, (match: string, uri: string) => {
    const target = toForwardSlashes(decodeUri(uri).slice('file:///'.length));
    for (const base of bases) {
      const relative = relativeBelow(target, toForwardSlashes(base));
      if (relative !== null) {
        return `(${relative})`;
      }
    }
    return match;
  });

  let result = linked;
  for (const base of bases) {
    for (const form of new Set([base, toForwardSlashes(base)])) {
      const trimmed = form.replace(/[\\/]+$/, '');
      if (trimmed === '') {
        continue;
      }
      result = result.split(`${trimmed}\\`).join('').split(`${trimmed}/`).join('');
    }
  }
  return result;
}
