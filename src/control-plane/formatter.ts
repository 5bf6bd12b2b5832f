import { formatLocalTimestamp } from '../artifacts/timing.js';
import {
  PullRequestState,
  type FolderArtifacts,
  type FolderReport,
  type PullRequestResult,
  type PushResult,
  type RunSummary,
} from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Default: use colors if stdout is a TTY
  return process.stdout.isTTY ?? false;
}

/**
 * Apply color to text if colors are enabled.
 */
function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Format helper functions.
 */
export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

/**
 * Abbreviate a commit SHA for display.
 */
export function shortSha(sha: string): string {
  return sha.slice(0, 7);
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format warning message.
 */
export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

/**
 * Format info message.
 */
export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

// ============================================================================
// Publish Reports
// ============================================================================

const SKIP_DESCRIPTIONS: Record<string, string> = {
  'no-change': 'no changes',
  'missing-file': 'required file missing',
  'missing-description': 'PR description missing',
  'remote-main-missing': 'remote main branch missing',
};

/**
 * Describe a push result in one line, without the status symbol.
 */
export function describePushResult(result: PushResult, dryRun: boolean): string {
  const verb = dryRun ? 'would push' : 'pushed';

  switch (result.status) {
    case 'skipped': {
      const text = `skipped: ${SKIP_DESCRIPTIONS[result.reason] ?? result.reason}`;
      return result.detail ? `${text} (${result.detail})` : text;
    }
    case 'pushed-fast-forward':
      return `${verb} ${shortSha(result.commit)} (fast-forward)`;
    case 'pushed-forced':
      return `${verb} ${shortSha(result.commit)} (forced)`;
    case 'needs-force':
      return 'remote branch has diverged; rerun with --force to overwrite it';
    case 'failed':
      return `failed: ${result.reason}`;
  }
}

/**
 * Describe a pull request result, null when no pull request applies.
 */
export function describePullRequest(result: PullRequestResult): string | null {
  switch (result.state) {
    case PullRequestState.NOT_APPLICABLE:
      return null;
    case PullRequestState.CREATED:
      return `PR #${result.number ?? '?'} created${result.url ? `: ${result.url}` : ''}`;
    case PullRequestState.ALREADY_EXISTS:
      return result.url ? `PR already exists: ${result.url}` : 'PR already exists';
    case PullRequestState.SKIPPED_MISSING_DESCRIPTION:
      return 'PR skipped: description missing';
    case PullRequestState.FAILED:
      return `PR failed: ${result.error ?? 'unknown error'}`;
  }
}

/**
 * Format one folder's report: a status line, plus a PR line when applicable.
 */
export function formatFolderReport(report: FolderReport): string {
  const { push } = report;
  const name = bold(report.branch);
  const text = describePushResult(push, report.dryRun);

  let line: string;
  switch (push.status) {
    case 'pushed-fast-forward':
    case 'pushed-forced':
      line = formatSuccess(`${name} ${text}`);
      break;
    case 'skipped':
      line = formatInfo(`${name} ${text}`);
      break;
    case 'needs-force':
      line = `${yellow('!')} ${name} ${yellow(text)}`;
      break;
    case 'failed':
      line = `${red('✗')} ${name} ${red(text)}`;
      break;
  }

  const pr = describePullRequest(report.pullRequest);
  if (pr === null) {
    return line;
  }

  const prText = report.pullRequest.state === PullRequestState.FAILED ? red(pr) : dim(pr);
  return `${line}\n  ${prText}`;
}

/**
 * Format the closing summary of a publish run.
 */
export function formatRunSummary(summary: RunSummary, dryRun = false): string {
  const counts = [
    `${summary.pushed} ${dryRun ? 'would push' : 'pushed'}`,
    `${summary.skipped} skipped`,
    `${summary.needsForce} need force`,
    `${summary.failed} failed`,
  ].join(', ');

  const text = `${summary.total} folder${summary.total === 1 ? '' : 's'}: ${counts}`;
  return summary.exitCode === 0 ? formatSuccess(text) : formatError(text);
}

// ============================================================================
// Artifact Reports
// ============================================================================

/**
 * Format one folder's collected artifacts: a transcript line, plus detail lines.
 */
export function formatArtifactReport(report: FolderArtifacts): string {
  const name = bold(report.folder);
  const lines = [
    report.transcript === 'written'
      ? formatSuccess(`${name} transcript written (${report.transcriptBytes} bytes)`)
      : `${yellow('!')} ${name} ${yellow('no chat transcript found')}`,
  ];

  if (report.promptCopied) {
    lines.push(`  ${dim('prompt file copied')}`);
  }
  if (report.timing) {
    const start = formatLocalTimestamp(report.timing.startMs);
    const end = formatLocalTimestamp(report.timing.endMs);
    lines.push(`  ${dim(`active ${start} to ${end}`)}`);
  }
  return lines.join('\n');
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
