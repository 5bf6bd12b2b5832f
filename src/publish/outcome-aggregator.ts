import type { FolderReport, PushStatus, RunSummary } from '../types/index.js';

/**
 * Whether a push status counts as a successful publish
 */
export function isPushed(status: PushStatus): boolean {
  return status === 'pushed-fast-forward' || status === 'pushed-forced';
}

/**
 * Collects per-folder reports for a run in processing order.
 *
 * The run exits non-zero when any folder failed or still needs a forced push.
 */
export class OutcomeAggregator {
  private readonly reports: FolderReport[] = [];

  record(report: FolderReport): void {
    this.reports.push(report);
  }

  get exitCode(): number {
    const blocked = this.reports.some(
      (report) => report.push.status === 'failed' || report.push.status === 'needs-force'
    );
    return blocked ? 1 : 0;
  }

  summary(): RunSummary {
    let pushed = 0;
    let skipped = 0;
    let needsForce = 0;
    let failed = 0;

    for (const report of this.reports) {
      const status = report.push.status;
      if (isPushed(status)) {
        pushed++;
      } else if (status === 'skipped') {
        skipped++;
      } else if (status === 'needs-force') {
        needsForce++;
      } else {
        failed++;
      }
    }

    return {
      total: this.reports.length,
      pushed,
      skipped,
      needsForce,
      failed,
      exitCode: this.exitCode,
      reports: [...this.reports],
    };
  }
}
