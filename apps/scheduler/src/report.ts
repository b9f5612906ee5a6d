import {
  NotifyCategory,
  formatDuration,
  notify,
  type BatchReport,
  type FailureReason,
} from '@deltaflow/shared';

export function reportCategory(report: BatchReport): NotifyCategory {
  if (report.cancelled) return NotifyCategory.CYCLE_CANCELLED;
  if (report.registryError) return NotifyCategory.CYCLE_FAILED;
  if (report.failureCount === 0) return NotifyCategory.CYCLE_COMPLETED;
  if (report.successCount === 0) return NotifyCategory.CYCLE_FAILED;
  return NotifyCategory.CYCLE_PARTIAL_FAILURE;
}

/** Non-zero when any table failed or the registry could not be read. */
export function reportExitCode(report: BatchReport): number {
  return report.registryError || report.failureCount > 0 ? 1 : 0;
}

/** Failure counts grouped by reason, in first-seen order. */
export function failureReasons(report: BatchReport): Map<FailureReason, number> {
  const counts = new Map<FailureReason, number>();
  for (const outcome of report.outcomes) {
    if (outcome.error) {
      counts.set(outcome.error.reason, (counts.get(outcome.error.reason) ?? 0) + 1);
    }
  }
  return counts;
}

export function summarizeReport(report: BatchReport): string {
  if (report.registryError) {
    return `Table registry could not be loaded: ${report.registryError.message}`;
  }

  const total = report.outcomes.length;
  const lines = [
    `Tables: ${report.successCount}/${total} succeeded (${report.skippedCount} unchanged), ` +
      `${report.rowsProcessed.toLocaleString('en-US')} rows in ` +
      formatDuration(report.startedAt, report.completedAt),
  ];

  const reasons = failureReasons(report);
  if (reasons.size > 0) {
    lines.push(
      'Failures: ' +
        [...reasons].map(([reason, count]) => `${reason} ×${count}`).join(', ')
    );
    for (const outcome of report.outcomes) {
      if (outcome.error) {
        lines.push(`• ${outcome.tableId}: ${outcome.error.message}`);
      }
    }
  }

  const truncated = report.outcomes.filter((outcome) => outcome.truncated).map((outcome) => outcome.tableId);
  if (truncated.length > 0) {
    lines.push(`Page cap reached: ${truncated.join(', ')}`);
  }

  return lines.join('\n');
}

const TITLES: Partial<Record<NotifyCategory, string>> = {
  [NotifyCategory.CYCLE_COMPLETED]: 'Cycle Completed',
  [NotifyCategory.CYCLE_PARTIAL_FAILURE]: 'Cycle Partially Failed',
  [NotifyCategory.CYCLE_FAILED]: 'Cycle Failed',
  [NotifyCategory.CYCLE_CANCELLED]: 'Cycle Cancelled',
};

export function notifyCycleReport(report: BatchReport): Promise<void> {
  const category = reportCategory(report);
  return notify({
    category,
    title: TITLES[category] ?? 'Cycle Finished',
    message: summarizeReport(report),
    context: {
      cycleId: report.cycleId,
      succeeded: String(report.successCount),
      failed: String(report.failureCount),
      rows: String(report.rowsProcessed),
    },
  });
}
