import {
  CycleCancelledError,
  errorMessage,
  type BatchReport,
  type Logger,
} from '@deltaflow/shared';
import { Orchestrator } from '@deltaflow/delta-engine';
import type { Backends } from './backends.js';
import type { SchedulerConfig } from './config.js';

export interface ScheduledCycleOptions {
  logger: Logger;
  /** Aborted on SIGINT/SIGTERM */
  signal?: AbortSignal;
  /** Stores the finished report; a failure here is logged and does not change the report */
  persist?: (report: BatchReport) => Promise<void>;
}

/**
 * Run one orchestration cycle with the configured limits.
 * A non-zero CYCLE_DEADLINE_MS cancels whatever is still running once it elapses.
 */
export async function runScheduledCycle(
  config: SchedulerConfig,
  backends: Pick<Backends, 'ports' | 'registry'>,
  options: ScheduledCycleOptions
): Promise<BatchReport> {
  const { logger } = options;
  const orchestrator = new Orchestrator(backends.ports, {
    concurrencyLimit: config.concurrencyLimit,
    maxPages: config.maxPagesPerTable,
    tableTimeoutMs: config.tableTimeoutMs,
    retry: config.retry,
    logger,
  });

  const controller = new AbortController();
  const onAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    onAbort();
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true });
  }

  let deadline: NodeJS.Timeout | undefined;
  if (config.cycleDeadlineMs > 0) {
    deadline = setTimeout(() => {
      logger.warn('Cycle deadline reached, cancelling remaining tables', {
        cycleDeadlineMs: config.cycleDeadlineMs,
      });
      controller.abort(new CycleCancelledError(`Cycle deadline of ${config.cycleDeadlineMs}ms reached`));
    }, config.cycleDeadlineMs);
  }

  let report: BatchReport;
  try {
    report = await orchestrator.runCycle(backends.registry, { signal: controller.signal });
  } finally {
    clearTimeout(deadline);
    options.signal?.removeEventListener('abort', onAbort);
  }

  if (options.persist) {
    try {
      await options.persist(report);
    } catch (error) {
      logger.warn('Failed to persist cycle report', {
        cycleId: report.cycleId,
        error: errorMessage(error),
      });
    }
  }

  return report;
}
