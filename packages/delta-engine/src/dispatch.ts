import { setMaxListeners } from 'node:events';
import { Semaphore, type SemaphoreInterface } from 'async-mutex';
import {
  DEFAULT_CONCURRENCY_LIMIT,
  DEFAULT_MAX_PAGES,
  capErrorMessage,
  errorMessage,
  generateTraceId,
  nullLogger,
  type BatchReport,
  type ErrorDetail,
  type Logger,
  type MarkerCodec,
  type RunOutcome,
  type TableDescriptor,
} from '@deltaflow/shared';
import type { RegistrySnapshot, TableRegistry } from '@deltaflow/table-registry';
import { acquireSemaphoreAbortable, createTableSignal } from './abort.js';
import { DeltaRunner, type DeltaPorts, type RunnerRetryOptions } from './runner.js';

export interface OrchestratorOptions {
  /** Default parallelism when a cycle does not set its own */
  concurrencyLimit?: number;
  /** Default page cap; a descriptor's maxPages overrides it */
  maxPages?: number;
  /** Default per-table wall-clock budget; 0 or unset disables it */
  tableTimeoutMs?: number;
  retry?: RunnerRetryOptions;
  logger?: Logger;
}

export interface RunCycleOptions {
  concurrencyLimit?: number;
  signal?: AbortSignal;
  cycleId?: string;
}

/**
 * Dispatch loop: one registry snapshot per cycle, every valid table run through
 * its own DeltaRunner under a bounded number of permits.
 *
 * `runCycle` never rejects. Every failure, including an unreadable registry,
 * ends up in the returned BatchReport.
 */
export class Orchestrator {
  private readonly ports: DeltaPorts;
  private readonly options: OrchestratorOptions;
  private readonly logger: Logger;

  constructor(ports: DeltaPorts, options: OrchestratorOptions = {}) {
    this.ports = ports;
    this.options = options;
    this.logger = options.logger ?? nullLogger;
  }

  async runCycle(registry: TableRegistry, options: RunCycleOptions = {}): Promise<BatchReport> {
    const cycleId = options.cycleId ?? generateTraceId();
    const log = this.logger.child({ cycleId });
    const startedAt = new Date();

    // Every waiting table listens on the cycle signal, so it gets its own uncapped one
    const cycle = new AbortController();
    setMaxListeners(0, cycle.signal);
    const external = options.signal;
    const onExternalAbort = () => cycle.abort(external?.reason);
    if (external?.aborted) {
      cycle.abort(external.reason);
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    try {
      let snapshot: RegistrySnapshot;
      try {
        snapshot = await registry.load();
      } catch (error) {
        log.error('Failed to load table registry', error);
        const registryError: Omit<ErrorDetail, 'failedIn'> = {
          reason: 'configuration_error',
          message: capErrorMessage(errorMessage(error)),
          name: error instanceof Error ? error.name : 'Error',
        };
        return buildReport(cycleId, startedAt, [], cycle.signal.aborted, registryError);
      }

      const limit = this.resolveConcurrencyLimit(options.concurrencyLimit, log);
      const semaphore = new Semaphore(limit);

      log.info('Cycle started', {
        tables: snapshot.tables.length,
        invalid: snapshot.invalid.length,
        concurrencyLimit: limit,
      });

      const outcomes = await Promise.all(
        snapshot.entries.map((entry): Promise<RunOutcome> => {
          if (entry.kind === 'invalid') {
            const { invalid } = entry;
            return Promise.resolve(
              notRunOutcome(invalid.tableId, {
                reason: 'configuration_error',
                message: capErrorMessage(invalid.error.message),
                name: invalid.error.name,
              }),
            );
          }
          return this.dispatchTable(entry.descriptor, entry.codec, semaphore, cycle.signal, log);
        }),
      );

      const report = buildReport(cycleId, startedAt, outcomes, cycle.signal.aborted);
      log.info('Cycle completed', {
        succeeded: report.successCount - report.skippedCount,
        skipped: report.skippedCount,
        failed: report.failureCount,
        rows: report.rowsProcessed,
        cancelled: report.cancelled,
        durationMs: report.durationMs,
      });
      return report;
    } finally {
      external?.removeEventListener('abort', onExternalAbort);
    }
  }

  private async dispatchTable(
    table: TableDescriptor,
    codec: MarkerCodec,
    semaphore: Semaphore,
    cycleSignal: AbortSignal,
    log: Logger,
  ): Promise<RunOutcome> {
    let release: SemaphoreInterface.Releaser | 'aborted';
    try {
      release = await acquireSemaphoreAbortable(semaphore, cycleSignal);
    } catch (error) {
      return notRunOutcome(table.id, {
        reason: 'unexpected_error',
        message: capErrorMessage(errorMessage(error)),
        name: error instanceof Error ? error.name : 'Error',
      });
    }

    if (release === 'aborted') {
      log.debug('Table not started, cycle cancelled', { tableId: table.id });
      return notRunOutcome(table.id, {
        reason: 'cancelled',
        message: capErrorMessage(errorMessage(cycleSignal.reason)),
        name: cycleSignal.reason instanceof Error ? cycleSignal.reason.name : 'AbortError',
      });
    }

    const tableSignal = createTableSignal(
      cycleSignal,
      table.id,
      table.timeoutMs ?? this.options.tableTimeoutMs,
    );
    try {
      const runner = new DeltaRunner(table, this.ports, {
        codec,
        maxPages: table.maxPages ?? this.options.maxPages ?? DEFAULT_MAX_PAGES,
        retry: this.options.retry,
        logger: log,
      });
      return await runner.run(tableSignal.signal);
    } finally {
      tableSignal.dispose();
      release();
    }
  }

  private resolveConcurrencyLimit(requested: number | undefined, log: Logger): number {
    const value = requested ?? this.options.concurrencyLimit ?? DEFAULT_CONCURRENCY_LIMIT;
    if (Number.isInteger(value) && value >= 1) {
      return value;
    }
    const clamped = Number.isFinite(value) ? Math.max(1, Math.floor(value)) : 1;
    log.warn('Invalid concurrency limit, clamping', { requested: value, concurrencyLimit: clamped });
    return clamped;
  }
}

/** Outcome for a registry entry that never reached a runner. */
function notRunOutcome(tableId: string, error: ErrorDetail): RunOutcome {
  const now = new Date();
  return {
    tableId,
    status: 'failed',
    rowsProcessed: 0,
    pagesFetched: 0,
    markerBefore: null,
    markerAfter: null,
    truncated: false,
    error,
    startedAt: now,
    completedAt: now,
    durationMs: 0,
  };
}

export function buildReport(
  cycleId: string,
  startedAt: Date,
  outcomes: RunOutcome[],
  cancelled: boolean,
  registryError?: Omit<ErrorDetail, 'failedIn'>,
): BatchReport {
  const completedAt = new Date();
  let succeeded = 0;
  let skipped = 0;
  let failed = 0;
  let rowsProcessed = 0;

  for (const outcome of outcomes) {
    rowsProcessed += outcome.rowsProcessed;
    switch (outcome.status) {
      case 'succeeded':
        succeeded++;
        break;
      case 'skipped_no_change':
        skipped++;
        break;
      case 'failed':
        failed++;
        break;
    }
  }

  return {
    cycleId,
    startedAt,
    completedAt,
    durationMs: completedAt.getTime() - startedAt.getTime(),
    outcomes,
    successCount: succeeded + skipped,
    failureCount: failed,
    skippedCount: skipped,
    rowsProcessed,
    cancelled,
    ...(registryError ? { registryError } : {}),
  };
}
