import {
  DB_TABLES,
  FAILURE_REASONS,
  RUN_STATUSES,
  RUNNER_STATES,
  type BatchReport,
  type ErrorDetail,
  type RunOutcome,
} from '@deltaflow/shared';
import { query, transaction } from '../client.js';

interface CycleRow {
  cycle_id: string;
  started_at: Date;
  completed_at: Date;
  duration_ms: number;
  success_count: number;
  failure_count: number;
  skipped_count: number;
  rows_processed: number;
  cancelled: boolean;
  registry_error_reason: string | null;
  registry_error_name: string | null;
  registry_error_message: string | null;
}

interface TableRunRow {
  cycle_id: string;
  position: number;
  table_id: string;
  status: string;
  rows_processed: number;
  pages_fetched: number;
  marker_before: string | null;
  marker_after: string | null;
  range_key: string | null;
  truncated: boolean;
  error_reason: string | null;
  error_name: string | null;
  error_message: string | null;
  failed_in: string | null;
  started_at: Date;
  completed_at: Date;
  duration_ms: number;
}

function mapRowToErrorDetail(
  reason: string | null,
  name: string | null,
  message: string | null,
): Omit<ErrorDetail, 'failedIn'> | undefined {
  if (reason === null) return undefined;
  return {
    reason: FAILURE_REASONS.find((known) => known === reason) ?? 'unexpected_error',
    name: name ?? 'Error',
    message: message ?? '',
  };
}

function mapRowToRunOutcome(row: TableRunRow): RunOutcome {
  const error = mapRowToErrorDetail(row.error_reason, row.error_name, row.error_message);
  const failedIn = RUNNER_STATES.find((state) => state === row.failed_in);
  return {
    tableId: row.table_id,
    status: RUN_STATUSES.find((status) => status === row.status) ?? 'failed',
    rowsProcessed: row.rows_processed,
    pagesFetched: row.pages_fetched,
    markerBefore: row.marker_before,
    markerAfter: row.marker_after,
    rangeKey: row.range_key ?? undefined,
    truncated: row.truncated,
    error: error && (failedIn ? { ...error, failedIn } : error),
    startedAt: row.started_at,
    completedAt: row.completed_at,
    durationMs: row.duration_ms,
  };
}

function mapRowsToBatchReport(cycle: CycleRow, runs: TableRunRow[]): BatchReport {
  const registryError = mapRowToErrorDetail(
    cycle.registry_error_reason,
    cycle.registry_error_name,
    cycle.registry_error_message,
  );
  return {
    cycleId: cycle.cycle_id,
    startedAt: cycle.started_at,
    completedAt: cycle.completed_at,
    durationMs: cycle.duration_ms,
    outcomes: runs.map(mapRowToRunOutcome),
    successCount: cycle.success_count,
    failureCount: cycle.failure_count,
    skippedCount: cycle.skipped_count,
    rowsProcessed: cycle.rows_processed,
    cancelled: cycle.cancelled,
    ...(registryError ? { registryError } : {}),
  };
}

/**
 * Persist a finished cycle and one row per outcome, in a single transaction.
 */
export async function insertCycleReport(report: BatchReport): Promise<void> {
  await transaction(async (client) => {
    await client.query(
      `INSERT INTO ${DB_TABLES.CYCLES} (
        cycle_id, started_at, completed_at, duration_ms,
        success_count, failure_count, skipped_count, rows_processed, cancelled,
        registry_error_reason, registry_error_name, registry_error_message
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
      [
        report.cycleId,
        report.startedAt,
        report.completedAt,
        report.durationMs,
        report.successCount,
        report.failureCount,
        report.skippedCount,
        report.rowsProcessed,
        report.cancelled,
        report.registryError?.reason ?? null,
        report.registryError?.name ?? null,
        report.registryError?.message ?? null,
      ]
    );

    if (report.outcomes.length === 0) return;

    const outcomes = report.outcomes;
    await client.query(
      `INSERT INTO ${DB_TABLES.TABLE_RUNS} (
        cycle_id, position, table_id, status, rows_processed, pages_fetched,
        marker_before, marker_after, range_key, truncated,
        error_reason, error_name, error_message, failed_in,
        started_at, completed_at, duration_ms
      )
      SELECT
        $1,
        UNNEST($2::INTEGER[]),
        UNNEST($3::TEXT[]),
        UNNEST($4::TEXT[]),
        UNNEST($5::INTEGER[]),
        UNNEST($6::INTEGER[]),
        UNNEST($7::TEXT[]),
        UNNEST($8::TEXT[]),
        UNNEST($9::TEXT[]),
        UNNEST($10::BOOLEAN[]),
        UNNEST($11::TEXT[]),
        UNNEST($12::TEXT[]),
        UNNEST($13::TEXT[]),
        UNNEST($14::TEXT[]),
        UNNEST($15::TIMESTAMPTZ[]),
        UNNEST($16::TIMESTAMPTZ[]),
        UNNEST($17::INTEGER[])`,
      [
        report.cycleId,
        outcomes.map((_, index) => index),
        outcomes.map((o) => o.tableId),
        outcomes.map((o) => o.status),
        outcomes.map((o) => o.rowsProcessed),
        outcomes.map((o) => o.pagesFetched),
        outcomes.map((o) => o.markerBefore),
        outcomes.map((o) => o.markerAfter),
        outcomes.map((o) => o.rangeKey ?? null),
        outcomes.map((o) => o.truncated),
        outcomes.map((o) => o.error?.reason ?? null),
        outcomes.map((o) => o.error?.name ?? null),
        outcomes.map((o) => o.error?.message ?? null),
        outcomes.map((o) => o.error?.failedIn ?? null),
        outcomes.map((o) => o.startedAt),
        outcomes.map((o) => o.completedAt),
        outcomes.map((o) => o.durationMs),
      ]
    );
  });
}

export async function getCycleReport(cycleId: string): Promise<BatchReport | null> {
  const cycles = await query<CycleRow>(
    `SELECT * FROM ${DB_TABLES.CYCLES} WHERE cycle_id = $1`,
    [cycleId]
  );
  const cycle = cycles.rows[0];
  if (!cycle) return null;

  const runs = await query<TableRunRow>(
    `SELECT * FROM ${DB_TABLES.TABLE_RUNS} WHERE cycle_id = $1 ORDER BY position`,
    [cycleId]
  );
  return mapRowsToBatchReport(cycle, runs.rows);
}

/** Most recently started cycle, or null when none was recorded. */
export async function getLatestCycleReport(): Promise<BatchReport | null> {
  const cycles = await query<CycleRow>(
    `SELECT * FROM ${DB_TABLES.CYCLES} ORDER BY started_at DESC LIMIT 1`
  );
  const cycle = cycles.rows[0];
  if (!cycle) return null;

  const runs = await query<TableRunRow>(
    `SELECT * FROM ${DB_TABLES.TABLE_RUNS} WHERE cycle_id = $1 ORDER BY position`,
    [cycle.cycle_id]
  );
  return mapRowsToBatchReport(cycle, runs.rows);
}
