/**
 * Test data factories for creating consistent mock data across tests.
 * All factories return valid objects with sensible defaults that can be overridden.
 */

import type {
  BatchReport,
  RunOutcome,
  SourceRow,
  TableDescriptor,
} from '../types/index.js';

let idCounter = 0;

/**
 * Generate a unique ID for test data
 */
export function generateTestId(prefix = 'test'): string {
  return `${prefix}-${++idCounter}-${Date.now()}`;
}

/**
 * Create a TableDescriptor with default values
 */
export function createMockTableDescriptor(
  overrides: Partial<TableDescriptor> = {}
): TableDescriptor {
  return {
    id: overrides.id ?? generateTestId('table'),
    changeColumn: 'updated_at',
    batchSize: 100,
    markerType: 'timestamp',
    params: {},
    ...overrides,
  };
}

/**
 * Create source rows whose change column holds consecutive days starting at `startDay`
 * (2024-01-<startDay>). Each row also carries a numeric `id`.
 */
export function createMockRows(
  count: number,
  options: { startDay?: number; changeColumn?: string } = {}
): SourceRow[] {
  const startDay = options.startDay ?? 2;
  const changeColumn = options.changeColumn ?? 'updated_at';
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    [changeColumn]: `2024-01-${String(startDay + i).padStart(2, '0')}`,
  }));
}

/**
 * Create a RunOutcome with default values
 */
export function createMockRunOutcome(overrides: Partial<RunOutcome> = {}): RunOutcome {
  const startedAt = new Date('2024-01-05T00:00:00.000Z');
  const completedAt = new Date('2024-01-05T00:00:01.500Z');
  return {
    tableId: overrides.tableId ?? generateTestId('table'),
    status: 'succeeded',
    rowsProcessed: 3,
    pagesFetched: 1,
    markerBefore: '2024-01-01',
    markerAfter: '2024-01-03',
    rangeKey: '2024-01-01+2024-01-03',
    truncated: false,
    startedAt,
    completedAt,
    durationMs: 1500,
    ...overrides,
  };
}

/**
 * Create a BatchReport around the given outcomes, with counts derived from them
 */
export function createMockBatchReport(
  outcomes: RunOutcome[] = [createMockRunOutcome()],
  overrides: Partial<BatchReport> = {}
): BatchReport {
  const skippedCount = outcomes.filter((o) => o.status === 'skipped_no_change').length;
  const failureCount = outcomes.filter((o) => o.status === 'failed').length;
  return {
    cycleId: overrides.cycleId ?? generateTestId('cycle'),
    startedAt: new Date('2024-01-05T00:00:00.000Z'),
    completedAt: new Date('2024-01-05T00:00:02.000Z'),
    durationMs: 2000,
    outcomes,
    successCount: outcomes.length - failureCount,
    failureCount,
    skippedCount,
    rowsProcessed: outcomes.reduce((sum, o) => sum + o.rowsProcessed, 0),
    cancelled: false,
    ...overrides,
  };
}
