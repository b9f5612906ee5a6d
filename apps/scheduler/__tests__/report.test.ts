import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NotifyCategory, _resetSlackState } from '@deltaflow/shared';
import { createMockBatchReport, createMockRunOutcome } from '@deltaflow/shared/testing';
import {
  failureReasons,
  notifyCycleReport,
  reportCategory,
  reportExitCode,
  summarizeReport,
} from '../src/report.js';

const succeeded = createMockRunOutcome({ tableId: 'orders' });
const skipped = createMockRunOutcome({ tableId: 'customers', status: 'skipped_no_change', rowsProcessed: 0 });
const failed = createMockRunOutcome({
  tableId: 'order_lines',
  status: 'failed',
  rowsProcessed: 0,
  rangeKey: undefined,
  error: { reason: 'sink_error', message: 'disk full', name: 'SinkError', failedIn: 'writing' },
});

describe('reportCategory', () => {
  it('completes when nothing failed', () => {
    expect(reportCategory(createMockBatchReport([succeeded, skipped]))).toBe(NotifyCategory.CYCLE_COMPLETED);
  });

  it('is partial when some tables failed', () => {
    expect(reportCategory(createMockBatchReport([succeeded, failed]))).toBe(NotifyCategory.CYCLE_PARTIAL_FAILURE);
  });

  it('fails when every table failed', () => {
    expect(reportCategory(createMockBatchReport([failed]))).toBe(NotifyCategory.CYCLE_FAILED);
  });

  it('fails when the registry could not be read', () => {
    const report = createMockBatchReport([], {
      registryError: { reason: 'configuration_error', message: 'ENOENT', name: 'Error' },
    });
    expect(reportCategory(report)).toBe(NotifyCategory.CYCLE_FAILED);
  });

  it('prefers cancellation over failures', () => {
    expect(reportCategory(createMockBatchReport([failed], { cancelled: true }))).toBe(NotifyCategory.CYCLE_CANCELLED);
  });
});

describe('reportExitCode', () => {
  it('is 0 for a clean cycle', () => {
    expect(reportExitCode(createMockBatchReport([succeeded, skipped]))).toBe(0);
  });

  it('is 1 when a table failed', () => {
    expect(reportExitCode(createMockBatchReport([succeeded, failed]))).toBe(1);
  });

  it('is 1 when the registry could not be read', () => {
    const report = createMockBatchReport([], {
      registryError: { reason: 'configuration_error', message: 'ENOENT', name: 'Error' },
    });
    expect(reportExitCode(report)).toBe(1);
  });
});

describe('summarizeReport', () => {
  it('lists counts, rows and each failure', () => {
    const summary = summarizeReport(createMockBatchReport([succeeded, skipped, failed]));

    expect(summary.split('\n')).toEqual([
      'Tables: 2/3 succeeded (1 unchanged), 3 rows in 2s',
      'Failures: sink_error ×1',
      '• order_lines: disk full',
    ]);
  });

  it('names tables that hit the page cap', () => {
    const capped = createMockRunOutcome({ tableId: 'events', truncated: true, rowsProcessed: 1200 });

    const summary = summarizeReport(createMockBatchReport([capped]));

    expect(summary.split('\n')).toEqual([
      'Tables: 1/1 succeeded (0 unchanged), 1,200 rows in 2s',
      'Page cap reached: events',
    ]);
  });

  it('reports a registry failure on its own', () => {
    const report = createMockBatchReport([], {
      registryError: { reason: 'configuration_error', message: 'tables.json missing', name: 'Error' },
    });

    expect(summarizeReport(report)).toBe('Table registry could not be loaded: tables.json missing');
  });

  it('groups failure reasons', () => {
    const conflict = createMockRunOutcome({
      tableId: 'a',
      status: 'failed',
      error: { reason: 'concurrent_watermark_conflict', message: 'moved', name: 'ConcurrentWatermarkConflictError' },
    });

    expect([...failureReasons(createMockBatchReport([failed, conflict, failed]))]).toEqual([
      ['sink_error', 2],
      ['concurrent_watermark_conflict', 1],
    ]);
  });
});

describe('notifyCycleReport', () => {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(null, { status: 200 }));

  beforeEach(() => {
    _resetSlackState();
    fetchMock.mockClear();
    vi.stubGlobal('fetch', fetchMock);
    vi.stubEnv('SLACK_WEBHOOK_PIPELINE', 'https://hooks.example.test/pipeline');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  it('posts a partial failure to the pipeline channel', async () => {
    await notifyCycleReport(createMockBatchReport([succeeded, failed], { cycleId: 'cycle-1' }));

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://hooks.example.test/pipeline');
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      attachments: [
        expect.objectContaining({
          color: '#ffc107',
          blocks: expect.arrayContaining([
            expect.objectContaining({ type: 'header', text: expect.objectContaining({ text: 'Cycle Partially Failed' }) }),
          ]),
        }),
      ],
    });
  });
});
