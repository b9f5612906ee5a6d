import { describe, it, expect, beforeEach } from 'vitest';
import {
  CycleCancelledError,
  TableTimeoutError,
  integerMarker,
  timestampMarker,
  type AdvanceResult,
  type ExtractionPort,
  type FetchRequest,
  type SinkPort,
  type SourceRow,
  type WatermarkStore,
} from '@deltaflow/shared';
import {
  createMockLogger,
  createMockRows,
  createMockTableDescriptor,
} from '@deltaflow/shared/testing';
import { DeltaRunner, type DeltaPorts } from '../src/runner.js';
import {
  InMemoryExtractionSource,
  InMemorySink,
  InMemoryWatermarkStore,
} from '../src/memory.js';

const table = createMockTableDescriptor({ id: 't1' });

const scenarioRows: SourceRow[] = [
  { id: 1, updated_at: '2024-01-01' },
  { id: 2, updated_at: '2024-01-02' },
  { id: 3, updated_at: '2024-01-02' },
  { id: 4, updated_at: '2024-01-03' },
];

describe('DeltaRunner', () => {
  let source: InMemoryExtractionSource;
  let sink: InMemorySink;
  let store: InMemoryWatermarkStore;
  let ports: DeltaPorts;

  beforeEach(() => {
    source = new InMemoryExtractionSource();
    sink = new InMemorySink();
    store = new InMemoryWatermarkStore();
    ports = { extraction: source, sink, watermarks: store };
  });

  function createRunner(overrides: Partial<DeltaPorts> = {}, maxPages = 50, descriptor = table) {
    return new DeltaRunner(descriptor, { ...ports, ...overrides }, { codec: timestampMarker, maxPages });
  }

  describe('single cycle', () => {
    it('captures the rows after the watermark and advances to their max marker', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      const runner = createRunner();

      const outcome = await runner.run(new AbortController().signal);

      expect(outcome).toMatchObject({
        tableId: 't1',
        status: 'succeeded',
        rowsProcessed: 3,
        pagesFetched: 1,
        markerBefore: '2024-01-01',
        markerAfter: '2024-01-03',
        rangeKey: '2024-01-01+2024-01-03',
        truncated: false,
      });
      expect(outcome.error).toBeUndefined();
      expect(store.snapshot()).toEqual({ t1: '2024-01-03' });
      expect(sink.getBatch('t1', '2024-01-01+2024-01-03')?.rows.map((row) => row.id)).toEqual([2, 3, 4]);
      expect(runner.history).toEqual(['resolving_watermark', 'extracting', 'writing', 'advancing', 'done']);
    });

    it('skips without touching the watermark when nothing changed', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', [{ id: 1, updated_at: '2024-01-01' }]);
      const runner = createRunner();

      const outcome = await runner.run(new AbortController().signal);

      expect(outcome.status).toBe('skipped_no_change');
      expect(outcome.rowsProcessed).toBe(0);
      expect(outcome.markerAfter).toBe('2024-01-01');
      expect(store.snapshot()).toEqual({ t1: '2024-01-01' });
      expect(store.advances).toHaveLength(0);
      expect(sink.writes).toBe(0);
      expect(runner.history).toEqual(['resolving_watermark', 'extracting', 'done']);
    });

    it('leaves the watermark alone when the write fails and recovers on the next run', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      sink.failNext(new Error('disk full'));

      const failed = await createRunner().run(new AbortController().signal);

      expect(failed.status).toBe('failed');
      expect(failed.error).toEqual({
        reason: 'sink_error',
        message: 'Write of 3 rows under 2024-01-01+2024-01-03 failed: disk full',
        name: 'SinkError',
        failedIn: 'writing',
      });
      expect(failed.rowsProcessed).toBe(0);
      expect(failed.markerAfter).toBe('2024-01-01');
      expect(store.snapshot()).toEqual({ t1: '2024-01-01' });

      const retried = await createRunner().run(new AbortController().signal);

      expect(retried.status).toBe('succeeded');
      expect(retried.rowsProcessed).toBe(3);
      expect(store.snapshot()).toEqual({ t1: '2024-01-03' });
      expect(sink.getBatch('t1', '2024-01-01+2024-01-03')?.writes).toBe(1);
    });
  });

  describe('watermark resolution', () => {
    it('starts from the codec initial marker and creates the watermark on first run', async () => {
      source.setTable('t1', createMockRows(2));

      const outcome = await createRunner().run(new AbortController().signal);

      expect(outcome.markerBefore).toBe('1970-01-01T00:00:00.000Z');
      expect(outcome.markerAfter).toBe('2024-01-03');
      const watermark = await store.get('t1');
      expect(watermark?.marker).toBe('2024-01-03');
      expect(watermark?.version).toBe(1);
      expect(store.advances).toEqual([{ tableId: 't1', from: null, to: '2024-01-03' }]);
    });

    it('prefers the descriptor initial marker over the codec default', async () => {
      source.setTable('t1', createMockRows(3));
      const descriptor = createMockTableDescriptor({ id: 't1', initialMarker: '2024-01-02' });

      const outcome = await createRunner({}, 50, descriptor).run(new AbortController().signal);

      expect(outcome.markerBefore).toBe('2024-01-02');
      expect(outcome.rowsProcessed).toBe(2);
      expect(source.requests[0]?.afterMarker).toBe('2024-01-02');
    });

    it('reports store read failures as watermark_store_error', async () => {
      store.failNextGet(new Error('connection refused'));

      const outcome = await createRunner().run(new AbortController().signal);

      expect(outcome.status).toBe('failed');
      expect(outcome.error?.reason).toBe('watermark_store_error');
      expect(outcome.error?.failedIn).toBe('resolving_watermark');
      expect(outcome.error?.message).toBe('Failed to read watermark: connection refused');
      expect(outcome.markerBefore).toBeNull();
      expect(source.requests).toHaveLength(0);
    });
  });

  describe('paging', () => {
    const paged = createMockTableDescriptor({ id: 't1', batchSize: 2 });

    it('follows pages until the source is drained', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', createMockRows(5));

      const outcome = await createRunner({}, 50, paged).run(new AbortController().signal);

      expect(outcome.pagesFetched).toBe(3);
      expect(outcome.rowsProcessed).toBe(5);
      expect(outcome.markerAfter).toBe('2024-01-06');
      expect(source.requests.map((request) => request.afterMarker)).toEqual([
        '2024-01-01',
        '2024-01-03',
        '2024-01-05',
      ]);
      expect(source.requests.every((request) => request.pageSize === 2)).toBe(true);
    });

    it('stops at the page cap and continues from the last captured marker next time', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', createMockRows(5));

      const first = await createRunner({}, 2, paged).run(new AbortController().signal);

      expect(first.status).toBe('succeeded');
      expect(first.truncated).toBe(true);
      expect(first.pagesFetched).toBe(2);
      expect(first.markerAfter).toBe('2024-01-05');

      const second = await createRunner({}, 2, paged).run(new AbortController().signal);

      expect(second.truncated).toBe(false);
      expect(second.markerBefore).toBe('2024-01-05');
      expect(second.markerAfter).toBe('2024-01-06');
      expect(sink.rowsFor('t1').map((row) => row.id)).toEqual([1, 2, 3, 4, 5]);
    });

    it('never splits rows that share a marker across pages', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', [
        { id: 'a', updated_at: '2024-01-02' },
        { id: 'b', updated_at: '2024-01-03' },
        { id: 'c', updated_at: '2024-01-03' },
        { id: 'd', updated_at: '2024-01-04' },
      ]);

      const outcome = await createRunner({}, 50, paged).run(new AbortController().signal);

      expect(outcome.pagesFetched).toBe(2);
      expect(sink.rowsFor('t1').map((row) => row.id)).toEqual(['a', 'b', 'c', 'd']);
    });

    it('fails a page whose marker does not move past the cursor', async () => {
      store.seed('t1', '2024-01-01');
      const stuck: ExtractionPort = {
        fetch: async (request) => ({ rows: [{ id: 1, updated_at: request.afterMarker }], hasMore: true }),
      };

      const outcome = await createRunner({ extraction: stuck }).run(new AbortController().signal);

      expect(outcome.error).toEqual({
        reason: 'extraction_error',
        message: 'Page max marker 2024-01-01 does not advance past 2024-01-01',
        name: 'ExtractionError',
        failedIn: 'extracting',
      });
      expect(sink.writes).toBe(0);
    });

    it('fails an empty page that reports more rows', async () => {
      store.seed('t1', '2024-01-01');
      const hollow: ExtractionPort = {
        fetch: async () => ({ rows: [], hasMore: true }),
      };

      const outcome = await createRunner({ extraction: hollow }).run(new AbortController().signal);

      expect(outcome.status).toBe('failed');
      expect(outcome.error).toEqual({
        reason: 'extraction_error',
        message: 'Source returned an empty page after 2024-01-01 but reported more rows',
        name: 'ExtractionError',
        failedIn: 'extracting',
      });
      expect(store.snapshot()).toEqual({ t1: '2024-01-01' });
    });

    it('advances to the page marker when it is finer than the row values', async () => {
      store.seed('t1', '2024-01-01T00:00:00.000100Z');
      const requests: FetchRequest[] = [];
      const precise: ExtractionPort = {
        fetch: async (request) => {
          requests.push(request);
          return {
            rows: [{ id: 2, updated_at: new Date('2024-01-01T00:00:00.000Z') }],
            maxMarker: '2024-01-01T00:00:00.000200Z',
            hasMore: false,
          };
        },
      };

      const outcome = await createRunner({ extraction: precise }).run(new AbortController().signal);

      expect(outcome.status).toBe('succeeded');
      expect(outcome.markerAfter).toBe('2024-01-01T00:00:00.000200Z');
      expect(requests[0]?.markerType).toBe('timestamp');
      expect(store.snapshot()).toEqual({ t1: '2024-01-01T00:00:00.000200Z' });
    });

    it('fails a page whose rows carry no marker', async () => {
      store.seed('t1', '2024-01-01');
      const unmarked: ExtractionPort = {
        fetch: async () => ({ rows: [{ id: 1 }], hasMore: false }),
      };

      const outcome = await createRunner({ extraction: unmarked }).run(new AbortController().signal);

      expect(outcome.error?.reason).toBe('extraction_error');
      expect(outcome.error?.message).toBe("Page of 1 rows has no usable timestamp marker in 'updated_at'");
    });

    it('orders integer markers numerically', async () => {
      const sequenced = createMockTableDescriptor({ id: 'seq', changeColumn: 'seq', markerType: 'integer', batchSize: 2 });
      source.setTable('seq', [{ seq: 9 }, { seq: 10 }, { seq: 11 }], integerMarker);
      store.seed('seq', '8');

      const runner = new DeltaRunner(sequenced, ports, { codec: integerMarker, maxPages: 50 });
      const outcome = await runner.run(new AbortController().signal);

      expect(outcome.markerAfter).toBe('11');
      expect(outcome.pagesFetched).toBe(2);
      expect(source.requests.map((request) => request.afterMarker)).toEqual(['8', '10']);
    });
  });

  describe('advance', () => {
    it('fails with a conflict when another run moved the watermark', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      const racing: ExtractionPort = {
        fetch: (request) => {
          store.seed('t1', '2024-01-02', 2);
          return source.fetch(request);
        },
      };

      const outcome = await createRunner({ extraction: racing }).run(new AbortController().signal);

      expect(outcome.error).toEqual({
        reason: 'concurrent_watermark_conflict',
        message: "Watermark for 't1' moved from 2024-01-01 to 2024-01-02 during the run",
        name: 'ConcurrentWatermarkConflictError',
        failedIn: 'advancing',
      });
      expect(store.snapshot()).toEqual({ t1: '2024-01-02' });
      expect(store.advances).toHaveLength(0);
    });

    it('treats a watermark removed mid-run as a conflict', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      const removing: ExtractionPort = {
        fetch: (request) => {
          store.remove('t1');
          return source.fetch(request);
        },
      };

      const outcome = await createRunner({ extraction: removing }).run(new AbortController().signal);

      expect(outcome.error?.reason).toBe('concurrent_watermark_conflict');
      expect(outcome.error?.message).toBe("Watermark for 't1' disappeared during the run");
      expect(store.snapshot()).toEqual({});
    });

    it('reports store write failures as watermark_store_error', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      store.failNextAdvance(new Error('deadlock detected'));

      const outcome = await createRunner().run(new AbortController().signal);

      expect(outcome.error?.reason).toBe('watermark_store_error');
      expect(outcome.error?.failedIn).toBe('advancing');
      expect(store.snapshot()).toEqual({ t1: '2024-01-01' });
    });
  });

  describe('retries', () => {
    it('retries transient extraction errors when configured', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      source.failNext(new Error('read ECONNRESET'), 2);
      const logger = createMockLogger();
      const runner = new DeltaRunner(table, ports, {
        codec: timestampMarker,
        maxPages: 50,
        retry: { maxRetries: 2, baseDelayMs: 1, jitterMs: 0 },
        logger,
      });

      const outcome = await runner.run(new AbortController().signal);

      expect(outcome.status).toBe('succeeded');
      expect(source.requests).toHaveLength(3);
      const retries = logger.getLogsByLevel('warn').filter((log) => log.message === 'Retrying fetch');
      expect(retries.map((log) => log.data?.attempt)).toEqual([1, 2]);
      expect(retries[0]?.data?.tableId).toBe('t1');
    });

    it('does not retry permanent errors', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      source.failNext(new Error('permission denied for table t1'));
      const runner = new DeltaRunner(table, ports, {
        codec: timestampMarker,
        maxPages: 50,
        retry: { maxRetries: 2, baseDelayMs: 1, jitterMs: 0 },
      });

      const outcome = await runner.run(new AbortController().signal);

      expect(outcome.error?.reason).toBe('extraction_error');
      expect(outcome.error?.message).toBe('Extraction failed after 2024-01-01: permission denied for table t1');
      expect(source.requests).toHaveLength(1);
    });

    it('makes a single attempt by default', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      source.failNext(new Error('read ECONNRESET'));

      const outcome = await createRunner().run(new AbortController().signal);

      expect(outcome.error?.reason).toBe('extraction_error');
      expect(source.requests).toHaveLength(1);
    });
  });

  describe('cancellation', () => {
    it('does nothing when the signal is already aborted', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      const controller = new AbortController();
      controller.abort(new CycleCancelledError());

      const outcome = await createRunner().run(controller.signal);

      expect(outcome.error).toEqual({
        reason: 'cancelled',
        message: 'Cycle cancelled',
        name: 'CycleCancelledError',
        failedIn: 'resolving_watermark',
      });
      expect(source.requests).toHaveLength(0);
    });

    it('abandons an in-flight extraction when cancelled', async () => {
      store.seed('t1', '2024-01-01');
      const controller = new AbortController();
      const hanging: ExtractionPort = {
        fetch: () => {
          controller.abort(new CycleCancelledError());
          return new Promise(() => undefined);
        },
      };

      const outcome = await createRunner({ extraction: hanging }).run(controller.signal);

      expect(outcome.error?.reason).toBe('cancelled');
      expect(outcome.error?.failedIn).toBe('extracting');
      expect(store.snapshot()).toEqual({ t1: '2024-01-01' });
    });

    it('reports a timeout raised during the write and keeps the watermark', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      const controller = new AbortController();
      const slowSink: SinkPort = {
        writeBatch: () => {
          controller.abort(new TableTimeoutError('t1', 50));
          return new Promise(() => undefined);
        },
      };

      const outcome = await createRunner({ sink: slowSink }).run(controller.signal);

      expect(outcome.error).toEqual({
        reason: 'timeout',
        message: "Table 't1' exceeded its 50ms budget",
        name: 'TableTimeoutError',
        failedIn: 'writing',
      });
      expect(store.snapshot()).toEqual({ t1: '2024-01-01' });
    });

    it('lets an advance that already started complete', async () => {
      store.seed('t1', '2024-01-01');
      source.setTable('t1', scenarioRows);
      const controller = new AbortController();
      const abortingStore: WatermarkStore = {
        get: (tableId) => store.get(tableId),
        compareAndAdvance: async (tableId, expected, next): Promise<AdvanceResult> => {
          controller.abort(new CycleCancelledError());
          return store.compareAndAdvance(tableId, expected, next);
        },
      };

      const outcome = await createRunner({ watermarks: abortingStore }).run(controller.signal);

      expect(outcome.status).toBe('succeeded');
      expect(store.snapshot()).toEqual({ t1: '2024-01-03' });
    });
  });
});
