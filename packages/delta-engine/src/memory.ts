import {
  sleep,
  timestampMarker,
  type AdvanceResult,
  type ExtractionPage,
  type ExtractionPort,
  type FetchRequest,
  type Marker,
  type MarkerCodec,
  type SinkPort,
  type SourceRow,
  type Watermark,
  type WatermarkStore,
  type WriteBatchRequest,
} from '@deltaflow/shared';

type FailureQueue = Error[];

function takeFailure(queue: FailureQueue): Error | undefined {
  return queue.shift();
}

/**
 * Map-backed watermark store. Compare and set happen in one synchronous step,
 * so concurrent callers on the same event loop observe them atomically.
 */
export class InMemoryWatermarkStore implements WatermarkStore {
  private readonly records = new Map<string, Watermark>();
  private readonly getFailures: FailureQueue = [];
  private readonly advanceFailures: FailureQueue = [];

  /** Successful advances, in order */
  readonly advances: Array<{ tableId: string; from: Marker | null; to: Marker }> = [];

  seed(tableId: string, marker: Marker, version = 1): Watermark {
    const watermark: Watermark = { tableId, marker, updatedAt: new Date(), version };
    this.records.set(tableId, watermark);
    return { ...watermark };
  }

  remove(tableId: string): boolean {
    return this.records.delete(tableId);
  }

  /** Current marker per table. */
  snapshot(): Record<string, Marker> {
    return Object.fromEntries([...this.records].map(([tableId, watermark]) => [tableId, watermark.marker]));
  }

  /** Make the next `get` reject with `error`. */
  failNextGet(error: Error): void {
    this.getFailures.push(error);
  }

  /** Make the next `compareAndAdvance` reject with `error`. */
  failNextAdvance(error: Error): void {
    this.advanceFailures.push(error);
  }

  async get(tableId: string): Promise<Watermark | null> {
    const failure = takeFailure(this.getFailures);
    if (failure) throw failure;

    const watermark = this.records.get(tableId);
    return watermark ? { ...watermark } : null;
  }

  async compareAndAdvance(
    tableId: string,
    expectedCurrent: Marker | null,
    newValue: Marker,
  ): Promise<AdvanceResult> {
    const failure = takeFailure(this.advanceFailures);
    if (failure) throw failure;

    const current = this.records.get(tableId);

    if (expectedCurrent === null) {
      if (current) return { status: 'conflict', current: { ...current } };
    } else if (!current) {
      return { status: 'not_found' };
    } else if (current.marker !== expectedCurrent) {
      return { status: 'conflict', current: { ...current } };
    }

    const watermark: Watermark = {
      tableId,
      marker: newValue,
      updatedAt: new Date(),
      version: (current?.version ?? 0) + 1,
    };
    this.records.set(tableId, watermark);
    this.advances.push({ tableId, from: expectedCurrent, to: newValue });
    return { status: 'advanced', watermark: { ...watermark } };
  }
}

export interface StoredBatch {
  tableId: string;
  rangeKey: string;
  fromMarker: Marker;
  toMarker: Marker;
  rows: SourceRow[];
  /** Number of times this range was written */
  writes: number;
}

export interface InMemoryPortOptions {
  /** Artificial latency per call */
  latencyMs?: number;
}

/** Sink keyed by (tableId, rangeKey); a repeated write replaces the stored batch. */
export class InMemorySink implements SinkPort {
  private readonly batches = new Map<string, StoredBatch>();
  private readonly failures: FailureQueue = [];
  private readonly latencyMs: number;

  /** Total accepted writes, overwrites included */
  writes = 0;

  constructor(options: InMemoryPortOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
  }

  /** Make the next `times` writes reject with `error`. */
  failNext(error: Error, times = 1): void {
    for (let i = 0; i < times; i++) this.failures.push(error);
  }

  async writeBatch(request: WriteBatchRequest): Promise<void> {
    if (this.latencyMs > 0) await sleep(this.latencyMs);

    const failure = takeFailure(this.failures);
    if (failure) throw failure;

    const key = batchKey(request.tableId, request.rangeKey);
    const previous = this.batches.get(key);
    this.batches.set(key, {
      tableId: request.tableId,
      rangeKey: request.rangeKey,
      fromMarker: request.fromMarker,
      toMarker: request.toMarker,
      rows: request.rows.map((row) => ({ ...row })),
      writes: (previous?.writes ?? 0) + 1,
    });
    this.writes++;
  }

  getBatch(tableId: string, rangeKey: string): StoredBatch | undefined {
    return this.batches.get(batchKey(tableId, rangeKey));
  }

  batchesFor(tableId: string): StoredBatch[] {
    return [...this.batches.values()].filter((batch) => batch.tableId === tableId);
  }

  /** Every stored row of a table, batch by batch in first-write order. */
  rowsFor(tableId: string): SourceRow[] {
    return this.batchesFor(tableId).flatMap((batch) => batch.rows);
  }

  get size(): number {
    return this.batches.size;
  }
}

function batchKey(tableId: string, rangeKey: string): string {
  return `${tableId}\u0000${rangeKey}`;
}

interface SourceTable {
  rows: SourceRow[];
  codec: MarkerCodec;
}

/**
 * Extraction source over in-memory tables.
 *
 * Looks tables up by `params.sourceTable`, falling back to the table id, and
 * extends a full page past `pageSize` rather than split rows sharing its last
 * marker.
 */
export class InMemoryExtractionSource implements ExtractionPort {
  private readonly tables = new Map<string, SourceTable>();
  private readonly failures: FailureQueue = [];
  private readonly latencyMs: number;

  /** Every request received, without its signal */
  readonly requests: Array<Omit<FetchRequest, 'signal'>> = [];

  constructor(options: InMemoryPortOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
  }

  setTable(name: string, rows: SourceRow[], codec: MarkerCodec = timestampMarker): void {
    this.tables.set(name, { rows: [...rows], codec });
  }

  append(name: string, rows: SourceRow[]): void {
    const table = this.tables.get(name);
    if (!table) {
      this.setTable(name, rows);
      return;
    }
    table.rows.push(...rows);
  }

  /** Make the next `times` fetches reject with `error`. */
  failNext(error: Error, times = 1): void {
    for (let i = 0; i < times; i++) this.failures.push(error);
  }

  async fetch(request: FetchRequest): Promise<ExtractionPage> {
    const { signal, ...logged } = request;
    this.requests.push(logged);

    if (this.latencyMs > 0) await sleep(this.latencyMs);
    signal.throwIfAborted();

    const failure = takeFailure(this.failures);
    if (failure) throw failure;

    const name = request.params.sourceTable ?? request.tableId;
    const table = this.tables.get(name);
    if (!table) {
      throw new Error(`relation "${name}" does not exist`);
    }

    const { codec } = table;
    const pending = table.rows
      .flatMap((row) => {
        const marker = codec.fromValue(row[request.changeColumn]);
        return marker !== null && codec.compare(marker, request.afterMarker) > 0 ? [{ row, marker }] : [];
      })
      .sort((a, b) => codec.compare(a.marker, b.marker));

    let end = Math.min(request.pageSize, pending.length);
    const last = pending[end - 1];
    if (last) {
      for (let next = pending[end]; next && codec.compare(next.marker, last.marker) === 0; next = pending[end]) {
        end++;
      }
    }

    const page = pending.slice(0, end);
    return {
      rows: page.map(({ row }) => ({ ...row })),
      maxMarker: page[page.length - 1]?.marker ?? null,
      hasMore: end < pending.length,
    };
  }
}
