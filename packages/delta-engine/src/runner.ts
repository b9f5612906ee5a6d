import {
  ConcurrentWatermarkConflictError,
  ExtractionError,
  IngestionError,
  SinkError,
  TableTimeoutError,
  WatermarkStoreError,
  capErrorMessage,
  errorMessage,
  isRetryableError,
  markerRangeKey,
  maxMarkerOf,
  nullLogger,
  withRetry,
  type AdvanceResult,
  type ErrorDetail,
  type ExtractionPort,
  type FailureReason,
  type Logger,
  type Marker,
  type MarkerCodec,
  type RetryOptions,
  type RunOutcome,
  type RunnerState,
  type SinkPort,
  type SourceRow,
  type TableDescriptor,
  type WatermarkStore,
} from '@deltaflow/shared';
import { raceAbort } from './abort.js';

export interface DeltaPorts {
  extraction: ExtractionPort;
  sink: SinkPort;
  watermarks: WatermarkStore;
}

export type RunnerRetryOptions = Partial<
  Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'>
>;

export interface DeltaRunnerOptions {
  codec: MarkerCodec;
  /** Page cap for this run */
  maxPages: number;
  /** In-run retries of transient port failures; none by default */
  retry?: RunnerRetryOptions;
  logger?: Logger;
}

interface ExtractedDelta {
  rows: SourceRow[];
  maxMarker: Marker | null;
  pagesFetched: number;
  truncated: boolean;
}

/**
 * Drives one table through resolve → extract → write → advance.
 *
 * The watermark is only ever touched by the final compare-and-advance, and only
 * after the sink confirmed the write, so every failure path leaves it where the
 * next cycle can re-extract the same delta.
 */
export class DeltaRunner {
  private readonly table: TableDescriptor;
  private readonly ports: DeltaPorts;
  private readonly codec: MarkerCodec;
  private readonly maxPages: number;
  private readonly retry: RunnerRetryOptions;
  private readonly log: Logger;

  private currentState: RunnerState = 'resolving_watermark';
  private readonly transitions: RunnerState[] = ['resolving_watermark'];

  constructor(table: TableDescriptor, ports: DeltaPorts, options: DeltaRunnerOptions) {
    this.table = table;
    this.ports = ports;
    this.codec = options.codec;
    this.maxPages = Math.max(1, options.maxPages);
    this.retry = { maxRetries: 0, ...options.retry };
    this.log = (options.logger ?? nullLogger).child({ tableId: table.id });
  }

  get state(): RunnerState {
    return this.currentState;
  }

  /** Every state entered so far, in order. */
  get history(): readonly RunnerState[] {
    return this.transitions;
  }

  async run(signal: AbortSignal): Promise<RunOutcome> {
    const startedAt = new Date();
    let markerBefore: Marker | null = null;
    let delta: ExtractedDelta = { rows: [], maxMarker: null, pagesFetched: 0, truncated: false };
    let rangeKey: string | undefined;

    const finish = (
      status: RunOutcome['status'],
      markerAfter: Marker | null,
      error?: ErrorDetail,
    ): RunOutcome => {
      const completedAt = new Date();
      return {
        tableId: this.table.id,
        status,
        rowsProcessed: status === 'succeeded' ? delta.rows.length : 0,
        pagesFetched: delta.pagesFetched,
        markerBefore,
        markerAfter,
        rangeKey,
        truncated: delta.truncated,
        error,
        startedAt,
        completedAt,
        durationMs: completedAt.getTime() - startedAt.getTime(),
      };
    };

    try {
      signal.throwIfAborted();
      const stored = await this.resolveWatermark(signal);
      const expectedCurrent = stored;
      const fromMarker = stored ?? this.table.initialMarker ?? this.codec.initial;
      markerBefore = fromMarker;

      this.transition('extracting');
      delta = await this.extract(fromMarker, signal);

      if (delta.rows.length === 0 || delta.maxMarker === null) {
        this.transition('done');
        this.log.info('No changes since watermark', { marker: fromMarker });
        return finish('skipped_no_change', fromMarker);
      }
      const toMarker = delta.maxMarker;

      this.transition('writing');
      rangeKey = markerRangeKey(fromMarker, toMarker);
      await this.write(fromMarker, toMarker, rangeKey, delta.rows, signal);

      this.transition('advancing');
      // Last cancellation point: once the advance starts it runs to completion
      signal.throwIfAborted();
      await this.advance(expectedCurrent, toMarker);

      this.transition('done');
      this.log.info('Delta captured', {
        rows: delta.rows.length,
        pages: delta.pagesFetched,
        from: fromMarker,
        to: toMarker,
        truncated: delta.truncated,
      });
      return finish('succeeded', toMarker);
    } catch (error) {
      const failedIn = this.currentState;
      const detail = this.describeFailure(error, signal, failedIn);
      this.transition('failed');
      this.log.warn('Table run failed', {
        reason: detail.reason,
        failedIn,
        error: detail.message,
      });
      return finish('failed', markerBefore, detail);
    }
  }

  private transition(next: RunnerState): void {
    this.log.debug('Runner state transition', { from: this.currentState, to: next });
    this.currentState = next;
    this.transitions.push(next);
  }

  /** Stored marker, or null when the table has never been advanced. */
  private async resolveWatermark(signal: AbortSignal): Promise<Marker | null> {
    try {
      const watermark = await raceAbort(this.ports.watermarks.get(this.table.id), signal);
      return watermark?.marker ?? null;
    } catch (error) {
      if (signal.aborted) throw error;
      throw new WatermarkStoreError(`Failed to read watermark: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async extract(fromMarker: Marker, signal: AbortSignal): Promise<ExtractedDelta> {
    const rows: SourceRow[] = [];
    let afterMarker = fromMarker;
    let maxMarker: Marker | null = null;
    let pagesFetched = 0;
    let hasMore = true;

    while (hasMore && pagesFetched < this.maxPages) {
      signal.throwIfAborted();
      const cursor = afterMarker;

      const page = await raceAbort(
        this.withPortRetry('fetch', signal, () =>
          this.ports.extraction.fetch({
            tableId: this.table.id,
            changeColumn: this.table.changeColumn,
            markerType: this.codec.type,
            afterMarker: cursor,
            pageSize: this.table.batchSize,
            params: this.table.params,
            signal,
          }),
        ),
        signal,
      ).catch((error: unknown) => {
        throw signal.aborted
          ? error
          : new ExtractionError(`Extraction failed after ${cursor}: ${errorMessage(error)}`, { cause: error });
      });
      pagesFetched++;

      if (page.rows.length === 0) {
        if (page.hasMore) {
          throw new ExtractionError(`Source returned an empty page after ${cursor} but reported more rows`);
        }
        hasMore = false;
        break;
      }

      const pageMax =
        page.maxMarker ?? maxMarkerOf(this.codec, page.rows.map((row) => row[this.table.changeColumn]));
      if (pageMax === null || !this.codec.isValid(pageMax)) {
        throw new ExtractionError(
          `Page of ${page.rows.length} rows has no usable ${this.codec.type} marker in '${this.table.changeColumn}'`,
        );
      }
      if (this.codec.compare(pageMax, cursor) <= 0) {
        throw new ExtractionError(
          `Page max marker ${pageMax} does not advance past ${cursor}`,
        );
      }

      rows.push(...page.rows);
      maxMarker = pageMax;
      afterMarker = pageMax;
      hasMore = page.hasMore;

      this.log.debug('Page extracted', { page: pagesFetched, rows: page.rows.length, maxMarker: pageMax, hasMore });
    }

    const truncated = hasMore && pagesFetched >= this.maxPages;
    if (truncated) {
      this.log.warn('Page cap reached, remaining rows deferred to next cycle', { maxPages: this.maxPages });
    }

    return { rows, maxMarker, pagesFetched, truncated };
  }

  private async write(
    fromMarker: Marker,
    toMarker: Marker,
    rangeKey: string,
    rows: SourceRow[],
    signal: AbortSignal,
  ): Promise<void> {
    signal.throwIfAborted();
    await raceAbort(
      this.withPortRetry('writeBatch', signal, () =>
        this.ports.sink.writeBatch({
          tableId: this.table.id,
          rangeKey,
          fromMarker,
          toMarker,
          rows,
          signal,
        }),
      ),
      signal,
    ).catch((error: unknown) => {
      throw signal.aborted
        ? error
        : new SinkError(`Write of ${rows.length} rows under ${rangeKey} failed: ${errorMessage(error)}`, { cause: error });
    });
  }

  private async advance(expectedCurrent: Marker | null, newValue: Marker): Promise<void> {
    let result: AdvanceResult;
    try {
      result = await this.ports.watermarks.compareAndAdvance(this.table.id, expectedCurrent, newValue);
    } catch (error) {
      throw new WatermarkStoreError(`Failed to advance watermark: ${errorMessage(error)}`, { cause: error });
    }

    if (result.status === 'conflict') {
      throw new ConcurrentWatermarkConflictError(
        this.table.id,
        `Watermark for '${this.table.id}' moved from ${expectedCurrent ?? '(none)'} to ${result.current.marker} during the run`,
      );
    }
    if (result.status === 'not_found') {
      throw new ConcurrentWatermarkConflictError(
        this.table.id,
        `Watermark for '${this.table.id}' disappeared during the run`,
      );
    }
  }

  private withPortRetry<T>(operation: string, signal: AbortSignal, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...this.retry,
      isRetryable: (error) => !signal.aborted && isRetryableError(error),
      beforeAttempt: async () => signal.throwIfAborted(),
      onRetry: (error, attempt, delayMs) => {
        this.log.warn(`Retrying ${operation}`, {
          attempt,
          delayMs: Math.round(delayMs),
          error: error.message,
        });
      },
    });
  }

  private describeFailure(error: unknown, signal: AbortSignal, failedIn: RunnerState): ErrorDetail {
    let reason: FailureReason;
    let source: unknown = error;

    // An advance that was already in flight reports its own result, not the abort
    if (signal.aborted && (error === signal.reason || failedIn !== 'advancing')) {
      source = signal.reason;
      reason = signal.reason instanceof TableTimeoutError ? 'timeout' : 'cancelled';
    } else if (error instanceof IngestionError) {
      reason = error.reason;
    } else {
      reason = 'unexpected_error';
    }

    return {
      reason,
      message: capErrorMessage(errorMessage(source)),
      name: source instanceof Error ? source.name : 'Error',
      failedIn,
    };
  }
}
