import type { Marker } from './table.js';
import type { AdvanceResult, Watermark } from './watermark.js';

/** An opaque source row. Must carry a value for the change-tracking column. */
export type SourceRow = Record<string, unknown>;

export interface FetchRequest {
  tableId: string;
  changeColumn: string;
  /** Codec name of the change column's markers */
  markerType?: string;
  /** Only rows whose change marker is strictly greater than this are returned */
  afterMarker: Marker;
  pageSize: number;
  params: Readonly<Record<string, string>>;
  signal: AbortSignal;
}

export interface ExtractionPage {
  /** Rows ordered ascending by the change column */
  rows: SourceRow[];
  /** Highest change marker in `rows`; derived from the rows when omitted */
  maxMarker?: Marker | null;
  /** True when rows beyond this page are available */
  hasMore: boolean;
}

/**
 * Capability to read a table's delta from the source system.
 * A page may exceed `pageSize` only to avoid splitting rows that share its last marker.
 */
export interface ExtractionPort {
  fetch(request: FetchRequest): Promise<ExtractionPage>;
}

export interface WriteBatchRequest {
  tableId: string;
  /** Deterministic key for the marker range; repeated writes overwrite */
  rangeKey: string;
  fromMarker: Marker;
  toMarker: Marker;
  rows: SourceRow[];
  signal: AbortSignal;
}

/** Capability to durably persist a delta. Must be idempotent per (tableId, rangeKey). */
export interface SinkPort {
  writeBatch(request: WriteBatchRequest): Promise<void>;
}

/**
 * Durable table → watermark mapping.
 * `compareAndAdvance` is the only mutation and must be atomic per table.
 * Passing `expectedCurrent = null` creates the record only if none exists.
 */
export interface WatermarkStore {
  get(tableId: string): Promise<Watermark | null>;
  compareAndAdvance(
    tableId: string,
    expectedCurrent: Marker | null,
    newValue: Marker,
  ): Promise<AdvanceResult>;
}
