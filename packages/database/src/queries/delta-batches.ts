import {
  DB_TABLES,
  sha256,
  type SinkPort,
  type SourceRow,
  type WriteBatchRequest,
} from '@deltaflow/shared';
import { query } from '../client.js';

export interface DeltaBatchRow {
  table_id: string;
  range_key: string;
  from_marker: string;
  to_marker: string;
  row_count: number;
  payload: SourceRow[];
  payload_hash: string;
  written_at: Date;
}

export interface DeltaBatch {
  tableId: string;
  rangeKey: string;
  fromMarker: string;
  toMarker: string;
  rowCount: number;
  rows: SourceRow[];
  payloadHash: string;
  writtenAt: Date;
}

function mapRowToDeltaBatch(row: DeltaBatchRow): DeltaBatch {
  return {
    tableId: row.table_id,
    rangeKey: row.range_key,
    fromMarker: row.from_marker,
    toMarker: row.to_marker,
    rowCount: row.row_count,
    rows: row.payload,
    payloadHash: row.payload_hash,
    writtenAt: row.written_at,
  };
}

/** JSON encoding that writes bigint column values as strings. */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, inner: unknown) =>
    typeof inner === 'bigint' ? inner.toString() : inner
  );
}

export function serializeRows(rows: SourceRow[]): string {
  return toJson(rows);
}

/**
 * Upsert one delta batch keyed by (table_id, range_key).
 * Returns false when an identical payload was already stored.
 */
export async function upsertDeltaBatch(
  batch: Omit<WriteBatchRequest, 'signal'>
): Promise<boolean> {
  const payloadStr = serializeRows(batch.rows);
  const payloadHash = sha256(payloadStr);

  // WHERE clause skips the rewrite when a replay carries the same rows
  const result = await query(
    `INSERT INTO ${DB_TABLES.BATCHES} (
      table_id, range_key, from_marker, to_marker, row_count, payload, payload_hash
    ) VALUES ($1, $2, $3, $4, $5, $6, $7)
    ON CONFLICT (table_id, range_key) DO UPDATE SET
      from_marker = EXCLUDED.from_marker,
      to_marker = EXCLUDED.to_marker,
      row_count = EXCLUDED.row_count,
      payload = EXCLUDED.payload,
      payload_hash = EXCLUDED.payload_hash,
      written_at = NOW()
    WHERE ${DB_TABLES.BATCHES}.payload_hash IS DISTINCT FROM EXCLUDED.payload_hash`,
    [
      batch.tableId,
      batch.rangeKey,
      batch.fromMarker,
      batch.toMarker,
      batch.rows.length,
      payloadStr,
      payloadHash,
    ]
  );

  return (result.rowCount ?? 0) > 0;
}

export async function getDeltaBatch(tableId: string, rangeKey: string): Promise<DeltaBatch | null> {
  const result = await query<DeltaBatchRow>(
    `SELECT * FROM ${DB_TABLES.BATCHES} WHERE table_id = $1 AND range_key = $2`,
    [tableId, rangeKey]
  );
  const row = result.rows[0];
  return row ? mapRowToDeltaBatch(row) : null;
}

/** Sink writing each delta as one row of the batches table. */
export class PostgresSink implements SinkPort {
  async writeBatch(request: WriteBatchRequest): Promise<void> {
    const { signal, ...batch } = request;
    signal.throwIfAborted();
    await upsertDeltaBatch(batch);
  }
}
