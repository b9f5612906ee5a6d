import {
  DB_TABLES,
  type AdvanceResult,
  type Marker,
  type Watermark,
  type WatermarkStore,
} from '@deltaflow/shared';
import { query } from '../client.js';

interface WatermarkRow {
  table_id: string;
  marker: string;
  version: number;
  updated_at: Date;
}

function mapRowToWatermark(row: WatermarkRow): Watermark {
  return {
    tableId: row.table_id,
    marker: row.marker,
    version: row.version,
    updatedAt: row.updated_at,
  };
}

export async function getWatermark(tableId: string): Promise<Watermark | null> {
  const result = await query<WatermarkRow>(
    `SELECT * FROM ${DB_TABLES.WATERMARKS} WHERE table_id = $1`,
    [tableId]
  );
  const row = result.rows[0];
  return row ? mapRowToWatermark(row) : null;
}

/**
 * Create the first watermark for a table.
 * Returns null when a record already exists (another run created it first).
 */
export async function createWatermark(tableId: string, marker: Marker): Promise<Watermark | null> {
  const result = await query<WatermarkRow>(
    `INSERT INTO ${DB_TABLES.WATERMARKS} (table_id, marker, version)
     VALUES ($1, $2, 1)
     ON CONFLICT (table_id) DO NOTHING
     RETURNING *`,
    [tableId, marker]
  );
  const row = result.rows[0];
  return row ? mapRowToWatermark(row) : null;
}

/**
 * Move the watermark only if it still holds `expected`.
 * Returns null when the stored marker differs or the record is missing.
 */
export async function updateWatermarkIfCurrent(
  tableId: string,
  expected: Marker,
  next: Marker
): Promise<Watermark | null> {
  const result = await query<WatermarkRow>(
    `UPDATE ${DB_TABLES.WATERMARKS}
     SET marker = $3, version = version + 1, updated_at = NOW()
     WHERE table_id = $1 AND marker = $2
     RETURNING *`,
    [tableId, expected, next]
  );
  const row = result.rows[0];
  return row ? mapRowToWatermark(row) : null;
}

/**
 * Watermark store on the state database. Each compare-and-advance is a single
 * conditional statement, so Postgres row locking makes it atomic per table.
 */
export class PostgresWatermarkStore implements WatermarkStore {
  get(tableId: string): Promise<Watermark | null> {
    return getWatermark(tableId);
  }

  async compareAndAdvance(
    tableId: string,
    expectedCurrent: Marker | null,
    newValue: Marker
  ): Promise<AdvanceResult> {
    const advanced =
      expectedCurrent === null
        ? await createWatermark(tableId, newValue)
        : await updateWatermarkIfCurrent(tableId, expectedCurrent, newValue);

    if (advanced) {
      return { status: 'advanced', watermark: advanced };
    }

    const current = await getWatermark(tableId);
    return current ? { status: 'conflict', current } : { status: 'not_found' };
  }
}
