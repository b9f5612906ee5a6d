import { DB_TABLES } from '@deltaflow/shared';
import { query } from '../client.js';

interface TableDescriptorRow {
  table_id: string;
  change_column: string;
  batch_size: number | null;
  marker_type: string | null;
  initial_marker: string | null;
  max_pages: number | null;
  timeout_ms: number | null;
  params: Record<string, unknown> | null;
}

/**
 * Raw registry entry in descriptor field names. Unset columns are left out so
 * the registry applies its defaults; validation happens in the registry.
 */
function mapRowToDescriptorEntry(row: TableDescriptorRow): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    id: row.table_id,
    changeColumn: row.change_column,
  };
  if (row.batch_size !== null) entry.batchSize = row.batch_size;
  if (row.marker_type !== null) entry.markerType = row.marker_type;
  if (row.initial_marker !== null) entry.initialMarker = row.initial_marker;
  if (row.max_pages !== null) entry.maxPages = row.max_pages;
  if (row.timeout_ms !== null) entry.timeoutMs = row.timeout_ms;
  if (row.params !== null) entry.params = row.params;
  return entry;
}

/**
 * Enabled table descriptors in registry order.
 * Pass to `new TableRegistry(loadTableDescriptorEntries)`.
 */
export async function loadTableDescriptorEntries(): Promise<Record<string, unknown>[]> {
  const result = await query<TableDescriptorRow>(
    `SELECT table_id, change_column, batch_size, marker_type, initial_marker,
            max_pages, timeout_ms, params
     FROM ${DB_TABLES.TABLES}
     WHERE enabled = TRUE
     ORDER BY position, table_id`
  );
  return result.rows.map(mapRowToDescriptorEntry);
}
