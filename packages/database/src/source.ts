import type pg from 'pg';
import type { ExtractionPage, ExtractionPort, FetchRequest, Marker, SourceRow } from '@deltaflow/shared';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function quoteIdentifier(name: string, what: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(`Invalid ${what} identifier: '${name}'`);
  }
  return `"${name}"`;
}

/** `"schema"."table"` for a request; `params.sourceTable` overrides the table id. */
export function qualifiedTableName(request: Pick<FetchRequest, 'tableId' | 'params'>): string {
  const table = quoteIdentifier(request.params.sourceTable ?? request.tableId, 'table');
  const schema = request.params.schema;
  return schema ? `${quoteIdentifier(schema, 'schema')}.${table}` : table;
}

const MARKER_ALIAS = '__change_marker';

/**
 * Select list for a page. Timestamp markers are read as UTC text with
 * microseconds, since pg hands `timestamptz` back as a millisecond `Date`.
 */
function selectList(column: string, markerType: string | undefined): string {
  if (markerType !== 'timestamp') return '*';
  return `*, to_char(${column}::timestamptz AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS "${MARKER_ALIAS}"`;
}

/** Drops the marker column from rows ordered by it, keeping the last (highest) value. */
function splitMarkers(rows: SourceRow[], markerType: string | undefined): { rows: SourceRow[]; maxMarker?: Marker | null } {
  if (markerType !== 'timestamp') return { rows };

  let maxMarker: Marker | null = null;
  const stripped: SourceRow[] = [];
  for (const { [MARKER_ALIAS]: marker, ...row } of rows) {
    if (typeof marker === 'string') maxMarker = marker;
    stripped.push(row);
  }
  return { rows: stripped, maxMarker };
}

/**
 * Extraction over a Postgres source database.
 *
 * Reads one row past the page size to learn whether more rows exist. When a
 * page is full it re-reads up to and including the last row's marker, so rows
 * that share it always land on the same page.
 */
export class PostgresExtractionSource implements ExtractionPort {
  private readonly pool: pg.Pool;

  constructor(pool: pg.Pool) {
    this.pool = pool;
  }

  async fetch(request: FetchRequest): Promise<ExtractionPage> {
    const table = qualifiedTableName(request);
    const column = quoteIdentifier(request.changeColumn, 'column');
    const select = selectList(column, request.markerType);

    request.signal.throwIfAborted();
    const probe = await this.pool.query<SourceRow>(
      `SELECT ${select} FROM ${table} WHERE ${column} > $1 ORDER BY ${column} LIMIT $2`,
      [request.afterMarker, request.pageSize + 1]
    );

    if (probe.rows.length <= request.pageSize) {
      return { ...splitMarkers(probe.rows, request.markerType), hasMore: false };
    }

    const last = probe.rows[request.pageSize - 1];
    const lastValue = last?.[request.markerType === 'timestamp' ? MARKER_ALIAS : request.changeColumn];

    request.signal.throwIfAborted();
    const page = await this.pool.query<SourceRow>(
      `SELECT ${select} FROM ${table} WHERE ${column} > $1 AND ${column} <= $2 ORDER BY ${column}`,
      [request.afterMarker, lastValue]
    );

    return { ...splitMarkers(page.rows, request.markerType), hasMore: true };
  }
}
