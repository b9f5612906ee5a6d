/** Rows requested per extraction call when a descriptor does not set batchSize */
export const DEFAULT_BATCH_SIZE = 1000;
/** Pages a single table may fetch in one cycle before it yields its slot */
export const DEFAULT_MAX_PAGES = 50;
/** Tables extracted in parallel when the caller does not choose a limit */
export const DEFAULT_CONCURRENCY_LIMIT = 4;
/** Marker codec used when a descriptor does not name one */
export const DEFAULT_MARKER_TYPE = 'timestamp';
/** Maximum length of error messages stored in reports and error logs */
export const MAX_ERROR_MESSAGE_LENGTH = 1000;

export const BLOB_CONTAINERS = {
  WATERMARKS: 'watermarks',
  DELTAS: 'deltas',
} as const;

export const DB_TABLES = {
  WATERMARKS: 'ingestion_watermarks',
  BATCHES: 'ingestion_batches',
  TABLES: 'ingestion_tables',
  CYCLES: 'ingestion_cycles',
  TABLE_RUNS: 'ingestion_table_runs',
} as const;
