export * from './client.js';
export * from './schema.js';
export * from './source.js';
export * from './queries/watermarks.js';
export * from './queries/delta-batches.js';
export * from './queries/cycle-reports.js';
export * from './queries/error-logs.js';
export * from './queries/tables.js';
