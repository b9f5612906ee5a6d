import type { FailureReason } from './types/outcome.js';

/**
 * Base class for every failure the orchestrator reports.
 * `reason` is the machine-readable code that ends up in the BatchReport.
 */
export class IngestionError extends Error {
  readonly reason: FailureReason;

  constructor(reason: FailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IngestionError';
    this.reason = reason;
  }
}

/** Malformed table descriptor. Excludes the entry from the cycle. */
export class ConfigurationError extends IngestionError {
  constructor(message: string) {
    super('configuration_error', message);
    this.name = 'ConfigurationError';
  }
}

export class ExtractionError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extraction_error', message, options);
    this.name = 'ExtractionError';
  }
}

export class SinkError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('sink_error', message, options);
    this.name = 'SinkError';
  }
}

export class WatermarkStoreError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('watermark_store_error', message, options);
    this.name = 'WatermarkStoreError';
  }
}

/** Another run moved the watermark between resolve and advance. */
export class ConcurrentWatermarkConflictError extends IngestionError {
  readonly tableId: string;

  constructor(tableId: string, message?: string) {
    super(
      'concurrent_watermark_conflict',
      message ?? `Watermark for '${tableId}' was changed by a concurrent run`,
    );
    this.name = 'ConcurrentWatermarkConflictError';
    this.tableId = tableId;
  }
}

export class CycleCancelledError extends IngestionError {
  constructor(message = 'Cycle cancelled') {
    super('cancelled', message);
    this.name = 'CycleCancelledError';
  }
}

export class TableTimeoutError extends IngestionError {
  readonly tableId: string;
  readonly timeoutMs: number;

  constructor(tableId: string, timeoutMs: number) {
    super('timeout', `Table '${tableId}' exceeded its ${timeoutMs}ms budget`);
    this.name = 'TableTimeoutError';
    this.tableId = tableId;
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
