import type { Marker } from './table.js';

export const RUN_STATUSES = ['succeeded', 'failed', 'skipped_no_change'] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const RUNNER_STATES = [
  'resolving_watermark',
  'extracting',
  'writing',
  'advancing',
  'done',
  'failed',
] as const;
export type RunnerState = (typeof RUNNER_STATES)[number];

export const FAILURE_REASONS = [
  'configuration_error',
  'extraction_error',
  'sink_error',
  'concurrent_watermark_conflict',
  'watermark_store_error',
  'cancelled',
  'timeout',
  'unexpected_error',
] as const;
export type FailureReason = (typeof FAILURE_REASONS)[number];

export interface ErrorDetail {
  reason: FailureReason;
  message: string;
  name: string;
  /** State the runner was in when it failed */
  failedIn?: RunnerState;
}

export interface RunOutcome {
  tableId: string;
  status: RunStatus;
  rowsProcessed: number;
  pagesFetched: number;
  markerBefore: Marker | null;
  markerAfter: Marker | null;
  rangeKey?: string;
  /** Page cap stopped extraction while the source still had rows */
  truncated: boolean;
  error?: ErrorDetail;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}

/** The externally visible result of one orchestration cycle. */
export interface BatchReport {
  cycleId: string;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  /** One entry per registry entry, in registry order */
  outcomes: RunOutcome[];
  /** Succeeded plus skipped-no-change */
  successCount: number;
  failureCount: number;
  skippedCount: number;
  rowsProcessed: number;
  cancelled: boolean;
  /** Set when the registry source itself could not be read */
  registryError?: Omit<ErrorDetail, 'failedIn'>;
}
