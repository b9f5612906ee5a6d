import type { Marker } from './table.js';

/**
 * Persisted frontier of what has already been captured for a table.
 * `version` increments on every successful advance.
 */
export interface Watermark {
  tableId: string;
  marker: Marker;
  updatedAt: Date;
  version: number;
}

export type AdvanceResult =
  | { status: 'advanced'; watermark: Watermark }
  | { status: 'conflict'; current: Watermark }
  | { status: 'not_found' };
