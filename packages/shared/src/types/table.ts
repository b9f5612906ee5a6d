/** A marker value in the encoding of its {@link MarkerCodec}. */
export type Marker = string;

/**
 * Declarative description of one source table.
 * Every table runs through the same generic delta path; nothing here is code.
 */
export interface TableDescriptor {
  /** Unique identifier within the registry */
  readonly id: string;
  /** Column used to detect new/updated rows (e.g. updated_at) */
  readonly changeColumn: string;
  /** Page size passed to the extraction port */
  readonly batchSize: number;
  /** Name of the marker codec used to order change markers */
  readonly markerType: string;
  /** Marker used when the table has no stored watermark yet */
  readonly initialMarker?: Marker;
  /** Per-table override of the cycle's page cap */
  readonly maxPages?: number;
  /** Per-table override of the cycle's wall-clock budget */
  readonly timeoutMs?: number;
  /** Source-specific parameters (schema, source table name, ...) */
  readonly params: Readonly<Record<string, string>>;
}
