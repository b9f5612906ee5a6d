import type { ConfigurationError, MarkerCodec, TableDescriptor } from '@deltaflow/shared';

/** A registry entry that failed validation. Reported, never executed. */
export interface InvalidDescriptor {
  /** Position in the registry source */
  index: number;
  /** The entry's id when it has one, otherwise `#<index>` */
  tableId: string;
  error: ConfigurationError;
}

export type RegistryEntry =
  | { kind: 'table'; index: number; descriptor: TableDescriptor; codec: MarkerCodec }
  | { kind: 'invalid'; index: number; invalid: InvalidDescriptor };

/**
 * Immutable view of the registry captured at cycle start.
 * Later reloads produce a new snapshot and never mutate this one.
 */
export interface RegistrySnapshot {
  readonly loadedAt: Date;
  /** Every entry in source order */
  readonly entries: readonly RegistryEntry[];
  readonly tables: readonly TableDescriptor[];
  readonly invalid: readonly InvalidDescriptor[];
}

/** Yields the raw, undecoded registry entries. */
export type DescriptorSource = () => Promise<unknown>;
