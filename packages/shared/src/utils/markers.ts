import type { Marker } from '../types/table.js';

/**
 * A totally ordered change-marker type.
 *
 * Markers travel through the system as strings in the codec's own encoding.
 * Codecs are looked up by name from the descriptor's `markerType`, so sources
 * with composite or otherwise unusual keys can plug in their own ordering.
 */
export interface MarkerCodec {
  readonly type: string;
  /** Marker used on a table's first run when the descriptor sets none */
  readonly initial: Marker;
  isValid(marker: string): boolean;
  /** Negative when a < b, zero when equal, positive when a > b */
  compare(a: Marker, b: Marker): number;
  /** Convert a change-column value from a source row; null when it cannot be encoded */
  fromValue(value: unknown): Marker | null;
}

const INTEGER_PATTERN = /^-?\d+$/;
const SECOND_FRACTION_PATTERN = /T\d{2}:\d{2}:\d{2}\.(\d+)/;

function isTimestamp(marker: string): boolean {
  return marker.trim() !== '' && !Number.isNaN(Date.parse(marker));
}

/** Nanoseconds below the millisecond; `Date.parse` drops them. */
function subMillisecond(marker: string): number {
  const digits = SECOND_FRACTION_PATTERN.exec(marker)?.[1] ?? '';
  return Number(digits.slice(3, 9).padEnd(6, '0'));
}

export const timestampMarker: MarkerCodec = {
  type: 'timestamp',
  initial: '1970-01-01T00:00:00.000Z',
  isValid: isTimestamp,
  compare: (a, b) => Date.parse(a) - Date.parse(b) || subMillisecond(a) - subMillisecond(b),
  fromValue(value) {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return new Date(value).toISOString();
    }
    if (typeof value === 'string' && isTimestamp(value)) {
      return value;
    }
    return null;
  },
};

export const integerMarker: MarkerCodec = {
  type: 'integer',
  initial: '0',
  isValid: (marker) => INTEGER_PATTERN.test(marker),
  compare(a, b) {
    const left = BigInt(a);
    const right = BigInt(b);
    return left === right ? 0 : left < right ? -1 : 1;
  },
  fromValue(value) {
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'number' && Number.isSafeInteger(value)) return String(value);
    if (typeof value === 'string' && INTEGER_PATTERN.test(value)) return value;
    return null;
  },
};

export const stringMarker: MarkerCodec = {
  type: 'string',
  initial: '',
  isValid: () => true,
  compare: (a, b) => (a === b ? 0 : a < b ? -1 : 1),
  fromValue(value) {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'bigint') return String(value);
    return null;
  },
};

export const BUILTIN_MARKER_CODECS: Readonly<Record<string, MarkerCodec>> = {
  [timestampMarker.type]: timestampMarker,
  [integerMarker.type]: integerMarker,
  [stringMarker.type]: stringMarker,
};

/** Merge caller-supplied codecs over the built-ins. */
export function createMarkerCodecs(
  extra: readonly MarkerCodec[] = [],
): ReadonlyMap<string, MarkerCodec> {
  const codecs = new Map<string, MarkerCodec>(Object.entries(BUILTIN_MARKER_CODECS));
  for (const codec of extra) {
    codecs.set(codec.type, codec);
  }
  return codecs;
}

/**
 * Deterministic sink key for a marker range.
 * Both bounds are URI-encoded, so the `+` separator cannot occur inside either.
 */
export function markerRangeKey(from: Marker, to: Marker): string {
  return `${encodeURIComponent(from)}+${encodeURIComponent(to)}`;
}

/** Highest marker among the rows' change-column values, or null when none encode. */
export function maxMarkerOf(
  codec: MarkerCodec,
  values: Iterable<unknown>,
): Marker | null {
  let max: Marker | null = null;
  for (const value of values) {
    const marker = codec.fromValue(value);
    if (marker === null) continue;
    if (max === null || codec.compare(marker, max) > 0) {
      max = marker;
    }
  }
  return max;
}
