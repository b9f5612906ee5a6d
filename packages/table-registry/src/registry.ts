import { readFile } from 'node:fs/promises';
import {
  ConfigurationError,
  createMarkerCodecs,
  nullLogger,
  type Logger,
  type MarkerCodec,
  type TableDescriptor,
} from '@deltaflow/shared';
import {
  createTableDescriptorSchema,
  formatZodError,
  registryDocumentSchema,
} from './schema.js';
import type {
  DescriptorSource,
  InvalidDescriptor,
  RegistryEntry,
  RegistrySnapshot,
} from './types.js';

export interface TableRegistryOptions {
  /** Marker codecs beyond the built-in timestamp/integer/string */
  codecs?: readonly MarkerCodec[];
  logger?: Logger;
}

/**
 * Ordered list of table descriptors driving the generic delta loop.
 *
 * The source is read once per `load()`. Malformed entries are kept in the
 * snapshot as invalid entries so a cycle can report them without running them.
 */
export class TableRegistry {
  private readonly source: DescriptorSource;
  private readonly codecs: ReadonlyMap<string, MarkerCodec>;
  private readonly logger: Logger;
  private current: RegistrySnapshot | null = null;

  constructor(source: DescriptorSource, options: TableRegistryOptions = {}) {
    this.source = source;
    this.codecs = createMarkerCodecs(options.codecs);
    this.logger = options.logger ?? nullLogger;
  }

  static fromEntries(entries: readonly unknown[], options?: TableRegistryOptions): TableRegistry {
    return new TableRegistry(async () => entries, options);
  }

  /** Read descriptors from a JSON file holding an array or `{ "tables": [...] }`. */
  static fromFile(path: string, options?: TableRegistryOptions): TableRegistry {
    return new TableRegistry(async () => {
      const content = await readFile(path, 'utf8');
      const document: unknown = JSON.parse(content);
      return document;
    }, options);
  }

  /**
   * Read the source and capture a new immutable snapshot.
   * Throws only when the source itself cannot be read or is not a list.
   */
  async load(): Promise<RegistrySnapshot> {
    const raw = await this.source();
    const document = registryDocumentSchema.safeParse(raw);
    if (!document.success) {
      throw new ConfigurationError(
        `Table registry must be an array of descriptors or { tables: [...] }: ${formatZodError(document.error)}`,
      );
    }

    const schema = createTableDescriptorSchema(this.codecs);
    const seen = new Set<string>();
    const entries: RegistryEntry[] = [];

    document.data.forEach((item, index) => {
      const fallbackId = `#${index}`;
      const parsed = schema.safeParse(item);

      if (!parsed.success) {
        entries.push(invalidEntry(index, rawTableId(item) ?? fallbackId, formatZodError(parsed.error)));
        return;
      }

      const { descriptor: fields, codec } = parsed.data;
      const descriptor: TableDescriptor = Object.freeze({
        ...fields,
        params: Object.freeze({ ...fields.params }),
      });

      if (seen.has(descriptor.id)) {
        entries.push(invalidEntry(index, descriptor.id, `duplicate table id '${descriptor.id}'`));
        return;
      }
      seen.add(descriptor.id);
      entries.push({ kind: 'table', index, descriptor, codec });
    });

    const snapshot: RegistrySnapshot = Object.freeze({
      loadedAt: new Date(),
      entries: Object.freeze(entries),
      tables: Object.freeze(
        entries.flatMap((entry) => (entry.kind === 'table' ? [entry.descriptor] : [])),
      ),
      invalid: Object.freeze(
        entries.flatMap((entry) => (entry.kind === 'invalid' ? [entry.invalid] : [])),
      ),
    });

    for (const invalid of snapshot.invalid) {
      this.logger.warn('Excluding malformed table descriptor', {
        tableId: invalid.tableId,
        index: invalid.index,
        error: invalid.error.message,
      });
    }

    this.current = snapshot;
    return snapshot;
  }

  /** Valid descriptors of the most recent snapshot, loading one if none exists yet. */
  async listTables(): Promise<readonly TableDescriptor[]> {
    const snapshot = this.current ?? (await this.load());
    return snapshot.tables;
  }

  /** Most recently loaded snapshot, if any. */
  get snapshot(): RegistrySnapshot | null {
    return this.current;
  }
}

function invalidEntry(index: number, tableId: string, reason: string): RegistryEntry {
  const invalid: InvalidDescriptor = {
    index,
    tableId,
    error: new ConfigurationError(`Invalid table descriptor ${tableId}: ${reason}`),
  };
  return { kind: 'invalid', index, invalid };
}

function rawTableId(item: unknown): string | null {
  if (typeof item !== 'object' || item === null || !('id' in item)) return null;
  const id = item.id;
  return typeof id === 'string' && id.trim() !== '' ? id.trim() : null;
}
