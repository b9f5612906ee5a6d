import type { ContainerClient } from '@azure/storage-blob';
import type { SinkPort, WriteBatchRequest } from '@deltaflow/shared';
import { toJson } from '@deltaflow/database';
import { containerInitializer } from './blob.js';

export function deltaBlobName(prefix: string, tableId: string, rangeKey: string): string {
  return `${prefix}${encodeURIComponent(tableId)}/${rangeKey}.json`;
}

/** Writes each delta to its own blob; a replayed range overwrites the same name. */
export class BlobSink implements SinkPort {
  private readonly container: ContainerClient;
  private readonly prefix: string;
  private readonly ensureContainer: () => Promise<void>;

  constructor(container: ContainerClient, prefix = '') {
    this.container = container;
    this.prefix = prefix;
    this.ensureContainer = containerInitializer(container);
  }

  async writeBatch(request: WriteBatchRequest): Promise<void> {
    request.signal.throwIfAborted();

    await this.ensureContainer();

    const content = toJson({
      tableId: request.tableId,
      rangeKey: request.rangeKey,
      fromMarker: request.fromMarker,
      toMarker: request.toMarker,
      rowCount: request.rows.length,
      rows: request.rows,
    });

    const blob = this.container.getBlockBlobClient(deltaBlobName(this.prefix, request.tableId, request.rangeKey));
    await blob.upload(content, Buffer.byteLength(content), {
      abortSignal: request.signal,
      blobHTTPHeaders: { blobContentType: 'application/json' },
    });
  }
}
