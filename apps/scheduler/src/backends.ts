import { BlobServiceClient } from '@azure/storage-blob';
import type { Logger, SinkPort, WatermarkStore } from '@deltaflow/shared';
import {
  PostgresExtractionSource,
  PostgresSink,
  PostgresWatermarkStore,
  closePool,
  createPool,
  loadTableDescriptorEntries,
} from '@deltaflow/database';
import type { DeltaPorts } from '@deltaflow/delta-engine';
import { TableRegistry } from '@deltaflow/table-registry';
import type { SchedulerConfig } from './config.js';
import { BlobSink } from './sink.js';
import { BlobWatermarkStore } from './watermark.js';

export interface Backends {
  ports: DeltaPorts;
  registry: TableRegistry;
  close(): Promise<void>;
}

/** Wires the ports and registry the configuration selects. */
export function createBackends(config: SchedulerConfig, logger: Logger): Backends {
  let blobService: BlobServiceClient | null = null;
  const getBlobService = (): BlobServiceClient => {
    if (!blobService) {
      if (!config.blob.connectionString) {
        throw new Error('AZURE_STORAGE_CONNECTION_STRING is required for blob backends');
      }
      blobService = BlobServiceClient.fromConnectionString(config.blob.connectionString);
    }
    return blobService;
  };

  const watermarks: WatermarkStore =
    config.watermarkBackend === 'blob'
      ? new BlobWatermarkStore(getBlobService().getContainerClient(config.blob.watermarkContainer))
      : new PostgresWatermarkStore();

  const sink: SinkPort =
    config.sinkBackend === 'blob'
      ? new BlobSink(getBlobService().getContainerClient(config.blob.sinkContainer), config.blob.sinkPrefix)
      : new PostgresSink();

  const sourcePool = createPool(config.sourceDatabaseUrl);
  const extraction = new PostgresExtractionSource(sourcePool);

  const registryLog = logger.child({ component: 'registry' });
  const registry =
    config.registry.source === 'file'
      ? TableRegistry.fromFile(config.registry.path, { logger: registryLog })
      : new TableRegistry(loadTableDescriptorEntries, { logger: registryLog });

  logger.info('Backends configured', {
    registry: config.registry.source,
    watermarks: config.watermarkBackend,
    sink: config.sinkBackend,
  });

  return {
    ports: { extraction, sink, watermarks },
    registry,
    async close() {
      await Promise.all([sourcePool.end(), closePool()]);
    },
  };
}
