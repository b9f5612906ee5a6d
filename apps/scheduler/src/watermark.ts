import type { ContainerClient } from '@azure/storage-blob';
import { z } from 'zod';
import type { AdvanceResult, Marker, Watermark, WatermarkStore } from '@deltaflow/shared';
import { containerInitializer, isStatus, streamToString } from './blob.js';

const storedWatermarkSchema = z.object({
  tableId: z.string(),
  marker: z.string(),
  version: z.number().int(),
  updatedAt: z.string(),
});

interface VersionedWatermark {
  watermark: Watermark;
  etag: string;
}

export function watermarkBlobName(tableId: string): string {
  return `${encodeURIComponent(tableId)}.json`;
}

/**
 * One JSON blob per table. Compare-and-advance uploads conditionally on the
 * ETag read alongside the marker (or on absence for a first watermark), so a
 * concurrent writer turns into a 412/409 instead of a lost update.
 */
export class BlobWatermarkStore implements WatermarkStore {
  private readonly container: ContainerClient;
  private readonly ensureContainer: () => Promise<void>;

  constructor(container: ContainerClient) {
    this.container = container;
    this.ensureContainer = containerInitializer(container);
  }

  async get(tableId: string): Promise<Watermark | null> {
    const current = await this.read(tableId);
    return current?.watermark ?? null;
  }

  async compareAndAdvance(
    tableId: string,
    expectedCurrent: Marker | null,
    newValue: Marker
  ): Promise<AdvanceResult> {
    const current = await this.read(tableId);

    if (expectedCurrent === null) {
      if (current) return { status: 'conflict', current: current.watermark };
    } else if (!current) {
      return { status: 'not_found' };
    } else if (current.watermark.marker !== expectedCurrent) {
      return { status: 'conflict', current: current.watermark };
    }

    const watermark: Watermark = {
      tableId,
      marker: newValue,
      updatedAt: new Date(),
      version: (current?.watermark.version ?? 0) + 1,
    };
    const content = JSON.stringify({ ...watermark, updatedAt: watermark.updatedAt.toISOString() });

    await this.ensureContainer();

    try {
      await this.container.getBlockBlobClient(watermarkBlobName(tableId)).upload(content, Buffer.byteLength(content), {
        blobHTTPHeaders: { blobContentType: 'application/json' },
        conditions: current ? { ifMatch: current.etag } : { ifNoneMatch: '*' },
      });
    } catch (error) {
      if (!isStatus(error, 412) && !isStatus(error, 409)) throw error;

      const winner = await this.read(tableId);
      return winner ? { status: 'conflict', current: winner.watermark } : { status: 'not_found' };
    }

    return { status: 'advanced', watermark };
  }

  private async read(tableId: string): Promise<VersionedWatermark | null> {
    try {
      const response = await this.container.getBlobClient(watermarkBlobName(tableId)).download();
      if (!response.readableStreamBody) {
        throw new Error(`Watermark blob for '${tableId}' has no body`);
      }
      if (!response.etag) {
        throw new Error(`Watermark blob for '${tableId}' has no ETag`);
      }
      const content = await streamToString(response.readableStreamBody);
      const stored = storedWatermarkSchema.parse(JSON.parse(content));

      return {
        watermark: { ...stored, updatedAt: new Date(stored.updatedAt) },
        etag: response.etag,
      };
    } catch (error) {
      if (isStatus(error, 404)) {
        return null;
      }
      throw error;
    }
  }
}
