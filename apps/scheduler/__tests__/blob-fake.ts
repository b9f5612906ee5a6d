import { Readable } from 'node:stream';
import { vi } from 'vitest';

interface StoredBlob {
  content: string;
  etag: string;
}

interface UploadOptions {
  abortSignal?: AbortSignal;
  conditions?: { ifMatch?: string; ifNoneMatch?: string };
}

function httpError(statusCode: number, message: string): Error {
  return Object.assign(new Error(message), { statusCode });
}

/** In-process stand-in for the parts of a blob container the scheduler uses. */
export class FakeContainer {
  readonly blobs = new Map<string, StoredBlob>();
  readonly createIfNotExists = vi.fn(async () => ({ succeeded: true }));
  readonly uploads: Array<{ name: string; options: UploadOptions }> = [];
  /** Runs after the conditions are captured and before they are checked */
  beforeUpload: ((name: string) => void) | null = null;
  private etagCounter = 0;

  put(name: string, content: string): void {
    this.etagCounter += 1;
    this.blobs.set(name, { content, etag: `"${this.etagCounter}"` });
  }

  json(name: string): unknown {
    const blob = this.blobs.get(name);
    return blob ? JSON.parse(blob.content) : undefined;
  }

  getBlobClient(name: string) {
    return {
      download: async () => {
        const blob = this.blobs.get(name);
        if (!blob) throw httpError(404, 'The specified blob does not exist.');
        return { etag: blob.etag, readableStreamBody: Readable.from([Buffer.from(blob.content)]) };
      },
    };
  }

  getBlockBlobClient(name: string) {
    return {
      upload: async (content: string, _length: number, options: UploadOptions = {}) => {
        this.uploads.push({ name, options });
        this.beforeUpload?.(name);
        options.abortSignal?.throwIfAborted();

        const existing = this.blobs.get(name);
        const { ifMatch, ifNoneMatch } = options.conditions ?? {};
        if (ifNoneMatch === '*' && existing) {
          throw httpError(409, 'The specified blob already exists.');
        }
        if (ifMatch !== undefined && existing?.etag !== ifMatch) {
          throw httpError(412, 'The condition specified using HTTP conditional header(s) is not met.');
        }
        this.put(name, content);
        return {};
      },
    };
  }
}

export class FakeBlobService {
  readonly containers = new Map<string, FakeContainer>();

  getContainerClient(name: string): FakeContainer {
    let container = this.containers.get(name);
    if (!container) {
      container = new FakeContainer();
      this.containers.set(name, container);
    }
    return container;
  }
}
