import type { ContainerClient } from '@azure/storage-blob';

export function isStatus(error: unknown, statusCode: number): boolean {
  return typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === statusCode;
}

/** Creates the container on first use; a failed attempt is retried on the next call. */
export function containerInitializer(container: ContainerClient): () => Promise<void> {
  let ready: Promise<void> | null = null;
  return () => {
    ready ??= container.createIfNotExists().then(
      () => undefined,
      (error: unknown) => {
        ready = null;
        throw error;
      }
    );
    return ready;
  };
}

export async function streamToString(
  readableStream: NodeJS.ReadableStream
): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    readableStream.on('data', (data: Buffer) => chunks.push(data));
    readableStream.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    readableStream.on('error', reject);
  });
}
