import type { SemaphoreInterface } from 'async-mutex';
import { TableTimeoutError } from '@deltaflow/shared';

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it aborts.
 * The losing promise keeps a rejection handler attached, so it never surfaces
 * as an unhandled rejection.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Acquire a semaphore permit unless the signal aborts first.
 * A permit that arrives after the abort is released immediately.
 */
export function acquireSemaphoreAbortable(
  semaphore: SemaphoreInterface,
  signal: AbortSignal,
): Promise<SemaphoreInterface.Releaser | 'aborted'> {
  if (signal.aborted) {
    return Promise.resolve('aborted');
  }

  return new Promise((resolve, reject) => {
    let aborted = false;
    let acquired = false;

    const listener = () => {
      if (!acquired) {
        aborted = true;
        resolve('aborted');
      }
    };
    signal.addEventListener('abort', listener, { once: true });

    semaphore.acquire().then(([, release]) => {
      acquired = true;
      if (aborted) {
        release();
      } else {
        signal.removeEventListener('abort', listener);
        resolve(release);
      }
    }, reject);
  });
}

export interface TableSignal {
  signal: AbortSignal;
  /** Clears the timer and detaches from the parent signal */
  dispose(): void;
}

/**
 * Per-table abort signal: follows the cycle signal and, when `timeoutMs` is set,
 * aborts with a TableTimeoutError once the budget is spent.
 */
export function createTableSignal(
  parent: AbortSignal,
  tableId: string,
  timeoutMs: number | undefined,
): TableSignal {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent.reason);

  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => controller.abort(new TableTimeoutError(tableId, timeoutMs)), timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    dispose() {
      if (timer !== undefined) clearTimeout(timer);
      parent.removeEventListener('abort', onParentAbort);
    },
  };
}
