import pMap from 'p-map';
import { CancelledError } from '../errors.js';

/**
 * Throw CancelledError once the signal has fired
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError('Session was cancelled', signal.reason);
  }
}

/**
 * Run `fn` over items with at most `concurrency` calls in flight.
 * Results keep the input order whatever the completion order.
 *
 * The first error, or an abort of `signal`, stops dispatch and aborts the
 * signal handed to `fn`. The returned promise rejects only after every call
 * already started has settled, so nothing keeps running behind it.
 */
export async function mapInParallel<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forwardAbort();
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  const inFlight = new Set<Promise<R>>();

  try {
    return await pMap(
      items,
      (item, index) => {
        throwIfCancelled(controller.signal);
        const task = fn(item, index, controller.signal);
        inFlight.add(task);
        void task.then(
          () => inFlight.delete(task),
          () => inFlight.delete(task)
        );
        return task;
      },
      { concurrency: Math.max(1, concurrency), signal: controller.signal }
    );
  } catch (error) {
    if (!controller.signal.aborted) {
      controller.abort(error);
    }
    await Promise.allSettled(inFlight);

    if (signal?.aborted && !(error instanceof CancelledError)) {
      throw new CancelledError('Session was cancelled', error);
    }
    throw error;
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
  }
}
