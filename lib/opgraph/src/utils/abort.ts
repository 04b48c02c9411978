import { LoggerManager } from './logging';

/**
 * Settles with the promise, or rejects with `onAbort()` as soon as the signal aborts.
 * A value produced after the abort is discarded.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal,
  onAbort: () => Error
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const abort = (): void => {
      reject(onAbort());
    };

    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener('abort', abort, { once: true });
    }

    void promise.then(
      value => {
        signal.removeEventListener('abort', abort);
        if (signal.aborted) {
          LoggerManager.debug('Discarding result produced after cancellation');
        }
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abort);
        reject(error);
      }
    );
  });
}

/**
 * Controller that aborts together with a parent signal
 */
export interface LinkedAbortController {
  readonly controller: AbortController;
  readonly signal: AbortSignal;

  /**
   * Stops following the parent signal
   */
  dispose(): void;
}

export function createLinkedController(parent: AbortSignal): LinkedAbortController {
  const controller = new AbortController();
  const forward = (): void => {
    controller.abort(parent.reason);
  };

  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', forward, { once: true });
  }

  return {
    controller,
    signal: controller.signal,
    dispose: () => parent.removeEventListener('abort', forward),
  };
}
