/**
 * Utilities for working with cancelable computations in tests
 * These functions are used only for testing and are not part of the main library
 */

import type { ICancelableComputation } from '../../lib/opgraph/src/types/cancelable-computation';
import type {
  IRemoteHandle,
  RemoteSubmission,
} from '../../lib/opgraph/src/providers/interfaces/remote';

/**
 * Creates cancelable task based on AbortController
 *
 * @example
 * createCancelableTask(signal => {
 *   return new Promise((resolve, reject) => {
 *     const timer = setTimeout(() => resolve('done'), 1000);
 *     signal.addEventListener('abort', () => {
 *       clearTimeout(timer);
 *       reject(new Error('Operation cancelled'));
 *     });
 *   });
 * });
 */
export function createCancelableTask<T>(
  executor: (signal: AbortSignal) => Promise<T>
): ICancelableComputation<T> {
  const controller = new AbortController();
  const signal = controller.signal;

  return {
    promise: executor(signal),
    cancel: () => controller.abort(),
  };
}

/**
 * Remote handle whose submissions only settle when the test says so
 */
export class ManualRemoteHandle implements IRemoteHandle {
  readonly submissions: RemoteSubmission[] = [];
  cancelled = 0;
  private readonly resolvers: Array<(value: unknown) => void> = [];

  submit(submission: RemoteSubmission): ICancelableComputation<unknown> {
    this.submissions.push(submission);
    return createCancelableTask<unknown>(
      signal =>
        new Promise(resolve => {
          this.resolvers.push(resolve);
          signal.addEventListener(
            'abort',
            () => {
              this.cancelled += 1;
              resolve(undefined);
            },
            { once: true }
          );
        })
    );
  }

  /**
   * Resolves the submission of one replica
   */
  resolve(index: number, value: unknown): void {
    this.resolvers[index](value);
  }
}
