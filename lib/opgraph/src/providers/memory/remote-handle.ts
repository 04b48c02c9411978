import type { IRemoteHandle, RemoteSubmission } from '../interfaces/remote';
import type { ICancelableComputation } from '../../types/cancelable-computation';
import { InvocationEngine } from '../../engine/invocation-engine';

/**
 * In-process remote handle
 * Runs submissions through an invocation engine; useful for development and testing
 * @category Providers
 */
export class MemoryRemoteHandle implements IRemoteHandle {
  private readonly engine: InvocationEngine;
  private readonly latencyMs: number;
  private submittedCount = 0;
  private cancelledCount = 0;

  constructor(options: { engine?: InvocationEngine; latencyMs?: number } = {}) {
    this.engine = options.engine ?? new InvocationEngine();
    this.latencyMs = options.latencyMs ?? 0;
  }

  submit(submission: RemoteSubmission): ICancelableComputation<unknown> {
    const controller = new AbortController();
    this.submittedCount += 1;

    const promise = this.delay(controller.signal).then(() =>
      this.engine.invoke(submission.operator, [], submission.inputs, {
        signal: controller.signal,
      })
    );

    return {
      promise,
      cancel: () => {
        if (!controller.signal.aborted) {
          this.cancelledCount += 1;
          controller.abort();
        }
      },
    };
  }

  get submitted(): number {
    return this.submittedCount;
  }

  get cancelled(): number {
    return this.cancelledCount;
  }

  private delay(signal: AbortSignal): Promise<void> {
    if (this.latencyMs <= 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      const timeoutId = setTimeout(resolve, this.latencyMs);
      signal.addEventListener('abort', () => {
        clearTimeout(timeoutId);
        resolve();
      }, { once: true });
    });
  }
}
