import type {
  ExecutionContext,
  FanOutRequest,
  RemoteExecutionOptions,
} from '../../types/execution-context';
import type { ILogger } from '../../types/logger';
import { isCancelableComputation } from '../../types/cancelable-computation';
import type { IRemoteHandle } from '../../providers/interfaces/remote';
import { InvocationCancelledError, InvocationTimeoutError } from '../operator-error';
import { createLinkedController } from '../abort';

/**
 * Execution context submitting replicas through a remote handle.
 * Cancelable submissions are cancelled on abort, timeout, or the failure of another replica.
 */
export class RemoteContext implements ExecutionContext {
  private readonly remote: IRemoteHandle;
  private readonly timeoutMs: number | undefined;
  private readonly logger?: ILogger;

  constructor(options: RemoteExecutionOptions) {
    this.remote = options.remote;
    this.timeoutMs = options.timeout && options.timeout > 0 ? options.timeout : undefined;
    this.logger = options.logger;
  }

  async execute(request: FanOutRequest): Promise<unknown[]> {
    const linked = createLinkedController(request.context.signal);

    try {
      return await Promise.all(
        Array.from({ length: request.replicas }, (_, replica) =>
          this.submit(request, replica, linked.signal)
        )
      );
    } catch (error) {
      linked.controller.abort();
      throw error;
    } finally {
      linked.dispose();
    }
  }

  terminate(): void {
    // Submissions are owned by the remote executor
  }

  private submit(request: FanOutRequest, replica: number, signal: AbortSignal): Promise<unknown> {
    const operatorName = request.operator.name;
    if (signal.aborted) {
      return Promise.reject(new InvocationCancelledError(operatorName));
    }

    const submission = this.remote.submit({
      operator: request.operator,
      inputs: request.inputs,
      replica,
    });
    this.logger?.debug(`[RemoteContext] ${operatorName}: submitted replica ${replica}`);

    const computation = isCancelableComputation<unknown>(submission) ? submission : undefined;
    const pending: Promise<unknown> = isCancelableComputation<unknown>(submission)
      ? submission.promise
      : submission;

    return new Promise((resolve, reject) => {
      let timeoutId: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        signal.removeEventListener('abort', onAbort);
      };

      const onAbort = (): void => {
        cleanup();
        computation?.cancel();
        reject(new InvocationCancelledError(operatorName));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      if (this.timeoutMs !== undefined) {
        const timeoutMs = this.timeoutMs;
        timeoutId = setTimeout(() => {
          cleanup();
          computation?.cancel();
          reject(new InvocationTimeoutError(operatorName, timeoutMs));
        }, timeoutMs);
      }

      void pending.then(
        value => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    });
  }
}
