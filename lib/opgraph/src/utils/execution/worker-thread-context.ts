import { Worker } from 'worker_threads';
import type {
  ExecutionContext,
  FanOutRequest,
  WorkerExecutionOptions,
} from '../../types/execution-context';
import type { ILogger } from '../../types/logger';
import { isObject } from '../../types/utils';
import {
  InvocationCancelledError,
  InvocationTimeoutError,
  OperatorError,
  getErrorMessage,
} from '../operator-error';
import { createLinkedController } from '../abort';

/**
 * Message structure for worker interaction
 */
interface WorkerMessage {
  readonly type: 'result' | 'error';
  readonly data: unknown;
}

function isWorkerMessage(message: unknown): message is WorkerMessage {
  return isObject(message) && (message.type === 'result' || message.type === 'error');
}

// Evaluated inside each worker
const WORKER_CODE = `
  const { parentPort, workerData } = require('worker_threads');

  Promise.resolve()
    .then(() => {
      const loaded = require(workerData.modulePath);
      const name = workerData.exportName;
      const fn = name !== undefined
        ? loaded && loaded[name]
        : typeof loaded === 'function' ? loaded : loaded && loaded.default;
      if (typeof fn !== 'function') {
        throw new Error('Module ' + workerData.modulePath + ' does not export ' +
          (name !== undefined ? "'" + name + "'" : 'a function'));
      }
      return fn(workerData.inputs, workerData.replica);
    })
    .then(
      result => parentPort.postMessage({ type: 'result', data: result }),
      error => parentPort.postMessage({
        type: 'error',
        data: error && error.message ? error.message : String(error),
      })
    );
`;

/**
 * Class implementing execution context using Node.js Worker Threads.
 * Every replica loads the module behind the operator's forward (see
 * `defineModuleForward`) in its own worker; inputs and results must be
 * structured-cloneable.
 */
export class WorkerThreadContext implements ExecutionContext {
  private readonly workers = new Set<Worker>();
  private readonly taskTimeoutMs: number | undefined;
  private readonly logger?: ILogger;

  constructor(options: WorkerExecutionOptions = {}) {
    this.taskTimeoutMs =
      options.workerTimeout && options.workerTimeout > 0 ? options.workerTimeout : undefined;
    this.logger = options.logger;
  }

  async execute(request: FanOutRequest): Promise<unknown[]> {
    const linked = createLinkedController(request.context.signal);

    try {
      return await Promise.all(
        Array.from({ length: request.replicas }, (_, replica) =>
          this.runReplica(request, replica, linked.signal)
        )
      );
    } catch (error) {
      linked.controller.abort();
      throw error;
    } finally {
      linked.dispose();
    }
  }

  /**
   * Terminates every running worker
   */
  terminate(): void {
    for (const worker of [...this.workers]) {
      this.release(worker);
    }
  }

  private runReplica(request: FanOutRequest, replica: number, signal: AbortSignal): Promise<unknown> {
    const operatorName = request.operator.name;
    const reference = request.operator.getForward()?.module;

    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new InvocationCancelledError(operatorName));
        return;
      }
      if (!reference) {
        reject(
          new OperatorError(
            `Operator '${operatorName}' has no module forward to run in a worker`,
            operatorName
          )
        );
        return;
      }

      const worker = new Worker(WORKER_CODE, {
        eval: true,
        workerData: {
          modulePath: reference.path,
          exportName: reference.exportName,
          inputs: request.inputs,
          replica,
        },
      });
      this.workers.add(worker);
      this.logger?.debug(`[WorkerThreadContext] ${operatorName}: started replica ${replica}`);

      let settled = false;
      let timeoutId: NodeJS.Timeout | undefined;

      const settle = (outcome: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
        signal.removeEventListener('abort', onAbort);
        this.release(worker);
        outcome();
      };

      const onAbort = (): void => {
        settle(() => reject(new InvocationCancelledError(operatorName)));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      if (this.taskTimeoutMs !== undefined) {
        const timeoutMs = this.taskTimeoutMs;
        timeoutId = setTimeout(() => {
          settle(() => reject(new InvocationTimeoutError(operatorName, timeoutMs)));
        }, timeoutMs);
      }

      worker.on('message', (message: unknown) => {
        if (!isWorkerMessage(message)) {
          return;
        }
        const data = message.data;
        if (message.type === 'result') {
          settle(() => resolve(data));
        } else {
          settle(() => reject(new Error(String(data))));
        }
      });

      worker.on('error', error => {
        settle(() => reject(new Error(`Worker crashed: ${getErrorMessage(error)}`)));
      });

      worker.on('exit', code => {
        settle(() => reject(new Error(`Worker exited with code ${code} before reporting a result`)));
      });
    });
  }

  private release(worker: Worker): void {
    if (!this.workers.delete(worker)) {
      return;
    }
    worker.terminate().catch((error: unknown) => {
      this.logger?.debug(`[WorkerThreadContext] terminate failed: ${getErrorMessage(error)}`);
    });
  }
}
