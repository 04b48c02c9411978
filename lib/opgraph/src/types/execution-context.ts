import type { ForwardInputs, InvocationContext } from './forward';
import type { ILogger } from './logger';
import type { Operator } from '../operator/operator';
import type { IRemoteHandle } from '../providers/interfaces/remote';

/**
 * A fan-out of one operator call into several replicas
 */
export interface FanOutRequest {
  readonly operator: Operator;
  readonly inputs: ForwardInputs;
  readonly replicas: number;

  /**
   * Context of the calling forward; its signal cancels every replica
   */
  readonly context: InvocationContext;
}

/**
 * Interface for execution context
 * Provides abstraction for different execution strategies (concurrent, worker threads, remote)
 */
export interface ExecutionContext {
  /**
   * Runs every replica and resolves with their results in replica order once all completed.
   * The first failure cancels the remaining replicas and rejects.
   */
  execute(request: FanOutRequest): Promise<unknown[]>;

  /**
   * Terminates execution context and releases resources
   */
  terminate(): void;
}

/**
 * Options for worker thread execution
 */
export interface WorkerExecutionOptions {
  /**
   * Timeout for a single replica in milliseconds (default: none)
   */
  readonly workerTimeout?: number;

  /**
   * Optional logger instance for debugging execution context
   */
  readonly logger?: ILogger;
}

/**
 * Options for remote execution
 */
export interface RemoteExecutionOptions {
  readonly remote: IRemoteHandle;

  /**
   * Timeout for a single submission in milliseconds (default: none)
   */
  readonly timeout?: number;

  readonly logger?: ILogger;
}
