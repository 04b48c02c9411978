import type { ExecutionContext } from '../../types/execution-context';
import type { ILogger } from '../../types/logger';
import type { IRemoteHandle } from '../../providers/interfaces/remote';

import { ConcurrentContext } from './concurrent-context';
import { WorkerThreadContext } from './worker-thread-context';
import { RemoteContext } from './remote-context';

// Re-export for public API
export { ConcurrentContext };
export { WorkerThreadContext };
export { RemoteContext };

/**
 * Fan-out execution modes
 */
export type FanOutMode = 'thread' | 'process' | 'remote';

const FAN_OUT_MODES: readonly FanOutMode[] = ['thread', 'process', 'remote'];

export function isFanOutMode(value: string): value is FanOutMode {
  return FAN_OUT_MODES.some(mode => mode === value);
}

/**
 * Settings needed to build an execution context for a mode
 */
export interface FanOutContextOptions {
  readonly remote?: IRemoteHandle;
  readonly timeout?: number;
  readonly logger?: ILogger;
}

/**
 * Creates execution context depending on mode
 *
 * @throws Error if remote mode is requested without a remote handle
 */
export function createExecutionContext(
  mode: FanOutMode,
  options: FanOutContextOptions = {}
): ExecutionContext {
  switch (mode) {
    case 'thread':
      return new ConcurrentContext();
    case 'process':
      return new WorkerThreadContext({
        workerTimeout: options.timeout,
        logger: options.logger,
      });
    case 'remote':
      if (!options.remote) {
        throw new Error('Remote mode requires a remote handle');
      }
      return new RemoteContext({
        remote: options.remote,
        timeout: options.timeout,
        logger: options.logger,
      });
  }
}
