import type { ExecutionContext, FanOutRequest } from '../../types/execution-context';
import { createLinkedController } from '../abort';

/**
 * Execution context running replicas concurrently on the calling thread.
 * Each replica is a full invocation of the operator through the engine.
 */
export class ConcurrentContext implements ExecutionContext {
  async execute(request: FanOutRequest): Promise<unknown[]> {
    const { operator, inputs, replicas, context } = request;
    const linked = createLinkedController(context.signal);

    try {
      return await Promise.all(
        Array.from({ length: replicas }, () =>
          context.invoke(operator, inputs, { signal: linked.signal })
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
   * Releases resources (this implementation does nothing)
   */
  terminate(): void {
    // Replicas run on the calling thread; there is nothing to release
  }
}
