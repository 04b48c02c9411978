import type { ExecutionContext } from '../types/execution-context';
import type { ForwardDefinition } from '../types/forward';
import type { ILogger } from '../types/logger';
import type { IRemoteHandle } from '../providers/interfaces/remote';
import { createExecutionContext, isFanOutMode } from '../utils/execution';
import type { FanOutMode } from '../utils/execution';
import { OperatorError, getErrorMessage, toError } from '../utils/operator-error';
import { Operator } from './operator';

/**
 * Options for fan-out construction
 */
export interface MultiOptions {
  /**
   * Number of replicas (default: 2)
   */
  readonly n?: number;

  /**
   * One of 'thread', 'process' or 'remote' (default: 'thread')
   */
  readonly mode?: string;

  /**
   * Remote executor, required in remote mode
   */
  readonly remote?: IRemoteHandle;

  /**
   * Timeout of a single replica in milliseconds (process and remote modes)
   */
  readonly timeout?: number;

  readonly logger?: ILogger;
}

/**
 * Runs a wrapped operator `n` times and returns the array of results once all completed.
 *
 * The wrapped operator is owned as child `op` and resolved on every call, so
 * replacing the child changes what runs; the forward declares the same inputs
 * as the current child. In `process` mode the child's forward must come from
 * `defineModuleForward`, since workers load it by module path. Aborting the
 * call cancels every replica and discards partial results.
 *
 * @example
 * ```typescript
 * const ensemble = new Multi(new Scorer(), { n: 4, mode: 'thread' });
 * const scores = await engine.invoke(ensemble, [], { text: 'hello' });
 * ```
 */
export class Multi extends Operator {
  static description = 'Runs the wrapped operator several times and joins the results';

  public readonly replicas: number;
  public readonly mode: FanOutMode;
  private readonly executionContext: ExecutionContext;

  constructor(operator: Operator, options: MultiOptions = {}) {
    const mode = options.mode ?? 'thread';
    super({ name: `Multi_${mode}` });

    if (!isFanOutMode(mode)) {
      throw new OperatorError(
        `Invalid execution mode '${mode}'; expected one of thread, process, remote`,
        this.name
      );
    }

    const replicas = options.n ?? 2;
    if (!Number.isInteger(replicas) || replicas < 1) {
      throw new OperatorError(
        `Number of replicas must be a positive integer, got ${replicas}`,
        this.name
      );
    }

    if (mode === 'process' && !operator.getForward()?.module) {
      throw new OperatorError(
        `Process mode requires '${operator.name}' to have a forward declared with defineModuleForward`,
        this.name
      );
    }

    this.mode = mode;
    this.replicas = replicas;

    try {
      this.executionContext = createExecutionContext(mode, {
        remote: options.remote,
        timeout: options.timeout,
        logger: options.logger,
      });
    } catch (error) {
      throw new OperatorError(getErrorMessage(error), this.name, toError(error));
    }

    this.setChild('op', operator);
  }

  /**
   * Fan-out forward over the current `op` child; undefined once the child is removed
   */
  override getForward(): ForwardDefinition | undefined {
    const wrapped = this.child('op');
    if (!wrapped) {
      return undefined;
    }

    const forward = wrapped.getForward();
    return {
      inputs: forward?.inputs ?? [],
      variadic: forward?.variadic ?? false,
      fn: (inputs, context) =>
        this.executionContext.execute({
          operator: wrapped,
          inputs,
          replicas: this.replicas,
          context,
        }),
    };
  }

  /**
   * @throws OperatorError; the forward is derived from the wrapped operator
   */
  override registerForward(_definition: ForwardDefinition): this {
    throw new OperatorError(
      'The forward of a fan-out is derived from its wrapped operator; replace child \'op\' instead',
      this.name
    );
  }

  /**
   * Releases resources held by the execution context
   */
  terminate(): void {
    this.executionContext.terminate();
  }
}
