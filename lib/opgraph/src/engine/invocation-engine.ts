import { firstValueFrom, isObservable } from 'rxjs';
import type { ForwardInputs, InvocationContext, InvokeOptions } from '../types/forward';
import type { ILogger } from '../types/logger';
import { InvocationEventType } from '../types/invocation-hooks';
import type { Operator } from '../operator/operator';
import { findCycle } from '../graph/walker';
import {
  AcyclicityViolation,
  ArityError,
  ForwardNotImplementedError,
  InvocationCancelledError,
  toError,
} from '../utils/operator-error';
import { raceAbort } from '../utils/abort';
import { LoggerManager } from '../utils/logging';
import { HookManager } from './hook-manager';

/**
 * Options for engine initialization
 */
export interface InvocationEngineOptions {
  /**
   * Logger receiving bound inputs at debug level (default: LoggerManager logger)
   */
  readonly logger?: ILogger;

  /**
   * Validate argument counts against declared inputs (default: true)
   */
  readonly typeCheck?: boolean;

  readonly hooks?: HookManager;
}

/**
 * Validates and executes operator calls.
 *
 * Positional arguments bind to declared inputs by position, named arguments by
 * name. With type checking enabled, the total argument count must equal the
 * number of declared inputs.
 */
export class InvocationEngine {
  public readonly hooks: HookManager;
  private readonly logger: ILogger;
  private readonly typeCheck: boolean;

  constructor(options: InvocationEngineOptions = {}) {
    this.logger = options.logger ?? LoggerManager.getInstance().getLogger();
    this.typeCheck = options.typeCheck ?? true;
    this.hooks = options.hooks ?? new HookManager();
  }

  /**
   * Declared input names of the operator's forward
   */
  declaredInputs(operator: Operator): readonly string[] {
    return operator.getForward()?.inputs ?? [];
  }

  /**
   * Binds call arguments to declared input names
   *
   * @throws ArityError when type checking is enabled and the arguments do not
   * match the declared inputs
   */
  bindInputs(
    operator: Operator,
    positional: readonly unknown[],
    named: ForwardInputs,
    typeCheck: boolean = this.typeCheck
  ): Record<string, unknown> {
    const forward = operator.getForward();
    const declared = forward?.inputs ?? [];
    const variadic = forward?.variadic ?? false;
    const namedEntries = Object.entries(named);
    const received = positional.length + namedEntries.length;

    if (typeCheck && !variadic && received !== declared.length) {
      throw new ArityError(
        `Number of arguments (${received}) does not match number of inputs (${declared.length})`,
        operator.name,
        declared.length,
        received
      );
    }

    const bound = new Map<string, unknown>();

    positional.forEach((value, index) => {
      if (index >= declared.length) {
        if (typeCheck) {
          throw new ArityError(
            `Positional argument ${index} has no declared input`,
            operator.name,
            declared.length,
            received
          );
        }
        this.logger.debug(`[InvocationEngine] ${operator.name}: dropping positional argument ${index}`);
        return;
      }
      bound.set(declared[index], value);
    });

    for (const [key, value] of namedEntries) {
      if (typeCheck && !variadic && !declared.includes(key)) {
        throw new ArityError(
          `Unknown input '${key}'`,
          operator.name,
          declared.length,
          received
        );
      }
      if (typeCheck && bound.has(key)) {
        throw new ArityError(
          `Input '${key}' is bound twice`,
          operator.name,
          declared.length,
          received
        );
      }
      bound.set(key, value);
    }

    return Object.fromEntries(bound);
  }

  /**
   * Invokes the operator's forward with bound inputs and returns its result unchanged
   *
   * @throws AcyclicityViolation, ForwardNotImplementedError, ArityError,
   * InvocationCancelledError, or whatever the forward throws
   */
  async invoke(
    operator: Operator,
    positional: readonly unknown[] = [],
    named: ForwardInputs = {},
    options: InvokeOptions = {}
  ): Promise<unknown> {
    const typeCheck = options.typeCheck ?? this.typeCheck;
    const signal = options.signal ?? new AbortController().signal;

    if (!operator.isAcyclic()) {
      const cycle = findCycle<Operator>(operator) ?? [];
      throw new AcyclicityViolation(
        operator.name,
        cycle.map(op => op.name)
      );
    }

    const forward = operator.getForward();
    if (!forward) {
      throw new ForwardNotImplementedError(operator.name);
    }

    const inputs = this.bindInputs(operator, positional, named, typeCheck);
    if (signal.aborted) {
      throw new InvocationCancelledError(operator.name);
    }

    this.logger.debug(`[InvocationEngine] ${operator.name} inputs`, inputs);
    operator.recordInvocationStart(inputs);
    this.hooks.emit(InvocationEventType.INVOCATION_STARTED, operator, inputs);

    const startedAt = performance.now();
    let output: unknown;
    try {
      const result = forward.fn(inputs, this.createContext(operator, signal, typeCheck));
      const pending = isObservable(result) ? firstValueFrom(result) : Promise.resolve(result);
      output = await raceAbort(pending, signal, () => new InvocationCancelledError(operator.name));
    } catch (error) {
      const failure = toError(error);
      operator.recordInvocationEnd({ ok: false, error: failure });
      this.hooks.emit(InvocationEventType.INVOCATION_FAILED, operator, failure);
      throw failure;
    }

    operator.recordInvocationEnd({ ok: true, output });
    this.hooks.emit(
      InvocationEventType.INVOCATION_COMPLETED,
      operator,
      output,
      performance.now() - startedAt
    );
    return output;
  }

  private createContext(
    operator: Operator,
    signal: AbortSignal,
    typeCheck: boolean
  ): InvocationContext {
    return {
      operator,
      signal,
      typeCheck,
      logger: this.logger,
      invoke: (target, named = {}, options = {}) =>
        this.invoke(target, [], named, {
          typeCheck: options.typeCheck ?? typeCheck,
          signal: options.signal ?? signal,
        }),
    };
  }
}
