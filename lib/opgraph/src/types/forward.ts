import type { Observable } from 'rxjs';
import type { ILogger } from './logger';
import type { Operator } from '../operator/operator';

/**
 * Bound inputs handed to a forward function, keyed by declared input name
 */
export type ForwardInputs = Readonly<Record<string, unknown>>;

/**
 * Options accepted by a single invocation
 */
export interface InvokeOptions {
  /**
   * Validate the argument count against the declared inputs (default: engine setting)
   */
  readonly typeCheck?: boolean;

  /**
   * Signal that cancels the invocation and every nested invocation
   */
  readonly signal?: AbortSignal;
}

/**
 * Runtime information available to forward functions
 */
export interface InvocationContext {
  readonly operator: Operator;
  readonly signal: AbortSignal;
  readonly typeCheck: boolean;
  readonly logger: ILogger;

  /**
   * Invokes another operator with named inputs through the same engine.
   * The signal and type-check flag of the current call are inherited unless overridden.
   */
  invoke(operator: Operator, named?: ForwardInputs, options?: InvokeOptions): Promise<unknown>;
}

/**
 * Forward function signature
 * Returns a plain value, a Promise or an Observable (its first value is used)
 */
export type ForwardFunction<TOutput = unknown> = (
  inputs: ForwardInputs,
  context: InvocationContext
) => TOutput | Promise<TOutput> | Observable<TOutput>;

/**
 * CommonJS module whose function export implements a forward
 */
export interface ModuleReference {
  /**
   * Absolute path of the module
   */
  readonly path: string;

  /**
   * Named export to call (default: the module's function export, or its `default`)
   */
  readonly exportName?: string;
}

/**
 * Callable unit of an operator together with its input contract
 */
export interface ForwardDefinition<TOutput = unknown> {
  /**
   * Declared input names, in positional order
   */
  readonly inputs: readonly string[];

  /**
   * Accepts any named inputs; arity is not checked
   */
  readonly variadic: boolean;

  readonly fn: ForwardFunction<TOutput>;

  /**
   * Module the forward is loaded from; set by `defineModuleForward` so that
   * worker threads can load the same code
   */
  readonly module?: ModuleReference;
}
