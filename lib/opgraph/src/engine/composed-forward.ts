import type { ForwardDefinition, ForwardInputs, InvocationContext } from '../types/forward';
import { isObject } from '../types/utils';
import type { Operator } from '../operator/operator';
import { defineVariadicForward } from '../operator/forward';
import { namedOperators } from '../graph/walker';
import {
  AcyclicityViolation,
  InvocationCancelledError,
  OperatorError,
} from '../utils/operator-error';
import { createLinkedController } from '../utils/abort';

/**
 * How a composed forward drives the operators of an imported task group
 */
export enum CompositionMode {
  /**
   * Every descendant of the root in pre-order, each fed the previous output
   */
  SEQUENTIAL = 'sequential',

  /**
   * Each task once all its upstream tasks finished; independent branches run concurrently
   */
  PARTIAL_ORDER = 'partial-order',
}

/**
 * Operators and dependency table produced by an import
 */
export interface CompositionPlan {
  /**
   * Operator of each task id, in import order
   */
  readonly operators: ReadonlyMap<string, Operator>;

  /**
   * Direct upstream task ids of each task id
   */
  readonly dependencies: ReadonlyMap<string, readonly string[]>;
}

function isEmptyResult(value: unknown): boolean {
  return !value || (Array.isArray(value) && value.length === 0);
}

/**
 * Forward of a synthetic root that drives the imported operators.
 *
 * Falsy (or empty array) outputs are replaced by `{}` before they are passed on,
 * so a task returning nothing does not break the next call. Any other output
 * that is not a plain object cannot be spread into named inputs and fails with
 * an OperatorError attributed to the consuming operator.
 */
export class ComposedForward {
  private readonly taskIds = new Map<Operator, string>();

  constructor(
    private readonly root: Operator,
    private readonly plan: CompositionPlan,
    public readonly mode: CompositionMode = CompositionMode.SEQUENTIAL
  ) {
    for (const [taskId, operator] of plan.operators) {
      this.taskIds.set(operator, taskId);
    }
  }

  /**
   * Forward definition to register on the root; accepts any named inputs
   */
  toDefinition(): ForwardDefinition {
    return defineVariadicForward((inputs, context) => this.run(inputs, context));
  }

  /**
   * Task ids in the order they are started
   */
  executionOrder(): string[] {
    if (this.mode === CompositionMode.SEQUENTIAL) {
      return this.sequence().map(operator => this.taskIdOf(operator));
    }
    return this.topologicalOrder();
  }

  run(inputs: ForwardInputs, context: InvocationContext): Promise<unknown> {
    return this.mode === CompositionMode.SEQUENTIAL
      ? this.runSequential(inputs, context)
      : this.runPartialOrder(inputs, context);
  }

  private sequence(): Operator[] {
    const sequence: Operator[] = [];
    for (const [, operator] of namedOperators<Operator>(this.root)) {
      if (operator !== this.root) {
        sequence.push(operator);
      }
    }
    return sequence;
  }

  private taskIdOf(operator: Operator): string {
    return this.taskIds.get(operator) ?? operator.name;
  }

  private async runSequential(inputs: ForwardInputs, context: InvocationContext): Promise<unknown> {
    let output: unknown = inputs;

    for (const operator of this.sequence()) {
      output = await context.invoke(operator, this.unpack(output, operator));
      if (isEmptyResult(output)) {
        output = {};
      }
    }

    return output;
  }

  private async runPartialOrder(
    inputs: ForwardInputs,
    context: InvocationContext
  ): Promise<Record<string, unknown>> {
    const linked = createLinkedController(context.signal);
    const runs = new Map<string, Promise<unknown>>();
    let firstFailure: unknown;

    const start = (taskId: string): Promise<unknown> => {
      const existing = runs.get(taskId);
      if (existing) {
        return existing;
      }

      const run = (async (): Promise<unknown> => {
        try {
          const upstream = this.upstreamOf(taskId);
          const upstreamOutputs = await Promise.all(upstream.map(start));
          const operator = this.operatorOf(taskId);
          const named =
            upstream.length === 0 ? inputs : this.merge(upstreamOutputs, operator);
          return await context.invoke(operator, named, { signal: linked.signal });
        } catch (error) {
          if (firstFailure === undefined) {
            firstFailure = error;
          }
          linked.controller.abort();
          throw error;
        }
      })();

      runs.set(taskId, run);
      return run;
    };

    const taskIds = [...this.plan.operators.keys()];
    const settled = await Promise.allSettled(taskIds.map(start));
    linked.dispose();

    if (context.signal.aborted) {
      throw new InvocationCancelledError(this.root.name);
    }
    if (firstFailure !== undefined) {
      throw firstFailure;
    }

    const result: Record<string, unknown> = {};
    const sinks = new Set(this.sinks());
    settled.forEach((outcome, index) => {
      const taskId = taskIds[index];
      if (sinks.has(taskId) && outcome.status === 'fulfilled') {
        result[taskId] = outcome.value;
      }
    });
    return result;
  }

  private upstreamOf(taskId: string): readonly string[] {
    return (this.plan.dependencies.get(taskId) ?? []).filter(id => this.plan.operators.has(id));
  }

  private operatorOf(taskId: string): Operator {
    const operator = this.plan.operators.get(taskId);
    if (!operator) {
      throw new OperatorError(`Unknown task '${taskId}'`, this.root.name);
    }
    return operator;
  }

  /**
   * Tasks nothing else depends on, in import order
   */
  private sinks(): string[] {
    const upstreamIds = new Set<string>();
    for (const taskId of this.plan.operators.keys()) {
      this.upstreamOf(taskId).forEach(id => upstreamIds.add(id));
    }
    return [...this.plan.operators.keys()].filter(id => !upstreamIds.has(id));
  }

  private topologicalOrder(): string[] {
    const order: string[] = [];
    const done = new Set<string>();
    const pending = [...this.plan.operators.keys()];

    while (pending.length > 0) {
      const index = pending.findIndex(taskId =>
        this.upstreamOf(taskId).every(id => done.has(id))
      );
      if (index === -1) {
        throw new AcyclicityViolation(this.root.name, [...pending, pending[0]]);
      }
      const [taskId] = pending.splice(index, 1);
      order.push(taskId);
      done.add(taskId);
    }

    return order;
  }

  private unpack(value: unknown, consumer: Operator): ForwardInputs {
    if (isEmptyResult(value)) {
      return {};
    }
    if (!isObject(value)) {
      throw new OperatorError(
        `Output passed to '${consumer.name}' is not a mapping and cannot be spread into named inputs`,
        consumer.name
      );
    }
    return value;
  }

  private merge(outputs: readonly unknown[], consumer: Operator): ForwardInputs {
    const merged: Record<string, unknown> = {};
    for (const output of outputs) {
      Object.assign(merged, this.unpack(output, consumer));
    }
    return merged;
  }
}
