import type { ForwardInputs, InvokeOptions } from '../types/forward';
import type { ILogger } from '../types/logger';
import type { SchedulerDag, SchedulerTask, TaskGroup } from '../types/scheduler';
import type { InvocationEventHandlers, UnsubscribeFn } from '../types/invocation-hooks';
import type { Operator } from '../operator/operator';
import { InvocationEngine } from '../engine/invocation-engine';
import { exportDag, exportOperator, exportTree } from '../bridge/export';
import type { DagExportOptions, TaskExportOptions } from '../bridge/export';
import { importTask, importTaskGroup } from '../bridge/import';
import type { SingleTask, TaskGroupImportOptions, TaskImportOptions } from '../bridge/import';
import { taskGroupFromDag } from '../bridge/task-group';
import { LoggerManager } from '../utils/logging';
import type { RuntimeDefinition, RuntimeModifier } from './types';

/**
 * Creates a new runtime from modifiers
 *
 * @example
 * ```typescript
 * const runtime = createRuntime(
 *   withLoggerProvider(new ConsoleLoggerProvider({ level: LogLevel.INFO })),
 *   withExportDefaults({ timeout: 30_000 }),
 *   withImportOptions({ composition: CompositionMode.PARTIAL_ORDER })
 * );
 *
 * const dag = runtime.exportDag(pipeline, { dagConfig: { schedule: '@daily' } });
 * const root = runtime.importDag(dag);
 * const result = await runtime.invoke(root, [], { text: 'hello' });
 * ```
 */
export function createRuntime(...modifiers: readonly RuntimeModifier[]): OperatorRuntime {
  // Start with empty definition
  let definition: RuntimeDefinition = {
    logger: undefined,
    invocation: {},
    exportDefaults: {},
    importDefaults: {},
  };

  // Apply all modifiers sequentially
  for (const modifier of modifiers) {
    definition = modifier(definition);
  }

  return new OperatorRuntime(definition);
}

/**
 * Configured facade over the invocation engine and the scheduler bridge
 */
export class OperatorRuntime {
  public readonly engine: InvocationEngine;
  private readonly logger: ILogger;

  constructor(public readonly definition: RuntimeDefinition) {
    this.logger = definition.logger ?? LoggerManager.getInstance().getLogger();
    this.engine = new InvocationEngine({
      logger: this.logger,
      typeCheck: definition.invocation.typeCheck,
    });
  }

  invoke(
    operator: Operator,
    positional: readonly unknown[] = [],
    named: ForwardInputs = {},
    options: InvokeOptions = {}
  ): Promise<unknown> {
    return this.engine.invoke(operator, positional, named, options);
  }

  exportOperator(operator: Operator, options: TaskExportOptions = {}): SchedulerTask {
    return exportOperator(operator, this.exportOptions(options));
  }

  exportTree(root: Operator, options: TaskExportOptions = {}): SchedulerTask[] {
    return exportTree(root, this.exportOptions(options));
  }

  exportDag(root: Operator, options: DagExportOptions = {}): SchedulerDag {
    return exportDag(root, { ...this.exportOptions(options), dagConfig: options.dagConfig });
  }

  /**
   * Imports one task as one operator
   */
  importTask(task: SingleTask, options: TaskImportOptions = {}): Operator {
    return importTask(task, {
      createOperator: this.definition.importDefaults.createOperator,
      logger: this.logger,
      ...options,
    });
  }

  importTaskGroup(group: TaskGroup, options: TaskGroupImportOptions = {}): Operator {
    return importTaskGroup(group, {
      ...this.definition.importDefaults,
      logger: this.logger,
      ...options,
    });
  }

  /**
   * Imports an exported DAG back into an operator tree
   */
  importDag(dag: SchedulerDag, options: TaskGroupImportOptions = {}): Operator {
    return this.importTaskGroup(taskGroupFromDag(dag), options);
  }

  /**
   * Registers handler for an invocation event
   * @returns Function to cancel registration
   */
  on<K extends keyof InvocationEventHandlers>(
    eventType: K,
    handler: InvocationEventHandlers[K]
  ): UnsubscribeFn {
    return this.engine.hooks.on(eventType, handler);
  }

  private exportOptions(options: TaskExportOptions): TaskExportOptions {
    const defaults = this.definition.exportDefaults;
    return {
      timeout: options.timeout !== undefined ? options.timeout : defaults.timeout,
      overrides: { ...defaults.overrides, ...options.overrides },
      logger: options.logger ?? this.logger,
    };
  }
}
