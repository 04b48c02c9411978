import { CALLABLE_TASK_KIND } from '../types/scheduler';
import type { ImportableTask, TaskGroup } from '../types/scheduler';
import type { ILogger } from '../types/logger';
import { Operator } from '../operator/operator';
import { ComposedForward, CompositionMode } from '../engine/composed-forward';
import { OperatorError, UnsupportedTaskKindError, getErrorMessage } from '../utils/operator-error';
import { LoggerManager } from '../utils/logging';

/**
 * Options for importing a scheduler task group
 */
export interface TaskGroupImportOptions {
  /**
   * How the synthetic root drives the imported operators (default: sequential)
   */
  readonly composition?: CompositionMode;

  /**
   * Name of the synthetic root (default: 'root')
   */
  readonly rootName?: string;

  /**
   * Creates the operator for a task id, and for the synthetic root
   */
  readonly createOperator?: (name: string) => Operator;

  readonly logger?: ILogger;
}

/**
 * Imported operator tree together with the plan driving it
 */
export interface ImportedTaskGroup {
  readonly root: Operator;
  readonly forward: ComposedForward;

  /**
   * Operator of each task id, in import order
   */
  readonly operators: ReadonlyMap<string, Operator>;

  /**
   * Direct upstream task ids of each task id
   */
  readonly dependencies: ReadonlyMap<string, readonly string[]>;
}

/**
 * Fields of a task read when it becomes a single operator; exported scheduler tasks qualify
 */
export type SingleTask = Pick<ImportableTask, 'taskId' | 'kind' | 'callable'>;

/**
 * Options for importing one scheduler task
 */
export interface TaskImportOptions {
  /**
   * Creates the operator for the task id
   */
  readonly createOperator?: (name: string) => Operator;

  readonly logger?: ILogger;
}

const defaultCreateOperator = (name: string): Operator => new Operator({ name });

/**
 * Imports one scheduler task as one operator named after the task id,
 * bound to the task's callable. Accepts exported tasks, so
 * `importTask(exportOperator(op))` yields an operator running `op`'s forward.
 *
 * @throws UnsupportedTaskKindError if the task is not a CallableTask
 */
export function importTask(
  task: SingleTask,
  options: TaskImportOptions = {}
): Operator {
  if (task.kind !== CALLABLE_TASK_KIND) {
    throw new UnsupportedTaskKindError(task.taskId, task.kind);
  }

  const logger = options.logger ?? LoggerManager.getInstance().getLogger();
  const operator = (options.createOperator ?? defaultCreateOperator)(task.taskId);
  bindCallable(operator, task, logger);
  return operator;
}

/**
 * Rebuilds a scheduler task group as an operator tree.
 *
 * Each task becomes an operator attached to its parents as
 * `op__<parent>__<child>`: the first parent owns it, later parents hold a
 * shared reference. Tasks without parents are attached to a synthetic root
 * as `op__root__<taskId>`; the root's forward drives the whole group.
 *
 * @throws UnsupportedTaskKindError if a task is not a CallableTask
 */
export function reconstructTaskGroup(
  group: TaskGroup,
  options: TaskGroupImportOptions = {}
): ImportedTaskGroup {
  const logger = options.logger ?? LoggerManager.getInstance().getLogger();
  const createOperator = options.createOperator ?? defaultCreateOperator;
  const tasks = [...group];

  const byId = new Map<string, ImportableTask>();
  for (const task of tasks) {
    if (task.kind !== CALLABLE_TASK_KIND) {
      throw new UnsupportedTaskKindError(task.taskId, task.kind);
    }
    if (byId.has(task.taskId)) {
      throw new OperatorError(`Duplicate task id '${task.taskId}'`, task.taskId);
    }
    byId.set(task.taskId, task);
  }

  const dependencies = new Map<string, readonly string[]>();
  for (const task of tasks) {
    const upstream = [...task.getDirectRelatives(true)].map(relative => relative.taskId);
    dependencies.set(task.taskId, [...new Set(upstream)]);
  }

  const operators = new Map<string, Operator>();
  const materialize = (taskId: string): Operator => {
    const existing = operators.get(taskId);
    if (existing) {
      return existing;
    }
    const operator = createOperator(taskId);
    bindCallable(operator, byId.get(taskId), logger);
    operators.set(taskId, operator);
    return operator;
  };

  const root = createOperator(options.rootName ?? 'root');
  const parentless: string[] = [];

  for (const [childId, parentIds] of dependencies) {
    const child = materialize(childId);
    for (const parentId of parentIds) {
      const parent = materialize(parentId);
      const slot = `op__${parentId}__${childId}`;
      if (child.owner) {
        parent.linkChild(slot, child);
      } else {
        parent.setChild(slot, child);
      }
    }
    if (parentIds.length === 0) {
      parentless.push(childId);
    }
  }
  // upstream tasks referenced from outside the group
  for (const taskId of operators.keys()) {
    if (!dependencies.has(taskId)) {
      parentless.push(taskId);
    }
  }

  for (const taskId of parentless) {
    root.setChild(`op__root__${taskId}`, materialize(taskId));
  }

  const forward = new ComposedForward(
    root,
    { operators, dependencies },
    options.composition ?? CompositionMode.SEQUENTIAL
  );
  root.registerForward(forward.toDefinition());

  logger.debug(
    `[DAGBridge] Imported ${operators.size} tasks under '${root.name}' (${forward.mode})`
  );

  return { root, forward, operators, dependencies };
}

/**
 * Imports a scheduler task group and returns its synthetic root
 */
export function importTaskGroup(group: TaskGroup, options: TaskGroupImportOptions = {}): Operator {
  return reconstructTaskGroup(group, options).root;
}

function bindCallable(operator: Operator, task: SingleTask | undefined, logger: ILogger): void {
  if (!task) {
    logger.debug(`[DAGBridge] '${operator.name}' is not part of the task group; left unbound`);
    return;
  }

  try {
    const callable = task.callable;
    if (callable) {
      operator.registerForward(callable);
    } else {
      logger.debug(`[DAGBridge] Task '${task.taskId}' has no callable; left unbound`);
    }
  } catch (error) {
    logger.warn(
      `[DAGBridge] Could not read callable of task '${task.taskId}': ${getErrorMessage(error)}`
    );
  }
}
