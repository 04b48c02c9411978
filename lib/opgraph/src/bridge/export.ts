import { CALLABLE_TASK_KIND } from '../types/scheduler';
import type { DisabledTaskFields, SchedulerDag, SchedulerTask } from '../types/scheduler';
import type { ILogger } from '../types/logger';
import { isNumber, isString } from '../types/utils';
import type { Operator } from '../operator/operator';
import { findCycle, namedOperators } from '../graph/walker';
import { AcyclicityViolation } from '../utils/operator-error';
import { LoggerManager } from '../utils/logging';
import { lookupComms, lookupDocumentation } from './metadata';

/**
 * Options for exporting operators as scheduler tasks
 */
export interface TaskExportOptions {
  /**
   * Execution timeout and SLA in milliseconds (default: none)
   */
  readonly timeout?: number | null;

  /**
   * Task fields and extra metadata; applied after `comms()` and winning over it
   */
  readonly overrides?: Readonly<Record<string, unknown>>;

  /**
   * Receives warnings for degraded metadata (default: LoggerManager logger)
   */
  readonly logger?: ILogger;
}

export interface DagExportOptions extends TaskExportOptions {
  /**
   * DAG configuration, passed through unmodified
   */
  readonly dagConfig?: Readonly<Record<string, unknown>>;
}

const DISABLED_FIELDS: DisabledTaskFields = {
  email: null,
  emailOnRetry: false,
  emailOnFailure: false,
  doc: null,
  docMd: null,
  docJson: null,
  docYaml: null,
  onExecuteCallback: null,
  onFailureCallback: null,
  onSuccessCallback: null,
  onRetryCallback: null,
};

const DISABLED_FIELD_NAMES = new Set(Object.keys(DISABLED_FIELDS));

// Owned by the export itself, never taken from metadata
const RESERVED_FIELDS = new Set(['kind', 'callable', 'upstreamTaskIds', 'extra']);

function assertExportable(operator: Operator): void {
  if (!operator.isAcyclic()) {
    const cycle = findCycle<Operator>(operator) ?? [];
    throw new AcyclicityViolation(
      operator.name,
      cycle.map(op => op.name)
    );
  }
}

function buildTask(
  operator: Operator,
  defaultTaskId: string,
  upstreamTaskIds: readonly string[],
  options: TaskExportOptions,
  allowTaskIdOverride: boolean
): SchedulerTask {
  const logger = options.logger ?? LoggerManager.getInstance().getLogger();
  const timeout = options.timeout ?? null;

  let taskId = defaultTaskId;
  let executionTimeout: number | null = timeout;
  let sla: number | null = timeout;
  let docRst: string | undefined;

  const documentation = lookupDocumentation(operator);
  if (documentation.ok) {
    docRst = documentation.value;
  } else {
    logger.warn(
      `[DAGBridge] Documentation lookup failed for '${defaultTaskId}': ${documentation.error.message}`
    );
  }

  const comms = lookupComms(operator);
  if (!comms.ok) {
    logger.warn(`[DAGBridge] comms() failed for '${defaultTaskId}': ${comms.error.message}`);
  }

  const merged: Record<string, unknown> = {
    ...(comms.ok ? comms.value : {}),
    ...(options.overrides ?? {}),
  };
  const extra: Record<string, unknown> = {};
  const ignore = (key: string, reason: string): void => {
    logger.warn(`[DAGBridge] Ignoring '${key}' for '${defaultTaskId}': ${reason}`);
  };

  for (const [key, value] of Object.entries(merged)) {
    if (DISABLED_FIELD_NAMES.has(key)) {
      ignore(key, 'notification and documentation fields are always disabled');
      continue;
    }
    if (RESERVED_FIELDS.has(key)) {
      ignore(key, 'field is set by the export');
      continue;
    }

    switch (key) {
      case 'taskId':
        if (!allowTaskIdOverride) {
          ignore(key, 'task ids of a tree are derived from operator paths');
        } else if (isString(value) && value.length > 0) {
          taskId = value;
        } else {
          ignore(key, 'expected a non-empty string');
        }
        break;
      case 'executionTimeout':
        if (value === null || isNumber(value)) {
          executionTimeout = value;
        } else {
          ignore(key, 'expected a number of milliseconds or null');
        }
        break;
      case 'sla':
        if (value === null || isNumber(value)) {
          sla = value;
        } else {
          ignore(key, 'expected a number of milliseconds or null');
        }
        break;
      case 'docRst':
        if (isString(value)) {
          docRst = value;
        } else {
          ignore(key, 'expected a string');
        }
        break;
      default:
        extra[key] = value;
    }
  }

  return {
    ...DISABLED_FIELDS,
    kind: CALLABLE_TASK_KIND,
    taskId,
    callable: operator.getForward(),
    upstreamTaskIds: [...upstreamTaskIds],
    executionTimeout,
    sla,
    ...(docRst !== undefined ? { docRst } : {}),
    extra,
  };
}

/**
 * Exports a single operator as a scheduler task.
 *
 * The task id is the operator name; `comms()` metadata and then `overrides`
 * are merged into the task.
 *
 * @throws AcyclicityViolation if the operator graph contains a cycle
 */
export function exportOperator(operator: Operator, options: TaskExportOptions = {}): SchedulerTask {
  assertExportable(operator);
  return buildTask(operator, operator.name, [], options, true);
}

/**
 * Exports every distinct operator of a tree, in traversal order.
 * The root keeps its name as task id; descendants are named `root.path.to.child`.
 * Each task lists all of its parents, owned and shared, as upstream tasks.
 */
export function exportTree(root: Operator, options: TaskExportOptions = {}): SchedulerTask[] {
  assertExportable(root);

  const taskIds = new Map<Operator, string>();
  for (const [path, operator] of namedOperators<Operator>(root)) {
    taskIds.set(operator, path ? `${root.name}.${path}` : root.name);
  }

  const upstream = new Map<Operator, string[]>();
  for (const [operator, taskId] of taskIds) {
    for (const child of operator.children().values()) {
      const list = upstream.get(child) ?? [];
      if (!list.includes(taskId)) {
        list.push(taskId);
      }
      upstream.set(child, list);
    }
  }

  return [...taskIds].map(([operator, taskId]) =>
    buildTask(operator, taskId, upstream.get(operator) ?? [], options, false)
  );
}

/**
 * Exports a tree as a scheduler DAG named after the root task
 */
export function exportDag(root: Operator, options: DagExportOptions = {}): SchedulerDag {
  const { dagConfig = {}, ...taskOptions } = options;
  const tasks = exportTree(root, taskOptions);

  return {
    dagId: `DAG_${tasks[0].taskId}`,
    config: dagConfig,
    tasks,
  };
}
