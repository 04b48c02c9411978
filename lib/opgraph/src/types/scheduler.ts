import type { ForwardDefinition } from './forward';

/**
 * The only scheduler task kind that can be imported: a leaf task with a single callable
 */
export const CALLABLE_TASK_KIND = 'CallableTask';

/**
 * Notification and documentation fields the bridge always leaves disabled
 */
export interface DisabledTaskFields {
  readonly email: null;
  readonly emailOnRetry: false;
  readonly emailOnFailure: false;
  readonly doc: null;
  readonly docMd: null;
  readonly docJson: null;
  readonly docYaml: null;
  readonly onExecuteCallback: null;
  readonly onFailureCallback: null;
  readonly onSuccessCallback: null;
  readonly onRetryCallback: null;
}

/**
 * Scheduler-side task record produced by export
 */
export interface SchedulerTask extends DisabledTaskFields {
  readonly kind: typeof CALLABLE_TASK_KIND;
  readonly taskId: string;

  /**
   * Callable run by the task; undefined for pass-through tasks
   */
  readonly callable: ForwardDefinition | undefined;

  /**
   * Tasks that must complete first
   */
  readonly upstreamTaskIds: readonly string[];

  /**
   * Maximum run time in milliseconds
   */
  readonly executionTimeout: number | null;

  /**
   * Time in milliseconds after which a missing success is reported
   */
  readonly sla: number | null;

  /**
   * reStructuredText documentation; omitted when the operator has none
   */
  readonly docRst?: string;

  /**
   * Communication metadata and caller overrides that are not task fields
   */
  readonly extra: Readonly<Record<string, unknown>>;
}

/**
 * Scheduler-side DAG record
 */
export interface SchedulerDag {
  readonly dagId: string;

  /**
   * Caller configuration, passed through unmodified
   */
  readonly config: Readonly<Record<string, unknown>>;

  readonly tasks: readonly SchedulerTask[];
}

/**
 * Task shape accepted by import
 */
export interface ImportableTask {
  readonly taskId: string;
  readonly kind: string;
  readonly callable?: ForwardDefinition;

  /**
   * Direct upstream (`true`) or downstream (`false`) tasks
   */
  getDirectRelatives(upstream: boolean): Iterable<ImportableTask>;
}

export type TaskGroup = Iterable<ImportableTask>;

/**
 * Result of a best-effort metadata source; failures stay visible to callers and tests
 */
export type MetadataLookup<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };
