import { CALLABLE_TASK_KIND } from '../types/scheduler';
import type { ImportableTask, SchedulerDag } from '../types/scheduler';
import type { ForwardDefinition } from '../types/forward';
import { isDefined } from '../types/utils';

/**
 * In-process scheduler task holding a single callable
 *
 * @example
 * ```typescript
 * const extract = new CallableTask('extract', extractForward);
 * const load = new CallableTask('load', loadForward);
 * extract.setDownstream(load);
 * ```
 */
export class CallableTask implements ImportableTask {
  public readonly kind = CALLABLE_TASK_KIND;

  private readonly upstream = new Set<CallableTask>();
  private readonly downstream = new Set<CallableTask>();

  constructor(
    public readonly taskId: string,
    public readonly callable?: ForwardDefinition
  ) {}

  /**
   * Makes the given tasks run after this one
   */
  setDownstream(...tasks: CallableTask[]): this {
    for (const task of tasks) {
      this.downstream.add(task);
      task.upstream.add(this);
    }
    return this;
  }

  /**
   * Makes this task run after the given tasks
   */
  setUpstream(...tasks: CallableTask[]): this {
    for (const task of tasks) {
      task.setDownstream(this);
    }
    return this;
  }

  getDirectRelatives(upstream = false): CallableTask[] {
    return upstream ? [...this.upstream] : [...this.downstream];
  }
}

/**
 * Task group view of an exported DAG, in task order
 */
export function taskGroupFromDag(dag: SchedulerDag): ImportableTask[] {
  const views = new Map<string, ImportableTask>();

  for (const task of dag.tasks) {
    views.set(task.taskId, {
      taskId: task.taskId,
      kind: task.kind,
      callable: task.callable,
      getDirectRelatives: (upstream: boolean) =>
        upstream
          ? task.upstreamTaskIds.map(id => views.get(id)).filter(isDefined)
          : dag.tasks
              .filter(other => other.upstreamTaskIds.includes(task.taskId))
              .map(other => views.get(other.taskId))
              .filter(isDefined),
    });
  }

  return [...views.values()];
}
