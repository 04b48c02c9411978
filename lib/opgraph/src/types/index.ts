/**
 * Types - Core type definitions for opgraph
 * Tree-shakable: explicit exports for better tree shaking
 */

// Forward and invocation types
export type {
  ForwardDefinition,
  ModuleReference,
  ForwardFunction,
  ForwardInputs,
  InvocationContext,
  InvokeOptions,
} from './forward';
export { InvocationEventType } from './invocation-hooks';
export type { InvocationEventHandlers, IHookManager, UnsubscribeFn } from './invocation-hooks';

// Operator state
export { OperatorPhase } from './state-descriptor';
export type { StateDescriptor, StateDescriptorInit, OrderedSource } from './state-descriptor';

// Scheduler types
export { CALLABLE_TASK_KIND } from './scheduler';
export type {
  DisabledTaskFields,
  ImportableTask,
  MetadataLookup,
  SchedulerDag,
  SchedulerTask,
  TaskGroup,
} from './scheduler';

// Execution types
export type {
  ExecutionContext,
  FanOutRequest,
  RemoteExecutionOptions,
  WorkerExecutionOptions,
} from './execution-context';
export type { ICancelableComputation } from './cancelable-computation';
export { isCancelableComputation } from './cancelable-computation';

// Provider types
export type { ILogger } from './logger';
export { LogLevel } from './logger';
