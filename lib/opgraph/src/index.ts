// ============================================
// Operators
// ============================================
export { Operator, Multi, OperatorRegistry } from './operator';
export type { OperatorOptions, MultiOptions, ChildEdge } from './operator';
export { defineForward, defineVariadicForward, defineModuleForward } from './operator';
export { createStateDescriptor } from './operator';
// ============================================
// Graph traversal
// ============================================
export { namedOperators, operators, findCycle, isAcyclic, formatOperator } from './graph';
export type { GraphNode, TraversalOptions } from './graph';
// ============================================
// Invocation
// ============================================
export { InvocationEngine, ComposedForward, CompositionMode, HookManager } from './engine';
export type { InvocationEngineOptions, CompositionPlan } from './engine';
// ============================================
// Scheduler bridge
// ============================================
export {
  exportOperator,
  exportTree,
  exportDag,
  importTask,
  importTaskGroup,
  reconstructTaskGroup,
  taskGroupFromDag,
  lookupDocumentation,
  lookupComms,
  CallableTask,
} from './bridge';
export type {
  TaskExportOptions,
  DagExportOptions,
  TaskImportOptions,
  TaskGroupImportOptions,
  ImportedTaskGroup,
  SingleTask,
} from './bridge';
// ============================================
// Runtime
// ============================================
export { createRuntime, OperatorRuntime } from './runtime';
export type { RuntimeDefinition, RuntimeModifier } from './runtime';
export { withLoggerProvider } from './options';
export { withInvocationOptions } from './options';
export { withExportDefaults } from './options';
export { withImportOptions } from './options';
// ============================================
// Types - Core Types
// ============================================
export { InvocationEventType, OperatorPhase, CALLABLE_TASK_KIND, LogLevel } from './types';
export type {
  ForwardDefinition,
  ModuleReference,
  ForwardFunction,
  ForwardInputs,
  InvocationContext,
  InvokeOptions,
  InvocationEventHandlers,
  UnsubscribeFn,
  StateDescriptor,
  StateDescriptorInit,
  SchedulerTask,
  SchedulerDag,
  ImportableTask,
  TaskGroup,
  MetadataLookup,
  ExecutionContext,
  FanOutRequest,
  ICancelableComputation,
  ILogger,
} from './types';
export {
  OperatorError,
  OwnershipError,
  ArityError,
  AcyclicityViolation,
  UnsupportedTaskKindError,
  ForwardNotImplementedError,
  InvocationCancelledError,
  InvocationTimeoutError,
  isOperatorError,
  isStructuralError,
  getErrorMessage,
} from './utils/operator-error';
// ============================================
// Execution contexts
// ============================================
export { ConcurrentContext, WorkerThreadContext, RemoteContext } from './utils/execution';
export type { FanOutMode } from './utils/execution';
// ============================================
// Logging
// ============================================
export { LoggerManager, ConsoleLoggerAdapter, LoggerAdapter } from './utils/logging';
// ============================================
// Providers (Interfaces + Memory implementations)
// ============================================
export type { ILoggerProvider, IRemoteHandle, RemoteSubmission } from './providers';
export { ConsoleLoggerProvider, MemoryRemoteHandle } from './providers';
