export { InvocationEngine } from './invocation-engine';
export type { InvocationEngineOptions } from './invocation-engine';
export { ComposedForward, CompositionMode } from './composed-forward';
export type { CompositionPlan } from './composed-forward';
export { HookManager } from './hook-manager';
