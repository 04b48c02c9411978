export { Operator } from './operator';
export type { OperatorOptions, InvocationOutcome } from './operator';
export { OperatorRegistry } from './registry';
export type { ChildEdge } from './registry';
export { defineForward, defineVariadicForward, defineModuleForward, loadModuleFunction } from './forward';
export { createStateDescriptor, toOrderedMap, toOutputMap } from './state';
export { Multi } from './multi';
export type { MultiOptions } from './multi';
