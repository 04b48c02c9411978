export { namedOperators, operators, findCycle, isAcyclic, findPath } from './walker';
export type { GraphNode, TraversalOptions } from './walker';
export { formatOperator } from './format';
