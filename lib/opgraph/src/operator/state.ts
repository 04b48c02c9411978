import { OperatorPhase } from '../types/state-descriptor';
import type { OrderedSource, StateDescriptor, StateDescriptorInit } from '../types/state-descriptor';
import { isObject } from '../types/utils';

function isEntryIterable(source: unknown): source is Iterable<readonly [string, unknown]> {
  return (
    typeof source === 'object' &&
    source !== null &&
    typeof Reflect.get(source, Symbol.iterator) === 'function'
  );
}

/**
 * Materialises any ordered source as a Map; plain records keep their key order
 */
export function toOrderedMap(source: OrderedSource | undefined): Map<string, unknown> {
  if (source === undefined) {
    return new Map();
  }
  if (isEntryIterable(source)) {
    return new Map(source);
  }
  return new Map(Object.entries(source));
}

/**
 * Creates a fresh state descriptor; every call returns new Map instances
 */
export function createStateDescriptor(init: StateDescriptorInit = {}): StateDescriptor {
  return {
    phase: init.phase ?? OperatorPhase.STOPPED,
    version: init.version ?? 1,
    data: toOrderedMap(init.data),
    inputs: toOrderedMap(init.inputs),
    outputs: toOrderedMap(init.outputs),
  };
}

/**
 * Output mapping recorded for the last call: record outputs per key, anything else under `output`
 */
export function toOutputMap(output: unknown): Map<string, unknown> {
  if (isObject(output)) {
    return new Map(Object.entries(output));
  }
  return new Map([['output', output]]);
}
