import * as path from 'path';
import type {
  ForwardDefinition,
  ForwardFunction,
  ForwardInputs,
  ModuleReference,
} from '../types/forward';
import { isObject } from '../types/utils';

/**
 * Declares a forward function together with its input contract
 *
 * @param inputs Declared input names, in positional order
 * @param fn Function receiving the bound inputs
 *
 * @example
 * ```typescript
 * const add = new Operator({
 *   name: 'add',
 *   forward: defineForward(['a', 'b'], ({ a, b }) => Number(a) + Number(b)),
 * });
 * ```
 */
export function defineForward<TOutput>(
  inputs: readonly string[],
  fn: ForwardFunction<TOutput>
): ForwardDefinition<TOutput> {
  const seen = new Set<string>();
  for (const input of inputs) {
    if (!input) {
      throw new Error('Forward input names must be non-empty strings');
    }
    if (seen.has(input)) {
      throw new Error(`Forward input '${input}' is declared twice`);
    }
    seen.add(input);
  }

  return Object.freeze({ inputs: Object.freeze([...inputs]), variadic: false, fn });
}

/**
 * Declares a forward that accepts any named inputs (no arity check)
 */
export function defineVariadicForward<TOutput>(
  fn: ForwardFunction<TOutput>
): ForwardDefinition<TOutput> {
  return Object.freeze({ inputs: Object.freeze([]), variadic: true, fn });
}

/**
 * Declares a forward implemented by a CommonJS module.
 *
 * The module's function is called with the bound inputs and a replica index
 * (0 outside a fan-out). Fan-out in `process` mode loads the same module in
 * each worker thread, so the code run there is the code run in-process.
 *
 * @example
 * ```typescript
 * const score = new Operator({
 *   name: 'score',
 *   forward: defineModuleForward(['text'], require.resolve('./score')),
 * });
 * ```
 */
export function defineModuleForward(
  inputs: readonly string[],
  modulePath: string,
  exportName?: string
): ForwardDefinition {
  const reference: ModuleReference = Object.freeze({ path: path.resolve(modulePath), exportName });
  const base = defineForward(inputs, bound => loadModuleFunction(reference)(bound, 0));

  return Object.freeze({ ...base, module: reference });
}

/**
 * Loads the function a module reference points at
 *
 * @throws Error if the export is not a function
 */
export function loadModuleFunction(
  reference: ModuleReference
): (inputs: ForwardInputs, replica: number) => unknown {
  const loaded: unknown = require(reference.path);
  const { exportName } = reference;

  let candidate: unknown;
  if (exportName !== undefined) {
    candidate = isObject(loaded) || typeof loaded === 'function'
      ? Reflect.get(loaded, exportName)
      : undefined;
  } else if (typeof loaded === 'function') {
    candidate = loaded;
  } else if (isObject(loaded)) {
    candidate = loaded.default;
  }

  if (typeof candidate !== 'function') {
    const target = exportName !== undefined ? `'${exportName}'` : 'a function';
    throw new Error(`Module ${reference.path} does not export ${target}`);
  }

  const fn = candidate;
  return (inputs, replica) => {
    const result: unknown = Reflect.apply(fn, undefined, [inputs, replica]);
    return result;
  };
}
