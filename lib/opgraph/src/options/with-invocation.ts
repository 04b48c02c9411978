import type { InvocationDefaults, RuntimeModifier } from '../runtime/types';

/**
 * Sets invocation defaults
 *
 * @throws Error if typeCheck is not a boolean
 *
 * @example
 * ```typescript
 * const runtime = createRuntime(withInvocationOptions({ typeCheck: false }));
 * ```
 */
export function withInvocationOptions(options: InvocationDefaults): RuntimeModifier {
  if (options.typeCheck !== undefined && typeof options.typeCheck !== 'boolean') {
    throw new Error('withInvocationOptions: typeCheck must be a boolean');
  }

  return definition => ({
    ...definition,
    invocation: { ...definition.invocation, ...options },
  });
}
