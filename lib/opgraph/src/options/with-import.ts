import type { ImportDefaults, RuntimeModifier } from '../runtime/types';
import { CompositionMode } from '../engine/composed-forward';

/**
 * Sets defaults for task group imports
 *
 * @throws Error if composition is unknown or rootName is empty
 *
 * @example
 * ```typescript
 * const runtime = createRuntime(
 *   withImportOptions({ composition: CompositionMode.PARTIAL_ORDER, rootName: 'pipeline' })
 * );
 * ```
 */
export function withImportOptions(options: ImportDefaults): RuntimeModifier {
  const modes: readonly string[] = Object.values(CompositionMode);
  if (options.composition !== undefined && !modes.includes(options.composition)) {
    throw new Error(`withImportOptions: unknown composition '${String(options.composition)}'`);
  }
  if (options.rootName !== undefined && options.rootName.length === 0) {
    throw new Error('withImportOptions: rootName must be a non-empty string');
  }

  return definition => ({
    ...definition,
    importDefaults: { ...definition.importDefaults, ...options },
  });
}
