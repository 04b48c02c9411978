import type { ExportDefaults, RuntimeModifier } from '../runtime/types';
import { isNumber } from '../types/utils';

/**
 * Sets defaults for scheduler exports; later calls merge their overrides over earlier ones
 *
 * @throws Error if timeout is negative or not a number
 *
 * @example
 * ```typescript
 * const runtime = createRuntime(
 *   withExportDefaults({ timeout: 60_000, overrides: { queue: 'batch' } })
 * );
 * ```
 */
export function withExportDefaults(options: ExportDefaults): RuntimeModifier {
  const { timeout } = options;
  if (timeout !== undefined && timeout !== null && (!isNumber(timeout) || timeout < 0)) {
    throw new Error('withExportDefaults: timeout must be a non-negative number of milliseconds');
  }

  return definition => ({
    ...definition,
    exportDefaults: {
      timeout: timeout !== undefined ? timeout : definition.exportDefaults.timeout,
      overrides: { ...definition.exportDefaults.overrides, ...options.overrides },
    },
  });
}
