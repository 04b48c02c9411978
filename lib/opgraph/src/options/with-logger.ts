import type { RuntimeModifier } from '../runtime/types';
import type { ILoggerProvider } from '../providers/interfaces/logger';

/**
 * Registers a logger provider for the runtime
 *
 * @param provider - Logger provider instance
 * @category Providers
 *
 * @example
 * ```typescript
 * const runtime = createRuntime(
 *   withLoggerProvider(new ConsoleLoggerProvider({ level: LogLevel.DEBUG }))
 * );
 * ```
 */
export function withLoggerProvider(provider: ILoggerProvider): RuntimeModifier {
  return definition => ({
    ...definition,
    logger: provider,
  });
}
