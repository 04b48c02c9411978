import type { ILogger } from '../../types/logger';

/**
 * Logger provider interface for the runtime
 * Uses existing ILogger interface from core
 * @category Providers
 */
export type ILoggerProvider = ILogger;
