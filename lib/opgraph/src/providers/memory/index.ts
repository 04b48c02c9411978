/**
 * Memory provider implementations
 * Simple in-process implementations for development and testing
 */

export { ConsoleLoggerProvider } from './logger';
export { MemoryRemoteHandle } from './remote-handle';
