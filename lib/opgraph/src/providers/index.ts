/**
 * Runtime Providers
 *
 * Provider interfaces and implementations for IoC pattern
 * Tree-shakable: explicit exports instead of export *
 */

// Interfaces
export type { ILoggerProvider } from './interfaces';
export type { IRemoteHandle, RemoteSubmission } from './interfaces';

// Memory implementations
export { ConsoleLoggerProvider } from './memory';
export { MemoryRemoteHandle } from './memory';
