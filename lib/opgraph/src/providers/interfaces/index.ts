/**
 * Provider interfaces for the runtime
 */

export type { ILoggerProvider } from './logger';
export type { IRemoteHandle, RemoteSubmission } from './remote';
