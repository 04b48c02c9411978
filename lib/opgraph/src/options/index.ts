export { withLoggerProvider } from './with-logger';
export { withInvocationOptions } from './with-invocation';
export { withExportDefaults } from './with-export';
export { withImportOptions } from './with-import';
