export * from './metadata';
export * from './export';
export * from './import';
export * from './task-group';
