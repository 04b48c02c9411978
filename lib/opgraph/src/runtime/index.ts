export { createRuntime, OperatorRuntime } from './runtime';
export type {
  ExportDefaults,
  ImportDefaults,
  InvocationDefaults,
  RuntimeDefinition,
  RuntimeModifier,
} from './types';
