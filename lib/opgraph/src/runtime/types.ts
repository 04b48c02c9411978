import type { ILoggerProvider } from '../providers/interfaces/logger';
import type { CompositionMode } from '../engine/composed-forward';
import type { Operator } from '../operator/operator';

/**
 * Defaults applied to every export made through a runtime
 */
export interface ExportDefaults {
  /**
   * Execution timeout and SLA in milliseconds
   */
  readonly timeout?: number | null;

  /**
   * Task overrides merged under per-call overrides
   */
  readonly overrides?: Readonly<Record<string, unknown>>;
}

/**
 * Defaults applied to every import made through a runtime
 */
export interface ImportDefaults {
  readonly composition?: CompositionMode;
  readonly rootName?: string;
  readonly createOperator?: (name: string) => Operator;
}

export interface InvocationDefaults {
  /**
   * Validate argument counts against declared inputs (default: true)
   */
  readonly typeCheck?: boolean;
}

/**
 * Configuration assembled by runtime modifiers
 */
export interface RuntimeDefinition {
  readonly logger?: ILoggerProvider;
  readonly invocation: InvocationDefaults;
  readonly exportDefaults: ExportDefaults;
  readonly importDefaults: ImportDefaults;
}

/**
 * Function transforming a runtime definition
 */
export interface RuntimeModifier {
  (definition: RuntimeDefinition): RuntimeDefinition;
}
