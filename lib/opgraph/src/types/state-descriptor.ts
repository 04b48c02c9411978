/**
 * Lifecycle tag of an operator
 */
export enum OperatorPhase {
  STOPPED = 'stopped',
  RUNNING = 'running',
  FAILED = 'failed',
}

/**
 * Snapshot of an operator's persisted values and its last call signature
 */
export interface StateDescriptor {
  readonly phase: OperatorPhase;
  readonly version: number;
  readonly data: ReadonlyMap<string, unknown>;
  readonly inputs: ReadonlyMap<string, unknown>;
  readonly outputs: ReadonlyMap<string, unknown>;
}

/**
 * Anything that can be turned into an ordered mapping
 */
export type OrderedSource =
  | ReadonlyMap<string, unknown>
  | Iterable<readonly [string, unknown]>
  | Readonly<Record<string, unknown>>;

export interface StateDescriptorInit {
  readonly phase?: OperatorPhase;
  readonly version?: number;
  readonly data?: OrderedSource;
  readonly inputs?: OrderedSource;
  readonly outputs?: OrderedSource;
}
