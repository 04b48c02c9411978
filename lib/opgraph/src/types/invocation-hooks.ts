import type { ForwardInputs } from './forward';
import type { Operator } from '../operator/operator';

/**
 * Types of all invocation events
 */
export enum InvocationEventType {
  INVOCATION_STARTED = 'invocationStarted',
  INVOCATION_COMPLETED = 'invocationCompleted',
  INVOCATION_FAILED = 'invocationFailed',
}

/**
 * Handler type for each event
 */
export interface InvocationEventHandlers {
  [InvocationEventType.INVOCATION_STARTED]: (operator: Operator, inputs: ForwardInputs) => void;
  [InvocationEventType.INVOCATION_COMPLETED]: (
    operator: Operator,
    output: unknown,
    durationMs: number
  ) => void;
  [InvocationEventType.INVOCATION_FAILED]: (operator: Operator, error: Error) => void;
}

/**
 * Function type for hook unregistration
 */
export type UnsubscribeFn = () => void;

/**
 * Interface for hook management
 */
export interface IHookManager {
  /**
   * Subscribe to event with cancellation capability
   * @param eventType Event type
   * @param handler Event handler
   * @returns Function to unsubscribe
   */
  on<K extends keyof InvocationEventHandlers>(
    eventType: K,
    handler: InvocationEventHandlers[K]
  ): UnsubscribeFn;

  /**
   * Call all handlers for specified event
   * @param eventType Event type
   * @param args Event arguments
   */
  emit<K extends keyof InvocationEventHandlers>(
    eventType: K,
    ...args: Parameters<InvocationEventHandlers[K]>
  ): void;

  clearEvent(eventType: keyof InvocationEventHandlers): void;

  clearAllEvents(): void;
}
