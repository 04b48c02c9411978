import { InvocationEventType } from '../types/invocation-hooks';
import type {
  IHookManager,
  InvocationEventHandlers,
  UnsubscribeFn,
} from '../types/invocation-hooks';
import { LoggerManager } from '../utils/logging';
import { getErrorMessage, isError } from '../utils/operator-error';

// Type for any event handler - union of all possible event handlers
type AnyEventHandler = InvocationEventHandlers[keyof InvocationEventHandlers];

/**
 * Hook manager for the invocation engine.
 * Provides ability to register/cancel hooks and support for multiple handlers.
 */
export class HookManager implements IHookManager {
  private readonly handlers = new Map<keyof InvocationEventHandlers, Set<AnyEventHandler>>();

  constructor() {
    Object.values(InvocationEventType).forEach(eventType => {
      this.handlers.set(eventType, new Set());
    });
  }

  /**
   * Registers handler for specified event
   * @returns Function to cancel registration
   */
  public on<K extends keyof InvocationEventHandlers>(
    eventType: K,
    handler: InvocationEventHandlers[K]
  ): UnsubscribeFn {
    const handlers = this.handlers.get(eventType);

    if (!handlers) {
      LoggerManager.warn(`Attempt to subscribe to unknown event: ${String(eventType)}`);
      return () => {
        /* Empty unsubscribe function */
      };
    }

    handlers.add(handler);

    return () => {
      handlers.delete(handler);
    };
  }

  /**
   * Calls all handlers for specified event.
   * A failing handler is logged and does not affect the invocation.
   */
  public emit<K extends keyof InvocationEventHandlers>(
    eventType: K,
    ...args: Parameters<InvocationEventHandlers[K]>
  ): void {
    const handlers = this.handlers.get(eventType);

    if (!handlers || handlers.size === 0) {
      return;
    }

    handlers.forEach(handler => {
      try {
        Reflect.apply(handler, undefined, args);
      } catch (error) {
        LoggerManager.error(
          `Error in event handler ${String(eventType)}: ${getErrorMessage(error)}`,
          isError(error) ? error : undefined
        );
      }
    });
  }

  public clearEvent(eventType: keyof InvocationEventHandlers): void {
    this.handlers.get(eventType)?.clear();
  }

  public clearAllEvents(): void {
    this.handlers.forEach(handlers => handlers.clear());
  }

  /**
   * Checks if there are handlers for specified event
   */
  public hasHandlers(eventType: keyof InvocationEventHandlers): boolean {
    const handlers = this.handlers.get(eventType);
    return !!handlers && handlers.size > 0;
  }
}
