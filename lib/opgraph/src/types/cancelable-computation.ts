/**
 * Interface for cancelable operation
 * Represents a remote submission that can be cancelled while in flight
 */
export interface ICancelableComputation<T = unknown> {
  /**
   * Promise representing async operation that can be cancelled
   */
  readonly promise: Promise<T>;

  /**
   * Function to cancel current operation
   */
  cancel: () => void;
}

/**
 * Checks if result is cancelable task
 * @param result Result to check
 * @returns true if result is cancelable task
 */
export function isCancelableComputation<T>(result: unknown): result is ICancelableComputation<T> {
  if (result === null || typeof result !== 'object') {
    return false;
  }

  const promise: unknown = Reflect.get(result, 'promise');
  const cancel: unknown = Reflect.get(result, 'cancel');

  return (
    typeof cancel === 'function' &&
    typeof promise === 'object' &&
    promise !== null &&
    typeof Reflect.get(promise, 'then') === 'function'
  );
}
