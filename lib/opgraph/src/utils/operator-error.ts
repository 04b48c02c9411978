/**
 * Error class for operators
 *
 * Extends standard Error class, adding
 * the name of the operator the failure is attributed to
 */
export class OperatorError extends Error {
  /**
   * Name of the operator (or task) where error occurred
   */
  public readonly operatorName: string;

  /**
   * Original error, if exists
   */
  public readonly originalError?: Error;

  /**
   * Creates new OperatorError instance
   * @param message Error message
   * @param operatorName Operator name
   * @param originalError Original error (optional)
   */
  constructor(message: string, operatorName: string, originalError?: Error) {
    super(message);

    this.name = 'OperatorError';
    this.operatorName = operatorName;
    this.originalError = originalError;

    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }

    // For ES5 compatibility
    Object.setPrototypeOf(this, OperatorError.prototype);
  }

  /**
   * Returns string representation of error
   */
  public override toString(): string {
    return `[${this.name} in ${this.operatorName}] ${this.message}`;
  }

  /**
   * Converts error to object for serialization
   */
  toJSON(): {
    readonly name: string;
    readonly message: string;
    readonly operatorName: string;
    readonly originalError?: {
      readonly name: string;
      readonly message: string;
    };
  } {
    return {
      name: this.name,
      message: this.message,
      operatorName: this.operatorName,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }
}

/**
 * A child was attached to an operator that was not constructed, under a name
 * that collides with a non-child member, or while owned by another operator
 */
export class OwnershipError extends OperatorError {
  constructor(message: string, operatorName: string) {
    super(message, operatorName);
    this.name = 'OwnershipError';
    Object.setPrototypeOf(this, OwnershipError.prototype);
  }
}

/**
 * Call arguments do not match the declared inputs of a forward
 */
export class ArityError extends OperatorError {
  public readonly expected: number;
  public readonly received: number;

  constructor(message: string, operatorName: string, expected: number, received: number) {
    super(message, operatorName);
    this.name = 'ArityError';
    this.expected = expected;
    this.received = received;
    Object.setPrototypeOf(this, ArityError.prototype);
  }
}

/**
 * Structural cycle in an operator graph
 */
export class AcyclicityViolation extends OperatorError {
  /**
   * Operator names along the cycle, first and last entries are the same operator
   */
  public readonly cycle: readonly string[];

  constructor(operatorName: string, cycle: readonly string[]) {
    super(`Cycle detected in operator graph: ${cycle.join(' -> ')}`, operatorName);
    this.name = 'AcyclicityViolation';
    this.cycle = cycle;
    Object.setPrototypeOf(this, AcyclicityViolation.prototype);
  }
}

/**
 * Import met a scheduler task that is not a single-callable leaf task
 */
export class UnsupportedTaskKindError extends OperatorError {
  public readonly taskId: string;
  public readonly kind: string;

  constructor(taskId: string, kind: string) {
    super(
      `Task '${taskId}' is of kind '${kind}'; only CallableTask tasks can be imported`,
      taskId
    );
    this.name = 'UnsupportedTaskKindError';
    this.taskId = taskId;
    this.kind = kind;
    Object.setPrototypeOf(this, UnsupportedTaskKindError.prototype);
  }
}

/**
 * Operator was invoked without a registered forward
 */
export class ForwardNotImplementedError extends OperatorError {
  constructor(operatorName: string) {
    super(`No forward implemented for operator '${operatorName}'`, operatorName);
    this.name = 'ForwardNotImplementedError';
    Object.setPrototypeOf(this, ForwardNotImplementedError.prototype);
  }
}

export class InvocationCancelledError extends OperatorError {
  constructor(operatorName: string) {
    super(`Invocation of '${operatorName}' was cancelled`, operatorName);
    this.name = 'InvocationCancelledError';
    Object.setPrototypeOf(this, InvocationCancelledError.prototype);
  }
}

export class InvocationTimeoutError extends OperatorError {
  public readonly timeoutMs: number;

  constructor(operatorName: string, timeoutMs: number) {
    super(`Invocation of '${operatorName}' timed out after ${timeoutMs}ms`, operatorName);
    this.name = 'InvocationTimeoutError';
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, InvocationTimeoutError.prototype);
  }
}

/**
 * Checks if object is OperatorError instance
 * @param error Object to check
 */
export function isOperatorError(error: unknown): error is OperatorError {
  return error instanceof OperatorError;
}

/**
 * Structural errors abort the current operation and are never degraded
 */
export function isStructuralError(
  error: unknown
): error is OwnershipError | ArityError | AcyclicityViolation | UnsupportedTaskKindError {
  return (
    error instanceof OwnershipError ||
    error instanceof ArityError ||
    error instanceof AcyclicityViolation ||
    error instanceof UnsupportedTaskKindError
  );
}

/**
 * Type guard for standard Error
 * @param error Value to check
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Wraps a thrown value of unknown type into an Error
 */
export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(getErrorMessage(error));
}

/**
 * Safely extracts error message from unknown error type
 * @param error Error of unknown type
 * @returns Error message string
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
