import {
  AcyclicityViolation,
  ArityError,
  ForwardNotImplementedError,
  InvocationCancelledError,
  InvocationTimeoutError,
  OperatorError,
  OwnershipError,
  UnsupportedTaskKindError,
  getErrorMessage,
  isOperatorError,
  isStructuralError,
  toError,
} from '../lib/opgraph/src/utils/operator-error';

describe('OperatorError', () => {
  it('should carry the operator name and format toString', () => {
    const error = new OperatorError('Something went wrong', 'tokenize');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('OperatorError');
    expect(error.operatorName).toBe('tokenize');
    expect(error.toString()).toBe('[OperatorError in tokenize] Something went wrong');
  });

  it('should serialize the original error', () => {
    const cause = new TypeError('bad input');
    const error = new OperatorError('Wrapped', 'embed', cause);

    expect(error.toJSON()).toEqual({
      name: 'OperatorError',
      message: 'Wrapped',
      operatorName: 'embed',
      originalError: { name: 'TypeError', message: 'bad input' },
    });
    expect(error.stack).toContain('Caused by: TypeError: bad input');
  });

  it('should keep subclass prototypes', () => {
    const errors = [
      new OwnershipError('taken', 'a'),
      new ArityError('count', 'a', 2, 1),
      new AcyclicityViolation('a', ['a', 'b', 'a']),
      new UnsupportedTaskKindError('bash', 'ShellTask'),
      new ForwardNotImplementedError('a'),
      new InvocationCancelledError('a'),
      new InvocationTimeoutError('a', 100),
    ];

    for (const error of errors) {
      expect(error).toBeInstanceOf(OperatorError);
      expect(isOperatorError(error)).toBe(true);
    }
    expect(errors.map(error => error.name)).toEqual([
      'OwnershipError',
      'ArityError',
      'AcyclicityViolation',
      'UnsupportedTaskKindError',
      'ForwardNotImplementedError',
      'InvocationCancelledError',
      'InvocationTimeoutError',
    ]);
  });

  it('should build descriptive messages', () => {
    expect(new AcyclicityViolation('a', ['a', 'b', 'a']).message).toBe(
      'Cycle detected in operator graph: a -> b -> a'
    );
    expect(new UnsupportedTaskKindError('bash', 'ShellTask').message).toBe(
      "Task 'bash' is of kind 'ShellTask'; only CallableTask tasks can be imported"
    );
    expect(new ForwardNotImplementedError('embed').message).toBe(
      "No forward implemented for operator 'embed'"
    );
    expect(new InvocationTimeoutError('embed', 250).message).toBe(
      "Invocation of 'embed' timed out after 250ms"
    );
  });

  it('should classify structural errors', () => {
    expect(isStructuralError(new OwnershipError('taken', 'a'))).toBe(true);
    expect(isStructuralError(new ArityError('count', 'a', 1, 0))).toBe(true);
    expect(isStructuralError(new AcyclicityViolation('a', ['a', 'a']))).toBe(true);
    expect(isStructuralError(new UnsupportedTaskKindError('t', 'k'))).toBe(true);
    expect(isStructuralError(new ForwardNotImplementedError('a'))).toBe(false);
    expect(isStructuralError(new Error('plain'))).toBe(false);
  });
});

describe('error helpers', () => {
  it('should extract messages from unknown values', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain text')).toBe('plain text');
    expect(getErrorMessage({ message: 'from object' })).toBe('from object');
    expect(getErrorMessage(42)).toBe('42');
  });

  it('should wrap non-errors', () => {
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});
