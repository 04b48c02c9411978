import { HookManager } from '../lib/opgraph/src/engine/hook-manager';
import { InvocationEventType } from '../lib/opgraph/src/types/invocation-hooks';
import { Operator } from '../lib/opgraph/src/operator/operator';
import { LoggerManager } from '../lib/opgraph/src/utils/logging';
import { LogLevel } from '../lib/opgraph/src/types/logger';
import { TestLoggerAdapter } from './utils/test-logger-adapter';

describe('HookManager', () => {
  const operator = new Operator({ name: 'probe' });

  it('should call every registered handler with event arguments', () => {
    const hooks = new HookManager();
    const first = jest.fn();
    const second = jest.fn();

    hooks.on(InvocationEventType.INVOCATION_STARTED, first);
    hooks.on(InvocationEventType.INVOCATION_STARTED, second);
    hooks.emit(InvocationEventType.INVOCATION_STARTED, operator, { x: 1 });

    expect(first).toHaveBeenCalledWith(operator, { x: 1 });
    expect(second).toHaveBeenCalledWith(operator, { x: 1 });
  });

  it('should stop calling a handler after unsubscribe', () => {
    const hooks = new HookManager();
    const handler = jest.fn();

    const unsubscribe = hooks.on(InvocationEventType.INVOCATION_COMPLETED, handler);
    unsubscribe();
    hooks.emit(InvocationEventType.INVOCATION_COMPLETED, operator, 1, 5);

    expect(handler).not.toHaveBeenCalled();
    expect(hooks.hasHandlers(InvocationEventType.INVOCATION_COMPLETED)).toBe(false);
  });

  it('should clear handlers of one event or all events', () => {
    const hooks = new HookManager();
    hooks.on(InvocationEventType.INVOCATION_STARTED, jest.fn());
    hooks.on(InvocationEventType.INVOCATION_FAILED, jest.fn());

    hooks.clearEvent(InvocationEventType.INVOCATION_STARTED);
    expect(hooks.hasHandlers(InvocationEventType.INVOCATION_STARTED)).toBe(false);
    expect(hooks.hasHandlers(InvocationEventType.INVOCATION_FAILED)).toBe(true);

    hooks.clearAllEvents();
    expect(hooks.hasHandlers(InvocationEventType.INVOCATION_FAILED)).toBe(false);
  });

  it('should log a failing handler and keep calling the others', () => {
    const previous = LoggerManager.getInstance().getLogger();
    const logger = new TestLoggerAdapter();
    LoggerManager.getInstance().setLogger(logger);

    try {
      const hooks = new HookManager();
      const after = jest.fn();
      hooks.on(InvocationEventType.INVOCATION_FAILED, () => {
        throw new Error('handler broke');
      });
      hooks.on(InvocationEventType.INVOCATION_FAILED, after);

      hooks.emit(InvocationEventType.INVOCATION_FAILED, operator, new Error('forward failed'));

      expect(after).toHaveBeenCalledTimes(1);
      expect(logger.messages(LogLevel.ERROR)).toEqual([
        'Error in event handler invocationFailed: handler broke',
      ]);
    } finally {
      LoggerManager.getInstance().setLogger(previous);
    }
  });
});
