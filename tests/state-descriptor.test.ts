import { Operator } from '../lib/opgraph/src/operator/operator';
import { defineForward } from '../lib/opgraph/src/operator/forward';
import { createStateDescriptor, toOutputMap } from '../lib/opgraph/src/operator/state';
import { InvocationEngine } from '../lib/opgraph/src/engine/invocation-engine';
import { OperatorPhase } from '../lib/opgraph/src/types/state-descriptor';
import { OperatorError } from '../lib/opgraph/src/utils/operator-error';

describe('StateDescriptor', () => {
  it('should start stopped and empty', () => {
    const state = new Operator({ version: 2 }).stateDict();

    expect(state.phase).toBe(OperatorPhase.STOPPED);
    expect(state.version).toBe(2);
    expect(state.data.size).toBe(0);
    expect(state.inputs.size).toBe(0);
    expect(state.outputs.size).toBe(0);
  });

  it('should never share state between instances', () => {
    const first = new Operator();
    const second = new Operator();

    first.loadStateDict({ data: { weight: 0.5 } });

    expect(first.stateDict().data.get('weight')).toBe(0.5);
    expect(second.stateDict().data.size).toBe(0);
  });

  it('should materialise records and entry lists as ordered maps', () => {
    const fromRecord = createStateDescriptor({ data: { b: 2, a: 1 } });
    const entries: Array<[string, unknown]> = [['z', 26], ['y', 25]];
    const fromEntries = createStateDescriptor({ data: entries });

    expect(fromRecord.data).toBeInstanceOf(Map);
    expect([...fromRecord.data.keys()]).toEqual(['b', 'a']);
    expect([...fromEntries.data.entries()]).toEqual([['z', 26], ['y', 25]]);
  });

  it('should return a copy from stateDict', () => {
    const op = new Operator();
    op.loadStateDict({ data: { step: 1 } });

    expect(op.stateDict().data).not.toBe(op.stateDict().data);
    expect(op.stateDict()).toEqual(op.stateDict());
  });

  it('should reject descriptors written by a newer version', () => {
    const op = new Operator({ name: 'model', version: 2 });

    expect(() => op.loadStateDict({ version: 3 })).toThrow(OperatorError);
    expect(() => op.loadStateDict({ version: 3 })).toThrow(
      'State version 3 is newer than operator version 2'
    );
  });

  it('should record outputs per key or under output', () => {
    expect([...toOutputMap({ loss: 0.1, step: 3 })]).toEqual([['loss', 0.1], ['step', 3]]);
    expect([...toOutputMap(7)]).toEqual([['output', 7]]);
  });

  it('should track the last call and its phase', async () => {
    const engine = new InvocationEngine();
    const op = new Operator({
      name: 'scale',
      forward: defineForward(['x', 'factor'], ({ x, factor }) => {
        if (Number(factor) === 0) {
          throw new Error('zero factor');
        }
        return { y: Number(x) * Number(factor) };
      }),
    });

    await engine.invoke(op, [3, 2]);
    const afterSuccess = op.stateDict();
    expect(afterSuccess.phase).toBe(OperatorPhase.STOPPED);
    expect([...afterSuccess.inputs]).toEqual([['x', 3], ['factor', 2]]);
    expect([...afterSuccess.outputs]).toEqual([['y', 6]]);

    await expect(engine.invoke(op, [3, 0])).rejects.toThrow('zero factor');
    expect(op.stateDict().phase).toBe(OperatorPhase.FAILED);
  });
});
