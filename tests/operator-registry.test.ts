import { Operator } from '../lib/opgraph/src/operator/operator';
import { OperatorRegistry } from '../lib/opgraph/src/operator/registry';
import { AcyclicityViolation, OwnershipError } from '../lib/opgraph/src/utils/operator-error';

class Tokenizer extends Operator {}

class Embedder extends Operator {
  readonly dimensions = 8;
}

const named = (name: string): Operator => new Operator({ name });

describe('Operator children', () => {
  it('should default the name to the constructor name', () => {
    expect(new Tokenizer().name).toBe('Tokenizer');
    expect(new Operator().name).toBe('Operator');
    expect(named('custom').name).toBe('custom');
  });

  it('should keep children in registration order', () => {
    const parent = named('parent');
    const b = named('b');
    const a = named('a');

    parent.setChild('second', b).setChild('first', a);

    expect([...parent.children().keys()]).toEqual(['second', 'first']);
    expect(parent.child('first')).toBe(a);
    expect(parent.hasChild('second')).toBe(true);
    expect(parent.hasChild('third')).toBe(false);
  });

  it('should release the previous child when a name is re-assigned', () => {
    const parent = named('parent');
    const oldChild = named('old');
    const newChild = named('new');

    parent.setChild('slot', oldChild);
    parent.setChild('slot', newChild);

    expect(parent.child('slot')).toBe(newChild);
    expect(oldChild.owner).toBeUndefined();
    expect(newChild.owner).toBe(parent);
  });

  it('should treat re-assigning the same child to the same slot as a no-op', () => {
    const parent = named('parent');
    const child = named('child');

    parent.setChild('slot', child);
    parent.setChild('slot', child);

    expect([...parent.children().keys()]).toEqual(['slot']);
    expect(child.owner).toBe(parent);
  });

  it('should reject a child owned by another operator', () => {
    const first = named('first');
    const second = named('second');
    const child = new Tokenizer();

    first.setChild('tok', child);

    expect(() => second.setChild('tok', child)).toThrow(OwnershipError);
    expect(() => second.setChild('tok', child)).toThrow(
      "Operator 'Tokenizer' is already owned by 'first' as 'tok'; detach it first or use linkChild()"
    );
  });

  it('should allow attaching a detached child elsewhere', () => {
    const first = named('first');
    const second = named('second');
    const child = named('child');

    first.setChild('c', child);
    child.detach();
    second.setChild('c', child);

    expect(first.hasChild('c')).toBe(false);
    expect(child.owner).toBe(second);
  });

  it('should reject names of existing members', () => {
    const embedder = new Embedder();

    expect(() => embedder.setChild('dimensions', named('x'))).toThrow(
      "Attribute 'dimensions' already exists"
    );
    expect(() => embedder.setChild('setChild', named('x'))).toThrow(OwnershipError);
  });

  it('should reject empty names', () => {
    expect(() => named('parent').setChild('', named('x'))).toThrow(
      'Child name must be a non-empty string'
    );
  });

  it('should reject assignment before the constructor has run', () => {
    const raw: Operator = Object.create(Operator.prototype);

    expect(() => raw.setChild('x', named('x'))).toThrow(OwnershipError);
    expect(() => raw.setChild('x', named('x'))).toThrow(
      "Cannot assign operator 'x' before the Operator constructor has run"
    );
  });

  it('should reject an operator as its own child', () => {
    const a = named('A');

    expect(() => a.setChild('self', a)).toThrow(AcyclicityViolation);
  });

  it('should reject attaching an ancestor', () => {
    const a = named('A');
    const b = named('B');
    const c = named('C');
    a.setChild('b', b);
    b.setChild('c', c);

    let caught: unknown;
    try {
      c.linkChild('a', a);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AcyclicityViolation);
    if (caught instanceof AcyclicityViolation) {
      expect(caught.cycle).toEqual(['C', 'A', 'B', 'C']);
      expect(caught.operatorName).toBe('C');
    }
    expect(c.hasChild('a')).toBe(false);
  });
});

describe('Operator shared references', () => {
  it('should link a child without taking ownership', () => {
    const owner = named('owner');
    const other = named('other');
    const child = named('child');

    owner.setChild('c', child);
    other.linkChild('c', child);

    expect(child.owner).toBe(owner);
    expect(child.parents()).toEqual([owner, other]);
    expect(other.isSharedChild('c')).toBe(true);
    expect(owner.isSharedChild('c')).toBe(false);
  });

  it('should drop the parent link when the shared edge is removed', () => {
    const owner = named('owner');
    const other = named('other');
    const child = named('child');
    owner.setChild('c', child);
    other.linkChild('c', child);

    expect(other.removeChild('c')).toBe(true);
    expect(other.removeChild('c')).toBe(false);
    expect(child.parents()).toEqual([owner]);
  });

  it('should keep the parent link while another shared edge remains', () => {
    const other = named('other');
    const child = named('child');
    other.linkChild('left', child);
    other.linkChild('right', child);

    other.removeChild('left');

    expect(child.parents()).toEqual([other]);
  });

  it('should report a diamond as acyclic', () => {
    const root = named('root');
    const left = named('left');
    const right = named('right');
    const join = named('join');
    root.setChild('left', left).setChild('right', right);
    left.setChild('join', join);
    right.linkChild('join', join);

    expect(root.isAcyclic()).toBe(true);
    expect(join.parents()).toEqual([left, right]);
  });
});

describe('Operator formatting', () => {
  it('should render nested children with indentation', () => {
    const a = named('A');
    const b = named('B');
    a.setChild('y', b);
    b.setChild('x', named('C'));

    expect(a.toString()).toBe('A(\n  (y): B(\n    (x): C()\n  )\n)');
  });

  it('should render a leaf on one line', () => {
    expect(new Tokenizer().toString()).toBe('Tokenizer()');
  });
});

describe('OperatorRegistry', () => {
  it('should return a snapshot view and removed edges', () => {
    const registry = new OperatorRegistry();
    const child = named('child');
    registry.set('c', child, true);

    const view = registry.view();
    expect(registry.delete('c')).toEqual({ operator: child, shared: true });
    expect(registry.delete('c')).toBeUndefined();
    expect(view.get('c')).toBe(child);
    expect(registry.size).toBe(0);
  });
});
