import type { ForwardDefinition, ForwardInputs } from '../types/forward';
import { OperatorPhase } from '../types/state-descriptor';
import type { StateDescriptor, StateDescriptorInit } from '../types/state-descriptor';
import { AcyclicityViolation, OperatorError, OwnershipError } from '../utils/operator-error';
import { findPath, isAcyclic } from '../graph/walker';
import type { GraphNode } from '../graph/walker';
import { formatOperator } from '../graph/format';
import { OperatorRegistry } from './registry';
import { createStateDescriptor, toOutputMap } from './state';

/**
 * Options for operator construction
 */
export interface OperatorOptions {
  /**
   * Display name (default: constructor name)
   */
  readonly name?: string;

  /**
   * Descriptive text of this operator instance
   */
  readonly description?: string;

  /**
   * Schema tag of the operator state (default: 1)
   */
  readonly version?: number;

  readonly forward?: ForwardDefinition;
}

/**
 * Outcome of a finished invocation, as recorded in the state descriptor
 */
export type InvocationOutcome =
  | { readonly ok: true; readonly output: unknown }
  | { readonly ok: false; readonly error: Error };

/**
 * Named, composable unit of computation.
 *
 * Children are attached explicitly: `setChild` makes this operator the exclusive
 * owner of the child, `linkChild` adds a shared (non-owning) reference to a
 * child that is owned elsewhere. Attaching anything that would make an operator
 * its own descendant is rejected.
 *
 * @example
 * ```typescript
 * class Pipeline extends Operator {
 *   static description = 'Tokenize then embed';
 *
 *   constructor() {
 *     super();
 *     this.setChild('tokenize', new Tokenizer());
 *     this.setChild('embed', new Embedder());
 *   }
 * }
 * ```
 */
export class Operator implements GraphNode<Operator> {
  /**
   * Descriptive text of the operator class, exported next to the instance description
   */
  static description?: string;

  public readonly name: string;
  public readonly version: number;
  public description: string | undefined;

  /**
   * Communication metadata merged into exported scheduler tasks
   */
  comms?(): Readonly<Record<string, unknown>>;

  private readonly registry: OperatorRegistry;
  private forwardDefinition: ForwardDefinition | undefined;
  private ownerSlot: { readonly operator: Operator; readonly name: string } | undefined;
  private readonly sharedParents = new Set<Operator>();
  private acyclicCache: boolean | undefined;
  private state: StateDescriptor;
  private activeInvocations = 0;

  constructor(options: OperatorOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.version = options.version ?? 1;
    this.description = options.description;
    this.forwardDefinition = options.forward;
    this.ownerSlot = undefined;
    this.acyclicCache = undefined;
    this.state = createStateDescriptor({ version: this.version });
    this.registry = new OperatorRegistry();
  }

  // children/

  /**
   * Registers `child` under `name` with this operator as its exclusive owner.
   * Re-assigning a name that already holds a child releases the previous child.
   *
   * @throws OwnershipError if the operator was not constructed, the name is empty or
   * names a non-child member, or the child is owned by another slot
   * @throws AcyclicityViolation if the child is this operator or one of its ancestors
   */
  setChild(name: string, child: Operator): this {
    const registry = this.requireRegistry(name);
    this.assertAttachable(registry, name, child);

    const slot = child.ownerSlot;
    if (slot && slot.operator === this && slot.name === name) {
      return this;
    }
    if (slot) {
      throw new OwnershipError(
        `Operator '${child.name}' is already owned by '${slot.operator.name}' as '${slot.name}'; ` +
          'detach it first or use linkChild()',
        this.name
      );
    }

    this.releaseSlot(registry, name);
    registry.set(name, child, false);
    child.ownerSlot = { operator: this, name };
    this.invalidateStructure();
    return this;
  }

  /**
   * Registers a shared reference to `child` under `name` without taking ownership
   *
   * @throws OwnershipError on name collisions, AcyclicityViolation on cycles
   */
  linkChild(name: string, child: Operator): this {
    const registry = this.requireRegistry(name);
    this.assertAttachable(registry, name, child);

    const edge = registry.edge(name);
    if (edge && edge.shared && edge.operator === child) {
      return this;
    }

    this.releaseSlot(registry, name);
    registry.set(name, child, true);
    child.sharedParents.add(this);
    this.invalidateStructure();
    return this;
  }

  /**
   * Removes the child registered under `name`
   * @returns true if a child was removed
   */
  removeChild(name: string): boolean {
    const registry = this.requireRegistry(name);
    if (!registry.has(name)) {
      return false;
    }
    this.releaseSlot(registry, name);
    this.invalidateStructure();
    return true;
  }

  /**
   * Releases this operator from its owner; shared references stay in place
   */
  detach(): void {
    if (this.ownerSlot) {
      this.ownerSlot.operator.removeChild(this.ownerSlot.name);
    }
  }

  /**
   * Read view of the children in registration order
   */
  children(): ReadonlyMap<string, Operator> {
    return this.registry.view();
  }

  child(name: string): Operator | undefined {
    return this.registry.get(name);
  }

  hasChild(name: string): boolean {
    return this.registry.has(name);
  }

  /**
   * Checks whether the edge under `name` is a shared reference
   */
  isSharedChild(name: string): boolean {
    return this.registry.edge(name)?.shared ?? false;
  }

  public get owner(): Operator | undefined {
    return this.ownerSlot?.operator;
  }

  /**
   * Owner first, then every operator holding a shared reference
   */
  parents(): Operator[] {
    const owner = this.ownerSlot?.operator;
    return owner ? [owner, ...this.sharedParents] : [...this.sharedParents];
  }

  // /children

  // structure/

  /**
   * Cached acyclicity check, recomputed after any structural change below this operator
   */
  isAcyclic(): boolean {
    if (this.acyclicCache === undefined) {
      this.acyclicCache = isAcyclic<Operator>(this);
    }
    return this.acyclicCache;
  }

  private invalidateStructure(): void {
    this.acyclicCache = undefined;
    for (const parent of this.parents()) {
      parent.invalidateStructure();
    }
  }

  private requireRegistry(childName: string): OperatorRegistry {
    const registry: unknown = this.registry;
    if (!(registry instanceof OperatorRegistry)) {
      throw new OwnershipError(
        `Cannot assign operator '${childName}' before the Operator constructor has run`,
        String(this.name)
      );
    }
    return registry;
  }

  private assertAttachable(registry: OperatorRegistry, name: string, child: Operator): void {
    if (!name) {
      throw new OwnershipError('Child name must be a non-empty string', this.name);
    }
    if (name in this && !registry.has(name)) {
      throw new OwnershipError(`Attribute '${name}' already exists`, this.name);
    }
    if (child === this) {
      throw new AcyclicityViolation(this.name, [this.name, this.name]);
    }
    const path = findPath<Operator>(child, this);
    if (path) {
      throw new AcyclicityViolation(this.name, [this.name, ...path.map(op => op.name)]);
    }
  }

  private releaseSlot(registry: OperatorRegistry, name: string): void {
    const edge = registry.delete(name);
    if (!edge) {
      return;
    }
    if (!edge.shared) {
      edge.operator.ownerSlot = undefined;
    } else if (!registry.hasSharedEdgeTo(edge.operator)) {
      edge.operator.sharedParents.delete(this);
    }
  }

  // /structure

  // forward/

  registerForward(definition: ForwardDefinition): this {
    this.forwardDefinition = definition;
    return this;
  }

  getForward(): ForwardDefinition | undefined {
    return this.forwardDefinition;
  }

  hasForward(): boolean {
    return this.getForward() !== undefined;
  }

  // /forward

  // state/

  /**
   * Snapshot of the state descriptor; the returned maps are copies
   */
  stateDict(): StateDescriptor {
    return createStateDescriptor(this.state);
  }

  /**
   * Replaces persisted data and call signature from a descriptor
   * @throws OperatorError if the descriptor was written by a newer operator version
   */
  loadStateDict(descriptor: StateDescriptorInit): void {
    if (descriptor.version !== undefined && descriptor.version > this.version) {
      throw new OperatorError(
        `State version ${descriptor.version} is newer than operator version ${this.version}`,
        this.name
      );
    }
    this.state = createStateDescriptor({
      phase: this.state.phase,
      version: this.version,
      data: descriptor.data,
      inputs: descriptor.inputs,
      outputs: descriptor.outputs,
    });
  }

  /**
   * @internal Called by the invocation engine
   */
  recordInvocationStart(inputs: ForwardInputs): void {
    this.activeInvocations += 1;
    this.state = {
      ...this.state,
      phase: OperatorPhase.RUNNING,
      inputs: new Map(Object.entries(inputs)),
    };
  }

  /**
   * @internal Called by the invocation engine
   */
  recordInvocationEnd(outcome: InvocationOutcome): void {
    this.activeInvocations = Math.max(0, this.activeInvocations - 1);
    const settled = this.activeInvocations === 0;

    if (outcome.ok) {
      this.state = {
        ...this.state,
        phase: settled ? OperatorPhase.STOPPED : OperatorPhase.RUNNING,
        outputs: toOutputMap(outcome.output),
      };
    } else {
      this.state = {
        ...this.state,
        phase: settled ? OperatorPhase.FAILED : OperatorPhase.RUNNING,
      };
    }
  }

  // /state

  public toString(): string {
    return formatOperator<Operator>(this);
  }
}
