import type { Operator } from './operator';

/**
 * Edge from an operator to one of its children
 */
export interface ChildEdge {
  readonly operator: Operator;

  /**
   * Shared edges reference a child owned elsewhere (or not owned at all)
   */
  readonly shared: boolean;
}

/**
 * Ordered child-name -> operator table of a single operator.
 * Naming and ownership rules are enforced by the owning Operator; the registry
 * only keeps insertion order and edge kinds.
 */
export class OperatorRegistry {
  private readonly edges = new Map<string, ChildEdge>();

  set(name: string, operator: Operator, shared: boolean): void {
    this.edges.set(name, { operator, shared });
  }

  /**
   * Removes an edge
   * @returns The removed edge, if the name was registered
   */
  delete(name: string): ChildEdge | undefined {
    const edge = this.edges.get(name);
    this.edges.delete(name);
    return edge;
  }

  has(name: string): boolean {
    return this.edges.has(name);
  }

  get(name: string): Operator | undefined {
    return this.edges.get(name)?.operator;
  }

  edge(name: string): ChildEdge | undefined {
    return this.edges.get(name);
  }

  /**
   * Checks whether any shared edge still points at the operator
   */
  hasSharedEdgeTo(operator: Operator): boolean {
    for (const edge of this.edges.values()) {
      if (edge.shared && edge.operator === operator) {
        return true;
      }
    }
    return false;
  }

  /**
   * Snapshot of the children in registration order
   */
  view(): ReadonlyMap<string, Operator> {
    const view = new Map<string, Operator>();
    for (const [name, edge] of this.edges) {
      view.set(name, edge.operator);
    }
    return view;
  }

  public get size(): number {
    return this.edges.size;
  }
}
