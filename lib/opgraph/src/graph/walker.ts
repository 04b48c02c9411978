/**
 * Anything that exposes named children can be walked
 */
export interface GraphNode<T extends GraphNode<T>> {
  readonly name: string;
  children(): ReadonlyMap<string, T>;
}

/**
 * Options for tree traversal
 */
export interface TraversalOptions {
  /**
   * Skip an instance that was already yielded under another path (default: true)
   */
  readonly removeDuplicates?: boolean;

  /**
   * Path given to the root (default: '')
   */
  readonly prefix?: string;
}

/**
 * Walks a tree depth-first in pre-order, yielding `[dottedPath, node]` pairs.
 * A node is yielded before its children, children in registration order.
 *
 * @example
 * ```typescript
 * for (const [path, op] of namedOperators(root)) {
 *   console.log(path || '<root>', op.name);
 * }
 * ```
 */
export function* namedOperators<T extends GraphNode<T>>(
  root: T,
  options: TraversalOptions = {}
): Generator<[string, T], void, undefined> {
  yield* walk(root, options.prefix ?? '', options.removeDuplicates ?? true, new Set<T>());
}

function* walk<T extends GraphNode<T>>(
  node: T,
  prefix: string,
  removeDuplicates: boolean,
  memo: Set<T>
): Generator<[string, T], void, undefined> {
  if (memo.has(node)) {
    return;
  }
  if (removeDuplicates) {
    memo.add(node);
  }

  yield [prefix, node];

  for (const [name, child] of node.children()) {
    const childPrefix = prefix ? `${prefix}.${name}` : name;
    yield* walk(child, childPrefix, removeDuplicates, memo);
  }
}

/**
 * Distinct nodes of a tree in pre-order
 */
export function* operators<T extends GraphNode<T>>(root: T): Generator<T, void, undefined> {
  for (const [, node] of namedOperators(root)) {
    yield node;
  }
}

const enum Mark {
  WHITE,
  GREY,
  BLACK,
}

/**
 * Three-colour DFS over node identity.
 * A node reached again through several parents is not a cycle; only an edge
 * back to a node that is still on the DFS stack is.
 *
 * @returns Nodes along the cycle (first and last are the same node), or undefined
 */
export function findCycle<T extends GraphNode<T>>(root: T): T[] | undefined {
  const marks = new Map<T, Mark>();
  const stack: T[] = [];

  const visit = (node: T): T[] | undefined => {
    marks.set(node, Mark.GREY);
    stack.push(node);

    for (const child of node.children().values()) {
      const mark = marks.get(child) ?? Mark.WHITE;
      if (mark === Mark.GREY) {
        return [...stack.slice(stack.indexOf(child)), child];
      }
      if (mark === Mark.WHITE) {
        const cycle = visit(child);
        if (cycle) {
          return cycle;
        }
      }
    }

    stack.pop();
    marks.set(node, Mark.BLACK);
    return undefined;
  };

  return visit(root);
}

export function isAcyclic<T extends GraphNode<T>>(root: T): boolean {
  return findCycle(root) === undefined;
}

/**
 * Finds a downward path between two nodes
 * @returns Nodes from `from` to `to` inclusive, or undefined when `to` is not reachable
 */
export function findPath<T extends GraphNode<T>>(from: T, to: T): T[] | undefined {
  const visited = new Set<T>();

  const visit = (node: T): T[] | undefined => {
    if (node === to) {
      return [node];
    }
    if (visited.has(node)) {
      return undefined;
    }
    visited.add(node);

    for (const child of node.children().values()) {
      const path = visit(child);
      if (path) {
        return [node, ...path];
      }
    }
    return undefined;
  };

  return visit(from);
}
