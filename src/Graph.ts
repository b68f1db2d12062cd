/**
 * Minimal shape of a computation-graph node: its operands.
 * @public
 */
export interface GraphNode<T> {
  readonly prev: readonly T[];
}

/**
 * Operand edge: `from` is the `index`-th operand of `to`.
 * @public
 */
export interface GraphEdge<T> {
  from: T;
  to: T;
  index: number;
}

/**
 * Every node reachable from a root (each exactly once, operands before their
 * consumers) and every operand edge between them.
 * @public
 */
export interface GraphWalk<T> {
  nodes: T[];
  edges: GraphEdge<T>[];
}

/**
 * Something that turns a computation graph into an output format.
 * @public
 */
export interface GraphRenderer<T, R = string> {
  render(root: T): R;
}

/**
 * Returns all nodes reachable from root in topological order: every node appears
 * after all of its operands, and a node shared by several consumers appears once.
 *
 * This is the post-order of a depth-first walk, run on an explicit stack so deep
 * graphs cannot exhaust the call stack. Operands always exist before the node that
 * consumes them, so the graph is acyclic by construction and no cycle check is made.
 * @public
 */
export function topologicalOrder<T extends GraphNode<T>>(root: T): T[] {
  const order: T[] = [];
  const visited = new Set<T>([root]);
  const stack: Array<{ node: T; next: number }> = [{ node: root, next: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next < frame.node.prev.length) {
      const child = frame.node.prev[frame.next++];
      if (!visited.has(child)) {
        visited.add(child);
        stack.push({ node: child, next: 0 });
      }
    } else {
      stack.pop();
      order.push(frame.node);
    }
  }

  return order;
}

/**
 * Enumerates nodes and operand edges reachable from root, for renderers.
 * @public
 */
export function walkGraph<T extends GraphNode<T>>(root: T): GraphWalk<T> {
  const nodes = topologicalOrder(root);
  const edges: GraphEdge<T>[] = [];
  for (const to of nodes) {
    to.prev.forEach((from, index) => edges.push({ from, to, index }));
  }
  return { nodes, edges };
}

/**
 * Union of the topological orders of several roots, each node once.
 * @public
 */
export function collectNodes<T extends GraphNode<T>>(roots: readonly T[]): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const root of roots) {
    if (seen.has(root)) continue;
    for (const node of topologicalOrder(root)) {
      if (!seen.has(node)) {
        seen.add(node);
        out.push(node);
      }
    }
  }
  return out;
}
