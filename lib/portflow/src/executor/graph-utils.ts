import type { Flow } from '../flow/flow';
import type { Node } from '../flow/node';

/**
 * Nodes reachable from the roots along forward edges, roots included
 */
export function collectReachable(flow: Flow, roots: Iterable<Node>): Set<Node> {
  const reachable = new Set<Node>(roots);
  const queue = [...reachable];

  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) {
      break;
    }
    for (const succ of flow.successors(node)) {
      if (!reachable.has(succ)) {
        reachable.add(succ);
        queue.push(succ);
      }
    }
  }

  return reachable;
}

/**
 * Number of distinct predecessors of each node, counting only nodes in `scope`
 */
export function countPredecessors(flow: Flow, scope: ReadonlySet<Node>): Map<Node, number> {
  const counts = new Map<Node, number>();
  scope.forEach(node => counts.set(node, 0));

  scope.forEach(node => {
    for (const succ of flow.successors(node)) {
      const count = counts.get(succ);
      if (count !== undefined) {
        counts.set(succ, count + 1);
      }
    }
  });

  return counts;
}

/**
 * Nodes of `scope` that lie on or behind a cycle, empty for acyclic scopes
 * @param counts Result of {@link countPredecessors} for the same scope
 */
export function findCycleNodes(
  flow: Flow,
  scope: ReadonlySet<Node>,
  counts: ReadonlyMap<Node, number>
): Node[] {
  const remaining = new Map(counts);
  const queue = [...scope].filter(node => remaining.get(node) === 0);

  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) {
      break;
    }
    remaining.delete(node);
    for (const succ of flow.successors(node)) {
      const count = remaining.get(succ);
      if (count === undefined) {
        continue;
      }
      remaining.set(succ, count - 1);
      if (count - 1 === 0) {
        queue.push(succ);
      }
    }
  }

  return [...remaining.keys()];
}
