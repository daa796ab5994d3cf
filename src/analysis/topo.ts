import { CycleError } from '../models';
import { BitSet } from './bitSet';
import { DependencyGraph } from './graph';

function insertSorted(queue: number[], value: number) {
  let low = 0;
  let high = queue.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (queue[mid] < value) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  queue.splice(low, 0, value);
}

/**
 * Kahn's algorithm; among ready events the lowest index goes first, so the
 * order is the same for every run over the same graph.
 */
export function topologicalOrder(graph: DependencyGraph): number[] {
  const indegree = graph.events.map(event => graph.incomingEdges(event.index).length);
  const queue = indegree.flatMap((value, index) => (value === 0 ? [index] : []));
  const order: number[] = [];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) {
      break;
    }
    order.push(current);
    for (const edge of graph.outgoingEdges(current)) {
      indegree[edge.target] -= 1;
      if (indegree[edge.target] === 0) {
        insertSorted(queue, edge.target);
      }
    }
  }

  if (order.length !== graph.size) {
    const remaining = graph.events
      .filter(event => indegree[event.index] > 0)
      .map(event => `${event.id}(${indegree[event.index]})`);
    throw new CycleError(`Circular dependency detected in table graph. Remaining: ${remaining.join(', ')}`, remaining);
  }
  return order;
}

/** For every event, the set of events reachable from it through one or more edges. */
export function descendants(graph: DependencyGraph, order: readonly number[] = topologicalOrder(graph)): BitSet[] {
  const reach = graph.events.map(() => new BitSet(graph.size));
  for (let position = order.length - 1; position >= 0; position--) {
    const current = order[position];
    for (const edge of graph.outgoingEdges(current)) {
      reach[current].add(edge.target);
      reach[current].union(reach[edge.target]);
    }
  }
  return reach;
}
