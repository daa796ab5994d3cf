import { log } from '../io';
import { BitSet } from './bitSet';
import { DependencyGraph } from './graph';
import { descendants, topologicalOrder } from './topo';

/**
 * Transitive reduction of a coarse graph: an edge u → w is dropped when w is
 * still reachable from u through other retained edges. Successors are visited
 * in topological order, so every alternative path through a direct successor
 * is already accounted for when w comes up.
 */
export function transitiveReduction(graph: DependencyGraph): DependencyGraph {
  if (graph.mode !== 'coarse') {
    throw new Error('Transitive reduction only applies to coarse graphs');
  }
  const order = topologicalOrder(graph);
  const position = new Array<number>(graph.size);
  order.forEach((event, index) => {
    position[event] = index;
  });
  const reach = descendants(graph, order);

  const redundant = new Set<string>();
  for (const source of order) {
    const targets = Array.from(new Set(graph.outgoingEdges(source).map(edge => edge.target))).sort(
      (a, b) => position[a] - position[b]
    );
    const covered = new BitSet(graph.size);
    for (const target of targets) {
      if (covered.has(target)) {
        redundant.add(`${source}>${target}`);
        continue;
      }
      covered.add(target);
      covered.union(reach[target]);
    }
  }

  const reduced = graph.filterEdges(edge => !redundant.has(`${edge.source}>${edge.target}`));
  log.debug(`transitive reduction removed ${graph.edges.length - reduced.edges.length} of ${graph.edges.length} edges`);
  return reduced;
}
