import {
  conditionalReads,
  ControlNode,
  FieldId,
  Hlir,
  tableActionAccess,
  tableMatchReads,
  tableNextEntries,
} from '../hlir';
import { log } from '../io';
import { StructuralError } from '../models';
import { BitSet } from './bitSet';
import { DependencyGraph } from './graph';
import { overlappingFields } from './overlap';
import { AnalysisMode, Event } from './types';

export interface BuildOptions {
  mode: AnalysisMode;
  /** emit control-flow-only edges; off yields a data-dependency-only graph */
  controlFlowEdges?: boolean;
}

export interface ControlFlowNode {
  readonly name: string;
  readonly node: ControlNode;
  readonly pipeline: string;
  /** distinct successor names, in declaration order */
  readonly successors: readonly string[];
}

interface NodeAccess {
  /** fields the node's match key or condition reads */
  readonly matchReads: readonly FieldId[];
  readonly actionReads: readonly FieldId[];
  readonly writes: readonly FieldId[];
}

function lookupNode(hlir: Hlir, name: string): ControlNode {
  const node = hlir.tables.get(name) ?? hlir.conditionals.get(name);
  if (!node) {
    throw new StructuralError(`Unknown control node "${name}"`);
  }
  return node;
}

export function successorNames(node: ControlNode): string[] {
  const targets =
    node.kind === 'table' ? tableNextEntries(node.next).map(([, next]) => next) : [node.trueNext, node.falseNext];
  return Array.from(new Set(targets.filter((next): next is string => next !== null)));
}

/**
 * Control nodes reachable from the pipelines, in a deterministic topological
 * order. Pipelines are walked in declaration order; a node applied from two
 * pipelines or a cycle in the successor relation is unsupported.
 */
export function collectControlFlow(hlir: Hlir): ControlFlowNode[] {
  const discovered = new Map<string, ControlFlowNode>();
  const visiting = new Set<string>();
  const finished = new Set<string>();

  const walk = (name: string, pipeline: string, path: string[]) => {
    if (finished.has(name)) {
      const owner = discovered.get(name)?.pipeline;
      if (owner !== pipeline) {
        throw new StructuralError(`"${name}" is applied in both ${owner} and ${pipeline}`);
      }
      return;
    }
    if (visiting.has(name)) {
      const cycle = [...path.slice(path.indexOf(name)), name];
      throw new StructuralError(`Cyclic control flow: ${cycle.join(' → ')}`);
    }
    visiting.add(name);
    const node = lookupNode(hlir, name);
    const entry: ControlFlowNode = { name, node, pipeline, successors: successorNames(node) };
    discovered.set(name, entry);
    for (const next of entry.successors) {
      walk(next, pipeline, [...path, name]);
    }
    visiting.delete(name);
    finished.add(name);
  };

  for (const [pipeline, entry] of hlir.pipelines) {
    if (entry !== null) {
      walk(entry, pipeline, []);
    }
  }

  for (const name of [...hlir.tables.keys(), ...hlir.conditionals.keys()]) {
    if (!discovered.has(name)) {
      log.debug(`"${name}" is not reachable from any pipeline, leaving it out`);
    }
  }

  const rank = new Map(Array.from(discovered.keys()).map((name, index) => [name, index]));
  const indegree = new Map<string, number>(Array.from(discovered.keys()).map(name => [name, 0]));
  for (const entry of discovered.values()) {
    for (const next of entry.successors) {
      indegree.set(next, (indegree.get(next) || 0) + 1);
    }
  }
  const byRank = (a: string, b: string) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0);
  const queue = Array.from(discovered.keys()).filter(name => indegree.get(name) === 0);
  const order: ControlFlowNode[] = [];
  while (queue.length > 0) {
    const name = queue.shift();
    const entry = name === undefined ? undefined : discovered.get(name);
    if (!entry) {
      break;
    }
    order.push(entry);
    for (const next of entry.successors) {
      const remaining = (indegree.get(next) || 0) - 1;
      indegree.set(next, remaining);
      if (remaining === 0) {
        queue.push(next);
        queue.sort(byRank);
      }
    }
  }
  return order;
}

function nodeAccess(hlir: Hlir, node: ControlNode): NodeAccess {
  if (node.kind === 'conditional') {
    return { matchReads: conditionalReads(node), actionReads: [], writes: [] };
  }
  const access = tableActionAccess(hlir, node);
  return { matchReads: tableMatchReads(node), actionReads: access.reads, writes: access.writes };
}

/**
 * Builds the table dependency graph. For every control node A and every node B
 * reachable from it, B gets a field edge when it reads something A's actions may
 * write, and a control-flow-only edge otherwise.
 */
export function buildDependencyGraph(hlir: Hlir, options: BuildOptions): DependencyGraph {
  const controlFlowEdges = options.controlFlowEdges ?? true;
  const nodes = collectControlFlow(hlir);
  const graph = new DependencyGraph(options.mode);

  // entry event receives edges, exit event emits them
  const entryEvent: Event[] = [];
  const exitEvent: Event[] = [];
  const actionEvent: Array<Event | undefined> = [];

  for (const { name, node, pipeline } of nodes) {
    if (node.kind === 'conditional') {
      const event = graph.addEvent(name, 'conditional', pipeline);
      entryEvent.push(event);
      exitEvent.push(event);
      actionEvent.push(undefined);
    } else if (options.mode === 'coarse') {
      const event = graph.addEvent(name, 'table', pipeline);
      entryEvent.push(event);
      exitEvent.push(event);
      actionEvent.push(undefined);
    } else {
      const match = graph.addEvent(name, 'match', pipeline);
      const action = graph.addEvent(name, 'action', pipeline);
      graph.addEdge(match.index, action.index, 'intra');
      entryEvent.push(match);
      exitEvent.push(action);
      actionEvent.push(action);
    }
  }

  const position = new Map(nodes.map((entry, index) => [entry.name, index]));
  const reach = nodes.map(() => new BitSet(nodes.length));
  for (let index = nodes.length - 1; index >= 0; index--) {
    for (const next of nodes[index].successors) {
      const target = position.get(next);
      if (target !== undefined) {
        reach[index].add(target);
        reach[index].union(reach[target]);
      }
    }
  }

  const access = nodes.map(entry => nodeAccess(hlir, entry.node));

  nodes.forEach((_, source) => {
    const writes = access[source].writes;
    const from = exitEvent[source].index;
    for (const target of reach[source].toArray()) {
      const matchFields = overlappingFields(writes, access[target].matchReads);
      const targetAction = actionEvent[target];
      const actionFields = targetAction ? overlappingFields(writes, access[target].actionReads) : [];

      if (matchFields.length > 0) {
        graph.addEdge(from, entryEvent[target].index, 'field', matchFields);
      }
      if (targetAction && actionFields.length > 0) {
        graph.addEdge(from, targetAction.index, 'field', actionFields);
      }
      if (matchFields.length === 0 && actionFields.length === 0 && controlFlowEdges) {
        graph.addEdge(from, entryEvent[target].index, 'control');
      }
    }
  });

  log.debug(
    `built ${options.mode} dependency graph: ${graph.size} events, ${graph.edges.length} edges from ${nodes.length} control nodes`
  );
  return graph;
}
