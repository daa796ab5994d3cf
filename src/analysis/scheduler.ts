import { DependencyGraph } from './graph';
import { topologicalOrder } from './topo';
import { DependencyEdge, Event } from './types';

export interface ScheduleOptions {
  /** conditionals occupy a stage of their own instead of passing through */
  countConditionals?: boolean;
}

/**
 * Stages an event occupies. A table and an action-event take one; a
 * match-event shares its stage with its own action-event.
 */
export function eventCost(event: Event, options: ScheduleOptions = {}): number {
  switch (event.role) {
    case 'table':
    case 'action':
      return 1;
    case 'match':
      return 0;
    case 'conditional':
      return options.countConditionals ? 1 : 0;
  }
}

interface ForwardPass {
  order: number[];
  cost: number[];
  /** earliest stage each event can start in */
  earliest: number[];
  length: number;
}

function forwardPass(graph: DependencyGraph, options: ScheduleOptions): ForwardPass {
  const order = topologicalOrder(graph);
  const cost = graph.events.map(event => eventCost(event, options));
  const earliest = new Array<number>(graph.size).fill(0);
  let length = 0;
  for (const current of order) {
    for (const edge of graph.incomingEdges(current)) {
      earliest[current] = Math.max(earliest[current], earliest[edge.source] + cost[edge.source]);
    }
    length = Math.max(length, earliest[current] + cost[current]);
  }
  return { order, cost, earliest, length };
}

export interface StageSchedule {
  /** stage index per event, starting at 0 */
  readonly stages: readonly number[];
  readonly minStages: number;
}

/** Longest-path stage assignment with every table treated as atomic. */
export function countMinStages(graph: DependencyGraph, options: ScheduleOptions = {}): StageSchedule {
  const { earliest, length } = forwardPass(graph, options);
  return { stages: earliest, minStages: length };
}

export interface CriticalPath {
  readonly length: number;
  readonly earliest: readonly number[];
  readonly latest: readonly number[];
  /** zero-slack events, in topological order */
  readonly events: readonly number[];
  /** dependency edges on some longest path; `intra` edges are never reported */
  readonly edges: readonly DependencyEdge[];
}

export function slack(path: CriticalPath, index: number): number {
  return path.latest[index] - path.earliest[index];
}

/**
 * Every event and dependency edge lying on some longest source-to-sink path.
 * A forward pass gives earliest stages, a backward pass the latest stages that
 * keep the overall length; zero slack on both ends of a tight edge marks it.
 */
export function criticalPath(graph: DependencyGraph, options: ScheduleOptions = {}): CriticalPath {
  const { order, cost, earliest, length } = forwardPass(graph, options);
  const latest = new Array<number>(graph.size).fill(length);

  for (let position = order.length - 1; position >= 0; position--) {
    const current = order[position];
    let bound = length - cost[current];
    for (const edge of graph.outgoingEdges(current)) {
      bound = Math.min(bound, latest[edge.target] - cost[current]);
    }
    latest[current] = bound;
  }

  const zeroSlack = (index: number) => latest[index] === earliest[index];
  const events = order.filter(zeroSlack);
  const edges = graph.edges.filter(
    edge =>
      edge.kind !== 'intra' &&
      zeroSlack(edge.source) &&
      zeroSlack(edge.target) &&
      earliest[edge.source] + cost[edge.source] === earliest[edge.target]
  );

  return { length, earliest, latest, events, edges };
}
