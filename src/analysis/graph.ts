import { FieldId, sortedUnique } from '../hlir';
import { StructuralError } from '../models';
import { AnalysisMode, DependencyEdge, EdgeKind, Event, EventRole } from './types';

interface EdgeRecord {
  source: number;
  target: number;
  kind: EdgeKind;
  fields: FieldId[];
}

function edgeKey(source: number, target: number, kind: EdgeKind) {
  return `${source}>${target}:${kind}`;
}

/**
 * Events live in an arena addressed by dense indices; edges are kept once per
 * (source, target, kind) and indexed by endpoint for both directions.
 */
export class DependencyGraph {
  private readonly eventList: Event[] = [];
  private readonly eventsById = new Map<string, Event>();
  private readonly edgeList: EdgeRecord[] = [];
  private readonly edgesByKey = new Map<string, EdgeRecord>();
  private readonly outgoing: EdgeRecord[][] = [];
  private readonly incoming: EdgeRecord[][] = [];

  constructor(readonly mode: AnalysisMode) {}

  get events(): readonly Event[] {
    return this.eventList;
  }

  get edges(): readonly DependencyEdge[] {
    return this.edgeList;
  }

  get size(): number {
    return this.eventList.length;
  }

  addEvent(node: string, role: EventRole, pipeline: string): Event {
    const id = role === 'match' || role === 'action' ? `${node}.${role}` : node;
    if (this.eventsById.has(id)) {
      throw new StructuralError(`Event "${id}" appears more than once`);
    }
    const event: Event = { index: this.eventList.length, id, node, role, pipeline };
    this.eventList.push(event);
    this.eventsById.set(id, event);
    this.outgoing.push([]);
    this.incoming.push([]);
    return event;
  }

  event(index: number): Event {
    const event = this.eventList[index];
    if (!event) {
      throw new RangeError(`No event with index ${index}`);
    }
    return event;
  }

  eventById(id: string): Event | undefined {
    return this.eventsById.get(id);
  }

  /**
   * Adds an edge, or merges `fields` into the existing edge with the same
   * source, target and kind.
   */
  addEdge(source: number, target: number, kind: EdgeKind, fields: readonly FieldId[] = []): DependencyEdge {
    if (source === target) {
      throw new StructuralError(`Self dependency on "${this.event(source).id}"`);
    }
    this.event(source);
    this.event(target);

    const key = edgeKey(source, target, kind);
    const existing = this.edgesByKey.get(key);
    if (existing) {
      existing.fields = sortedUnique([...existing.fields, ...fields]);
      return existing;
    }
    const record: EdgeRecord = { source, target, kind, fields: sortedUnique(fields) };
    this.edgeList.push(record);
    this.edgesByKey.set(key, record);
    this.outgoing[source].push(record);
    this.incoming[target].push(record);
    return record;
  }

  findEdge(source: number, target: number, kind: EdgeKind): DependencyEdge | undefined {
    return this.edgesByKey.get(edgeKey(source, target, kind));
  }

  outgoingEdges(index: number): readonly DependencyEdge[] {
    return this.outgoing[index] ?? [];
  }

  incomingEdges(index: number): readonly DependencyEdge[] {
    return this.incoming[index] ?? [];
  }

  /** Same events, only the edges `keep` accepts, in their original order. */
  filterEdges(keep: (edge: DependencyEdge) => boolean): DependencyGraph {
    const copy = new DependencyGraph(this.mode);
    for (const event of this.eventList) {
      copy.addEvent(event.node, event.role, event.pipeline);
    }
    for (const edge of this.edgeList) {
      if (keep(edge)) {
        copy.addEdge(edge.source, edge.target, edge.kind, edge.fields);
      }
    }
    return copy;
  }
}
