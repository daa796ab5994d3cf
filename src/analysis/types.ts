import { FieldId } from '../hlir';

/** `coarse`: one event per table. `fine`: a match-event and an action-event per table. */
export type AnalysisMode = 'coarse' | 'fine';

export type EventRole = 'table' | 'match' | 'action' | 'conditional';

export interface Event {
  readonly index: number;
  /** `table`, `table.match`, `table.action` or the conditional's name */
  readonly id: string;
  /** the table or conditional this event was derived from */
  readonly node: string;
  readonly role: EventRole;
  readonly pipeline: string;
}

/**
 * `control`: program order only. `field`: the target may observe a value the
 * source writes. `intra`: a table's match-event before its own action-event.
 */
export type EdgeKind = 'control' | 'field' | 'intra';

export interface DependencyEdge {
  readonly source: number;
  readonly target: number;
  readonly kind: EdgeKind;
  /** fields responsible for a `field` edge, sorted; empty otherwise */
  readonly fields: readonly FieldId[];
}
