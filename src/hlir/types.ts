import { OrderedMap } from './orderedMap';

/**
 * Canonical field identity: `inst.field`, `stack[2].field`, `stack[next].field`,
 * `inst.$valid` or `register:name`.
 */
export type FieldId = string;

export type StackIndex = number | 'next' | 'last';

export interface HeaderRef {
  readonly base: string;
  readonly index?: StackIndex;
}

export interface HeaderType {
  readonly name: string;
  /** field name to width in bits */
  readonly fields: OrderedMap<number>;
}

export interface HeaderInstance {
  readonly name: string;
  readonly type: HeaderType;
  readonly metadata: boolean;
  readonly stackSize?: number;
}

export type ArgumentRef =
  | { readonly kind: 'field'; readonly field: FieldId }
  | { readonly kind: 'header'; readonly header: HeaderRef }
  | { readonly kind: 'param'; readonly name: string }
  | { readonly kind: 'const'; readonly value: number | string }
  | { readonly kind: 'register'; readonly name: string };

export interface PrimitiveCall {
  readonly primitive: string;
  readonly args: readonly ArgumentRef[];
}

export interface Action {
  readonly name: string;
  /** parameter name to width in bits */
  readonly params: OrderedMap<number>;
  readonly body: readonly PrimitiveCall[];
}

export type MatchType = 'exact' | 'ternary' | 'lpm' | 'range' | 'valid';

export type MatchTarget =
  | { readonly kind: 'field'; readonly field: FieldId }
  | { readonly kind: 'header'; readonly header: HeaderRef };

export interface MatchField {
  readonly target: MatchTarget;
  readonly match: MatchType;
}

export type TableNext =
  | { readonly kind: 'default'; readonly next: string | null }
  | { readonly kind: 'hit-miss'; readonly hit: string | null; readonly miss: string | null }
  | { readonly kind: 'actions'; readonly targets: OrderedMap<string | null> };

export interface Table {
  readonly kind: 'table';
  readonly name: string;
  readonly reads: readonly MatchField[];
  readonly actions: readonly string[];
  readonly defaultAction?: string;
  readonly next: TableNext;
}

export type Expression =
  | { readonly kind: 'field'; readonly field: FieldId }
  | { readonly kind: 'const'; readonly value: number | string }
  | { readonly kind: 'valid'; readonly header: HeaderRef }
  | { readonly kind: 'unary'; readonly op: UnaryOperator; readonly operand: Expression }
  | { readonly kind: 'binary'; readonly op: BinaryOperator; readonly left: Expression; readonly right: Expression };

export const UNARY_OPERATORS = ['not', '~', '-'] as const;
export type UnaryOperator = (typeof UNARY_OPERATORS)[number];

export const BINARY_OPERATORS = [
  'and',
  'or',
  '==',
  '!=',
  '<',
  '<=',
  '>',
  '>=',
  '+',
  '-',
  '*',
  '&',
  '|',
  '^',
  '<<',
  '>>',
] as const;
export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

export interface Conditional {
  readonly kind: 'conditional';
  readonly name: string;
  readonly expression: Expression;
  readonly trueNext: string | null;
  readonly falseNext: string | null;
}

export type ControlNode = Table | Conditional;

export interface ParseTransition {
  readonly value: string;
  readonly next: string;
  /** `state` for another parse state, `control` when parsing hands over to a pipeline */
  readonly target: 'state' | 'control';
}

export interface ParseState {
  readonly name: string;
  readonly extracts: readonly HeaderRef[];
  readonly select: readonly FieldId[];
  readonly transitions: readonly ParseTransition[];
}

export type AccessMode = 'read' | 'write' | 'read_write';

export interface PrimitiveArgProperty {
  readonly access: AccessMode;
  /** `valid` restricts a header argument to its validity bit */
  readonly scope?: 'valid';
}

export interface PrimitiveDefinition {
  readonly name: string;
  readonly args: readonly string[];
  readonly optional: readonly string[];
  /** arguments without an entry are read */
  readonly properties: OrderedMap<PrimitiveArgProperty>;
}

export type PrimitiveTable = OrderedMap<PrimitiveDefinition>;

/**
 * The high-level intermediate representation of one P4 program, as handed over
 * by the front end. Never mutated after loading.
 */
export interface Hlir {
  readonly name: string;
  readonly headerTypes: OrderedMap<HeaderType>;
  readonly headers: OrderedMap<HeaderInstance>;
  readonly registers: readonly string[];
  readonly parseStates: OrderedMap<ParseState>;
  readonly actions: OrderedMap<Action>;
  readonly tables: OrderedMap<Table>;
  readonly conditionals: OrderedMap<Conditional>;
  /** pipeline name to entry node */
  readonly pipelines: OrderedMap<string | null>;
  readonly primitives: PrimitiveTable;
}
