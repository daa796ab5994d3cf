import { IrLoadError } from '../models';
import { isRecord } from '../utils';
import { formatHeaderRef, parseFieldId, parseHeaderRef, VALID_MEMBER } from './fieldId';
import { OrderedMap } from './orderedMap';
import {
  Action,
  ArgumentRef,
  BINARY_OPERATORS,
  Conditional,
  Expression,
  FieldId,
  HeaderInstance,
  HeaderRef,
  HeaderType,
  Hlir,
  MatchField,
  MatchType,
  ParseState,
  ParseTransition,
  PrimitiveCall,
  PrimitiveTable,
  Table,
  TableNext,
  UNARY_OPERATORS,
} from './types';

export interface LoadOptions {
  /** used when the snapshot carries no `name` */
  name?: string;
  primitives: PrimitiveTable;
}

const MATCH_TYPES: ReadonlyArray<MatchType> = ['exact', 'ternary', 'lpm', 'range', 'valid'];

function expectRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new IrLoadError(`${where} must be an object`);
  }
  return value;
}

function optionalRecord(value: unknown, where: string): Record<string, unknown> {
  return value === undefined ? {} : expectRecord(value, where);
}

function expectString(value: unknown, where: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new IrLoadError(`${where} must be a non-empty string`);
  }
  return value;
}

function expectArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new IrLoadError(`${where} must be a list`);
  }
  return value;
}

function optionalArray(value: unknown, where: string): unknown[] {
  return value === undefined ? [] : expectArray(value, where);
}

function expectWidth(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new IrLoadError(`${where} must be a positive integer`);
  }
  return value;
}

function expectNodeName(value: unknown, where: string): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return expectString(value, where);
}

/**
 * Turns a JSON HLIR snapshot into an immutable {@link Hlir}, checking that every
 * header, field, action, parse state and control node it mentions is declared.
 */
export function loadHlir(document: unknown, options: LoadOptions): Hlir {
  const root = expectRecord(document, 'HLIR snapshot');
  const name = root.name === undefined ? options.name || 'program' : expectString(root.name, 'name');

  const headerTypes = new OrderedMap(
    Object.entries(optionalRecord(root.headerTypes, 'headerTypes')).map(([typeName, raw]): [string, HeaderType] => {
      const where = `headerTypes.${typeName}`;
      const fields = Object.entries(expectRecord(expectRecord(raw, where).fields, `${where}.fields`)).map(
        ([field, width]): [string, number] => [field, expectWidth(width, `${where}.fields.${field}`)]
      );
      return [typeName, { name: typeName, fields: new OrderedMap(fields) }];
    })
  );

  const headers = new OrderedMap(
    Object.entries(optionalRecord(root.headers, 'headers')).map(([instanceName, raw]): [string, HeaderInstance] => {
      const where = `headers.${instanceName}`;
      const entry = expectRecord(raw, where);
      const typeName = expectString(entry.type, `${where}.type`);
      const type = headerTypes.get(typeName);
      if (!type) {
        throw new IrLoadError(`${where}: unknown header type "${typeName}"`);
      }
      const instance: HeaderInstance = {
        name: instanceName,
        type,
        metadata: entry.metadata === true,
        ...(entry.stack === undefined ? {} : { stackSize: expectWidth(entry.stack, `${where}.stack`) }),
      };
      return [instanceName, instance];
    })
  );

  const registers = optionalArray(root.registers, 'registers').map((raw, index) =>
    expectString(raw, `registers[${index}]`)
  );

  const refs = new ReferenceChecker(headers, registers);

  const actions = new OrderedMap(
    Object.entries(optionalRecord(root.actions, 'actions')).map(([actionName, raw]): [string, Action] => [
      actionName,
      parseAction(actionName, raw, refs),
    ])
  );

  const tables = new OrderedMap(
    Object.entries(optionalRecord(root.tables, 'tables')).map(([tableName, raw]): [string, Table] => [
      tableName,
      parseTable(tableName, raw, refs, actions),
    ])
  );

  const conditionals = new OrderedMap(
    Object.entries(optionalRecord(root.conditionals, 'conditionals')).map(([condName, raw]): [string, Conditional] => {
      const where = `conditionals.${condName}`;
      const entry = expectRecord(raw, where);
      return [
        condName,
        {
          kind: 'conditional',
          name: condName,
          expression: parseExpression(entry.expression, `${where}.expression`, refs),
          trueNext: expectNodeName(entry.true, `${where}.true`),
          falseNext: expectNodeName(entry.false, `${where}.false`),
        },
      ];
    })
  );

  for (const condName of conditionals.keys()) {
    if (tables.has(condName)) {
      throw new IrLoadError(`"${condName}" is declared both as a table and as a conditional`);
    }
  }
  const checkNode = (node: string | null, where: string) => {
    if (node !== null && !tables.has(node) && !conditionals.has(node)) {
      throw new IrLoadError(`${where}: unknown control node "${node}"`);
    }
  };
  for (const table of tables.values()) {
    for (const [label, next] of tableNextEntries(table.next)) {
      checkNode(next, `tables.${table.name}.next${label ? `.${label}` : ''}`);
    }
  }
  for (const conditional of conditionals.values()) {
    checkNode(conditional.trueNext, `conditionals.${conditional.name}.true`);
    checkNode(conditional.falseNext, `conditionals.${conditional.name}.false`);
  }

  const pipelines = new OrderedMap(
    Object.entries(optionalRecord(root.pipelines, 'pipelines')).map(([pipeline, raw]): [string, string | null] => {
      const entry = expectNodeName(raw, `pipelines.${pipeline}`);
      checkNode(entry, `pipelines.${pipeline}`);
      return [pipeline, entry];
    })
  );

  const rawStates = optionalRecord(root.parseStates, 'parseStates');
  const parseStates = new OrderedMap(
    Object.entries(rawStates).map(([stateName, raw]): [string, ParseState] => [
      stateName,
      parseState(stateName, raw, refs, next => {
        if (Object.prototype.hasOwnProperty.call(rawStates, next)) {
          return 'state';
        }
        if (pipelines.has(next)) {
          return 'control';
        }
        return undefined;
      }),
    ])
  );

  return {
    name,
    headerTypes,
    headers,
    registers,
    parseStates,
    actions,
    tables,
    conditionals,
    pipelines,
    primitives: options.primitives,
  };
}

/** Label/target pairs of a table's successors; the label is empty for a plain `next`. */
export function tableNextEntries(next: TableNext): Array<[string, string | null]> {
  switch (next.kind) {
    case 'default':
      return [['', next.next]];
    case 'hit-miss':
      return [
        ['hit', next.hit],
        ['miss', next.miss],
      ];
    case 'actions':
      return Array.from(next.targets);
  }
}

class ReferenceChecker {
  constructor(
    private readonly headers: OrderedMap<HeaderInstance>,
    private readonly registers: readonly string[]
  ) {}

  private instance(ref: HeaderRef, where: string, allowWholeStack: boolean): HeaderInstance {
    const instance = this.headers.get(ref.base);
    if (!instance) {
      throw new IrLoadError(`${where}: unknown header instance "${ref.base}"`);
    }
    if (instance.stackSize === undefined) {
      if (ref.index !== undefined) {
        throw new IrLoadError(`${where}: "${ref.base}" is not a header stack`);
      }
    } else if (ref.index === undefined) {
      if (!allowWholeStack) {
        throw new IrLoadError(`${where}: header stack "${ref.base}" needs an index`);
      }
    } else if (typeof ref.index === 'number' && ref.index >= instance.stackSize) {
      throw new IrLoadError(`${where}: index ${ref.index} is out of range for "${ref.base}"`);
    }
    return instance;
  }

  header(text: unknown, where: string, allowWholeStack = true): HeaderRef {
    const ref = parseHeaderRef(expectString(text, where));
    if (!ref) {
      throw new IrLoadError(`${where}: malformed header reference ${JSON.stringify(text)}`);
    }
    this.instance(ref, where, allowWholeStack);
    return ref;
  }

  field(text: unknown, where: string): FieldId {
    const id = expectString(text, where);
    const key = parseFieldId(id);
    if (!key || key.member === '') {
      throw new IrLoadError(`${where}: malformed field reference ${JSON.stringify(text)}`);
    }
    const ref: HeaderRef = key.index === undefined ? { base: key.base } : { base: key.base, index: key.index };
    const instance = this.instance(ref, where, false);
    if (key.member !== VALID_MEMBER && !instance.type.fields.has(key.member)) {
      throw new IrLoadError(`${where}: header "${formatHeaderRef(ref)}" has no field "${key.member}"`);
    }
    return id;
  }

  register(text: unknown, where: string): string {
    const name = expectString(text, where);
    if (!this.registers.includes(name)) {
      throw new IrLoadError(`${where}: unknown register "${name}"`);
    }
    return name;
  }
}

function parseArgument(raw: unknown, where: string, refs: ReferenceChecker, params: OrderedMap<number>): ArgumentRef {
  if (typeof raw === 'number') {
    return { kind: 'const', value: raw };
  }
  const entry = expectRecord(raw, where);
  const keys = Object.keys(entry);
  if (keys.length !== 1) {
    throw new IrLoadError(`${where} must have exactly one of field, header, param, const, register`);
  }
  const value = entry[keys[0]];
  switch (keys[0]) {
    case 'field':
      return { kind: 'field', field: refs.field(value, `${where}.field`) };
    case 'header':
      return { kind: 'header', header: refs.header(value, `${where}.header`) };
    case 'register':
      return { kind: 'register', name: refs.register(value, `${where}.register`) };
    case 'param': {
      const name = expectString(value, `${where}.param`);
      if (!params.has(name)) {
        throw new IrLoadError(`${where}: unknown parameter "${name}"`);
      }
      return { kind: 'param', name };
    }
    case 'const':
      if (typeof value !== 'number' && typeof value !== 'string') {
        throw new IrLoadError(`${where}.const must be a number or a string`);
      }
      return { kind: 'const', value };
    default:
      throw new IrLoadError(`${where}: unknown argument kind "${keys[0]}"`);
  }
}

function parseAction(actionName: string, raw: unknown, refs: ReferenceChecker): Action {
  const where = `actions.${actionName}`;
  const entry = expectRecord(raw, where);
  const params = new OrderedMap(
    Object.entries(optionalRecord(entry.params, `${where}.params`)).map(([param, width]): [string, number] => [
      param,
      expectWidth(width, `${where}.params.${param}`),
    ])
  );
  const body = optionalArray(entry.body, `${where}.body`).map((rawCall, index): PrimitiveCall => {
    const callWhere = `${where}.body[${index}]`;
    const call = expectRecord(rawCall, callWhere);
    return {
      primitive: expectString(call.primitive, `${callWhere}.primitive`),
      args: optionalArray(call.args, `${callWhere}.args`).map((arg, argIndex) =>
        parseArgument(arg, `${callWhere}.args[${argIndex}]`, refs, params)
      ),
    };
  });
  return { name: actionName, params, body };
}

function parseTable(tableName: string, raw: unknown, refs: ReferenceChecker, actions: OrderedMap<Action>): Table {
  const where = `tables.${tableName}`;
  const entry = expectRecord(raw, where);

  const reads = optionalArray(entry.reads, `${where}.reads`).map((rawRead, index): MatchField => {
    const readWhere = `${where}.reads[${index}]`;
    const read = expectRecord(rawRead, readWhere);
    const match = MATCH_TYPES.find(type => type === read.match);
    if (!match) {
      throw new IrLoadError(`${readWhere}.match must be one of ${MATCH_TYPES.join(', ')}`);
    }
    if (read.header !== undefined) {
      if (match !== 'valid') {
        throw new IrLoadError(`${readWhere}: a header can only be matched for validity`);
      }
      return { target: { kind: 'header', header: refs.header(read.header, `${readWhere}.header`, false) }, match };
    }
    return { target: { kind: 'field', field: refs.field(read.field, `${readWhere}.field`) }, match };
  });

  const checkAction = (value: unknown, actionWhere: string): string => {
    const name = expectString(value, actionWhere);
    if (!actions.has(name)) {
      throw new IrLoadError(`${actionWhere}: unknown action "${name}"`);
    }
    return name;
  };
  const tableActions = expectArray(entry.actions, `${where}.actions`).map((value, index) =>
    checkAction(value, `${where}.actions[${index}]`)
  );
  const defaultAction =
    entry.defaultAction === undefined ? undefined : checkAction(entry.defaultAction, `${where}.defaultAction`);

  return {
    kind: 'table',
    name: tableName,
    reads,
    actions: tableActions,
    ...(defaultAction === undefined ? {} : { defaultAction }),
    next: parseTableNext(entry.next, `${where}.next`, tableActions),
  };
}

function parseTableNext(raw: unknown, where: string, tableActions: string[]): TableNext {
  if (raw === undefined || raw === null || typeof raw === 'string') {
    return { kind: 'default', next: expectNodeName(raw, where) };
  }
  const entry = expectRecord(raw, where);
  if (entry.actions !== undefined) {
    const targets = Object.entries(expectRecord(entry.actions, `${where}.actions`)).map(
      ([action, next]): [string, string | null] => {
        if (!tableActions.includes(action)) {
          throw new IrLoadError(`${where}.actions: "${action}" is not an action of this table`);
        }
        return [action, expectNodeName(next, `${where}.actions.${action}`)];
      }
    );
    return { kind: 'actions', targets: new OrderedMap(targets) };
  }
  if ('hit' in entry || 'miss' in entry) {
    return {
      kind: 'hit-miss',
      hit: expectNodeName(entry.hit, `${where}.hit`),
      miss: expectNodeName(entry.miss, `${where}.miss`),
    };
  }
  throw new IrLoadError(`${where} must be a node name, null, { hit, miss } or { actions }`);
}

function parseExpression(raw: unknown, where: string, refs: ReferenceChecker): Expression {
  if (typeof raw === 'number' || typeof raw === 'boolean') {
    return { kind: 'const', value: typeof raw === 'boolean' ? Number(raw) : raw };
  }
  const entry = expectRecord(raw, where);
  if (entry.field !== undefined) {
    return { kind: 'field', field: refs.field(entry.field, `${where}.field`) };
  }
  if (entry.valid !== undefined) {
    return { kind: 'valid', header: refs.header(entry.valid, `${where}.valid`, false) };
  }
  if (entry.const !== undefined) {
    if (typeof entry.const !== 'number' && typeof entry.const !== 'string') {
      throw new IrLoadError(`${where}.const must be a number or a string`);
    }
    return { kind: 'const', value: entry.const };
  }
  if (entry.operand !== undefined) {
    const op = UNARY_OPERATORS.find(candidate => candidate === entry.op);
    if (!op) {
      throw new IrLoadError(`${where}: unknown unary operator ${JSON.stringify(entry.op)}`);
    }
    return { kind: 'unary', op, operand: parseExpression(entry.operand, `${where}.operand`, refs) };
  }
  const op = BINARY_OPERATORS.find(candidate => candidate === entry.op);
  if (!op) {
    throw new IrLoadError(`${where}: unknown operator ${JSON.stringify(entry.op)}`);
  }
  return {
    kind: 'binary',
    op,
    left: parseExpression(entry.left, `${where}.left`, refs),
    right: parseExpression(entry.right, `${where}.right`, refs),
  };
}

function parseState(
  stateName: string,
  raw: unknown,
  refs: ReferenceChecker,
  classify: (next: string) => ParseTransition['target'] | undefined
): ParseState {
  const where = `parseStates.${stateName}`;
  const entry = expectRecord(raw, where);
  const extracts = optionalArray(entry.extracts, `${where}.extracts`).map((header, index) =>
    refs.header(header, `${where}.extracts[${index}]`, false)
  );
  const select = optionalArray(entry.select, `${where}.select`).map((field, index) =>
    refs.field(field, `${where}.select[${index}]`)
  );
  const transitions = optionalArray(entry.transitions, `${where}.transitions`).map(
    (rawTransition, index): ParseTransition => {
      const transitionWhere = `${where}.transitions[${index}]`;
      const transition = expectRecord(rawTransition, transitionWhere);
      const value =
        typeof transition.value === 'number' ? String(transition.value) : expectString(transition.value, `${transitionWhere}.value`);
      const next = expectString(transition.next, `${transitionWhere}.next`);
      const target = classify(next);
      if (!target) {
        throw new IrLoadError(`${transitionWhere}: unknown parse state or pipeline "${next}"`);
      }
      return { value, next, target };
    }
  );
  return { name: stateName, extracts, select, transitions };
}
