import { StructuralError } from '../models';
import { expressionReads } from './expression';
import { fieldIdOf, parseFieldId, registerFieldId, validityOf, VALID_MEMBER } from './fieldId';
import { isReadAccess, isWriteAccess } from './primitives';
import { Action, ArgumentRef, Conditional, FieldId, HeaderRef, Hlir, PrimitiveArgProperty, Table } from './types';

export interface FieldAccess {
  readonly reads: readonly FieldId[];
  readonly writes: readonly FieldId[];
}

export function sortedUnique(ids: Iterable<FieldId>): FieldId[] {
  return Array.from(new Set(ids)).sort();
}

/**
 * Every field of a header instance plus its validity bit. A stack referenced
 * without an index stands for all of its elements.
 */
export function headerFieldIds(hlir: Hlir, ref: HeaderRef, validOnly = false): FieldId[] {
  const instance = hlir.headers.get(ref.base);
  if (!instance) {
    throw new StructuralError(`Unknown header instance "${ref.base}"`);
  }
  const elements: HeaderRef[] =
    instance.stackSize !== undefined && ref.index === undefined
      ? Array.from({ length: instance.stackSize }, (_, index) => ({ base: ref.base, index }))
      : [ref];

  const ids: FieldId[] = [];
  for (const element of elements) {
    ids.push(validityOf(element));
    if (!validOnly) {
      for (const field of instance.type.fields.keys()) {
        ids.push(fieldIdOf(element, field));
      }
    }
  }
  return ids;
}

/** `undefined` when the argument names no field (constants, unbound parameters). */
function argumentFields(hlir: Hlir, arg: ArgumentRef, validOnly: boolean): FieldId[] | undefined {
  switch (arg.kind) {
    case 'field':
      return [arg.field];
    case 'header':
      return headerFieldIds(hlir, arg.header, validOnly);
    case 'register':
      return [registerFieldId(arg.name)];
    default:
      return undefined;
  }
}

function bind(arg: ArgumentRef, bindings: ReadonlyMap<string, ArgumentRef>): ArgumentRef {
  if (arg.kind === 'param') {
    return bindings.get(arg.name) ?? arg;
  }
  return arg;
}

function collectActionAccess(
  hlir: Hlir,
  action: Action,
  bindings: ReadonlyMap<string, ArgumentRef>,
  reads: Set<FieldId>,
  writes: Set<FieldId>,
  callStack: string[]
) {
  if (callStack.includes(action.name)) {
    throw new StructuralError(`Recursive compound action: ${[...callStack, action.name].join(' → ')}`);
  }
  const stack = [...callStack, action.name];

  for (const call of action.body) {
    const args = call.args.map(arg => bind(arg, bindings));
    const callee = hlir.actions.get(call.primitive);
    if (callee) {
      const params = callee.params.keys();
      if (params.length !== args.length) {
        throw new StructuralError(
          `Action "${action.name}" calls "${callee.name}" with ${args.length} arguments, expected ${params.length}`
        );
      }
      const calleeBindings = new Map(params.map((param, index) => [param, args[index]]));
      collectActionAccess(hlir, callee, calleeBindings, reads, writes, stack);
      continue;
    }

    const primitive = hlir.primitives.get(call.primitive);
    if (!primitive) {
      throw new StructuralError(`Action "${action.name}" calls unknown primitive "${call.primitive}"`);
    }
    const required = primitive.args.length - primitive.optional.length;
    if (args.length > primitive.args.length || args.length < required) {
      throw new StructuralError(
        `Primitive "${primitive.name}" in action "${action.name}" takes ${required}..${primitive.args.length} arguments, got ${args.length}`
      );
    }

    args.forEach((arg, index) => {
      const argName = primitive.args[index];
      const property: PrimitiveArgProperty = primitive.properties.get(argName) ?? { access: 'read' };
      const fields = argumentFields(hlir, arg, property.scope === 'valid');
      if (isWriteAccess(property.access)) {
        if (!fields) {
          throw new StructuralError(
            `Primitive "${primitive.name}" in action "${action.name}" writes "${argName}", which resolves to no field`
          );
        }
        fields.forEach(field => writes.add(field));
      }
      if (isReadAccess(property.access) && fields) {
        fields.forEach(field => reads.add(field));
      }
    });
  }
}

export function resolveActionAccess(hlir: Hlir, actionName: string): FieldAccess {
  const action = hlir.actions.get(actionName);
  if (!action) {
    throw new StructuralError(`Unknown action "${actionName}"`);
  }
  const reads = new Set<FieldId>();
  const writes = new Set<FieldId>();
  collectActionAccess(hlir, action, new Map(), reads, writes, []);
  return { reads: sortedUnique(reads), writes: sortedUnique(writes) };
}

/** Candidate actions of a table, the default action included once. */
export function tableActionNames(table: Table): string[] {
  const names = [...table.actions];
  if (table.defaultAction && !names.includes(table.defaultAction)) {
    names.push(table.defaultAction);
  }
  return names;
}

export function tableMatchReads(table: Table): FieldId[] {
  return sortedUnique(
    table.reads.map(read => (read.target.kind === 'field' ? read.target.field : validityOf(read.target.header)))
  );
}

export function tableActionAccess(hlir: Hlir, table: Table): FieldAccess {
  const reads: FieldId[] = [];
  const writes: FieldId[] = [];
  for (const name of tableActionNames(table)) {
    const access = resolveActionAccess(hlir, name);
    reads.push(...access.reads);
    writes.push(...access.writes);
  }
  return { reads: sortedUnique(reads), writes: sortedUnique(writes) };
}

export function conditionalReads(conditional: Conditional): FieldId[] {
  return sortedUnique(expressionReads(conditional.expression));
}

export function fieldWidth(hlir: Hlir, id: FieldId): number {
  const key = parseFieldId(id);
  if (!key || key.member === '') {
    return 0;
  }
  if (key.member === VALID_MEMBER) {
    return 1;
  }
  return hlir.headers.get(key.base)?.type.fields.get(key.member) ?? 0;
}

export function tableKeyWidth(hlir: Hlir, table: Table): number {
  return table.reads.reduce(
    (acc, read) => acc + (read.target.kind === 'field' ? fieldWidth(hlir, read.target.field) : 1),
    0
  );
}

/** Widest action data any of the table's actions needs. */
export function tableActionDataWidth(hlir: Hlir, table: Table): number {
  let widest = 0;
  for (const name of tableActionNames(table)) {
    const action = hlir.actions.get(name);
    if (!action) {
      continue;
    }
    const width = action.params.values().reduce((acc, paramWidth) => acc + paramWidth, 0);
    widest = Math.max(widest, width);
  }
  return widest;
}
