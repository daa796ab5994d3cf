import { FieldId, HeaderRef, StackIndex } from './types';

export const VALID_MEMBER = '$valid';
const REGISTER_PREFIX = 'register:';

export interface FieldKey {
  readonly base: string;
  readonly index?: StackIndex;
  /** empty for register resources */
  readonly member: string;
}

const HEADER_REF_REGEX = /^([A-Za-z_]\w*)(?:\[(\d+|next|last)\])?$/;
const FIELD_ID_REGEX = /^([A-Za-z_]\w*)(?:\[(\d+|next|last)\])?\.(\$valid|[A-Za-z_]\w*)$/;
const REGISTER_REGEX = /^register:([A-Za-z_]\w*)$/;

function toStackIndex(raw: string | undefined): StackIndex | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (raw === 'next' || raw === 'last') {
    return raw;
  }
  return Number.parseInt(raw, 10);
}

export function parseHeaderRef(text: string): HeaderRef | undefined {
  const match = HEADER_REF_REGEX.exec(text);
  if (!match) {
    return undefined;
  }
  const index = toStackIndex(match[2]);
  return index === undefined ? { base: match[1] } : { base: match[1], index };
}

export function formatHeaderRef(ref: HeaderRef): string {
  return ref.index === undefined ? ref.base : `${ref.base}[${ref.index}]`;
}

export function parseFieldId(id: FieldId): FieldKey | undefined {
  const register = REGISTER_REGEX.exec(id);
  if (register) {
    return { base: `${REGISTER_PREFIX}${register[1]}`, member: '' };
  }
  const match = FIELD_ID_REGEX.exec(id);
  if (!match) {
    return undefined;
  }
  const index = toStackIndex(match[2]);
  return index === undefined ? { base: match[1], member: match[3] } : { base: match[1], index, member: match[3] };
}

export function fieldIdOf(header: HeaderRef, member: string): FieldId {
  return `${formatHeaderRef(header)}.${member}`;
}

export function validityOf(header: HeaderRef): FieldId {
  return fieldIdOf(header, VALID_MEMBER);
}

export function registerFieldId(name: string): FieldId {
  return `${REGISTER_PREFIX}${name}`;
}

export function isDynamicIndex(index: StackIndex | undefined): boolean {
  return index === 'next' || index === 'last';
}
