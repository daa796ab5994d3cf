import { FieldId, isDynamicIndex, parseFieldId, StackIndex } from '../hlir';

function indicesMayAlias(a: StackIndex | undefined, b: StackIndex | undefined): boolean {
  if (a === undefined || b === undefined || isDynamicIndex(a) || isDynamicIndex(b)) {
    return true;
  }
  return a === b;
}

/**
 * Whether a write to `a` may be observed through `b`. Stack elements addressed
 * with `next` or `last` may alias any element of the same stack.
 */
export function mayOverlap(a: FieldId, b: FieldId): boolean {
  if (a === b) {
    return true;
  }
  const left = parseFieldId(a);
  const right = parseFieldId(b);
  if (!left || !right) {
    return false;
  }
  return left.base === right.base && left.member === right.member && indicesMayAlias(left.index, right.index);
}

/** Read-side fields that overlap at least one written field, sorted. */
export function overlappingFields(writes: readonly FieldId[], reads: readonly FieldId[]): FieldId[] {
  if (writes.length === 0 || reads.length === 0) {
    return [];
  }
  const buckets = new Map<string, FieldId[]>();
  for (const write of writes) {
    const key = parseFieldId(write);
    const bucket = key ? `${key.base}.${key.member}` : write;
    const list = buckets.get(bucket) || [];
    list.push(write);
    buckets.set(bucket, list);
  }

  const result = new Set<FieldId>();
  for (const read of reads) {
    const key = parseFieldId(read);
    const candidates = buckets.get(key ? `${key.base}.${key.member}` : read) || [];
    if (candidates.some(write => mayOverlap(write, read))) {
      result.add(read);
    }
  }
  return Array.from(result).sort();
}
