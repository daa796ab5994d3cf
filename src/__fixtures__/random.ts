import { ProgramSketch, TableSketch } from './programs';

const FIELDS = ['a', 'b', 'c', 'd', 'e', 'f'];

/** Park–Miller generator, so every seed always yields the same program. */
export function createRandom(seed: number): () => number {
  let state = seed % 2147483647 || 1;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

function pick<T>(random: () => number, items: T[]): T {
  return items[Math.floor(random() * items.length)];
}

function subset(random: () => number): string[] {
  return FIELDS.filter(() => random() < 0.3);
}

/**
 * A random acyclic program: nodes only point at nodes declared after them,
 * roughly one in four nodes is a conditional.
 */
export function randomSketch(seed: number, size = 8): ProgramSketch {
  const random = createRandom(seed);
  const names = Array.from({ length: size }, (_, index) => (index > 0 && random() < 0.25 ? `c${index}` : `t${index}`));
  const later = (index: number) => {
    const candidates: Array<string | null> = [...names.slice(index + 1), null];
    return pick(random, candidates);
  };

  const tables: Record<string, TableSketch> = {};
  const conditionals: NonNullable<ProgramSketch['conditionals']> = {};
  names.forEach((name, index) => {
    if (name.startsWith('c')) {
      const reads = subset(random);
      conditionals[name] = { reads: reads.length > 0 ? reads : ['a'], true: later(index), false: later(index) };
    } else {
      tables[name] = { reads: subset(random), writes: subset(random), actionReads: subset(random), next: later(index) };
    }
  });

  return { tables, conditionals, pipelines: { ingress: names[0] } };
}
