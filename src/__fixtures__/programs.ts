import fs from 'fs';
import path from 'path';

import { builtinPrimitives, Hlir, loadHlir, mergePrimitives, PrimitiveTable } from '../hlir';

export const builtinTable: PrimitiveTable = mergePrimitives(builtinPrimitives());

export function fixturePath(name: string): string {
  return path.join(__dirname, name);
}

export function loadFixture(name: string): Hlir {
  const document: unknown = JSON.parse(fs.readFileSync(fixturePath(name), 'utf-8'));
  return loadHlir(document, { primitives: builtinTable });
}

export function hlirFrom(document: Record<string, unknown>): Hlir {
  return loadHlir(document, { primitives: builtinTable });
}

export interface TableSketch {
  /** metadata fields the match key reads */
  reads?: string[];
  /** metadata fields the action writes */
  writes?: string[];
  /** metadata fields the action reads */
  actionReads?: string[];
  next?: string | null;
}

export interface ConditionalSketch {
  reads: string[];
  true: string | null;
  false: string | null;
}

export interface ProgramSketch {
  tables: Record<string, TableSketch>;
  conditionals?: Record<string, ConditionalSketch>;
  pipelines: Record<string, string | null>;
}

const meta = (field: string) => `meta.${field}`;

/**
 * A program over a single `meta` header: every table gets one action writing
 * `writes` and reading `actionReads`.
 */
export function sketchProgram(sketch: ProgramSketch): Hlir {
  const fields = new Set<string>();
  for (const table of Object.values(sketch.tables)) {
    [...(table.reads || []), ...(table.writes || []), ...(table.actionReads || [])].forEach(field => fields.add(field));
  }
  for (const conditional of Object.values(sketch.conditionals || {})) {
    conditional.reads.forEach(field => fields.add(field));
  }

  const actions: Record<string, unknown> = {};
  const tables: Record<string, unknown> = {};
  for (const [name, table] of Object.entries(sketch.tables)) {
    actions[`${name}_act`] = {
      body: [
        ...(table.writes || []).map(field => ({ primitive: 'modify_field', args: [{ field: meta(field) }, 1] })),
        ...(table.actionReads || []).map(field => ({ primitive: 'count', args: [0, { field: meta(field) }] })),
      ],
    };
    tables[name] = {
      reads: (table.reads || []).map(field => ({ field: meta(field), match: 'exact' })),
      actions: [`${name}_act`],
      next: table.next ?? null,
    };
  }

  const conditionals: Record<string, unknown> = {};
  for (const [name, conditional] of Object.entries(sketch.conditionals || {})) {
    const comparisons: unknown[] = conditional.reads.map(field => ({ op: '==', left: { field: meta(field) }, right: { const: 0 } }));
    conditionals[name] = {
      expression: comparisons.reduce((left, right) => ({ op: 'and', left, right })),
      true: conditional.true,
      false: conditional.false,
    };
  }

  return hlirFrom({
    name: 'sketch',
    headerTypes: { meta_t: { fields: Object.fromEntries(Array.from(fields).map(field => [field, 8])) } },
    headers: { meta: { type: 'meta_t', metadata: true } },
    actions,
    tables,
    conditionals,
    pipelines: sketch.pipelines,
  });
}

/** T1 → T2 → T3; T2 matches on what T1 writes, T3 on an unrelated field. */
export const scenarioA: ProgramSketch = {
  tables: {
    t1: { reads: ['a'], writes: ['x'], next: 't2' },
    t2: { reads: ['x'], writes: ['y'], next: 't3' },
    t3: { reads: ['z'], writes: ['w'] },
  },
  pipelines: { ingress: 't1' },
};

/** Two tables sharing no fields and no program order. */
export const scenarioB: ProgramSketch = {
  tables: {
    t1: { reads: ['a'], writes: ['x'] },
    t2: { reads: ['b'], writes: ['y'] },
  },
  pipelines: { ingress: 't1', egress: 't2' },
};

/** A conditional on T1's output choosing between T2 and T3. */
export const scenarioD: ProgramSketch = {
  tables: {
    t1: { reads: ['a'], writes: ['x'], next: 'c' },
    t2: { reads: ['b'], writes: ['y'] },
    t3: { reads: ['d'], writes: ['z'] },
  },
  conditionals: {
    c: { reads: ['x'], true: 't2', false: 't3' },
  },
  pipelines: { ingress: 't1' },
};
