import { StructuralError } from '../../models';
import { hlirFrom, loadFixture, scenarioA, scenarioB, scenarioD, sketchProgram } from '../../__fixtures__/programs';
import { randomSketch } from '../../__fixtures__/random';
import { buildDependencyGraph, collectControlFlow } from '../graphBuilder';
import { DependencyGraph } from '../graph';
import { topologicalOrder } from '../topo';

function edgeList(graph: DependencyGraph) {
  return graph.edges.map(edge => [edge.source, edge.target, edge.kind, edge.fields.join(',')]);
}

describe('collectControlFlow', () => {
  it('orders reachable nodes topologically with pipelines in declaration order', () => {
    const nodes = collectControlFlow(loadFixture('basic_routing.json'));

    expect(nodes.map(node => node.name)).toEqual([
      'port_mapping',
      'vlan_check',
      'vlan_strip',
      'ipv4_check',
      'ipv4_lpm',
      'forward',
      'send_frame',
      'flow_stats',
    ]);
    expect(nodes.map(node => node.pipeline)).toEqual([
      'ingress',
      'ingress',
      'ingress',
      'ingress',
      'ingress',
      'ingress',
      'egress',
      'egress',
    ]);
  });

  it('rejects a cycle in the control flow', () => {
    const hlir = sketchProgram({
      tables: { t1: { reads: ['a'], next: 't2' }, t2: { reads: ['b'], next: 't1' } },
      pipelines: { ingress: 't1' },
    });

    expect(() => collectControlFlow(hlir)).toThrow(new StructuralError('Cyclic control flow: t1 → t2 → t1'));
  });

  it('rejects a node applied from two pipelines', () => {
    const hlir = sketchProgram({
      tables: { t1: { reads: ['a'], next: 't2' }, t2: { reads: ['b'] } },
      pipelines: { ingress: 't1', egress: 't2' },
    });

    expect(() => collectControlFlow(hlir)).toThrow('"t2" is applied in both ingress and egress');
  });

  it('skips pipelines without an entry node', () => {
    const hlir = sketchProgram({ tables: { t1: { reads: ['a'] } }, pipelines: { ingress: 't1', egress: null } });

    expect(collectControlFlow(hlir).map(node => node.name)).toEqual(['t1']);
  });
});

describe('buildDependencyGraph', () => {
  describe('coarse', () => {
    it('adds a field edge for a read-after-write and control edges otherwise', () => {
      const graph = buildDependencyGraph(sketchProgram(scenarioA), { mode: 'coarse' });

      expect(graph.events.map(event => event.id)).toEqual(['t1', 't2', 't3']);
      expect(edgeList(graph)).toEqual([
        [0, 1, 'field', 'meta.x'],
        [0, 2, 'control', ''],
        [1, 2, 'control', ''],
      ]);
    });

    it('adds no edges between pipelines', () => {
      const graph = buildDependencyGraph(sketchProgram(scenarioB), { mode: 'coarse' });

      expect(graph.events.map(event => [event.id, event.pipeline])).toEqual([
        ['t1', 'ingress'],
        ['t2', 'egress'],
      ]);
      expect(graph.edges).toEqual([]);
    });

    it('treats a conditional reading a written field as a field dependency', () => {
      const graph = buildDependencyGraph(sketchProgram(scenarioD), { mode: 'coarse' });

      expect(graph.events.map(event => [event.id, event.role])).toEqual([
        ['t1', 'table'],
        ['c', 'conditional'],
        ['t2', 'table'],
        ['t3', 'table'],
      ]);
      expect(edgeList(graph)).toEqual([
        [0, 1, 'field', 'meta.x'],
        [0, 2, 'control', ''],
        [0, 3, 'control', ''],
        [1, 2, 'control', ''],
        [1, 3, 'control', ''],
      ]);
    });

    it('drops control edges when asked for data dependencies only', () => {
      const graph = buildDependencyGraph(sketchProgram(scenarioA), { mode: 'coarse', controlFlowEdges: false });

      expect(edgeList(graph)).toEqual([[0, 1, 'field', 'meta.x']]);
    });

    it('resolves compound actions, header stacks and validity on a full program', () => {
      const graph = buildDependencyGraph(loadFixture('basic_routing.json'), { mode: 'coarse' });

      expect(graph.edges).toHaveLength(16);
      expect(graph.edges.filter(edge => edge.kind === 'field')).toEqual([
        { source: 0, target: 4, kind: 'field', fields: ['routing_metadata.bd'] },
        { source: 4, target: 5, kind: 'field', fields: ['routing_metadata.nhop_ipv4'] },
      ]);
      expect(graph.eventById('unused_acl')).toBeUndefined();
    });
  });

  describe('fine', () => {
    it('splits tables into match and action events joined by intra edges', () => {
      const graph = buildDependencyGraph(sketchProgram(scenarioA), { mode: 'fine' });

      expect(graph.events.map(event => event.id)).toEqual([
        't1.match',
        't1.action',
        't2.match',
        't2.action',
        't3.match',
        't3.action',
      ]);
      expect(edgeList(graph)).toEqual([
        [0, 1, 'intra', ''],
        [2, 3, 'intra', ''],
        [4, 5, 'intra', ''],
        [1, 2, 'field', 'meta.x'],
        [1, 4, 'control', ''],
        [3, 4, 'control', ''],
      ]);
    });

    it('points an action-read dependency at the action event', () => {
      const hlir = sketchProgram({
        tables: { t1: { reads: ['a'], writes: ['x'], next: 't2' }, t2: { reads: ['b'], actionReads: ['x'] } },
        pipelines: { ingress: 't1' },
      });
      const graph = buildDependencyGraph(hlir, { mode: 'fine' });

      expect(edgeList(graph)).toEqual([
        [0, 1, 'intra', ''],
        [2, 3, 'intra', ''],
        [1, 3, 'field', 'meta.x'],
      ]);
    });

    it('keeps conditionals as single events', () => {
      const graph = buildDependencyGraph(sketchProgram(scenarioD), { mode: 'fine' });

      expect(graph.events.map(event => event.id)).toEqual([
        't1.match',
        't1.action',
        'c',
        't2.match',
        't2.action',
        't3.match',
        't3.action',
      ]);
      expect(graph.findEdge(1, 2, 'field')?.fields).toEqual(['meta.x']);
      expect(graph.findEdge(2, 3, 'control')).toBeDefined();
      expect(graph.findEdge(2, 5, 'control')).toBeDefined();
    });
  });

  it('rejects an action writing something that is not a field', () => {
    const hlir = hlirFrom({
      headerTypes: { meta_t: { fields: { a: 8 } } },
      headers: { meta: { type: 'meta_t', metadata: true } },
      actions: { bad: { params: { value: 8 }, body: [{ primitive: 'modify_field', args: [{ param: 'value' }, 1] }] } },
      tables: { t1: { reads: [{ field: 'meta.a', match: 'exact' }], actions: ['bad'] } },
      pipelines: { ingress: 't1' },
    });

    expect(() => buildDependencyGraph(hlir, { mode: 'coarse' })).toThrow(StructuralError);
  });

  it('builds the same graph on every run', () => {
    const hlir = loadFixture('basic_routing.json');
    const first = buildDependencyGraph(hlir, { mode: 'fine' });
    const second = buildDependencyGraph(hlir, { mode: 'fine' });

    expect(second.events).toEqual(first.events);
    expect(second.edges).toEqual(first.edges);
  });

  it.each([1, 7, 42, 1234, 98765])('produces an acyclic graph without duplicate edges (seed %i)', seed => {
    const hlir = sketchProgram(randomSketch(seed));
    for (const mode of ['coarse', 'fine'] as const) {
      const graph = buildDependencyGraph(hlir, { mode });
      const keys = graph.edges.map(edge => `${edge.source}>${edge.target}:${edge.kind}`);

      expect(() => topologicalOrder(graph)).not.toThrow();
      expect(new Set(keys).size).toBe(keys.length);
      expect(graph.edges.every(edge => edge.source !== edge.target)).toBe(true);
    }
  });
});
