import { loadFixture, scenarioA, sketchProgram } from '../../__fixtures__/programs';
import { randomSketch } from '../../__fixtures__/random';
import { DependencyGraph } from '../graph';
import { buildDependencyGraph } from '../graphBuilder';
import { transitiveReduction } from '../reducer';
import { countMinStages } from '../scheduler';
import { descendants } from '../topo';

function reachability(graph: DependencyGraph) {
  return descendants(graph).map(set => set.toArray());
}

describe('transitiveReduction', () => {
  it('drops an edge implied by a longer path', () => {
    const graph = buildDependencyGraph(sketchProgram(scenarioA), { mode: 'coarse' });
    const reduced = transitiveReduction(graph);

    expect(reduced.edges).toEqual([
      { source: 0, target: 1, kind: 'field', fields: ['meta.x'] },
      { source: 1, target: 2, kind: 'control', fields: [] },
    ]);
    expect(graph.edges).toHaveLength(3);
  });

  it('keeps only the immediate dependencies of the routing program', () => {
    const reduced = transitiveReduction(buildDependencyGraph(loadFixture('basic_routing.json'), { mode: 'coarse' }));

    expect(reduced.edges.map(edge => [edge.source, edge.target, edge.kind])).toEqual([
      [0, 1, 'control'],
      [1, 2, 'control'],
      [2, 3, 'control'],
      [3, 4, 'control'],
      [4, 5, 'field'],
      [6, 7, 'control'],
    ]);
  });

  it('refuses split match/action graphs', () => {
    const graph = buildDependencyGraph(sketchProgram(scenarioA), { mode: 'fine' });

    expect(() => transitiveReduction(graph)).toThrow('Transitive reduction only applies to coarse graphs');
  });

  it.each([3, 11, 2024, 31337, 500000])(
    'keeps reachability and stage count and is idempotent (seed %i)',
    seed => {
      const graph = buildDependencyGraph(sketchProgram(randomSketch(seed, 10)), { mode: 'coarse' });
      const reduced = transitiveReduction(graph);
      const twice = transitiveReduction(reduced);

      expect(reachability(reduced)).toEqual(reachability(graph));
      expect(countMinStages(reduced)).toEqual(countMinStages(graph));
      expect(countMinStages(reduced, { countConditionals: true })).toEqual(
        countMinStages(graph, { countConditionals: true })
      );
      expect(twice.edges).toEqual(reduced.edges);
    }
  );
});
