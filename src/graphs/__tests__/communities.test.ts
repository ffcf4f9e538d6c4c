import { describe, it, expect } from 'vitest';
import { DependencyGraph } from '../model.js';
import { detectCommunities, modularity } from '../communities.js';

const twoTriangles = DependencyGraph.fromEdges([
  ['A', 'B'],
  ['B', 'C'],
  ['C', 'A'],
  ['D', 'E'],
  ['E', 'F'],
  ['F', 'D'],
]);

function ringOfCliques(): DependencyGraph {
  const edges: Array<[string, string]> = [];
  const groups = ['a', 'b', 'c', 'd'];
  for (const group of groups) {
    for (let i = 0; i < 4; i += 1) {
      for (let j = i + 1; j < 4; j += 1) edges.push([`${group}${i}`, `${group}${j}`]);
    }
  }
  groups.forEach((group, index) => {
    edges.push([`${group}0`, `${groups[(index + 1) % groups.length]}3`]);
  });
  return DependencyGraph.fromEdges(edges);
}

describe('detectCommunities', () => {
  it('separates two disconnected triangles', () => {
    const result = detectCommunities(twoTriangles);

    expect(result.communities).toEqual([['A', 'B', 'C'], ['D', 'E', 'F']]);
    expect(result.assignments.get('A')).toBe(0);
    expect(result.assignments.get('F')).toBe(1);
    expect(result.modularity).toBeCloseTo(0.5, 10);
  });

  it('records one partition per aggregation level', () => {
    const result = detectCommunities(twoTriangles);
    expect(result.levels).toHaveLength(2);
    expect(result.levels[0]).toEqual(result.assignments);
  });

  it('is reproducible for a fixed seed', () => {
    const graph = ringOfCliques();
    expect(detectCommunities(graph, { seed: 7 })).toEqual(detectCommunities(graph, { seed: 7 }));
    expect(detectCommunities(graph)).toEqual(detectCommunities(graph, { seed: 42 }));
  });

  it('keeps isolated nodes in their own community', () => {
    const graph = DependencyGraph.fromEdges([['A', 'B']], ['C']);
    expect(detectCommunities(graph).communities).toEqual([['A', 'B'], ['C']]);
  });

  it('returns empty results for an empty graph', () => {
    expect(detectCommunities(DependencyGraph.fromEdges([]))).toEqual({
      assignments: new Map(),
      communities: [],
      modularity: 0,
      levels: [],
    });
  });
});

describe('modularity', () => {
  it('is 0 when everything shares one community', () => {
    const assignments = new Map(twoTriangles.nodes().map((node) => [node, 0]));
    expect(modularity(twoTriangles, assignments)).toBeCloseTo(0, 10);
  });

  it('treats unassigned nodes as singletons', () => {
    expect(modularity(twoTriangles, new Map())).toBeCloseTo(-1 / 24, 10);
  });

  it('is 0 for a graph without edges', () => {
    expect(modularity(DependencyGraph.fromEdges([], ['A', 'B']), new Map())).toBe(0);
  });
});
