import { describe, it, expect } from 'vitest';
import { DependencyGraph } from '../model.js';
import { assignTopologicalLayers, detectLayerViolations, topologicalOrder } from '../topology.js';

const diamond = DependencyGraph.fromEdges([
  ['A', 'B'],
  ['A', 'C'],
  ['B', 'D'],
  ['C', 'D'],
  ['D', 'E'],
]);

const withCycle = DependencyGraph.fromEdges([
  ['A', 'B'],
  ['B', 'C'],
  ['C', 'B'],
  ['C', 'D'],
]);

describe('topologicalOrder', () => {
  it('orders a DAG consistently with every edge', () => {
    const result = topologicalOrder(diamond);

    expect(result).toEqual({ order: ['A', 'B', 'C', 'D', 'E'], isDag: true, cycleEdges: [] });
    for (const edge of diamond.edges()) {
      expect(result.order.indexOf(edge.source)).toBeLessThan(result.order.indexOf(edge.target));
    }
  });

  it('takes the smallest ready key first', () => {
    const graph = DependencyGraph.fromEdges([['C', 'A'], ['B', 'A']]);
    expect(topologicalOrder(graph).order).toEqual(['B', 'C', 'A']);
  });

  it('reports cycles with the edges inside them', () => {
    const result = topologicalOrder(withCycle);

    expect(result.isDag).toBe(false);
    expect(result.order).toEqual(['A']);
    expect(result.cycleEdges).toEqual([['B', 'C'], ['C', 'B']]);
  });

  it('treats a self-loop as a cycle', () => {
    const result = topologicalOrder(DependencyGraph.fromEdges([['A', 'A']]));
    expect(result.isDag).toBe(false);
    expect(result.cycleEdges).toEqual([['A', 'A']]);
  });

  it('filters edge types before ordering', () => {
    const graph = DependencyGraph.fromEdges([
      { source: 'A', target: 'B', type: 'compile' },
      { source: 'B', target: 'A', type: 'runtime' },
    ]);

    expect(topologicalOrder(graph).isDag).toBe(false);
    expect(topologicalOrder(graph, { edgeTypes: new Set(['compile']) })).toEqual({
      order: ['A', 'B'],
      isDag: true,
      cycleEdges: [],
    });
  });

  it('accepts an empty graph', () => {
    expect(topologicalOrder(DependencyGraph.fromEdges([]))).toEqual({ order: [], isDag: true, cycleEdges: [] });
  });
});

describe('assignTopologicalLayers', () => {
  it('uses the longest path from the roots', () => {
    expect(assignTopologicalLayers(diamond)).toEqual(
      new Map([['A', 0], ['B', 1], ['C', 1], ['D', 2], ['E', 3]]),
    );
  });

  it('gives every member of a cycle the same depth', () => {
    expect(assignTopologicalLayers(withCycle)).toEqual(new Map([['A', 0], ['B', 1], ['C', 1], ['D', 2]]));
  });
});

describe('detectLayerViolations', () => {
  const graph = DependencyGraph.fromEdges([
    ['A', 'B'],
    ['B', 'C'],
    ['C', 'A'],
    ['B', 'E'],
    ['D', 'A'],
  ]);
  const expected = [
    { source: 'B', target: 'E', sourceRank: 1, targetRank: 1, severity: 'info', reason: 'Same-rank dependency' },
    { source: 'C', target: 'A', sourceRank: 2, targetRank: 0, severity: 'critical', reason: 'Rank 2 depends on rank 0' },
  ];

  it('flags edges back to a smaller rank and notes same-rank edges', () => {
    expect(detectLayerViolations(graph, { A: 0, B: 1, C: 2, E: 1 })).toEqual(expected);
  });

  it('accepts a Map of ranks', () => {
    expect(detectLayerViolations(graph, new Map([['A', 0], ['B', 1], ['C', 2], ['E', 1]]))).toEqual(expected);
  });

  it('finds no critical violation against its own depth layering on a DAG', () => {
    const violations = detectLayerViolations(diamond, assignTopologicalLayers(diamond));
    expect(violations.filter((violation) => violation.severity === 'critical')).toEqual([]);
  });
});
