/**
 * @fileoverview Tests for the dependency graph model
 */

import { describe, it, expect } from 'vitest';
import { DependencyGraph, type GraphSnapshot } from '../model.js';

// ============================================================================
// TEST FIXTURES
// ============================================================================

const snapshot: GraphSnapshot = {
  components: [{ key: 'P' }, { key: 'Q' }],
  endpoints: [
    { key: 'p1', component: 'P' },
    { key: 'p2', component: 'P' },
    { key: 'q1', component: 'Q' },
  ],
  dependencies: [
    { source: 'p1', target: 'q1', type: 'contract' },
    { source: 'p1', target: 'p2', type: 'runtime' },
    { source: 'P', target: 'Q', type: 'compile' },
    { source: 'P', target: 'Z', type: 'compile' },
  ],
};

describe('DependencyGraph', () => {
  describe('fromEdges', () => {
    it('adds nodes named only by edges', () => {
      const graph = DependencyGraph.fromEdges([['A', 'B'], ['A', 'C']]);

      expect(graph.nodes()).toEqual(['A', 'B', 'C']);
      expect(graph.edgeCount).toBe(2);
      expect(graph.successors('A')).toEqual(['B', 'C']);
      expect(graph.predecessors('B')).toEqual(['A']);
    });

    it('keeps isolated nodes passed explicitly', () => {
      const graph = DependencyGraph.fromEdges([['A', 'B']], ['Z']);
      expect(graph.nodes()).toEqual(['A', 'B', 'Z']);
      expect(graph.successors('Z')).toEqual([]);
    });

    it('keeps parallel edges of different types and drops exact duplicates', () => {
      const graph = DependencyGraph.fromEdges([
        { source: 'A', target: 'B', type: 'compile' },
        { source: 'A', target: 'B', type: 'runtime' },
        { source: 'A', target: 'B', type: 'compile' },
      ]);

      expect(graph.edgeCount).toBe(1);
      expect(graph.typedEdgeCount).toBe(2);
      expect(graph.edgeTypes('A', 'B')).toEqual(['compile', 'runtime']);
      expect(graph.outgoingTypeCounts('A')).toEqual({ compile: 1, runtime: 1 });
      expect(graph.incomingTypeCounts('B')).toEqual({ compile: 1, runtime: 1 });
    });

    it('gives untyped pairs the default type', () => {
      const graph = DependencyGraph.fromEdges([['A', 'B']]);
      expect(graph.edgeTypes('A', 'B')).toEqual(['unspecified']);
    });
  });

  describe('fromSnapshot', () => {
    it('lifts endpoint edges to their owners at component granularity', () => {
      const graph = DependencyGraph.fromSnapshot(snapshot);

      expect(graph.nodes()).toEqual(['P', 'Q']);
      expect(graph.edges()).toEqual([
        { source: 'P', target: 'Q', type: 'compile' },
        { source: 'P', target: 'Q', type: 'contract' },
      ]);
      expect(graph.hasEdge('P', 'P')).toBe(false);
      expect(graph.droppedEdges).toBe(1);
    });

    it('keeps raw edges only at endpoint granularity', () => {
      const graph = DependencyGraph.fromSnapshot(snapshot, { granularity: 'endpoint' });

      expect(graph.nodes()).toEqual(['P', 'Q', 'p1', 'p2', 'q1']);
      expect(graph.edgeCount).toBe(3);
      expect(graph.hasEdge('p1', 'q1')).toBe(true);
      expect(graph.edgeTypes('P', 'Q')).toEqual(['compile']);
    });

    it('keeps raw and lifted edges at combined granularity', () => {
      const graph = DependencyGraph.fromSnapshot(snapshot, { granularity: 'combined' });

      expect(graph.edgeCount).toBe(5);
      expect(graph.typedEdgeCount).toBe(6);
      expect(graph.edgeTypes('P', 'Q')).toEqual(['compile', 'contract']);
      expect(graph.hasEdge('p1', 'p2')).toBe(true);
    });

    it('adds half-lifted edges between endpoints and components at combined granularity', () => {
      const graph = DependencyGraph.fromSnapshot(snapshot, { granularity: 'combined' });

      expect(graph.edgeTypes('p1', 'Q')).toEqual(['contract']);
      expect(graph.edgeTypes('P', 'q1')).toEqual(['contract']);
      expect(graph.hasEdge('p1', 'P')).toBe(false);
      expect(graph.hasEdge('P', 'p2')).toBe(false);
    });

    it('builds an empty graph from an empty snapshot', () => {
      const graph = DependencyGraph.fromSnapshot({ components: [], dependencies: [] });
      expect(graph.nodeCount).toBe(0);
      expect(graph.edgeCount).toBe(0);
    });
  });

  describe('edge type filtering', () => {
    it('restricts adjacency and derived graphs to the given types', () => {
      const graph = DependencyGraph.fromSnapshot(snapshot);

      const adjacency = graph.adjacency(new Set(['runtime']));
      expect(Array.from(adjacency.keys())).toEqual(['P', 'Q']);
      expect(adjacency.get('P')?.size).toBe(0);

      const compileOnly = graph.filterEdgeTypes(new Set(['compile']));
      expect(compileOnly.typedEdgeCount).toBe(1);
      expect(compileOnly.nodes()).toEqual(['P', 'Q']);
    });
  });
});
