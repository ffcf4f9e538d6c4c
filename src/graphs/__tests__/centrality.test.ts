import { describe, it, expect } from 'vitest';
import { DependencyGraph } from '../model.js';
import {
  betweennessCentrality,
  closenessCentrality,
  degreeCentrality,
  eigenvectorCentrality,
} from '../centrality.js';

const path = DependencyGraph.fromEdges([['A', 'B'], ['B', 'C']]);
const triangle = DependencyGraph.fromEdges([['A', 'B'], ['B', 'C'], ['C', 'A']]);
const empty = DependencyGraph.fromEdges([]);

describe('degreeCentrality', () => {
  it('normalises in + out degree by 2(n - 1)', () => {
    expect(degreeCentrality(path)).toEqual(new Map([['A', 0.25], ['B', 0.5], ['C', 0.25]]));
  });

  it('is 0 for a lone node', () => {
    expect(degreeCentrality(DependencyGraph.fromEdges([], ['A']))).toEqual(new Map([['A', 0]]));
  });
});

describe('betweennessCentrality', () => {
  it('credits the middle of a directed path', () => {
    const result = betweennessCentrality(path);
    expect(result.get('A')).toBe(0);
    expect(result.get('B')).toBeCloseTo(0.5, 10);
    expect(result.get('C')).toBe(0);
  });

  it('returns an empty map for an empty graph', () => {
    expect(betweennessCentrality(empty).size).toBe(0);
  });
});

describe('closenessCentrality', () => {
  it('scales by the share of reachable nodes', () => {
    const result = closenessCentrality(path);
    expect(result.get('A')).toBeCloseTo(2 / 3, 10);
    expect(result.get('B')).toBeCloseTo(0.5, 10);
    expect(result.get('C')).toBe(0);
  });
});

describe('eigenvectorCentrality', () => {
  it('is uniform on a triangle', () => {
    const result = eigenvectorCentrality(triangle);
    for (const node of ['A', 'B', 'C']) {
      expect(result.get(node)).toBeCloseTo(1 / Math.sqrt(3), 6);
    }
  });

  it('converges on a path despite it being bipartite', () => {
    const result = eigenvectorCentrality(path);
    expect(result.get('A')).toBeCloseTo(0.5, 4);
    expect(result.get('B')).toBeCloseTo(Math.SQRT1_2, 4);
    expect(result.get('C')).toBeCloseTo(0.5, 4);
  });

  it('honours the iteration cap', () => {
    const result = eigenvectorCentrality(path, { maxIterations: 1 });
    expect(result.get('B')).toBeCloseTo(3 / Math.sqrt(17), 10);
  });

  it('returns an empty map for an empty graph', () => {
    expect(eigenvectorCentrality(empty).size).toBe(0);
  });
});
