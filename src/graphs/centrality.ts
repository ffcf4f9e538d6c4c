import {
  DEFAULT_EIGENVECTOR_MAX_ITERATIONS,
  DEFAULT_EIGENVECTOR_TOLERANCE,
} from '../config/engine_config.js';
import type { Adjacency, DependencyGraph, EntityKey } from './model.js';

export interface EigenvectorOptions {
  maxIterations?: number;
  /** L1 change between iterations that counts as converged */
  tolerance?: number;
}

/** (in + out) / (2(n - 1)); 0 for graphs of fewer than two nodes. */
export function degreeCentrality(graph: DependencyGraph): Map<EntityKey, number> {
  const n = graph.nodeCount;
  const centrality = new Map<EntityKey, number>();
  for (const node of graph.nodes()) {
    const degree = graph.successors(node).length + graph.predecessors(node).length;
    centrality.set(node, n > 1 ? degree / (2 * (n - 1)) : 0);
  }
  return centrality;
}

/**
 * Brandes' algorithm over directed shortest paths, normalised by
 * (n - 1)(n - 2).
 */
export function betweennessCentrality(graph: DependencyGraph): Map<EntityKey, number> {
  const adjacency = graph.adjacency();
  const nodes = graph.nodes();
  const centrality = new Map(nodes.map((node) => [node, 0]));

  for (const source of nodes) {
    const stack: EntityKey[] = [];
    const predecessors = new Map<EntityKey, EntityKey[]>();
    const sigma = new Map<EntityKey, number>();
    const dist = new Map<EntityKey, number>();

    for (const node of nodes) {
      predecessors.set(node, []);
      sigma.set(node, 0);
      dist.set(node, -1);
    }
    sigma.set(source, 1);
    dist.set(source, 0);

    const queue: EntityKey[] = [source];
    while (queue.length > 0) {
      const v = queue.shift();
      if (v === undefined) break;
      stack.push(v);
      for (const w of adjacency.get(v) ?? []) {
        if (dist.get(w) === -1) {
          queue.push(w);
          dist.set(w, (dist.get(v) ?? 0) + 1);
        }
        if (dist.get(w) === (dist.get(v) ?? 0) + 1) {
          sigma.set(w, (sigma.get(w) ?? 0) + (sigma.get(v) ?? 0));
          predecessors.get(w)?.push(v);
        }
      }
    }

    const delta = new Map<EntityKey, number>();
    for (const node of nodes) delta.set(node, 0);

    while (stack.length > 0) {
      const w = stack.pop();
      if (w === undefined) break;
      for (const v of predecessors.get(w) ?? []) {
        const contribution = ((sigma.get(v) ?? 0) / (sigma.get(w) ?? 1)) * (1 + (delta.get(w) ?? 0));
        delta.set(v, (delta.get(v) ?? 0) + contribution);
      }
      if (w !== source) {
        centrality.set(w, (centrality.get(w) ?? 0) + (delta.get(w) ?? 0));
      }
    }
  }

  const n = nodes.length;
  if (n > 2) {
    const norm = 1 / ((n - 1) * (n - 2));
    for (const [node, value] of centrality) {
      centrality.set(node, value * norm);
    }
  }

  return centrality;
}

/**
 * Wasserman-Faust closeness over outgoing distances: with r nodes reachable
 * at total distance s, (r / (n - 1)) * (r / s). Nodes reaching nothing get 0.
 */
export function closenessCentrality(graph: DependencyGraph): Map<EntityKey, number> {
  const adjacency = graph.adjacency();
  const n = graph.nodeCount;
  const closeness = new Map<EntityKey, number>();
  for (const node of graph.nodes()) {
    const distances = bfsDistances(adjacency, node);
    let sum = 0;
    let reachable = 0;
    for (const [target, dist] of distances) {
      if (target === node) continue;
      sum += dist;
      reachable += 1;
    }
    closeness.set(node, sum > 0 && n > 1 ? (reachable / (n - 1)) * (reachable / sum) : 0);
  }
  return closeness;
}

/**
 * Power iteration on the undirected projection, L2-normalised. Iterates on
 * A + I, which has the same leading eigenvector as A but does not oscillate
 * on bipartite graphs.
 */
export function eigenvectorCentrality(
  graph: DependencyGraph,
  options: EigenvectorOptions = {},
): Map<EntityKey, number> {
  const maxIterations = options.maxIterations ?? DEFAULT_EIGENVECTOR_MAX_ITERATIONS;
  const tolerance = options.tolerance ?? DEFAULT_EIGENVECTOR_TOLERANCE;
  const nodes = graph.nodes();
  const n = nodes.length;
  if (!n) return new Map();

  const undirected = toUndirected(graph.adjacency());
  const seed = 1 / Math.sqrt(n);
  const values = new Map(nodes.map((node) => [node, seed]));

  for (let iter = 0; iter < maxIterations; iter += 1) {
    const next = new Map<EntityKey, number>();
    let norm = 0;
    for (const node of nodes) {
      let sum = values.get(node) ?? 0;
      for (const neighbor of undirected.get(node) ?? []) sum += values.get(neighbor) ?? 0;
      next.set(node, sum);
      norm += sum * sum;
    }
    norm = Math.sqrt(norm) || 1;
    let delta = 0;
    for (const node of nodes) {
      const value = (next.get(node) ?? 0) / norm;
      delta += Math.abs(value - (values.get(node) ?? 0));
      values.set(node, value);
    }
    if (delta < tolerance) break;
  }
  return values;
}

function bfsDistances(adjacency: Adjacency, start: EntityKey): Map<EntityKey, number> {
  const distances = new Map<EntityKey, number>([[start, 0]]);
  const queue: EntityKey[] = [start];
  while (queue.length) {
    const node = queue.shift();
    if (node === undefined) break;
    const nextDist = (distances.get(node) ?? 0) + 1;
    for (const neighbor of adjacency.get(node) ?? []) {
      if (!distances.has(neighbor)) {
        distances.set(neighbor, nextDist);
        queue.push(neighbor);
      }
    }
  }
  return distances;
}

function toUndirected(adjacency: Adjacency): Adjacency {
  const undirected: Adjacency = new Map();
  for (const node of adjacency.keys()) undirected.set(node, new Set());
  for (const [node, neighbors] of adjacency) {
    for (const neighbor of neighbors) {
      if (neighbor === node) continue;
      undirected.get(node)?.add(neighbor);
      undirected.get(neighbor)?.add(node);
    }
  }
  return undirected;
}
