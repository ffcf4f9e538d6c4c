/**
 * @fileoverview Topological ordering, depth layering and layer-rule checks
 *
 * Ranks follow the depth convention of `assignTopologicalLayers`: roots sit
 * at rank 0 and dependencies point toward larger ranks. An edge pointing
 * back to a smaller rank is a layer violation.
 */

import type { DependencyGraph, DependencyType, EntityKey } from './model.js';
import { computeComponents, findCycleEdges } from './scc.js';

// ============================================================================
// TYPES
// ============================================================================

export interface TopologicalOrderOptions {
  edgeTypes?: ReadonlySet<DependencyType>;
}

export interface TopologicalOrderResult {
  /** Every node on a DAG; otherwise only the nodes not blocked by a cycle */
  order: EntityKey[];
  isDag: boolean;
  /** Edges inside a cyclic SCC, self-loops included; empty on a DAG */
  cycleEdges: Array<[EntityKey, EntityKey]>;
}

export type LayerViolationSeverity = 'critical' | 'info';

export interface LayerViolation {
  source: EntityKey;
  target: EntityKey;
  sourceRank: number;
  targetRank: number;
  severity: LayerViolationSeverity;
  reason: string;
}

export type RankMap = ReadonlyMap<EntityKey, number> | Readonly<Record<EntityKey, number>>;

// ============================================================================
// ORDERING
// ============================================================================

/**
 * Kahn's algorithm. The ready set is kept sorted so the smallest ready key
 * always comes next, which makes the order unique for a given graph.
 */
export function topologicalOrder(
  graph: DependencyGraph,
  options: TopologicalOrderOptions = {},
): TopologicalOrderResult {
  const adjacency = graph.adjacency(options.edgeTypes);
  const inDegree = new Map<EntityKey, number>();
  for (const node of adjacency.keys()) inDegree.set(node, 0);
  for (const targets of adjacency.values()) {
    for (const target of targets) inDegree.set(target, (inDegree.get(target) ?? 0) + 1);
  }

  const ready = Array.from(inDegree.entries())
    .filter(([, degree]) => degree === 0)
    .map(([node]) => node)
    .sort();
  const order: EntityKey[] = [];

  while (ready.length > 0) {
    const node = ready.shift();
    if (node === undefined) break;
    order.push(node);
    for (const target of adjacency.get(node) ?? []) {
      const remaining = (inDegree.get(target) ?? 0) - 1;
      inDegree.set(target, remaining);
      if (remaining === 0) insertSorted(ready, target);
    }
  }

  const isDag = order.length === adjacency.size;
  return {
    order,
    isDag,
    cycleEdges: isDag ? [] : findCycleEdges(adjacency, computeComponents(adjacency)),
  };
}

/**
 * Longest-path depth from the roots. Computed on the condensation, so every
 * member of a cycle shares one depth.
 */
export function assignTopologicalLayers(
  graph: DependencyGraph,
  edgeTypes?: ReadonlySet<DependencyType>,
): Map<EntityKey, number> {
  const adjacency = graph.adjacency(edgeTypes);
  const components = computeComponents(adjacency);
  const sccOf = new Map<EntityKey, number>();
  for (const component of components) {
    for (const member of component.members) sccOf.set(member, component.id);
  }

  const successors = new Map<number, Set<number>>();
  for (const [source, targets] of adjacency) {
    const from = sccOf.get(source) ?? 0;
    for (const target of targets) {
      const to = sccOf.get(target) ?? 0;
      if (to === from) continue;
      const set = successors.get(from) ?? new Set<number>();
      set.add(to);
      successors.set(from, set);
    }
  }

  // SCC ids are already in topological order.
  const depth = new Array<number>(components.length).fill(0);
  for (let id = 0; id < components.length; id += 1) {
    for (const next of successors.get(id) ?? []) {
      depth[next] = Math.max(depth[next] ?? 0, (depth[id] ?? 0) + 1);
    }
  }

  const layers = new Map<EntityKey, number>();
  for (const node of graph.nodes()) layers.set(node, depth[sccOf.get(node) ?? 0] ?? 0);
  return layers;
}

// ============================================================================
// LAYER RULES
// ============================================================================

/**
 * Check every edge against a caller-supplied rank map. An edge to a smaller
 * rank is `critical` whether or not the graph is acyclic; an edge within one
 * rank is reported at `info`. Nodes without a rank are skipped.
 */
export function detectLayerViolations(graph: DependencyGraph, ranks: RankMap): LayerViolation[] {
  const rankOf = toRankLookup(ranks);
  const violations: LayerViolation[] = [];
  for (const source of graph.nodes()) {
    const sourceRank = rankOf(source);
    if (sourceRank === undefined) continue;
    for (const target of graph.successors(source)) {
      const targetRank = rankOf(target);
      if (targetRank === undefined) continue;
      if (sourceRank > targetRank) {
        violations.push({
          source,
          target,
          sourceRank,
          targetRank,
          severity: 'critical',
          reason: `Rank ${sourceRank} depends on rank ${targetRank}`,
        });
      } else if (sourceRank === targetRank) {
        violations.push({ source, target, sourceRank, targetRank, severity: 'info', reason: 'Same-rank dependency' });
      }
    }
  }
  return violations;
}

function toRankLookup(ranks: RankMap): (node: EntityKey) => number | undefined {
  if (isRankMap(ranks)) {
    const map = ranks;
    return (node) => map.get(node);
  }
  const record = ranks;
  return (node) => (Object.prototype.hasOwnProperty.call(record, node) ? record[node] : undefined);
}

function isRankMap(ranks: RankMap): ranks is ReadonlyMap<EntityKey, number> {
  return ranks instanceof Map;
}

function insertSorted(list: EntityKey[], value: EntityKey): void {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if ((list[mid] ?? '') < value) low = mid + 1;
    else high = mid;
  }
  list.splice(low, 0, value);
}
