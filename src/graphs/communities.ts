import { DEFAULT_COMMUNITY_SEED } from '../config/engine_config.js';
import { SeededRandom } from '../utils/random.js';
import type { DependencyGraph, EntityKey } from './model.js';

/** Undirected weighted graph; a node's own key holds its self-loop weight. */
type WeightedGraph = Map<string, Map<string, number>>;

export interface CommunityDetectionOptions {
  /** Shuffles the node visiting order (default 42) */
  seed?: number;
  resolution?: number;
  maxIterations?: number;
  maxLevels?: number;
}

export interface CommunityDetectionResult {
  /** Node -> community id */
  assignments: Map<EntityKey, number>;
  /** Sorted member lists; community i is `communities[i]`, ordered by smallest member */
  communities: EntityKey[][];
  modularity: number;
  /** Partition after each aggregation level, finest first */
  levels: Array<Map<EntityKey, number>>;
}

/**
 * Louvain local moving, connectivity refinement and aggregation, repeated
 * until no node moves. Runs on the undirected projection, where a pair
 * linked in both directions weighs 2.
 */
export function detectCommunities(
  graph: DependencyGraph,
  options: CommunityDetectionOptions = {},
): CommunityDetectionResult {
  const base = projectUndirected(graph);
  if (base.size === 0) {
    return { assignments: new Map(), communities: [], modularity: 0, levels: [] };
  }

  const random = new SeededRandom(options.seed ?? DEFAULT_COMMUNITY_SEED);
  const resolution = options.resolution ?? 1;
  const maxIterations = options.maxIterations ?? 20;
  const maxLevels = options.maxLevels ?? 10;

  let currentGraph = base;
  let members = initMembers(currentGraph);
  let assignments = new Map<string, number>();
  const levels: Array<Map<EntityKey, number>> = [];

  for (let level = 0; level < maxLevels; level += 1) {
    const partition = initPartition(currentGraph);
    const { partition: movedPartition, moved } = localMovingPhase(
      currentGraph,
      partition,
      maxIterations,
      resolution,
      random,
    );
    const refined = refinePartition(currentGraph, movedPartition);
    assignments = mapAssignments(members, refined);
    levels.push(numberBySmallestMember(assignments).assignments);
    const aggregated = aggregateGraph(currentGraph, members, refined);

    if (!moved || aggregated.graph.size === currentGraph.size) {
      break;
    }

    currentGraph = aggregated.graph;
    members = aggregated.members;
  }

  const final = numberBySmallestMember(assignments);
  return {
    assignments: final.assignments,
    communities: final.communities,
    modularity: modularityOf(base, final.assignments, resolution),
    levels,
  };
}

/**
 * Newman modularity of a partition on the undirected projection. Nodes
 * missing from `assignments` count as singletons. 0 for an edgeless graph.
 */
export function modularity(
  graph: DependencyGraph,
  assignments: ReadonlyMap<EntityKey, number>,
  resolution = 1,
): number {
  return modularityOf(projectUndirected(graph), assignments, resolution);
}

function modularityOf(graph: WeightedGraph, assignments: ReadonlyMap<string, number>, resolution: number): number {
  const degrees = computeDegrees(graph);
  const twiceTotal = sumValues(degrees);
  if (twiceTotal === 0) return 0;

  const communityOf = (node: string): string => {
    const community = assignments.get(node);
    return community === undefined ? `singleton:${node}` : String(community);
  };

  const internal = new Map<string, number>();
  const totals = new Map<string, number>();
  for (const [node, neighbors] of graph) {
    const community = communityOf(node);
    totals.set(community, (totals.get(community) ?? 0) + (degrees.get(node) ?? 0));
    for (const [neighbor, weight] of neighbors) {
      if (communityOf(neighbor) !== community) continue;
      // Each undirected edge is stored twice; a self-loop once but counts twice.
      const contribution = neighbor === node ? 2 * weight : weight;
      internal.set(community, (internal.get(community) ?? 0) + contribution);
    }
  }

  let q = 0;
  for (const [community, total] of totals) {
    const inside = internal.get(community) ?? 0;
    q += inside / twiceTotal - resolution * (total / twiceTotal) ** 2;
  }
  return q;
}

function projectUndirected(graph: DependencyGraph): WeightedGraph {
  const projected: WeightedGraph = new Map();
  for (const node of graph.nodes()) projected.set(node, new Map());
  for (const [source, targets] of graph.adjacency()) {
    for (const target of targets) {
      if (source === target) continue;
      addWeight(projected, source, target, 1);
      addWeight(projected, target, source, 1);
    }
  }
  return projected;
}

function initMembers(graph: WeightedGraph): Map<string, Set<string>> {
  const members = new Map<string, Set<string>>();
  for (const node of graph.keys()) {
    members.set(node, new Set([node]));
  }
  return members;
}

function initPartition(graph: WeightedGraph): Map<string, number> {
  const nodes = Array.from(graph.keys()).sort();
  const partition = new Map<string, number>();
  nodes.forEach((node, idx) => {
    partition.set(node, idx);
  });
  return partition;
}

function localMovingPhase(
  graph: WeightedGraph,
  partition: Map<string, number>,
  maxIterations: number,
  resolution: number,
  random: SeededRandom,
): { partition: Map<string, number>; moved: boolean } {
  const nodes = random.shuffle(Array.from(graph.keys()).sort());
  const degrees = computeDegrees(graph);
  const twiceTotal = sumValues(degrees);
  if (twiceTotal === 0) {
    return { partition, moved: false };
  }

  const communityDegree = new Map<number, number>();
  for (const [node, community] of partition) {
    const degree = degrees.get(node) ?? 0;
    communityDegree.set(community, (communityDegree.get(community) ?? 0) + degree);
  }

  let moved = false;
  for (let iter = 0; iter < maxIterations; iter += 1) {
    let movedThisRound = false;
    for (const node of nodes) {
      const nodeCommunity = partition.get(node);
      if (nodeCommunity === undefined) continue;
      const nodeDegree = degrees.get(node) ?? 0;
      if (nodeDegree === 0) continue;

      const neighborCommunities = new Map<number, number>([[nodeCommunity, 0]]);
      for (const [neighbor, weight] of graph.get(node) ?? []) {
        if (neighbor === node) continue;
        const community = partition.get(neighbor);
        if (community === undefined) continue;
        neighborCommunities.set(community, (neighborCommunities.get(community) ?? 0) + weight);
      }

      communityDegree.set(nodeCommunity, (communityDegree.get(nodeCommunity) ?? 0) - nodeDegree);

      let bestCommunity = nodeCommunity;
      let bestGain = modularityGain(
        nodeDegree,
        neighborCommunities.get(nodeCommunity) ?? 0,
        communityDegree.get(nodeCommunity) ?? 0,
        twiceTotal,
        resolution,
      );
      const candidates = Array.from(neighborCommunities.keys()).sort((a, b) => a - b);
      for (const community of candidates) {
        const gain = modularityGain(
          nodeDegree,
          neighborCommunities.get(community) ?? 0,
          communityDegree.get(community) ?? 0,
          twiceTotal,
          resolution,
        );
        if (gain > bestGain + 1e-9) {
          bestGain = gain;
          bestCommunity = community;
        }
      }

      if (bestCommunity !== nodeCommunity) {
        partition.set(node, bestCommunity);
        moved = true;
        movedThisRound = true;
      }

      communityDegree.set(bestCommunity, (communityDegree.get(bestCommunity) ?? 0) + nodeDegree);
    }

    if (!movedThisRound) break;
  }

  return { partition, moved };
}

function modularityGain(
  nodeDegree: number,
  edgeWeightToCommunity: number,
  communityDegree: number,
  twiceTotal: number,
  resolution: number,
): number {
  return edgeWeightToCommunity - (resolution * nodeDegree * communityDegree) / twiceTotal;
}

/** Split every community into its connected pieces. */
function refinePartition(graph: WeightedGraph, partition: Map<string, number>): Map<string, number> {
  const communities = new Map<number, string[]>();
  for (const [node, community] of partition) {
    const list = communities.get(community) ?? [];
    list.push(node);
    communities.set(community, list);
  }

  let nextCommunityId = Math.max(0, ...communities.keys()) + 1;
  const refined = new Map(partition);

  const ids = Array.from(communities.keys()).sort((a, b) => a - b);
  for (const communityId of ids) {
    const nodes = communities.get(communityId) ?? [];
    if (nodes.length <= 1) continue;
    const components = connectedComponents(graph, new Set(nodes.sort()));
    if (components.length <= 1) continue;
    components.forEach((component, index) => {
      const targetCommunity = index === 0 ? communityId : nextCommunityId++;
      for (const node of component) {
        refined.set(node, targetCommunity);
      }
    });
  }

  return refined;
}

function connectedComponents(graph: WeightedGraph, nodeSet: Set<string>): string[][] {
  const seen = new Set<string>();
  const components: string[][] = [];
  for (const node of nodeSet) {
    if (seen.has(node)) continue;
    const queue = [node];
    const component: string[] = [];
    seen.add(node);
    while (queue.length) {
      const current = queue.shift();
      if (current === undefined) break;
      component.push(current);
      for (const neighbor of graph.get(current)?.keys() ?? []) {
        if (!nodeSet.has(neighbor) || seen.has(neighbor)) continue;
        seen.add(neighbor);
        queue.push(neighbor);
      }
    }
    components.push(component);
  }
  return components;
}

/**
 * One node per community. Edge weights between communities add up; weights
 * inside a community become that node's self-loop.
 */
function aggregateGraph(
  graph: WeightedGraph,
  members: Map<string, Set<string>>,
  partition: Map<string, number>,
): { graph: WeightedGraph; members: Map<string, Set<string>> } {
  const newMembers = new Map<string, Set<string>>();
  for (const [node, memberSet] of members) {
    const key = String(partition.get(node) ?? 0);
    const combined = newMembers.get(key) ?? new Set<string>();
    for (const member of memberSet) combined.add(member);
    newMembers.set(key, combined);
  }

  const aggregated: WeightedGraph = new Map();
  for (const key of newMembers.keys()) aggregated.set(key, new Map());

  for (const [node, neighbors] of graph) {
    const sourceCommunity = String(partition.get(node) ?? 0);
    for (const [neighbor, weight] of neighbors) {
      if (neighbor === node) {
        addWeight(aggregated, sourceCommunity, sourceCommunity, weight);
        continue;
      }
      // Visit each undirected pair once.
      if (neighbor < node) continue;
      const targetCommunity = String(partition.get(neighbor) ?? 0);
      if (targetCommunity === sourceCommunity) {
        addWeight(aggregated, sourceCommunity, sourceCommunity, weight);
      } else {
        addWeight(aggregated, sourceCommunity, targetCommunity, weight);
        addWeight(aggregated, targetCommunity, sourceCommunity, weight);
      }
    }
  }

  return { graph: aggregated, members: newMembers };
}

function mapAssignments(
  members: Map<string, Set<string>>,
  partition: Map<string, number>,
): Map<string, number> {
  const assignments = new Map<string, number>();
  for (const [node, memberSet] of members) {
    const community = partition.get(node) ?? 0;
    for (const member of memberSet) {
      assignments.set(member, community);
    }
  }
  return assignments;
}

/** Renumber so community 0 holds the smallest key, 1 the next smallest, and so on. */
function numberBySmallestMember(
  assignments: Map<string, number>,
): { assignments: Map<string, number>; communities: string[][] } {
  const grouped = new Map<number, string[]>();
  for (const [node, community] of assignments) {
    const list = grouped.get(community) ?? [];
    list.push(node);
    grouped.set(community, list);
  }
  const communities = Array.from(grouped.values())
    .map((list) => list.sort())
    .sort((a, b) => ((a[0] ?? '') < (b[0] ?? '') ? -1 : 1));

  const renumbered = new Map<string, number>();
  communities.forEach((list, index) => {
    for (const node of list) renumbered.set(node, index);
  });
  return { assignments: renumbered, communities };
}

/** Weighted degree; a self-loop counts twice. */
function computeDegrees(graph: WeightedGraph): Map<string, number> {
  const degrees = new Map<string, number>();
  for (const [node, neighbors] of graph) {
    let degree = 0;
    for (const [neighbor, weight] of neighbors) degree += neighbor === node ? 2 * weight : weight;
    degrees.set(node, degree);
  }
  return degrees;
}

function addWeight(graph: WeightedGraph, source: string, target: string, weight: number): void {
  const neighbors = graph.get(source) ?? new Map<string, number>();
  neighbors.set(target, (neighbors.get(target) ?? 0) + weight);
  graph.set(source, neighbors);
}

function sumValues(values: Map<string, number>): number {
  let total = 0;
  for (const value of values.values()) total += value;
  return total;
}
