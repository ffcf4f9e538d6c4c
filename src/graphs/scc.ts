/**
 * @fileoverview Strongly connected components and the condensed DAG
 *
 * Iterative Tarjan, O(V + E). Components are numbered in topological order
 * of the condensation: every condensed edge goes from a lower id to a
 * higher one.
 */

import type { Adjacency, DependencyGraph, DependencyType, EntityKey } from './model.js';

export interface StronglyConnectedComponent {
  id: number;
  /** Ascending key order */
  members: EntityKey[];
  size: number;
  /** Edges between a member and a non-member, either direction */
  externalEdges: number;
  /** More than one member, or a single member with a self-loop */
  cyclic: boolean;
}

export interface CondensedGraph {
  nodeToScc: Map<EntityKey, number>;
  /** SCC id -> successor SCC ids; every SCC is a key */
  adjacency: Map<number, Set<number>>;
  edges: Array<[number, number]>;
}

export interface CycleAnalysis {
  components: StronglyConnectedComponent[];
  /** Only the components with `cyclic` set */
  cycles: StronglyConnectedComponent[];
  condensed: CondensedGraph;
}

export function stronglyConnectedComponents(
  graph: DependencyGraph,
  edgeTypes?: ReadonlySet<DependencyType>,
): StronglyConnectedComponent[] {
  return computeComponents(graph.adjacency(edgeTypes));
}

export function analyzeCycles(graph: DependencyGraph, edgeTypes?: ReadonlySet<DependencyType>): CycleAnalysis {
  const adjacency = graph.adjacency(edgeTypes);
  const components = computeComponents(adjacency);
  return {
    components,
    cycles: components.filter((component) => component.cyclic),
    condensed: condenseAdjacency(adjacency, components),
  };
}

export function condense(graph: DependencyGraph, components: readonly StronglyConnectedComponent[]): CondensedGraph {
  return condenseAdjacency(graph.adjacency(), components);
}

/**
 * Edges whose endpoints share a cyclic component (self-loops included).
 */
export function findCycleEdges(
  adjacency: Adjacency,
  components: readonly StronglyConnectedComponent[],
): Array<[EntityKey, EntityKey]> {
  const nodeToScc = indexMembers(components);
  const cyclic = new Set(components.filter((c) => c.cyclic).map((c) => c.id));
  const edges: Array<[EntityKey, EntityKey]> = [];
  for (const [source, targets] of adjacency) {
    const sourceScc = nodeToScc.get(source);
    if (sourceScc === undefined || !cyclic.has(sourceScc)) continue;
    for (const target of Array.from(targets).sort()) {
      if (nodeToScc.get(target) === sourceScc) edges.push([source, target]);
    }
  }
  return edges.sort((a, b) => (a[0] === b[0] ? compareKeys(a[1], b[1]) : compareKeys(a[0], b[0])));
}

export interface CycleEnumerationOptions {
  /** Stop after this many cycles (default 100) */
  maxCycles?: number;
  /** Longest cycle, in nodes, to report (default 10) */
  maxLength?: number;
  edgeTypes?: ReadonlySet<DependencyType>;
}

export interface CycleEnumeration {
  /** Each cycle starts at its smallest key; shorter cycles first */
  cycles: EntityKey[][];
  /** More cycles exist than `maxCycles` allowed */
  truncated: boolean;
}

/**
 * Elementary cycles, searched inside each cyclic component only. A cycle is
 * found once, from its smallest member, so rotations are not repeated.
 * Self-loops count as cycles of length 1.
 */
export function enumerateCycles(graph: DependencyGraph, options: CycleEnumerationOptions = {}): CycleEnumeration {
  const maxCycles = options.maxCycles ?? 100;
  const maxLength = options.maxLength ?? 10;
  const adjacency = graph.adjacency(options.edgeTypes);
  const cycles: EntityKey[][] = [];
  let truncated = false;

  const record = (cycle: EntityKey[]): boolean => {
    if (cycles.length >= maxCycles) {
      truncated = true;
      return false;
    }
    cycles.push(cycle);
    return true;
  };

  search: for (const component of computeComponents(adjacency)) {
    if (!component.cyclic) continue;
    const members = new Set(component.members);
    for (const start of component.members) {
      const path: EntityKey[] = [start];
      const onPath = new Set<EntityKey>([start]);
      const extend = (node: EntityKey): boolean => {
        for (const next of sortedSuccessors(adjacency, node)) {
          if (!members.has(next)) continue;
          if (next === start) {
            if (!record([...path])) return false;
            continue;
          }
          if (next < start || onPath.has(next) || path.length >= maxLength) continue;
          path.push(next);
          onPath.add(next);
          const keepGoing = extend(next);
          path.pop();
          onPath.delete(next);
          if (!keepGoing) return false;
        }
        return true;
      };
      if (!extend(start)) break search;
    }
  }

  cycles.sort((a, b) => a.length - b.length || compareKeys(a.join('\u0000'), b.join('\u0000')));
  return { cycles, truncated };
}

/**
 * Edges implied by other paths: dropping each one, in ascending order,
 * leaves its target reachable from its source. Edges are dropped as they
 * are found, so two edges that imply each other are not both reported.
 * Self-loops are never reported.
 */
export function findTransitiveEdges(
  graph: DependencyGraph,
  edgeTypes?: ReadonlySet<DependencyType>,
): Array<[EntityKey, EntityKey]> {
  const adjacency = graph.adjacency(edgeTypes);
  const pairs: Array<[EntityKey, EntityKey]> = [];
  for (const source of Array.from(adjacency.keys()).sort()) {
    for (const target of sortedSuccessors(adjacency, source)) {
      if (source !== target) pairs.push([source, target]);
    }
  }

  const transitive: Array<[EntityKey, EntityKey]> = [];
  for (const [source, target] of pairs) {
    const targets = adjacency.get(source);
    if (!targets) continue;
    targets.delete(target);
    if (isReachable(adjacency, source, target)) {
      transitive.push([source, target]);
    } else {
      targets.add(target);
    }
  }
  return transitive;
}

function isReachable(adjacency: Adjacency, source: EntityKey, target: EntityKey): boolean {
  const visited = new Set<EntityKey>([source]);
  const queue: EntityKey[] = [source];
  for (const node of queue) {
    for (const next of adjacency.get(node) ?? []) {
      if (next === target) return true;
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push(next);
    }
  }
  return false;
}

export function computeComponents(adjacency: Adjacency): StronglyConnectedComponent[] {
  const nodes = Array.from(adjacency.keys()).sort();
  const indices = new Map<EntityKey, number>();
  const lowLinks = new Map<EntityKey, number>();
  const onStack = new Set<EntityKey>();
  const stack: EntityKey[] = [];
  const found: EntityKey[][] = [];
  let nextIndex = 0;

  const visit = (node: EntityKey): void => {
    indices.set(node, nextIndex);
    lowLinks.set(node, nextIndex);
    nextIndex += 1;
    stack.push(node);
    onStack.add(node);
  };

  for (const root of nodes) {
    if (indices.has(root)) continue;
    visit(root);
    const work: Array<{ node: EntityKey; successors: EntityKey[]; next: number }> = [
      { node: root, successors: sortedSuccessors(adjacency, root), next: 0 },
    ];

    while (work.length > 0) {
      const frame = work[work.length - 1];
      if (!frame) break;
      const { node } = frame;

      if (frame.next < frame.successors.length) {
        const successor = frame.successors[frame.next] ?? '';
        frame.next += 1;
        if (!indices.has(successor)) {
          visit(successor);
          work.push({ node: successor, successors: sortedSuccessors(adjacency, successor), next: 0 });
        } else if (onStack.has(successor)) {
          lowLinks.set(node, Math.min(lowLinks.get(node) ?? 0, indices.get(successor) ?? 0));
        }
        continue;
      }

      work.pop();
      if (lowLinks.get(node) === indices.get(node)) {
        const members: EntityKey[] = [];
        let member: EntityKey | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          members.push(member);
        } while (member !== node);
        found.push(members.sort());
      }
      const parent = work[work.length - 1];
      if (parent) {
        lowLinks.set(parent.node, Math.min(lowLinks.get(parent.node) ?? 0, lowLinks.get(node) ?? 0));
      }
    }
  }

  // Tarjan finishes sinks first; reverse for topological numbering.
  found.reverse();
  const nodeToScc = new Map<EntityKey, number>();
  found.forEach((members, id) => {
    for (const member of members) nodeToScc.set(member, id);
  });

  const external = new Array<number>(found.length).fill(0);
  for (const [source, targets] of adjacency) {
    const sourceScc = nodeToScc.get(source) ?? -1;
    for (const target of targets) {
      const targetScc = nodeToScc.get(target) ?? -1;
      if (sourceScc === targetScc) continue;
      external[sourceScc] = (external[sourceScc] ?? 0) + 1;
      external[targetScc] = (external[targetScc] ?? 0) + 1;
    }
  }

  return found.map((members, id) => {
    const first = members[0] ?? '';
    return {
      id,
      members,
      size: members.length,
      externalEdges: external[id] ?? 0,
      cyclic: members.length > 1 || (adjacency.get(first)?.has(first) ?? false),
    };
  });
}

function condenseAdjacency(adjacency: Adjacency, components: readonly StronglyConnectedComponent[]): CondensedGraph {
  const nodeToScc = indexMembers(components);
  const condensed = new Map<number, Set<number>>();
  for (const component of components) condensed.set(component.id, new Set());

  for (const [source, targets] of adjacency) {
    const sourceScc = nodeToScc.get(source);
    if (sourceScc === undefined) continue;
    for (const target of targets) {
      const targetScc = nodeToScc.get(target);
      if (targetScc === undefined || targetScc === sourceScc) continue;
      condensed.get(sourceScc)?.add(targetScc);
    }
  }

  const edges: Array<[number, number]> = [];
  for (const [source, targets] of condensed) {
    for (const target of Array.from(targets).sort((a, b) => a - b)) edges.push([source, target]);
  }
  edges.sort((a, b) => a[0] - b[0] || a[1] - b[1]);
  return { nodeToScc, adjacency: condensed, edges };
}

function indexMembers(components: readonly StronglyConnectedComponent[]): Map<EntityKey, number> {
  const nodeToScc = new Map<EntityKey, number>();
  for (const component of components) {
    for (const member of component.members) nodeToScc.set(member, component.id);
  }
  return nodeToScc;
}

function sortedSuccessors(adjacency: Adjacency, node: EntityKey): EntityKey[] {
  return Array.from(adjacency.get(node) ?? []).sort();
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
