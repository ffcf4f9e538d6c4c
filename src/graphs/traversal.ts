import type { DependencyGraph, DependencyType, EntityKey } from './model.js';

export type TraversalDirection = 'outgoing' | 'incoming' | 'both';

export interface TraversalOptions {
  direction?: TraversalDirection;
  /** 0 or less means unbounded */
  maxDepth?: number;
  /** Only follow edges of these types */
  edgeTypes?: ReadonlySet<DependencyType>;
}

export interface TraversalStep {
  node: EntityKey;
  /** Hops from the start node (1 = direct) */
  depth: number;
  /** Node this one was first reached from */
  parent: EntityKey;
}

/**
 * Breadth-first reachability from one node. Iterating yields each reachable
 * node once, nearest first, nodes at equal depth in ascending key order; the start node
 * itself is not yielded. Each iteration recomputes from the graph, so the
 * result can be consumed any number of times.
 */
export class Traversal implements Iterable<TraversalStep> {
  constructor(
    private readonly graph: DependencyGraph,
    readonly start: EntityKey,
    private readonly options: TraversalOptions = {},
  ) {}

  *[Symbol.iterator](): Iterator<TraversalStep> {
    if (!this.graph.hasNode(this.start)) return;
    const direction = this.options.direction ?? 'outgoing';
    const maxDepth = this.options.maxDepth ?? 0;
    const visited = new Set<EntityKey>([this.start]);
    let frontier: EntityKey[] = [this.start];
    let depth = 0;

    while (frontier.length > 0) {
      if (maxDepth > 0 && depth >= maxDepth) return;
      depth += 1;
      const parents = new Map<EntityKey, EntityKey>();
      for (const node of frontier) {
        for (const neighbor of this.neighbors(node, direction)) {
          if (visited.has(neighbor) || parents.has(neighbor)) continue;
          parents.set(neighbor, node);
        }
      }
      const level = Array.from(parents.keys()).sort();
      for (const node of level) {
        visited.add(node);
        yield { node, depth, parent: parents.get(node) ?? this.start };
      }
      frontier = level;
    }
  }

  /** Nodes at distance 1 */
  direct(): EntityKey[] {
    return this.collect((step) => step.depth === 1);
  }

  /** Nodes at distance greater than 1 */
  transitive(): EntityKey[] {
    return this.collect((step) => step.depth > 1);
  }

  /** Every reachable node */
  reachable(): EntityKey[] {
    return this.collect(() => true);
  }

  /** Depth -> nodes at that depth, in visiting order */
  byDepth(): Map<number, EntityKey[]> {
    const levels = new Map<number, EntityKey[]>();
    for (const step of this) {
      const level = levels.get(step.depth) ?? [];
      level.push(step.node);
      levels.set(step.depth, level);
    }
    return levels;
  }

  /** Start node, ..., `target` along the first path found; null when unreachable */
  pathTo(target: EntityKey): EntityKey[] | null {
    const parents = new Map<EntityKey, EntityKey>();
    for (const step of this) {
      parents.set(step.node, step.parent);
      if (step.node === target) {
        const path = [target];
        let current = step.parent;
        while (current !== this.start) {
          path.push(current);
          current = parents.get(current) ?? this.start;
        }
        path.push(this.start);
        return path.reverse();
      }
    }
    return null;
  }

  private collect(predicate: (step: TraversalStep) => boolean): EntityKey[] {
    const nodes: EntityKey[] = [];
    for (const step of this) {
      if (predicate(step)) nodes.push(step.node);
    }
    return nodes;
  }

  private neighbors(node: EntityKey, direction: TraversalDirection): EntityKey[] {
    const edgeTypes = this.options.edgeTypes;
    const follows = (source: EntityKey, target: EntityKey): boolean =>
      !edgeTypes || this.graph.edgeTypes(source, target).some((type) => edgeTypes.has(type));

    const result = new Set<EntityKey>();
    if (direction !== 'incoming') {
      for (const target of this.graph.successors(node)) {
        if (follows(node, target)) result.add(target);
      }
    }
    if (direction !== 'outgoing') {
      for (const source of this.graph.predecessors(node)) {
        if (follows(source, node)) result.add(source);
      }
    }
    return Array.from(result).sort();
  }
}

export function traverse(graph: DependencyGraph, start: EntityKey, options: TraversalOptions = {}): Traversal {
  return new Traversal(graph, start, options);
}
