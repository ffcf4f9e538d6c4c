/**
 * @fileoverview Component dependency graph model
 *
 * Snapshot types exchanged with the host application, and the immutable
 * `DependencyGraph` every algorithm in this directory runs on.
 *
 * The graph keeps each typed edge (parallel edges of different types stay
 * distinct, for per-type metrics) and exposes a de-duplicated adjacency
 * for the algorithms that only care about reachability.
 */

// ============================================================================
// SNAPSHOT TYPES
// ============================================================================

export type EntityKey = string;
export type DependencyType = string;

export const DEFAULT_DEPENDENCY_TYPE: DependencyType = 'unspecified';

export interface ComponentRecord {
  key: EntityKey;
  name?: string;
  tags?: readonly string[];
  /** Layer keys this component belongs to, in addition to each layer's own member list */
  layers?: readonly string[];
}

export interface EndpointRecord {
  key: EntityKey;
  /** Owning component */
  component: EntityKey;
  name?: string;
  tags?: readonly string[];
  layers?: readonly string[];
}

export interface DependencyRecord {
  source: EntityKey;
  target: EntityKey;
  /** compile, runtime, contract, ... (default: unspecified) */
  type?: DependencyType;
}

export interface LayerRecord {
  key: string;
  name?: string;
  parent?: string | null;
  members?: readonly EntityKey[];
  tags?: readonly string[];
  /** Imported from an external source and not editable by hand */
  readOnly?: boolean;
}

export interface GraphSnapshot {
  components: readonly ComponentRecord[];
  endpoints?: readonly EndpointRecord[];
  dependencies: readonly DependencyRecord[];
  layers?: readonly LayerRecord[];
}

/**
 * Which nodes a graph built from a snapshot contains.
 *
 * - `component`: components only; endpoint edges are lifted to their owners
 * - `endpoint`: components and endpoints, raw edges only
 * - `combined`: components and endpoints, raw edges plus lifted edges, and
 *   half-lifted edges from an endpoint to a component and back
 */
export type GraphGranularity = 'component' | 'endpoint' | 'combined';

// ============================================================================
// GRAPH
// ============================================================================

/** Plain adjacency: node -> distinct successors. Every node is a key. */
export type Adjacency = Map<string, Set<string>>;

export interface DependencyEdge {
  source: EntityKey;
  target: EntityKey;
  type: DependencyType;
}

export interface GraphBuildOptions {
  granularity?: GraphGranularity;
}

export class DependencyGraph {
  private readonly nodeSet: ReadonlySet<EntityKey>;
  private readonly sortedNodes: readonly EntityKey[];
  private readonly typedEdges: readonly DependencyEdge[];
  private readonly outgoing: Map<EntityKey, Map<EntityKey, DependencyType[]>>;
  private readonly incoming: Map<EntityKey, Map<EntityKey, DependencyType[]>>;

  private constructor(
    nodes: Iterable<EntityKey>,
    edges: Iterable<DependencyEdge>,
    /** Edges from the input that named an unknown node and were left out */
    readonly droppedEdges: number,
  ) {
    const nodeSet = new Set(nodes);
    this.outgoing = new Map();
    this.incoming = new Map();
    for (const node of nodeSet) {
      this.outgoing.set(node, new Map());
      this.incoming.set(node, new Map());
    }

    const kept: DependencyEdge[] = [];
    for (const edge of edges) {
      const targets = this.outgoing.get(edge.source);
      const sources = this.incoming.get(edge.target);
      if (!targets || !sources) continue;
      const types = targets.get(edge.target) ?? [];
      if (types.includes(edge.type)) continue;
      types.push(edge.type);
      targets.set(edge.target, types);
      sources.set(edge.source, types);
      kept.push({ source: edge.source, target: edge.target, type: edge.type });
    }

    this.nodeSet = nodeSet;
    this.sortedNodes = Array.from(nodeSet).sort();
    this.typedEdges = kept.sort(compareEdges);
  }

  /**
   * Build from explicit nodes and edges. Nodes named only by an edge are
   * added; untyped pairs get the default dependency type.
   */
  static fromEdges(
    edges: Iterable<DependencyEdge | readonly [EntityKey, EntityKey]>,
    nodes: Iterable<EntityKey> = [],
  ): DependencyGraph {
    const nodeSet = new Set(nodes);
    const typed: DependencyEdge[] = [];
    for (const edge of edges) {
      const normalized = isEdgeTuple(edge)
        ? { source: edge[0], target: edge[1], type: DEFAULT_DEPENDENCY_TYPE }
        : edge;
      nodeSet.add(normalized.source);
      nodeSet.add(normalized.target);
      typed.push(normalized);
    }
    return new DependencyGraph(nodeSet, typed, 0);
  }

  static fromSnapshot(snapshot: GraphSnapshot, options: GraphBuildOptions = {}): DependencyGraph {
    const granularity = options.granularity ?? 'component';
    const componentKeys = new Set(snapshot.components.map((component) => component.key));
    const owner = new Map<EntityKey, EntityKey>();
    for (const endpoint of snapshot.endpoints ?? []) {
      if (componentKeys.has(endpoint.component)) owner.set(endpoint.key, endpoint.component);
    }

    const nodes = new Set<EntityKey>(componentKeys);
    if (granularity !== 'component') {
      for (const key of owner.keys()) nodes.add(key);
    }

    const edges: DependencyEdge[] = [];
    let dropped = 0;
    for (const dependency of snapshot.dependencies) {
      const type = dependency.type ?? DEFAULT_DEPENDENCY_TYPE;
      const sourceKnown = componentKeys.has(dependency.source) || owner.has(dependency.source);
      const targetKnown = componentKeys.has(dependency.target) || owner.has(dependency.target);
      if (!sourceKnown || !targetKnown) {
        dropped += 1;
        continue;
      }

      if (granularity !== 'component') {
        edges.push({ source: dependency.source, target: dependency.target, type });
      }
      if (granularity === 'endpoint') continue;

      const liftedSource = owner.get(dependency.source) ?? dependency.source;
      const liftedTarget = owner.get(dependency.target) ?? dependency.target;
      const wasLifted = liftedSource !== dependency.source || liftedTarget !== dependency.target;
      if (wasLifted && liftedSource === liftedTarget) continue;
      if (wasLifted || granularity === 'component') {
        edges.push({ source: liftedSource, target: liftedTarget, type });
      }
      if (granularity !== 'combined') continue;
      // half-lifted: endpoint to the other side's owner, owner to the other side's endpoint
      if (liftedTarget !== dependency.target) {
        edges.push({ source: dependency.source, target: liftedTarget, type });
      }
      if (liftedSource !== dependency.source) {
        edges.push({ source: liftedSource, target: dependency.target, type });
      }
    }

    return new DependencyGraph(nodes, edges, dropped);
  }

  get nodeCount(): number {
    return this.sortedNodes.length;
  }

  /** Distinct (source, target) pairs */
  get edgeCount(): number {
    let count = 0;
    for (const targets of this.outgoing.values()) count += targets.size;
    return count;
  }

  /** Typed edges, parallel edges counted separately */
  get typedEdgeCount(): number {
    return this.typedEdges.length;
  }

  /** Node keys in ascending order */
  nodes(): readonly EntityKey[] {
    return this.sortedNodes;
  }

  hasNode(key: EntityKey): boolean {
    return this.nodeSet.has(key);
  }

  edges(): readonly DependencyEdge[] {
    return this.typedEdges;
  }

  hasEdge(source: EntityKey, target: EntityKey): boolean {
    return this.outgoing.get(source)?.has(target) ?? false;
  }

  edgeTypes(source: EntityKey, target: EntityKey): readonly DependencyType[] {
    return this.outgoing.get(source)?.get(target) ?? [];
  }

  /** Successors in ascending key order */
  successors(node: EntityKey): EntityKey[] {
    return Array.from(this.outgoing.get(node)?.keys() ?? []).sort();
  }

  /** Predecessors in ascending key order */
  predecessors(node: EntityKey): EntityKey[] {
    return Array.from(this.incoming.get(node)?.keys() ?? []).sort();
  }

  /** Dependency type -> number of outgoing typed edges */
  outgoingTypeCounts(node: EntityKey): Record<DependencyType, number> {
    return countTypes(this.outgoing.get(node));
  }

  incomingTypeCounts(node: EntityKey): Record<DependencyType, number> {
    return countTypes(this.incoming.get(node));
  }

  /**
   * De-duplicated adjacency. With `edgeTypes`, only edges of those types
   * count; every node stays a key either way.
   */
  adjacency(edgeTypes?: ReadonlySet<DependencyType>): Adjacency {
    const result: Adjacency = new Map();
    for (const node of this.sortedNodes) result.set(node, new Set());
    for (const edge of this.typedEdges) {
      if (edgeTypes && !edgeTypes.has(edge.type)) continue;
      result.get(edge.source)?.add(edge.target);
    }
    return result;
  }

  /** Same nodes, only edges whose type is in `edgeTypes` */
  filterEdgeTypes(edgeTypes: ReadonlySet<DependencyType>): DependencyGraph {
    return new DependencyGraph(
      this.sortedNodes,
      this.typedEdges.filter((edge) => edgeTypes.has(edge.type)),
      this.droppedEdges,
    );
  }
}

function isEdgeTuple(edge: DependencyEdge | readonly [EntityKey, EntityKey]): edge is readonly [EntityKey, EntityKey] {
  return Array.isArray(edge);
}

function compareEdges(a: DependencyEdge, b: DependencyEdge): number {
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  if (a.target !== b.target) return a.target < b.target ? -1 : 1;
  if (a.type !== b.type) return a.type < b.type ? -1 : 1;
  return 0;
}

function countTypes(neighbors: Map<EntityKey, DependencyType[]> | undefined): Record<DependencyType, number> {
  const counts: Record<DependencyType, number> = {};
  for (const types of neighbors?.values() ?? []) {
    for (const type of types) counts[type] = (counts[type] ?? 0) + 1;
  }
  return counts;
}
