import {
  betweennessCentrality,
  closenessCentrality,
  degreeCentrality,
  eigenvectorCentrality,
  type EigenvectorOptions,
} from './centrality.js';
import type { DependencyGraph, DependencyType, EntityKey } from './model.js';
import { computeComponents } from './scc.js';
import { assignTopologicalLayers } from './topology.js';

export interface ComponentMetrics {
  entityId: EntityKey;
  fanIn: number;
  fanOut: number;
  /** fanOut / (fanIn + fanOut); 0 when both are 0 */
  instability: number;
  /** 0.6 * fanIn + 0.4 * fanOut */
  couplingScore: number;
  degree: number;
  betweenness: number;
  closeness: number;
  eigenvector: number;
  /** Typed parallel edges, counted per dependency type */
  outgoingTypes: Record<DependencyType, number>;
  incomingTypes: Record<DependencyType, number>;
  sccId: number;
  topologicalDepth: number;
}

export interface GraphMetricsReportV1 {
  kind: 'GraphMetricsReport.v1';
  schema_version: 1;
  computed_at: string;
  totals: {
    nodes: number;
    edges: number;
    typed_edges: number;
    parallel_edges: number;
    cyclic_sccs: number;
    dropped_edges: number;
  };
}

export interface ComputeMetricsOptions {
  eigenvector?: EigenvectorOptions;
  computedAt?: string;
}

export interface GraphMetricsResult {
  /** One entry per node, in ascending key order */
  metrics: ComponentMetrics[];
  report: GraphMetricsReportV1;
}

const FAN_IN_WEIGHT = 0.6;
const FAN_OUT_WEIGHT = 0.4;

export function computeMetrics(graph: DependencyGraph, options: ComputeMetricsOptions = {}): GraphMetricsResult {
  const computedAt = options.computedAt ?? new Date().toISOString();
  const degree = degreeCentrality(graph);
  const betweenness = betweennessCentrality(graph);
  const closeness = closenessCentrality(graph);
  const eigenvector = eigenvectorCentrality(graph, options.eigenvector);
  const components = computeComponents(graph.adjacency());
  const depths = assignTopologicalLayers(graph);

  const sccOf = new Map<EntityKey, number>();
  for (const component of components) {
    for (const member of component.members) sccOf.set(member, component.id);
  }

  const metrics: ComponentMetrics[] = graph.nodes().map((node) => {
    const fanIn = graph.predecessors(node).length;
    const fanOut = graph.successors(node).length;
    return {
      entityId: node,
      fanIn,
      fanOut,
      instability: fanIn + fanOut === 0 ? 0 : fanOut / (fanIn + fanOut),
      couplingScore: FAN_IN_WEIGHT * fanIn + FAN_OUT_WEIGHT * fanOut,
      degree: degree.get(node) ?? 0,
      betweenness: betweenness.get(node) ?? 0,
      closeness: closeness.get(node) ?? 0,
      eigenvector: eigenvector.get(node) ?? 0,
      outgoingTypes: graph.outgoingTypeCounts(node),
      incomingTypes: graph.incomingTypeCounts(node),
      sccId: sccOf.get(node) ?? 0,
      topologicalDepth: depths.get(node) ?? 0,
    };
  });

  return {
    metrics,
    report: {
      kind: 'GraphMetricsReport.v1',
      schema_version: 1,
      computed_at: computedAt,
      totals: {
        nodes: graph.nodeCount,
        edges: graph.edgeCount,
        typed_edges: graph.typedEdgeCount,
        parallel_edges: graph.typedEdgeCount - graph.edgeCount,
        cyclic_sccs: components.filter((component) => component.cyclic).length,
        dropped_edges: graph.droppedEdges,
      },
    },
  };
}

/**
 * Entries whose coupling score is at or above the given percentile (0..1)
 * of all scores, highest first.
 */
export function findHighCouplingComponents(
  metrics: readonly ComponentMetrics[],
  p = 0.8,
): ComponentMetrics[] {
  if (metrics.length === 0) return [];
  const threshold = percentile(metrics.map((entry) => entry.couplingScore), p);
  return metrics
    .filter((entry) => entry.couplingScore >= threshold)
    .sort((a, b) => b.couplingScore - a.couplingScore || (a.entityId < b.entityId ? -1 : 1));
}

function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = values.slice().sort((a, b) => a - b);
  const idx = Math.min(sorted.length - 1, Math.max(0, Math.floor(p * (sorted.length - 1))));
  return sorted[idx] ?? 0;
}
