export {
  DEFAULT_DEPENDENCY_TYPE,
  DependencyGraph,
  type Adjacency,
  type ComponentRecord,
  type DependencyEdge,
  type DependencyRecord,
  type DependencyType,
  type EndpointRecord,
  type EntityKey,
  type GraphBuildOptions,
  type GraphGranularity,
  type GraphSnapshot,
  type LayerRecord,
} from './model.js';
export { Traversal, traverse, type TraversalDirection, type TraversalOptions, type TraversalStep } from './traversal.js';
export {
  assignTopologicalLayers,
  detectLayerViolations,
  topologicalOrder,
  type LayerViolation,
  type LayerViolationSeverity,
  type RankMap,
  type TopologicalOrderOptions,
  type TopologicalOrderResult,
} from './topology.js';
export {
  analyzeCycles,
  condense,
  enumerateCycles,
  findCycleEdges,
  findTransitiveEdges,
  stronglyConnectedComponents,
  type CondensedGraph,
  type CycleAnalysis,
  type CycleEnumeration,
  type CycleEnumerationOptions,
  type StronglyConnectedComponent,
} from './scc.js';
export {
  detectCommunities,
  modularity,
  type CommunityDetectionOptions,
  type CommunityDetectionResult,
} from './communities.js';
export {
  betweennessCentrality,
  closenessCentrality,
  degreeCentrality,
  eigenvectorCentrality,
  type EigenvectorOptions,
} from './centrality.js';
export {
  computeMetrics,
  findHighCouplingComponents,
  type ComponentMetrics,
  type ComputeMetricsOptions,
  type GraphMetricsReportV1,
  type GraphMetricsResult,
} from './metrics.js';
