/**
 * @fileoverview Architecture engine facade
 *
 * One object holding resolved configuration, exposing every boundary
 * operation over plain snapshots. Graphs built from a snapshot are cached
 * per snapshot object, so callers must treat snapshots as immutable.
 */

import {
  loadEngineConfig,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
  type LoadEngineConfigOptions,
} from '../config/engine_config.js';
import { detectCommunities, type CommunityDetectionResult } from '../graphs/communities.js';
import { computeMetrics, type GraphMetricsResult } from '../graphs/metrics.js';
import {
  DependencyGraph,
  type DependencyType,
  type EntityKey,
  type GraphGranularity,
  type GraphSnapshot,
} from '../graphs/model.js';
import {
  analyzeCycles,
  enumerateCycles,
  findTransitiveEdges,
  type CycleAnalysis,
  type CycleEnumeration,
  type CycleEnumerationOptions,
} from '../graphs/scc.js';
import { topologicalOrder, type TopologicalOrderResult } from '../graphs/topology.js';
import { traverse, type Traversal, type TraversalOptions } from '../graphs/traversal.js';
import type { ReferenceDefinition, ReferenceRegistry } from '../references/reference_definition.js';
import { resolveReference, type ReferenceResolution, type ResolverContext } from '../references/resolver.js';
import {
  evaluateStatement,
  evaluateStatements,
  type BatchResult,
  type EvaluationContext,
  type StatementInput,
  type Verdict,
} from '../statements/evaluator.js';
import { parseStatement, type KnownReferences } from '../statements/parser.js';
import type { ParsedStatement } from '../statements/types.js';
import { createSnapshotTagStore } from '../tags/tag_store.js';
import { createLogger, setLogLevel } from '../telemetry/logger.js';

const logger = createLogger('engine');

export interface GraphQueryOptions {
  /** Default `component` */
  granularity?: GraphGranularity;
}

/**
 * Build the context statements are evaluated in. The graph is built at
 * combined granularity so statements can name components and endpoints.
 */
export function createEvaluationContext(snapshot: GraphSnapshot, references: ReferenceRegistry): EvaluationContext {
  return Object.freeze({
    graph: DependencyGraph.fromSnapshot(snapshot, { granularity: 'combined' }),
    tags: createSnapshotTagStore(snapshot),
    references,
  });
}

export class ArchitectureEngine {
  readonly config: EngineConfig;
  private readonly graphs = new WeakMap<GraphSnapshot, Map<GraphGranularity, DependencyGraph>>();

  /**
   * The logger threshold is process-wide: a `logLevel` given here applies to
   * every engine, and without one the current threshold is kept.
   */
  constructor(config: EngineConfigInput = {}) {
    this.config = resolveEngineConfig(config);
    if (this.config.logLevel) setLogLevel(this.config.logLevel);
  }

  /** Engine configured from a YAML file, `ARCH_ENGINE_*` variables and overrides */
  static async load(options: LoadEngineConfigOptions = {}): Promise<ArchitectureEngine> {
    return new ArchitectureEngine(await loadEngineConfig(options));
  }

  // ==========================================================================
  // REFERENCES AND STATEMENTS
  // ==========================================================================

  resolveReference(definition: ReferenceDefinition, context: ResolverContext): ReferenceResolution {
    return resolveReference(definition, context);
  }

  parseStatement(text: string, knownReferences: KnownReferences = []): ParsedStatement {
    return parseStatement(text, knownReferences);
  }

  evaluateStatement(statement: StatementInput, context: EvaluationContext): Verdict {
    const parsed = typeof statement === 'string' ? parseStatement(statement, context.references) : statement;
    return evaluateStatement(parsed, context, { exclusionTransitiveByDefault: this.config.exclusionTransitiveByDefault });
  }

  evaluateStatements(statements: readonly StatementInput[], context: EvaluationContext): BatchResult {
    const result = evaluateStatements(statements, context, {
      exclusionTransitiveByDefault: this.config.exclusionTransitiveByDefault,
    });
    logger.info('Evaluated statements', { ...result.summary });
    return result;
  }

  // ==========================================================================
  // GRAPH QUERIES
  // ==========================================================================

  computeMetrics(snapshot: GraphSnapshot, options: GraphQueryOptions = {}): GraphMetricsResult {
    return computeMetrics(this.graphOf(snapshot, options.granularity), {
      eigenvector: {
        maxIterations: this.config.eigenvectorMaxIterations,
        tolerance: this.config.eigenvectorTolerance,
      },
    });
  }

  detectCycles(snapshot: GraphSnapshot, options: GraphQueryOptions = {}): CycleAnalysis {
    return analyzeCycles(this.graphOf(snapshot, options.granularity));
  }

  enumerateCycles(snapshot: GraphSnapshot, options: CycleEnumerationOptions & GraphQueryOptions = {}): CycleEnumeration {
    const { granularity, ...limits } = options;
    return enumerateCycles(this.graphOf(snapshot, granularity), limits);
  }

  findTransitiveEdges(snapshot: GraphSnapshot, options: GraphQueryOptions = {}): Array<[EntityKey, EntityKey]> {
    return findTransitiveEdges(this.graphOf(snapshot, options.granularity));
  }

    detectCommunities(snapshot: GraphSnapshot, seed?: number, options: GraphQueryOptions = {}): CommunityDetectionResult {
    return detectCommunities(this.graphOf(snapshot, options.granularity), {
      seed: seed ?? this.config.communitySeed,
      resolution: this.config.communityResolution,
      maxIterations: this.config.communityMaxIterations,
      maxLevels: this.config.communityMaxLevels,
    });
  }

  topologicalOrder(
    snapshot: GraphSnapshot,
    edgeTypes?: Iterable<DependencyType>,
    options: GraphQueryOptions = {},
  ): TopologicalOrderResult {
    return topologicalOrder(this.graphOf(snapshot, options.granularity), {
      edgeTypes: edgeTypes ? new Set(edgeTypes) : undefined,
    });
  }

  traverse(
    snapshot: GraphSnapshot,
    start: EntityKey,
    options: TraversalOptions & GraphQueryOptions = {},
  ): Traversal {
    const { granularity, ...traversal } = options;
    return traverse(this.graphOf(snapshot, granularity), start, traversal);
  }

  private graphOf(snapshot: GraphSnapshot, granularity: GraphGranularity = 'component'): DependencyGraph {
    const byGranularity = this.graphs.get(snapshot) ?? new Map<GraphGranularity, DependencyGraph>();
    this.graphs.set(snapshot, byGranularity);
    const cached = byGranularity.get(granularity);
    if (cached) return cached;
    const graph = DependencyGraph.fromSnapshot(snapshot, { granularity });
    if (graph.droppedEdges > 0) {
      logger.warn('Dropped dependencies naming unknown entities', { dropped: graph.droppedEdges });
    }
    byGranularity.set(granularity, graph);
    return graph;
  }
}
