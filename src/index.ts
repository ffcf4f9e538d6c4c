/**
 * @fileoverview Architectural statement evaluation engine
 *
 * Evaluates statements such as
 * `$$$payment-services$$$ must be in $$$domain-layer$$$` against a snapshot
 * of components, endpoints, dependencies and layers, and computes graph
 * metrics over the same snapshot.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ArchitectureEngine, createEvaluationContext, parseReferenceRegistryInput } from 'arch-statement-engine';
 *
 * const engine = new ArchitectureEngine({ exclusionTransitiveByDefault: true });
 * const context = createEvaluationContext(snapshot, parseReferenceRegistryInput({
 *   'payment-services': "components tagged with 'payment'",
 *   'domain-layer': 'components under $$$domain$$$',
 * }));
 *
 * const { results, summary } = engine.evaluateStatements([
 *   '$$$payment-services$$$ must be in $$$domain-layer$$$',
 * ], context);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// ENGINE
// ============================================================================

export * from './api/index.js';

// ============================================================================
// AREAS
// ============================================================================

export * from './core/index.js';
export * from './config/index.js';
export * from './contracts/index.js';
export * from './graphs/index.js';
export * from './tags/index.js';
export * from './references/index.js';
export * from './statements/index.js';
export {
  createLogger,
  getLogLevel,
  logDebug,
  logError,
  logInfo,
  logWarning,
  setLogLevel,
  type LogLevel,
  type ScopedLogger,
} from './telemetry/logger.js';
export { SeededRandom } from './utils/random.js';
