export { ArchitectureEngine, createEvaluationContext, type GraphQueryOptions } from './architecture_engine.js';
