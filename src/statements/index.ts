export {
  ALL_COMPONENTS,
  STATEMENT_TYPES,
  type CardinalityExpression,
  type Classification,
  type ContainmentExpression,
  type CorrespondenceExpression,
  type CoverageExpression,
  type ExclusionExpression,
  type ExistenceExpression,
  type FormalStatement,
  type InformalStatement,
  type ParsedStatement,
  type RefinementExpression,
  type SemiFormalStatement,
  type StatementExpression,
  type StatementType,
  type Transitivity,
} from './types.js';
export { tokenizeStatement, type ComparisonOperator, type Modifier, type StatementToken } from './scaffold.js';
export {
  detectStatementType,
  extractReferenceTokens,
  getStatementTemplates,
  parseStatement,
  renderStatement,
  type KnownReferences,
  type ReferenceToken,
} from './parser.js';
export {
  findDuplicateGroups,
  matchCorrespondence,
  matchRefinement,
  type CorrespondenceMatch,
  type GroupDuplicate,
  type RefinementMatch,
} from './partitions.js';
export {
  evaluateStatement,
  evaluateStatements,
  type BatchResult,
  type BatchSummary,
  type DependencyPath,
  type EvaluateOptions,
  type EvaluationContext,
  type Evidence,
  type Severity,
  type StatementInput,
  type Verdict,
  type VerdictStatus,
} from './evaluator.js';
