/**
 * @fileoverview Core engine infrastructure
 *
 * Result types and the typed error hierarchy shared by every area.
 */

export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
} from './result.js';

export {
  type ErrorJSON,
  type InputIssue,
  ArchitectureEngineError,
  TagExpressionSyntaxError,
  StatementSyntaxError,
  ReferenceDefinitionSyntaxError,
  UnresolvedReferenceError,
  ReferenceTypeError,
  SnapshotValidationError,
  ConfigurationError,
  isArchitectureEngineError,
  getErrorMessage,
} from './errors.js';
