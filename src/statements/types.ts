/**
 * @fileoverview Statement types
 *
 * A parsed statement is one variant of `ParsedStatement`; classification is
 * decided once by the parser and never changed in place.
 */

import type { ReferenceTypeError, StatementSyntaxError, UnresolvedReferenceError } from '../core/errors.js';
import type { ComparisonOperator, Modifier } from './scaffold.js';

export type { ComparisonOperator, Modifier } from './scaffold.js';

export const STATEMENT_TYPES = [
  'existence',
  'containment',
  'exclusion',
  'cardinality',
  'coverage',
  'correspondence',
  'refinement',
] as const;

export type StatementType = (typeof STATEMENT_TYPES)[number];

export type Classification = 'informal' | 'semi_formal' | 'formal';

/** Whether an exclusion looks at direct edges or reachability */
export type Transitivity = 'direct' | 'transitive' | 'unspecified';

/** Coverage subject meaning every component in the snapshot */
export const ALL_COMPONENTS = '*';

// ============================================================================
// EXPRESSIONS
// ============================================================================

export interface ExistenceExpression {
  type: 'existence';
  reference: string;
}

export interface ContainmentExpression {
  type: 'containment';
  subset: string;
  superset: string;
}

export interface ExclusionExpression {
  type: 'exclusion';
  source: string;
  forbidden: string;
  transitivity: Transitivity;
}

export interface CardinalityExpression {
  type: 'cardinality';
  reference: string;
  operator: ComparisonOperator;
  count: number;
}

export interface CoverageExpression {
  type: 'coverage';
  /** A reference name, or `ALL_COMPONENTS` */
  subject: string;
  layer: string;
}

export interface CorrespondenceExpression {
  type: 'correspondence';
  left: string;
  right: string;
}

export interface RefinementExpression {
  type: 'refinement';
  finer: string;
  coarser: string;
}

export type StatementExpression =
  | ExistenceExpression
  | ContainmentExpression
  | ExclusionExpression
  | CardinalityExpression
  | CoverageExpression
  | CorrespondenceExpression
  | RefinementExpression;

// ============================================================================
// PARSED STATEMENTS
// ============================================================================

interface StatementBase {
  text: string;
  /** `must` when the text has no modifier */
  modifier: Modifier;
  /** `$$$name$$$` tokens in order of first appearance */
  referenceNames: string[];
}

export interface InformalStatement extends StatementBase {
  classification: 'informal';
  /** Keyword-based guess, for hints only */
  detectedType: StatementType | null;
  syntaxError?: StatementSyntaxError;
}

export interface SemiFormalStatement extends StatementBase {
  classification: 'semi_formal';
  /** Names in `unresolvedNames` are placeholders */
  expression: StatementExpression;
  unresolvedNames: string[];
  unresolvedError?: UnresolvedReferenceError;
  typeErrors: ReferenceTypeError[];
}

export interface FormalStatement extends StatementBase {
  classification: 'formal';
  expression: StatementExpression;
}

export type ParsedStatement = InformalStatement | SemiFormalStatement | FormalStatement;
