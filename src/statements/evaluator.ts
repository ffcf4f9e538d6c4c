/**
 * @fileoverview Statement Evaluator
 *
 * Evaluates formal statements against one immutable context. Every outcome
 * is a verdict: reference errors become `invalid` verdicts and non-formal
 * statements become `not_evaluated`; nothing is thrown to the caller.
 */

import {
  ReferenceTypeError,
  UnresolvedReferenceError,
  getErrorMessage,
  isArchitectureEngineError,
  type ArchitectureEngineError,
  type ErrorJSON,
} from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { DependencyGraph, EntityKey } from '../graphs/model.js';
import { traverse } from '../graphs/traversal.js';
import type { ReferenceRegistry } from '../references/reference_definition.js';
import { ResolutionScope, resolveNamedReference } from '../references/resolver.js';
import type { LayerGroup, TagStore } from '../tags/tag_store.js';
import { createLogger } from '../telemetry/logger.js';
import {
  findDuplicateGroups,
  matchCorrespondence,
  matchRefinement,
  type CorrespondenceMatch,
  type GroupDuplicate,
  type RefinementMatch,
} from './partitions.js';
import { parseStatement } from './parser.js';
import type { ComparisonOperator, Modifier } from './scaffold.js';
import {
  ALL_COMPONENTS,
  type Classification,
  type ExclusionExpression,
  type ParsedStatement,
  type StatementExpression,
  type StatementType,
} from './types.js';

const logger = createLogger('evaluator');

// ============================================================================
// TYPES
// ============================================================================

export interface EvaluationContext {
  /** Combined-granularity graph of the snapshot */
  graph: DependencyGraph;
  tags: TagStore;
  references: ReferenceRegistry;
}

export interface EvaluateOptions {
  /** Treat exclusions without a qualifier as transitive */
  exclusionTransitiveByDefault?: boolean;
  /** Shared resolutions for a batch */
  scope?: ResolutionScope;
}

export type VerdictStatus = 'satisfied' | 'violated' | 'not_evaluated' | 'invalid';
export type Severity = 'error' | 'warning' | 'none';

export interface DependencyPath {
  source: EntityKey;
  target: EntityKey;
  /** source, ..., target */
  path: EntityKey[];
}

export type Evidence =
  | { type: 'existence'; reference: string; members: EntityKey[] }
  | { type: 'containment'; subset: string; superset: string; missing: EntityKey[] }
  | {
      type: 'exclusion';
      source: string;
      forbidden: string;
      mode: 'direct' | 'transitive';
      /** True when no qualifier was given and the configured default decided the mode */
      transitivityAssumed: boolean;
      offending: DependencyPath[];
    }
  | { type: 'cardinality'; reference: string; operator: ComparisonOperator; expected: number; actual: number }
  | { type: 'coverage'; subject: string; layer: string; uncovered: EntityKey[] }
  | ({ type: 'correspondence'; left: string; right: string } & CorrespondenceMatch)
  | ({ type: 'refinement'; finer: string; coarser: string } & RefinementMatch)
  | { type: 'ambiguous'; ambiguities: Array<{ reference: string; duplicates: GroupDuplicate[] }> }
  | { type: 'not_formal'; classification: Exclude<Classification, 'formal'>; unresolvedNames: string[]; errors: ErrorJSON[] }
  | { type: 'invalid'; reference: string | null; errors: ErrorJSON[] };

export interface Verdict {
  statement: string;
  statementType: StatementType | null;
  status: VerdictStatus;
  severity: Severity;
  evidence: Evidence;
}

export type StatementInput = string | ParsedStatement;

export interface BatchSummary {
  total: number;
  satisfied: number;
  violated: number;
  notEvaluated: number;
  invalid: number;
}

export interface BatchResult {
  results: Verdict[];
  summary: BatchSummary;
}

interface Outcome {
  holds: boolean | null;
  evidence: Evidence;
}

/** Unwinds one statement's evaluation when a reference cannot be used */
class EvaluationFailure extends Error {
  constructor(
    readonly reference: string | null,
    readonly error: ArchitectureEngineError,
  ) {
    super(error.message);
    this.name = 'EvaluationFailure';
  }
}

// ============================================================================
// SINGLE STATEMENT
// ============================================================================

export function evaluateStatement(
  statement: ParsedStatement,
  context: EvaluationContext,
  options: EvaluateOptions = {},
): Verdict {
  const verdict = (status: VerdictStatus, evidence: Evidence, statementType: StatementType | null): Verdict => ({
    statement: statement.text,
    statementType,
    status,
    severity: severityOf(status, statement.modifier),
    evidence,
  });

  if (statement.classification === 'informal') {
    return verdict(
      'not_evaluated',
      {
        type: 'not_formal',
        classification: 'informal',
        unresolvedNames: [],
        errors: statement.syntaxError ? [statement.syntaxError.toJSON()] : [],
      },
      statement.detectedType,
    );
  }
  if (statement.classification === 'semi_formal') {
    const errors = [
      ...(statement.unresolvedError ? [statement.unresolvedError.toJSON()] : []),
      ...statement.typeErrors.map((error) => error.toJSON()),
    ];
    return verdict(
      'not_evaluated',
      { type: 'not_formal', classification: 'semi_formal', unresolvedNames: [...statement.unresolvedNames], errors },
      statement.expression.type,
    );
  }

  const evaluator = new ExpressionEvaluator(context, options);
  const outcome = evaluator.evaluate(statement.expression);
  if (!outcome.ok) {
    return verdict(
      'invalid',
      { type: 'invalid', reference: outcome.error.reference, errors: [outcome.error.error.toJSON()] },
      statement.expression.type,
    );
  }
  const status: VerdictStatus = outcome.value.holds === null ? 'not_evaluated' : outcome.value.holds ? 'satisfied' : 'violated';
  return verdict(status, outcome.value.evidence, statement.expression.type);
}

function severityOf(status: VerdictStatus, modifier: Modifier): Severity {
  if (status !== 'violated') return 'none';
  return modifier === 'should' ? 'warning' : 'error';
}

class ExpressionEvaluator {
  private readonly scope: ResolutionScope;

  constructor(
    private readonly context: EvaluationContext,
    private readonly options: EvaluateOptions,
  ) {
    this.scope = options.scope ?? new ResolutionScope();
  }

  evaluate(expression: StatementExpression): Result<Outcome, EvaluationFailure> {
    try {
      return Ok(this.dispatch(expression));
    } catch (error) {
      if (error instanceof EvaluationFailure) return Err(error);
      throw error;
    }
  }

  private dispatch(expression: StatementExpression): Outcome {
    switch (expression.type) {
      case 'existence': {
        const members = this.members(expression.reference);
        return {
          holds: members.length > 0,
          evidence: { type: 'existence', reference: expression.reference, members },
        };
      }
      case 'containment': {
        const superset = new Set(this.members(expression.superset));
        const missing = this.members(expression.subset).filter((member) => !superset.has(member));
        return {
          holds: missing.length === 0,
          evidence: { type: 'containment', subset: expression.subset, superset: expression.superset, missing },
        };
      }
      case 'exclusion':
        return this.exclusion(expression);
      case 'cardinality': {
        const actual = this.members(expression.reference).length;
        return {
          holds: compare(actual, expression.operator, expression.count),
          evidence: {
            type: 'cardinality',
            reference: expression.reference,
            operator: expression.operator,
            expected: expression.count,
            actual,
          },
        };
      }
      case 'coverage': {
        const subjects =
          expression.subject === ALL_COMPONENTS
            ? this.context.tags.entityKeys('components')
            : this.members(expression.subject);
        const covered = new Set<EntityKey>();
        for (const group of this.groups(expression.layer)) {
          for (const member of group.members) covered.add(member);
        }
        const uncovered = subjects.filter((member) => !covered.has(member));
        return {
          holds: uncovered.length === 0,
          evidence: { type: 'coverage', subject: expression.subject, layer: expression.layer, uncovered },
        };
      }
      case 'correspondence': {
        const left = this.groups(expression.left);
        const right = this.groups(expression.right);
        const ambiguous = ambiguity([
          [expression.left, left],
          [expression.right, right],
        ]);
        if (ambiguous) return ambiguous;
        const match = matchCorrespondence(left, right);
        return {
          holds: match.holds,
          evidence: { type: 'correspondence', left: expression.left, right: expression.right, ...match },
        };
      }
      case 'refinement': {
        const finer = this.groups(expression.finer);
        const coarser = this.groups(expression.coarser);
        const ambiguous = ambiguity([
          [expression.finer, finer],
          [expression.coarser, coarser],
        ]);
        if (ambiguous) return ambiguous;
        const match = matchRefinement(finer, coarser);
        return {
          holds: match.holds,
          evidence: { type: 'refinement', finer: expression.finer, coarser: expression.coarser, ...match },
        };
      }
    }
  }

  private exclusion(expression: ExclusionExpression): Outcome {
    const assumed = expression.transitivity === 'unspecified';
    const transitive =
      expression.transitivity === 'transitive' || (assumed && (this.options.exclusionTransitiveByDefault ?? false));
    const forbidden = new Set(this.members(expression.forbidden));
    const offending: DependencyPath[] = [];

    for (const source of this.members(expression.source)) {
      if (!transitive) {
        for (const target of this.context.graph.successors(source)) {
          if (forbidden.has(target)) offending.push({ source, target, path: [source, target] });
        }
        continue;
      }
      const parents = new Map<EntityKey, EntityKey>();
      let cycleBack: EntityKey[] | null = this.context.graph.hasEdge(source, source) ? [source, source] : null;
      for (const step of traverse(this.context.graph, source)) {
        parents.set(step.node, step.parent);
        if (!cycleBack && this.context.graph.hasEdge(step.node, source)) {
          cycleBack = [...pathFrom(source, step.node, parents), source];
        }
        if (forbidden.has(step.node)) {
          offending.push({ source, target: step.node, path: pathFrom(source, step.node, parents) });
        }
      }
      // the traversal never yields its start node, so a cycle back to a forbidden source is checked here
      if (cycleBack && forbidden.has(source)) {
        offending.push({ source, target: source, path: cycleBack });
      }
    }

    return {
      holds: offending.length === 0,
      evidence: {
        type: 'exclusion',
        source: expression.source,
        forbidden: expression.forbidden,
        mode: transitive ? 'transitive' : 'direct',
        transitivityAssumed: assumed && transitive,
        offending,
      },
    };
  }

  private members(name: string): EntityKey[] {
    const resolution = resolveNamedReference(name, this.context, this.scope);
    if (!resolution) throw new EvaluationFailure(name, new UnresolvedReferenceError([name]));
    if (resolution.error) throw new EvaluationFailure(name, resolution.error);
    return Array.from(resolution.members);
  }

  private groups(name: string): LayerGroup[] {
    const definition = this.context.references.get(name);
    if (!definition) throw new EvaluationFailure(name, new UnresolvedReferenceError([name]));
    if (definition.kind !== 'layer') {
      throw new EvaluationFailure(name, new ReferenceTypeError(name, 'layer', definition.kind));
    }
    return this.context.tags.groupsOf(definition.layer);
  }
}

/** source, ..., node along the traversal's parent links */
function pathFrom(source: EntityKey, node: EntityKey, parents: ReadonlyMap<EntityKey, EntityKey>): EntityKey[] {
  const path = [node];
  let current = parents.get(node) ?? source;
  while (current !== source) {
    path.push(current);
    current = parents.get(current) ?? source;
  }
  path.push(source);
  return path.reverse();
}

function ambiguity(sides: ReadonlyArray<readonly [string, readonly LayerGroup[]]>): Outcome | null {
  const ambiguities = sides
    .map(([reference, groups]) => ({ reference, duplicates: findDuplicateGroups(groups) }))
    .filter((entry) => entry.duplicates.length > 0);
  if (ambiguities.length === 0) return null;
  return { holds: null, evidence: { type: 'ambiguous', ambiguities } };
}

function compare(actual: number, operator: ComparisonOperator, expected: number): boolean {
  switch (operator) {
    case '=':
      return actual === expected;
    case '!=':
      return actual !== expected;
    case '>=':
      return actual >= expected;
    case '<=':
      return actual <= expected;
    case '>':
      return actual > expected;
    case '<':
      return actual < expected;
  }
}

// ============================================================================
// BATCH
// ============================================================================

/**
 * Evaluate a list of statements with one shared resolution scope. Text
 * items are parsed against the context's references first. A failure in
 * one item becomes that item's `invalid` verdict.
 */
export function evaluateStatements(
  batch: readonly StatementInput[],
  context: EvaluationContext,
  options: Omit<EvaluateOptions, 'scope'> = {},
): BatchResult {
  const scope = new ResolutionScope();
  const results = batch.map((item): Verdict => {
    const text = typeof item === 'string' ? item : item.text;
    try {
      const parsed = typeof item === 'string' ? parseStatement(item, context.references) : item;
      return evaluateStatement(parsed, context, { ...options, scope });
    } catch (error) {
      logger.warn('Statement evaluation failed', { statement: text, error: getErrorMessage(error) });
      return {
        statement: text,
        statementType: null,
        status: 'invalid',
        severity: 'none',
        evidence: { type: 'invalid', reference: null, errors: [toErrorJSON(error)] },
      };
    }
  });

  const count = (status: VerdictStatus): number => results.filter((result) => result.status === status).length;
  return {
    results,
    summary: {
      total: results.length,
      satisfied: count('satisfied'),
      violated: count('violated'),
      notEvaluated: count('not_evaluated'),
      invalid: count('invalid'),
    },
  };
}

function toErrorJSON(error: unknown): ErrorJSON {
  if (isArchitectureEngineError(error)) return error.toJSON();
  return { code: 'EVALUATION_FAILED', message: getErrorMessage(error), timestamp: Date.now() };
}
