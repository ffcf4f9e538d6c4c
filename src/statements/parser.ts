/**
 * @fileoverview Statement Parser
 *
 * text -> reference tokens -> modifier lifted out -> first archetype whose
 * scaffold matches the whole word stream -> one `ParsedStatement` variant.
 */

import {
  ReferenceTypeError,
  StatementSyntaxError,
  UnresolvedReferenceError,
} from '../core/errors.js';
import type { ReferenceDefinition, ReferenceRegistry } from '../references/reference_definition.js';
import { createLogger } from '../telemetry/logger.js';
import { ARCHETYPES, expressionReferences, layerSlotReferences } from './archetypes.js';
import {
  comparisonPhrase,
  liftModifier,
  matchAll,
  tokenizeStatement,
  type MatchInput,
  type Modifier,
} from './scaffold.js';
import {
  ALL_COMPONENTS,
  type ParsedStatement,
  type StatementExpression,
  type StatementType,
} from './types.js';

const logger = createLogger('statement-parser');

export interface ReferenceToken {
  name: string;
  /** Offset of the opening `$$$` */
  position: number;
}

const REFERENCE_TOKEN = /\$\$\$([A-Za-z0-9_-]+)\$\$\$/g;

export function extractReferenceTokens(text: string): ReferenceToken[] {
  return Array.from(text.matchAll(REFERENCE_TOKEN), (match) => ({ name: match[1] ?? '', position: match.index ?? 0 }));
}

/** Either a plain list of registered names or the registry itself */
export type KnownReferences = Iterable<string> | ReferenceRegistry;

/**
 * Classify statement text.
 *
 * With a registry (not just names), layer slots naming a reference that is
 * not layer-backed make the statement semi-formal with `typeErrors`.
 */
export function parseStatement(text: string, known: KnownReferences = []): ParsedStatement {
  const referenceNames = Array.from(new Set(extractReferenceTokens(text).map((token) => token.name)));
  const { modifier, tokens } = liftModifier(tokenizeStatement(text));
  const base: { text: string; modifier: Modifier; referenceNames: string[] } = {
    text,
    modifier: modifier ?? 'must',
    referenceNames,
  };

  let expression: StatementExpression | null = null;
  try {
    expression = matchArchetypes({ tokens, text });
  } catch (error) {
    if (!(error instanceof StatementSyntaxError)) throw error;
    logger.debug('Statement has a malformed slot', { text, position: error.position });
    return { ...base, classification: 'informal', detectedType: detectStatementType(text), syntaxError: error };
  }

  if (!expression) {
    return { ...base, classification: 'informal', detectedType: detectStatementType(text) };
  }

  let registry: ReferenceRegistry | null = null;
  let knownNames: Set<string>;
  if (isRegistry(known)) {
    registry = known;
    knownNames = new Set(known.keys());
  } else {
    knownNames = new Set(known);
  }
  const unresolvedNames = expressionReferences(expression).filter((name) => !knownNames.has(name));
  if (unresolvedNames.length > 0) {
    const distinct = Array.from(new Set(unresolvedNames));
    return {
      ...base,
      classification: 'semi_formal',
      expression,
      unresolvedNames: distinct,
      unresolvedError: new UnresolvedReferenceError(distinct),
      typeErrors: [],
    };
  }

  const typeErrors = registry ? checkLayerSlots(expression, registry) : [];
  if (typeErrors.length > 0) {
    return { ...base, classification: 'semi_formal', expression, unresolvedNames: [], typeErrors };
  }

  return { ...base, classification: 'formal', expression };
}

function matchArchetypes(input: MatchInput): StatementExpression | null {
  for (const archetype of ARCHETYPES) {
    const bindings = matchAll(archetype.pattern, input);
    if (!bindings) continue;
    const expression = archetype.build(bindings);
    if (expression) return expression;
  }
  return null;
}

function checkLayerSlots(expression: StatementExpression, registry: ReferenceRegistry): ReferenceTypeError[] {
  const errors: ReferenceTypeError[] = [];
  for (const name of new Set(layerSlotReferences(expression))) {
    const definition: ReferenceDefinition | undefined = registry.get(name);
    if (definition && definition.kind !== 'layer') {
      errors.push(new ReferenceTypeError(name, 'layer', definition.kind));
    }
  }
  return errors;
}

function isRegistry(known: KnownReferences): known is ReferenceRegistry {
  return known instanceof Map;
}

// ============================================================================
// HINTS, RENDERING, TEMPLATES
// ============================================================================

const HINTS: ReadonlyArray<readonly [StatementType, readonly string[]]> = [
  ['cardinality', ['exactly', 'at least', 'at most', 'more than', 'fewer than', 'less than']],
  ['coverage', ['have an owner', 'have a owner', 'has an owner', 'covered by', 'belong to a group on', 'belongs to a group on']],
  ['correspondence', ['correspond', 'aligns with', 'align with', 'matches with', 'match with']],
  ['refinement', ['refine', 'refinement of', 'nests within', 'nest within']],
  ['exclusion', ['not depend', 'not transitively depend', 'not directly depend']],
  ['containment', ['be in', 'be contained', 'must contain', 'should contain', 'contains']],
  ['existence', ['exist', 'there must be', 'there should be']],
];

/**
 * Guess the statement type from keywords alone. Meant for editor hints on
 * unfinished text; `parseStatement` does not rely on it.
 */
export function detectStatementType(text: string): StatementType | null {
  const lower = text.toLowerCase().split(/\s+/).join(' ');
  for (const [type, indicators] of HINTS) {
    if (indicators.some((indicator) => lower.includes(indicator))) return type;
  }
  return null;
}

const slot = (name: string): string => `$$$${name}$$$`;

/**
 * Canonical text for an expression. Parsing the result gives back the same
 * expression.
 */
export function renderStatement(expression: StatementExpression, modifier: Modifier = 'must'): string {
  switch (expression.type) {
    case 'existence':
      return `there ${modifier} be ${slot(expression.reference)}`;
    case 'containment':
      return `${slot(expression.subset)} ${modifier} be in ${slot(expression.superset)}`;
    case 'exclusion': {
      const qualifier =
        expression.transitivity === 'transitive' ? ' transitively' : expression.transitivity === 'direct' ? ' directly' : '';
      return `${slot(expression.source)} ${modifier} not${qualifier} depend on ${slot(expression.forbidden)}`;
    }
    case 'cardinality':
      return `there ${modifier} be ${comparisonPhrase(expression.operator)} ${expression.count} ${slot(expression.reference)}`;
    case 'coverage': {
      const subject = expression.subject === ALL_COMPONENTS ? 'all components' : `all ${slot(expression.subject)}`;
      return `${subject} ${modifier} have an owner on ${slot(expression.layer)}`;
    }
    case 'correspondence':
      return `${slot(expression.left)} ${modifier} correspond with ${slot(expression.right)}`;
    case 'refinement':
      return `${slot(expression.finer)} ${modifier} refine ${slot(expression.coarser)}`;
  }
}

/** Accepted scaffolds per type; `N` stands for a non-negative integer */
export function getStatementTemplates(): Record<StatementType, string[]> {
  return {
    existence: ['there must be $$$reference$$$', '$$$reference$$$ must exist'],
    containment: [
      '$$$subject$$$ must be in $$$container$$$',
      'every $$$subject$$$ must be in $$$container$$$',
      '$$$subject$$$ must be contained in $$$container$$$',
      '$$$container$$$ must contain $$$subject$$$',
    ],
    exclusion: [
      '$$$subject$$$ must not depend on $$$excluded$$$',
      'every $$$subject$$$ must not depend on $$$excluded$$$',
      '$$$subject$$$ must not transitively depend on $$$excluded$$$',
      '$$$subject$$$ must not directly depend on $$$excluded$$$',
    ],
    cardinality: [
      'there must be exactly N $$$reference$$$',
      'there must be not exactly N $$$reference$$$',
      'there must be at least N $$$reference$$$',
      'there must be at most N $$$reference$$$',
      'there must be more than N $$$reference$$$',
      'there must be fewer than N $$$reference$$$',
    ],
    coverage: [
      'all components must have an owner on $$$layer$$$',
      'every component in the system must have an owner on $$$layer$$$',
      'all $$$subject$$$ must have an owner on $$$layer$$$',
      'all components must be covered by $$$layer$$$',
      '$$$subject$$$ must be covered by $$$layer$$$',
      'all components must belong to a group on $$$layer$$$',
      'every $$$subject$$$ must belong to a group on $$$layer$$$',
    ],
    correspondence: [
      '$$$layer-a$$$ must correspond with $$$layer-b$$$',
      '$$$layer-a$$$ must align with $$$layer-b$$$',
      '$$$layer-a$$$ must match with $$$layer-b$$$',
      '$$$layer-a$$$ corresponds to $$$layer-b$$$',
    ],
    refinement: [
      '$$$fine-layer$$$ refines $$$coarse-layer$$$',
      '$$$fine-layer$$$ must be a refinement of $$$coarse-layer$$$',
      '$$$fine-layer$$$ must nest within $$$coarse-layer$$$',
    ],
  };
}
