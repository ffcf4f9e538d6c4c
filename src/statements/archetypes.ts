/**
 * @fileoverview The seven statement archetypes
 *
 * Each archetype is a set of scaffolds over the modifier-free word stream
 * plus a builder from bindings to a typed expression. Scaffolds are tried
 * in declaration order; the first complete match wins.
 */

import {
  choice,
  comparison,
  count,
  flag,
  mark,
  optional,
  phrase,
  ref,
  sequence,
  word,
  type Bindings,
  type Element,
} from './scaffold.js';
import { ALL_COMPONENTS, type StatementExpression, type StatementType } from './types.js';

export interface Archetype {
  type: StatementType;
  pattern: Element;
  build(bindings: Bindings): StatementExpression | null;
}

const BE = word('be', 'is', 'are');
const QUANTIFIER = optional(word('every', 'all'));
const QUALIFIER = choice(flag('transitive', 'transitively'), flag('direct', 'directly'));

const existence: Archetype = {
  type: 'existence',
  pattern: choice(
    sequence(word('there'), BE, ref('subject')),
    sequence(ref('subject'), word('exist', 'exists')),
  ),
  build: ({ refs }) => {
    const reference = refs.get('subject');
    return reference ? { type: 'existence', reference } : null;
  },
};

const cardinality: Archetype = {
  type: 'cardinality',
  pattern: sequence(word('there'), BE, comparison(), count(), ref('subject')),
  build: ({ refs, comparison: operator, count: value }) => {
    const reference = refs.get('subject');
    if (!reference || operator === undefined || value === undefined) return null;
    return { type: 'cardinality', reference, operator, count: value };
  },
};

const containment: Archetype = {
  type: 'containment',
  pattern: choice(
    sequence(QUANTIFIER, ref('subject'), BE, optional(word('contained')), word('in', 'within'), ref('object')),
    sequence(QUANTIFIER, ref('object'), word('contain', 'contains'), ref('subject')),
  ),
  build: ({ refs }) => {
    const subset = refs.get('subject');
    const superset = refs.get('object');
    return subset && superset ? { type: 'containment', subset, superset } : null;
  },
};

const exclusion: Archetype = {
  type: 'exclusion',
  pattern: sequence(
    QUANTIFIER,
    ref('subject'),
    optional(word('do', 'does')),
    word('not'),
    QUALIFIER,
    word('depend', 'depends'),
    word('on'),
    ref('object'),
    QUALIFIER,
  ),
  build: ({ refs, flags }) => {
    const source = refs.get('subject');
    const forbidden = refs.get('object');
    if (!source || !forbidden) return null;
    // Contradictory qualifiers ("directly ... transitively") match nothing.
    if (flags.has('transitive') && flags.has('direct')) return null;
    const transitivity = flags.has('transitive') ? 'transitive' : flags.has('direct') ? 'direct' : 'unspecified';
    return { type: 'exclusion', source, forbidden, transitivity };
  },
};

const coverage: Archetype = {
  type: 'coverage',
  pattern: sequence(
    choice(
      sequence(phrase('all', 'components'), mark('all')),
      sequence(phrase('every', 'component', 'in', 'the', 'system'), mark('all')),
      sequence(QUANTIFIER, ref('subject')),
    ),
    choice(
      sequence(word('have', 'has'), word('a', 'an'), phrase('owner', 'on')),
      sequence(BE, phrase('covered', 'by')),
      sequence(word('belong', 'belongs'), phrase('to'), word('a', 'an'), phrase('group', 'on')),
    ),
    optional(word('layer')),
    ref('layer'),
  ),
  build: ({ refs, flags }) => {
    const layer = refs.get('layer');
    const subject = flags.has('all') ? ALL_COMPONENTS : refs.get('subject');
    return layer && subject ? { type: 'coverage', subject, layer } : null;
  },
};

const correspondence: Archetype = {
  type: 'correspondence',
  pattern: sequence(
    ref('subject'),
    word('correspond', 'corresponds', 'align', 'aligns', 'match', 'matches'),
    word('with', 'to'),
    ref('object'),
  ),
  build: ({ refs }) => {
    const left = refs.get('subject');
    const right = refs.get('object');
    return left && right ? { type: 'correspondence', left, right } : null;
  },
};

const refinement: Archetype = {
  type: 'refinement',
  pattern: choice(
    sequence(ref('subject'), word('refine', 'refines'), ref('object')),
    sequence(ref('subject'), BE, word('a'), phrase('refinement', 'of'), ref('object')),
    sequence(ref('subject'), word('nest', 'nests'), word('within', 'in'), ref('object')),
  ),
  build: ({ refs }) => {
    const finer = refs.get('subject');
    const coarser = refs.get('object');
    return finer && coarser ? { type: 'refinement', finer, coarser } : null;
  },
};

/** Cardinality comes before existence: both start with "there be". */
export const ARCHETYPES: readonly Archetype[] = [
  cardinality,
  existence,
  containment,
  exclusion,
  coverage,
  correspondence,
  refinement,
];

/** Reference names an expression uses, in slot order */
export function expressionReferences(expression: StatementExpression): string[] {
  switch (expression.type) {
    case 'existence':
    case 'cardinality':
      return [expression.reference];
    case 'containment':
      return [expression.subset, expression.superset];
    case 'exclusion':
      return [expression.source, expression.forbidden];
    case 'coverage':
      return expression.subject === ALL_COMPONENTS ? [expression.layer] : [expression.subject, expression.layer];
    case 'correspondence':
      return [expression.left, expression.right];
    case 'refinement':
      return [expression.finer, expression.coarser];
  }
}

/** Names in slots that must hold a layer-backed reference */
export function layerSlotReferences(expression: StatementExpression): string[] {
  switch (expression.type) {
    case 'coverage':
      return [expression.layer];
    case 'correspondence':
      return [expression.left, expression.right];
    case 'refinement':
      return [expression.finer, expression.coarser];
    default:
      return [];
  }
}
