import { describe, it, expect } from 'vitest';
import { evaluateStatement, evaluateStatements, type EvaluateOptions, type EvaluationContext } from '../evaluator.js';
import { parseStatement } from '../parser.js';
import { DependencyGraph, type GraphSnapshot } from '../../graphs/model.js';
import type { ReferenceDefinition } from '../../references/reference_definition.js';
import { createSnapshotTagStore } from '../../tags/tag_store.js';

const snapshot: GraphSnapshot = {
  components: [
    { key: 'A', tags: ['payment'] },
    { key: 'B', tags: ['payment'] },
    { key: 'C', tags: ['core'] },
    { key: 'D', tags: ['ui'] },
    { key: 'E', tags: ['legacy'] },
  ],
  dependencies: [
    { source: 'D', target: 'A', type: 'runtime' },
    { source: 'A', target: 'C' },
  ],
  layers: [
    { key: 'domain', members: ['A', 'B', 'C'] },
    { key: 'teams' },
    { key: 'team-1', parent: 'teams', members: ['A', 'B'] },
    { key: 'team-2', parent: 'teams', members: ['C'] },
    { key: 'owners' },
    { key: 'owner-1', parent: 'owners', members: ['A', 'B'] },
    { key: 'owner-2', parent: 'owners', members: ['D'] },
    { key: 'squads' },
    { key: 'sq-1', parent: 'squads', members: ['A'] },
    { key: 'sq-2', parent: 'squads', members: ['B'] },
    { key: 'sq-3', parent: 'squads', members: ['C'] },
    { key: 'dupes' },
    { key: 'dup-1', parent: 'dupes', members: ['A'] },
    { key: 'dup-2', parent: 'dupes', members: ['A'] },
    { key: 'blocks' },
    { key: 'block-1', parent: 'blocks', members: ['A', 'B', 'C'] },
    { key: 'slices' },
    { key: 'slice-1', parent: 'slices', members: ['A', 'B'] },
    { key: 'slice-2', parent: 'slices', members: ['B', 'C'] },
  ],
};

const references = new Map<string, ReferenceDefinition>([
  ['payment-services', { kind: 'tag_expression', expression: 'payment' }],
  ['domain-layer', { kind: 'layer', layer: 'domain' }],
  ['ui', { kind: 'explicit_list', members: ['D'] }],
  ['core', { kind: 'tag_expression', expression: 'core' }],
  ['empty', { kind: 'tag_expression', expression: 'nothing' }],
  ['broken', { kind: 'tag_expression', expression: "'payment' AND" }],
  ['teams', { kind: 'layer', layer: 'teams' }],
  ['owners', { kind: 'layer', layer: 'owners' }],
  ['squads', { kind: 'layer', layer: 'squads' }],
  ['dupes', { kind: 'layer', layer: 'dupes' }],
  ['blocks', { kind: 'layer', layer: 'blocks' }],
  ['slices', { kind: 'layer', layer: 'slices' }],
]);

const context: EvaluationContext = {
  graph: DependencyGraph.fromSnapshot(snapshot, { granularity: 'combined' }),
  tags: createSnapshotTagStore(snapshot),
  references,
};

function evaluate(text: string, options: EvaluateOptions = {}) {
  return evaluateStatement(parseStatement(text, references), context, options);
}

describe('evaluateStatement', () => {
  it('satisfies containment of a subset', () => {
    const verdict = evaluate('$$$payment-services$$$ must be in $$$domain-layer$$$');

    expect(verdict.status).toBe('satisfied');
    expect(verdict.severity).toBe('none');
    expect(verdict.evidence).toEqual({
      type: 'containment',
      subset: 'payment-services',
      superset: 'domain-layer',
      missing: [],
    });
  });

  it('reports missing members with error severity for must', () => {
    const verdict = evaluate('$$$domain-layer$$$ must be in $$$payment-services$$$');

    expect(verdict.status).toBe('violated');
    expect(verdict.severity).toBe('error');
    expect(verdict.evidence).toMatchObject({ missing: ['C'] });
  });

  it('uses warning severity for should', () => {
    expect(evaluate('$$$domain-layer$$$ should be in $$$payment-services$$$').severity).toBe('warning');
  });

  it('checks existence and cardinality on an empty reference', () => {
    expect(evaluate('there must be $$$empty$$$').status).toBe('violated');

    const verdict = evaluate('there must be exactly 1 $$$empty$$$');
    expect(verdict.status).toBe('violated');
    expect(verdict.evidence).toEqual({ type: 'cardinality', reference: 'empty', operator: '=', expected: 1, actual: 0 });
    expect(evaluate('there must be at least 2 $$$payment-services$$$').status).toBe('satisfied');
  });

  it('checks only direct edges for an unqualified exclusion', () => {
    const verdict = evaluate('$$$ui$$$ must not depend on $$$core$$$');

    expect(verdict.status).toBe('satisfied');
    expect(verdict.evidence).toMatchObject({ mode: 'direct', transitivityAssumed: false, offending: [] });
  });

  it('follows paths for a transitive exclusion', () => {
    const verdict = evaluate('$$$ui$$$ must not transitively depend on $$$core$$$');

    expect(verdict.status).toBe('violated');
    expect(verdict.evidence).toMatchObject({
      mode: 'transitive',
      transitivityAssumed: false,
      offending: [{ source: 'D', target: 'C', path: ['D', 'A', 'C'] }],
    });
  });

  it('flags an assumed transitive reading', () => {
    const verdict = evaluate('$$$ui$$$ must not depend on $$$core$$$', { exclusionTransitiveByDefault: true });

    expect(verdict.status).toBe('violated');
    expect(verdict.evidence).toMatchObject({ mode: 'transitive', transitivityAssumed: true });
  });

  it('lists components without a group on the layer', () => {
    const verdict = evaluate('all components must have an owner on $$$owners$$$');

    expect(verdict.status).toBe('violated');
    expect(verdict.evidence).toEqual({ type: 'coverage', subject: '*', layer: 'owners', uncovered: ['C', 'E'] });
    expect(evaluate('$$$payment-services$$$ must have an owner on $$$owners$$$').status).toBe('satisfied');
  });

  it('compares partitions for correspondence', () => {
    const verdict = evaluate('$$$teams$$$ must correspond with $$$owners$$$');

    expect(verdict.status).toBe('violated');
    expect(verdict.evidence).toEqual({
      type: 'correspondence',
      left: 'teams',
      right: 'owners',
      pairs: [{ left: 'team-1', right: 'owner-1' }],
      unmatchedLeft: ['team-2'],
      unmatchedRight: ['owner-2'],
      holds: false,
    });
  });

  it('accepts a refinement that tiles the coarser layer', () => {
    expect(evaluate('$$$squads$$$ must refine $$$teams$$$').status).toBe('satisfied');
    expect(evaluate('$$$teams$$$ must refine $$$squads$$$').status).toBe('violated');
  });

  it('violates a refinement whose finer groups overlap', () => {
    const verdict = evaluate('$$$slices$$$ must refine $$$blocks$$$');

    expect(verdict.status).toBe('violated');
    expect(verdict.evidence).toMatchObject({
      type: 'refinement',
      incomplete: [],
      sharedMembers: [{ coarser: 'block-1', member: 'B', finer: ['slice-1', 'slice-2'] }],
    });
  });

  it('does not evaluate partitions with duplicate groups', () => {
    const verdict = evaluate('$$$dupes$$$ must correspond with $$$teams$$$');

    expect(verdict.status).toBe('not_evaluated');
    expect(verdict.severity).toBe('none');
    expect(verdict.evidence).toEqual({
      type: 'ambiguous',
      ambiguities: [{ reference: 'dupes', duplicates: [{ groups: ['dup-1', 'dup-2'], members: ['A'] }] }],
    });
  });

  it('is invalid when a reference expression does not parse', () => {
    const verdict = evaluate('there must be $$$broken$$$');

    expect(verdict.status).toBe('invalid');
    expect(verdict.evidence.type).toBe('invalid');
    if (verdict.evidence.type !== 'invalid') return;
    expect(verdict.evidence.reference).toBe('broken');
    expect(verdict.evidence.errors[0]?.code).toBe('TAG_EXPRESSION_SYNTAX');
  });

  it('does not evaluate semi-formal and informal statements', () => {
    const semi = evaluate('$$$nope$$$ must exist');
    expect(semi.status).toBe('not_evaluated');
    expect(semi.evidence).toMatchObject({ type: 'not_formal', classification: 'semi_formal', unresolvedNames: ['nope'] });

    const typed = evaluate('$$$teams$$$ must correspond with $$$ui$$$');
    expect(typed.status).toBe('not_evaluated');
    expect(typed.evidence.type === 'not_formal' && typed.evidence.errors[0]?.code).toBe('REFERENCE_TYPE');

    const informal = evaluate('components should be small');
    expect(informal.status).toBe('not_evaluated');
    expect(informal.statementType).toBeNull();
  });

  it('is invalid when a layer slot is not layer-backed at evaluation time', () => {
    const parsed = parseStatement('$$$teams$$$ must correspond with $$$ui$$$', ['teams', 'ui']);
    const verdict = evaluateStatement(parsed, context);

    expect(verdict.status).toBe('invalid');
    expect(verdict.evidence.type === 'invalid' && verdict.evidence.errors[0]?.code).toBe('REFERENCE_TYPE');
  });
});

describe('exclusion edge cases', () => {
  function contextOf(graphSnapshot: GraphSnapshot, definitions: Array<[string, ReferenceDefinition]>): EvaluationContext {
    return {
      graph: DependencyGraph.fromSnapshot(graphSnapshot, { granularity: 'combined' }),
      tags: createSnapshotTagStore(graphSnapshot),
      references: new Map(definitions),
    };
  }

  function check(text: string, local: EvaluationContext) {
    return evaluateStatement(parseStatement(text, local.references), local);
  }

  const coreOnly: Array<[string, ReferenceDefinition]> = [['core', { kind: 'tag_expression', expression: 'core' }]];

  it('reports a self-loop on a forbidden source in both modes', () => {
    const local = contextOf(
      { components: [{ key: 'S', tags: ['core'] }], dependencies: [{ source: 'S', target: 'S' }] },
      coreOnly,
    );

    const direct = check('$$$core$$$ must not directly depend on $$$core$$$', local);
    expect(direct.status).toBe('violated');

    const transitive = check('$$$core$$$ must not transitively depend on $$$core$$$', local);
    expect(transitive.status).toBe('violated');
    expect(transitive.evidence).toMatchObject({ offending: [{ source: 'S', target: 'S', path: ['S', 'S'] }] });
  });

  it('reports a cycle leading back to a forbidden source', () => {
    const local = contextOf(
      {
        components: [{ key: 'S', tags: ['core'] }, { key: 'T' }],
        dependencies: [
          { source: 'S', target: 'T' },
          { source: 'T', target: 'S' },
        ],
      },
      coreOnly,
    );

    expect(check('$$$core$$$ must not directly depend on $$$core$$$', local).status).toBe('satisfied');

    const transitive = check('$$$core$$$ must not transitively depend on $$$core$$$', local);
    expect(transitive.status).toBe('violated');
    expect(transitive.evidence).toMatchObject({ offending: [{ source: 'S', target: 'S', path: ['S', 'T', 'S'] }] });
  });

  it('sees an endpoint depending on a component through its endpoint', () => {
    const local = contextOf(
      {
        components: [{ key: 'A' }, { key: 'B', tags: ['db'] }],
        endpoints: [
          { key: 'a1', component: 'A', tags: ['public'] },
          { key: 'b1', component: 'B' },
        ],
        dependencies: [{ source: 'a1', target: 'b1' }],
      },
      [
        ['pub', { kind: 'tag_expression', expression: 'public', scope: 'endpoints' }],
        ['db', { kind: 'tag_expression', expression: 'db' }],
      ],
    );

    const verdict = check('$$$pub$$$ must not depend on $$$db$$$', local);
    expect(verdict.status).toBe('violated');
    expect(verdict.evidence).toMatchObject({ offending: [{ source: 'a1', target: 'B', path: ['a1', 'B'] }] });
  });
});

describe('evaluateStatements', () => {
  it('summarises a batch', () => {
    const batch = evaluateStatements(
      [
        '$$$payment-services$$$ must be in $$$domain-layer$$$',
        'there must be exactly 1 $$$empty$$$',
        '$$$nope$$$ must exist',
        'there must be $$$broken$$$',
      ],
      context,
    );

    expect(batch.results.map((result) => result.status)).toEqual(['satisfied', 'violated', 'not_evaluated', 'invalid']);
    expect(batch.summary).toEqual({ total: 4, satisfied: 1, violated: 1, notEvaluated: 1, invalid: 1 });
  });

  it('isolates a failing item', () => {
    const failing: EvaluationContext = {
      ...context,
      tags: {
        ...context.tags,
        groupsOf: () => {
          throw new Error('store offline');
        },
      },
    };
    const batch = evaluateStatements(
      ['$$$teams$$$ must correspond with $$$owners$$$', 'there must be $$$payment-services$$$'],
      failing,
    );

    expect(batch.results[0]?.status).toBe('invalid');
    expect(batch.results[0]?.evidence).toMatchObject({ type: 'invalid', errors: [{ code: 'EVALUATION_FAILED', message: 'store offline' }] });
    expect(batch.results[1]?.status).toBe('satisfied');
  });
});
