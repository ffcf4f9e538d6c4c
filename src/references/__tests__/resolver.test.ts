import { describe, it, expect } from 'vitest';
import { ResolutionScope, resolveNamedReference, resolveReference } from '../resolver.js';
import type { ReferenceDefinition } from '../reference_definition.js';
import { createSnapshotTagStore } from '../../tags/tag_store.js';
import { TagExpressionSyntaxError } from '../../core/errors.js';
import type { GraphSnapshot } from '../../graphs/model.js';

const snapshot: GraphSnapshot = {
  components: [
    { key: 'X', tags: ['payment', 'api'] },
    { key: 'Y', tags: ['payment'] },
    { key: 'Z', tags: ['legacy'] },
  ],
  endpoints: [{ key: 'x1', component: 'X', tags: ['public'] }],
  dependencies: [],
  layers: [
    { key: 'domain', members: ['X', 'Y'] },
    { key: 'core', parent: 'domain', members: ['Z'] },
  ],
};

const context = { tags: createSnapshotTagStore(snapshot) };

function members(definition: ReferenceDefinition, ctx = context): string[] {
  return Array.from(resolveReference(definition, ctx).members);
}

describe('resolveReference', () => {
  it('evaluates a tag expression over component tags', () => {
    expect(members({ kind: 'tag_expression', expression: "'payment' AND 'api'" })).toEqual(['X']);
  });

  it('evaluates over endpoints when scoped to them', () => {
    expect(members({ kind: 'tag_expression', expression: 'public', scope: 'endpoints' })).toEqual(['x1']);
  });

  it('is idempotent', () => {
    const definition: ReferenceDefinition = { kind: 'tag_expression', expression: "NOT 'legacy'" };
    expect(resolveReference(definition, context)).toEqual(resolveReference(definition, context));
  });

  it('returns no members and the error for a bad expression', () => {
    const resolution = resolveReference({ kind: 'tag_expression', expression: "'payment' AND" }, context);

    expect(resolution.members.size).toBe(0);
    expect(resolution.error).toBeInstanceOf(TagExpressionSyntaxError);
    expect(resolution.error?.position).toBe(13);
  });

  it('returns direct layer members or the subtree', () => {
    expect(members({ kind: 'layer', layer: 'domain' })).toEqual(['X', 'Y']);
    expect(members({ kind: 'layer', layer: 'domain', includeDescendants: true })).toEqual(['X', 'Y', 'Z']);
    expect(members({ kind: 'layer', layer: 'missing' })).toEqual([]);
  });

  it('drops stale keys from explicit lists', () => {
    expect(members({ kind: 'explicit_list', members: ['Z', 'gone', 'X'] })).toEqual(['X', 'Z']);
  });

  it('follows tag changes without any reference-side update', () => {
    const definition: ReferenceDefinition = { kind: 'tag_expression', expression: 'legacy' };
    const retagged = createSnapshotTagStore({
      ...snapshot,
      components: [{ key: 'X', tags: ['legacy'] }, { key: 'Y' }, { key: 'Z' }],
    });

    expect(members(definition)).toEqual(['Z']);
    expect(members(definition, { tags: retagged })).toEqual(['X']);
  });
});

describe('ResolutionScope', () => {
  const definition: ReferenceDefinition = { kind: 'layer', layer: 'domain' };

  it('memoizes within one scope', () => {
    const scope = new ResolutionScope();
    const first = resolveReference(definition, context, scope);

    expect(resolveReference(definition, context, scope)).toBe(first);
    expect(scope.size).toBe(1);
  });

  it('recomputes without a scope', () => {
    expect(resolveReference(definition, context)).not.toBe(resolveReference(definition, context));
  });
});

describe('resolveNamedReference', () => {
  const named = { ...context, references: new Map<string, ReferenceDefinition>([['core-team', { kind: 'layer', layer: 'core' }]]) };

  it('resolves registered names and reports unknown ones as undefined', () => {
    expect(Array.from(resolveNamedReference('core-team', named)?.members ?? [])).toEqual(['Z']);
    expect(resolveNamedReference('nobody', named)).toBeUndefined();
  });
});
