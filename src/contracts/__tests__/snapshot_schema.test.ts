import { describe, it, expect } from 'vitest';
import { parseGraphSnapshot, parseReferenceDefinitionInput, parseReferenceRegistryInput } from '../snapshot_schema.js';
import { SnapshotValidationError } from '../../core/errors.js';

describe('parseGraphSnapshot', () => {
  it('accepts a well-formed snapshot', () => {
    const input = {
      components: [{ key: 'A', tags: ['api'] }, { key: 'B' }],
      endpoints: [{ key: 'a1', component: 'A' }],
      dependencies: [{ source: 'A', target: 'B', type: 'runtime' }],
      layers: [{ key: 'core', parent: null, members: ['B'] }],
    };
    expect(parseGraphSnapshot(input)).toEqual(input);
  });

  it('lists every issue with its path', () => {
    let caught: unknown;
    try {
      parseGraphSnapshot({ components: [{ key: '' }], dependencies: 'x' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SnapshotValidationError);
    if (!(caught instanceof SnapshotValidationError)) return;
    expect(caught.issues.map((issue) => issue.path)).toEqual(['components.0.key', 'dependencies']);
    expect(caught.code).toBe('SNAPSHOT_VALIDATION');
  });
});

describe('parseReferenceDefinitionInput', () => {
  it('parses the text form', () => {
    expect(parseReferenceDefinitionInput('components under $$$domain$$$')).toEqual({
      kind: 'layer',
      layer: 'domain',
      includeDescendants: true,
    });
  });

  it('accepts a definition object', () => {
    expect(parseReferenceDefinitionInput({ kind: 'explicit_list', members: ['a'] })).toEqual({
      kind: 'explicit_list',
      members: ['a'],
    });
  });

  it('rejects unknown kinds and unrecognised text', () => {
    expect(() => parseReferenceDefinitionInput({ kind: 'regex', pattern: '.*' })).toThrow(SnapshotValidationError);
    expect(() => parseReferenceDefinitionInput('something else')).toThrow('unrecognised reference definition');
  });
});

describe('parseReferenceRegistryInput', () => {
  it('builds a registry from mixed forms', () => {
    const registry = parseReferenceRegistryInput({
      ui: 'components: D',
      dom: { kind: 'layer', layer: 'domain' },
    });

    expect(registry.size).toBe(2);
    expect(registry.get('ui')).toEqual({ kind: 'explicit_list', members: ['D'] });
    expect(registry.get('dom')).toEqual({ kind: 'layer', layer: 'domain' });
  });

  it('rejects names that cannot appear in a statement', () => {
    expect(() => parseReferenceRegistryInput({ 'bad name': 'components: D' })).toThrow(SnapshotValidationError);
  });

  it('reports the failing name in the issue path', () => {
    expect(() => parseReferenceRegistryInput({ ui: 'nonsense' })).toThrow('Invalid reference definition: ui:');
  });
});
