/**
 * @fileoverview Reference definitions
 *
 * A Reference is a name bound to one of three definition kinds. Definitions
 * hold no membership; the resolver recomputes it on every call.
 *
 * Definitions can also be written as short sentences:
 *   components tagged with 'api' AND NOT 'deprecated'
 *   endpoints tagged with 'public'
 *   components on $$$domain-layer$$$      (also: groups on [layer] ..., components in ...)
 *   components under $$$domain-layer$$$   (descendant layers included)
 *   components: billing, ledger
 */

import { ReferenceDefinitionSyntaxError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { EntityKey } from '../graphs/model.js';

export type TagExpressionScope = 'components' | 'endpoints';

export type ReferenceDefinition =
  | { kind: 'tag_expression'; expression: string; scope?: TagExpressionScope }
  | { kind: 'layer'; layer: string; includeDescendants?: boolean }
  | { kind: 'explicit_list'; members: readonly EntityKey[] };

export type ReferenceDefinitionKind = ReferenceDefinition['kind'];

/** Reference name -> definition */
export type ReferenceRegistry = ReadonlyMap<string, ReferenceDefinition>;

const LAYER_TOKEN = '\\$\\$\\$([A-Za-z0-9_-]+)\\$\\$\\$';
const TAGGED_WITH = /^(components|endpoints) tagged with\b\s*(.*)$/i;
const ON_LAYER = new RegExp(`^(?:groups|components) (?:on|in)(?: layer)? ${LAYER_TOKEN}$`, 'i');
const UNDER_LAYER = new RegExp(`^components under ${LAYER_TOKEN}$`, 'i');
const EXPLICIT_LIST = /^components\s*:(.*)$/i;
const ENTITY_KEY = /^[A-Za-z0-9_.:-]+$/;

export function parseReferenceDefinition(
  text: string,
): Result<ReferenceDefinition, ReferenceDefinitionSyntaxError> {
  const normalized = text.trim().split(/\s+/).join(' ');

  const tagged = TAGGED_WITH.exec(normalized);
  if (tagged) {
    const expression = (tagged[2] ?? '').trim();
    if (expression === '') {
      return Err(new ReferenceDefinitionSyntaxError(normalized, normalized.length, 'expected a tag expression'));
    }
    const scope: TagExpressionScope = (tagged[1] ?? '').toLowerCase() === 'endpoints' ? 'endpoints' : 'components';
    return Ok(scope === 'endpoints' ? { kind: 'tag_expression', expression, scope } : { kind: 'tag_expression', expression });
  }

  const onLayer = ON_LAYER.exec(normalized);
  if (onLayer?.[1]) return Ok({ kind: 'layer', layer: onLayer[1] });

  const underLayer = UNDER_LAYER.exec(normalized);
  if (underLayer?.[1]) return Ok({ kind: 'layer', layer: underLayer[1], includeDescendants: true });

  const list = EXPLICIT_LIST.exec(normalized);
  if (list) {
    const body = list[1] ?? '';
    const offset = normalized.length - body.length;
    const members: EntityKey[] = [];
    let cursor = 0;
    for (const raw of body.split(',')) {
      const key = raw.trim();
      const position = offset + cursor + (raw.length - raw.trimStart().length);
      if (!ENTITY_KEY.test(key)) {
        return Err(new ReferenceDefinitionSyntaxError(
          normalized,
          position,
          key === '' ? 'expected an entity key' : `invalid entity key '${key}'`,
        ));
      }
      members.push(key);
      cursor += raw.length + 1;
    }
    return Ok({ kind: 'explicit_list', members });
  }

  return Err(new ReferenceDefinitionSyntaxError(normalized, 0, 'unrecognised reference definition'));
}

export function formatReferenceDefinition(definition: ReferenceDefinition): string {
  switch (definition.kind) {
    case 'tag_expression':
      return `${definition.scope ?? 'components'} tagged with ${definition.expression}`;
    case 'layer':
      return definition.includeDescendants
        ? `components under $$$${definition.layer}$$$`
        : `components on $$$${definition.layer}$$$`;
    case 'explicit_list':
      return `components: ${definition.members.join(', ')}`;
  }
}

/** Best-effort kind of a possibly unfinished definition, for editors */
export function detectDefinitionKind(text: string): ReferenceDefinitionKind | null {
  const lower = text.toLowerCase();
  if (lower.includes('tagged with')) return 'tag_expression';
  if (text.includes('$$$') && / (on|in|under) /.test(lower)) return 'layer';
  if (/^\s*components\s*:/.test(lower)) return 'explicit_list';
  return null;
}

export function getDefinitionTemplates(): Record<ReferenceDefinitionKind, string[]> {
  return {
    tag_expression: [
      "components tagged with 'tag-name'",
      "components tagged with 'tag1' AND 'tag2'",
      "components tagged with 'tag1' OR 'tag2'",
      "components tagged with NOT 'tag-name'",
      "components tagged with ('tag1' OR 'tag2') AND 'tag3'",
      "endpoints tagged with 'tag-name'",
    ],
    layer: [
      'groups on $$$layer-name$$$',
      'components on $$$layer-name$$$',
      'components in $$$layer-name$$$',
      'components under $$$layer-name$$$',
    ],
    explicit_list: ['components: key1, key2, key3'],
  };
}

/** Stable identity of a definition, for memoization */
export function definitionKey(definition: ReferenceDefinition): string {
  switch (definition.kind) {
    case 'tag_expression':
      return `tag:${definition.scope ?? 'components'}:${definition.expression}`;
    case 'layer':
      return `layer:${definition.includeDescendants ? 'subtree' : 'direct'}:${definition.layer}`;
    case 'explicit_list':
      return `list:${JSON.stringify(definition.members)}`;
  }
}
