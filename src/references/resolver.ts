/**
 * @fileoverview Reference Resolver
 *
 * Turns a definition into the current member set. Nothing is cached between
 * calls unless the caller passes a `ResolutionScope`, which lives for one
 * evaluation batch and must not outlive the snapshot it was used with.
 */

import type { TagExpressionSyntaxError } from '../core/errors.js';
import type { EntityKey } from '../graphs/model.js';
import { createLogger } from '../telemetry/logger.js';
import type { TagStore } from '../tags/tag_store.js';
import { definitionKey, type ReferenceDefinition, type ReferenceRegistry } from './reference_definition.js';
import { evaluateTagExpression, tryParseTagExpression } from './tag_expression.js';

const logger = createLogger('resolver');

export interface ReferenceResolution {
  /** Ascending key order */
  members: ReadonlySet<EntityKey>;
  /** Set when the definition's tag expression does not parse */
  error?: TagExpressionSyntaxError;
}

export interface ResolverContext {
  tags: TagStore;
}

/**
 * Memo of resolutions for one batch.
 */
export class ResolutionScope {
  private readonly resolutions = new Map<string, ReferenceResolution>();

  get size(): number {
    return this.resolutions.size;
  }

  lookup(definition: ReferenceDefinition): ReferenceResolution | undefined {
    return this.resolutions.get(definitionKey(definition));
  }

  remember(definition: ReferenceDefinition, resolution: ReferenceResolution): void {
    this.resolutions.set(definitionKey(definition), resolution);
  }
}

export function resolveReference(
  definition: ReferenceDefinition,
  context: ResolverContext,
  scope?: ResolutionScope,
): ReferenceResolution {
  const cached = scope?.lookup(definition);
  if (cached) return cached;
  const resolution = computeResolution(definition, context.tags);
  scope?.remember(definition, resolution);
  return resolution;
}

/**
 * Resolve a registered reference by name; undefined when the name is not
 * registered.
 */
export function resolveNamedReference(
  name: string,
  context: ResolverContext & { references: ReferenceRegistry },
  scope?: ResolutionScope,
): ReferenceResolution | undefined {
  const definition = context.references.get(name);
  return definition ? resolveReference(definition, context, scope) : undefined;
}

function computeResolution(definition: ReferenceDefinition, tags: TagStore): ReferenceResolution {
  switch (definition.kind) {
    case 'tag_expression': {
      const parsed = tryParseTagExpression(definition.expression);
      if (!parsed.ok) {
        logger.debug('Tag expression does not parse', { expression: definition.expression, error: parsed.error.message });
        return { members: new Set(), error: parsed.error };
      }
      const candidates = tags.entityKeys(definition.scope ?? 'components');
      return {
        members: new Set(candidates.filter((key) => evaluateTagExpression(parsed.value, tags.tagsOf(key)))),
      };
    }
    case 'layer': {
      if (!tags.hasLayer(definition.layer)) {
        logger.debug('Unknown layer in reference', { layer: definition.layer });
      }
      const members = tags.membersOf(definition.layer, definition.includeDescendants ?? false);
      return { members: new Set(Array.from(members).sort()) };
    }
    case 'explicit_list': {
      const present = definition.members.filter((key) => tags.hasEntity(key));
      if (present.length !== definition.members.length) {
        logger.debug('Dropped stale keys from explicit list', {
          dropped: definition.members.filter((key) => !tags.hasEntity(key)),
        });
      }
      return { members: new Set(present.sort()) };
    }
  }
}
