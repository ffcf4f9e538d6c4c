/**
 * @fileoverview Zod validators for host-supplied input
 *
 * Hosts that receive snapshots or reference definitions from outside (JSON
 * files, HTTP bodies) check them here before building a context. Everything
 * past this boundary assumes well-typed input.
 */

import { z } from 'zod';
import { SnapshotValidationError, type InputIssue } from '../core/errors.js';
import type { GraphSnapshot } from '../graphs/model.js';
import {
  parseReferenceDefinition,
  type ReferenceDefinition,
  type ReferenceRegistry,
} from '../references/reference_definition.js';

// ============================================================================
// SNAPSHOT SCHEMAS
// ============================================================================

const KeySchema = z.string().min(1);
const TagsSchema = z.array(z.string().min(1));

export const ComponentRecordSchema = z.object({
  key: KeySchema,
  name: z.string().optional(),
  tags: TagsSchema.optional(),
  layers: z.array(KeySchema).optional(),
});

export const EndpointRecordSchema = z.object({
  key: KeySchema,
  component: KeySchema,
  name: z.string().optional(),
  tags: TagsSchema.optional(),
  layers: z.array(KeySchema).optional(),
});

export const DependencyRecordSchema = z.object({
  source: KeySchema,
  target: KeySchema,
  type: z.string().min(1).optional(),
});

export const LayerRecordSchema = z.object({
  key: KeySchema,
  name: z.string().optional(),
  parent: KeySchema.nullable().optional(),
  members: z.array(KeySchema).optional(),
  tags: TagsSchema.optional(),
  readOnly: z.boolean().optional(),
});

export const GraphSnapshotSchema = z.object({
  components: z.array(ComponentRecordSchema),
  endpoints: z.array(EndpointRecordSchema).optional(),
  dependencies: z.array(DependencyRecordSchema),
  layers: z.array(LayerRecordSchema).optional(),
});

// ============================================================================
// REFERENCE SCHEMAS
// ============================================================================

const ReferenceNameSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, 'Reference names use letters, digits, _ and -');

export const ReferenceDefinitionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('tag_expression'),
    expression: z.string().min(1),
    scope: z.enum(['components', 'endpoints']).optional(),
  }).strict(),
  z.object({
    kind: z.literal('layer'),
    layer: KeySchema,
    includeDescendants: z.boolean().optional(),
  }).strict(),
  z.object({
    kind: z.literal('explicit_list'),
    members: z.array(KeySchema),
  }).strict(),
]);

/** A definition object, or its text form */
export const ReferenceDefinitionInputSchema = z.union([z.string().min(1), ReferenceDefinitionSchema]);

export const ReferenceRegistryInputSchema = z.record(ReferenceNameSchema, ReferenceDefinitionInputSchema);

// ============================================================================
// PARSERS
// ============================================================================

function toIssues(error: z.ZodError): InputIssue[] {
  return error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

/**
 * Validate a snapshot. Throws `SnapshotValidationError` listing every
 * issue. Keys that no record defines are not an error here; graph
 * construction drops the edges that use them.
 */
export function parseGraphSnapshot(input: unknown): GraphSnapshot {
  const result = GraphSnapshotSchema.safeParse(input);
  if (!result.success) throw new SnapshotValidationError('snapshot', toIssues(result.error));
  return result.data;
}

export function parseReferenceDefinitionInput(input: unknown, path = ''): ReferenceDefinition {
  const result = ReferenceDefinitionInputSchema.safeParse(input);
  if (!result.success) {
    throw new SnapshotValidationError(
      'reference definition',
      toIssues(result.error).map((issue) => ({ ...issue, path: [path, issue.path].filter(Boolean).join('.') })),
    );
  }
  if (typeof result.data !== 'string') return result.data;

  const parsed = parseReferenceDefinition(result.data);
  if (!parsed.ok) {
    throw new SnapshotValidationError('reference definition', [{ path, message: parsed.error.message }]);
  }
  return parsed.value;
}

/** Name -> definition (object or text) into a registry */
export function parseReferenceRegistryInput(input: unknown): ReferenceRegistry {
  const result = ReferenceRegistryInputSchema.safeParse(input);
  if (!result.success) throw new SnapshotValidationError('reference registry', toIssues(result.error));
  const registry = new Map<string, ReferenceDefinition>();
  for (const [name, definition] of Object.entries(result.data)) {
    registry.set(name, parseReferenceDefinitionInput(definition, name));
  }
  return registry;
}
