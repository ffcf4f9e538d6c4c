/**
 * @fileoverview Tag Store
 *
 * Read-only view over the tags and layer memberships of one snapshot. The
 * resolver and evaluator only ever talk to the `TagStore` interface, so a
 * host can back it with its own storage instead of a snapshot.
 */

import type { EntityKey, GraphSnapshot } from '../graphs/model.js';

// ============================================================================
// TYPES
// ============================================================================

export type EntityScope = 'components' | 'endpoints' | 'all';

/** One group of a layer: a direct child layer, or the layer itself when it has no children. */
export interface LayerGroup {
  key: string;
  members: ReadonlySet<EntityKey>;
}

export interface TagStore {
  /** Tags of a component, endpoint or layer; empty when unknown */
  tagsOf(key: string): ReadonlySet<string>;
  /** Layers the entity is a direct member of */
  layersOf(key: EntityKey): ReadonlySet<string>;
  /** Direct members, or the union over the layer's subtree */
  membersOf(layerKey: string, includeDescendants?: boolean): ReadonlySet<EntityKey>;
  /** Groups in ascending key order; empty for an unknown layer */
  groupsOf(layerKey: string): LayerGroup[];
  childrenOf(layerKey: string): string[];
  hasLayer(key: string): boolean;
  layerKeys(): string[];
  /** Entity keys in ascending order */
  entityKeys(scope?: EntityScope): EntityKey[];
  hasEntity(key: EntityKey): boolean;
}

const EMPTY: ReadonlySet<string> = new Set();

// ============================================================================
// SNAPSHOT-BACKED STORE
// ============================================================================

export function createSnapshotTagStore(snapshot: GraphSnapshot): TagStore {
  const componentKeys = snapshot.components.map((component) => component.key).sort();
  const componentSet = new Set(componentKeys);
  const endpointKeys = (snapshot.endpoints ?? [])
    .filter((endpoint) => componentSet.has(endpoint.component))
    .map((endpoint) => endpoint.key)
    .sort();
  const entitySet = new Set([...componentKeys, ...endpointKeys]);
  const allKeys = Array.from(entitySet).sort();

  const tags = new Map<string, Set<string>>();
  for (const record of [...snapshot.components, ...(snapshot.endpoints ?? []), ...(snapshot.layers ?? [])]) {
    const set = tags.get(record.key) ?? new Set<string>();
    for (const tag of record.tags ?? []) set.add(tag);
    tags.set(record.key, set);
  }

  const layerKeys = new Set((snapshot.layers ?? []).map((layer) => layer.key));
  const directMembers = new Map<string, Set<EntityKey>>();
  const entityLayers = new Map<EntityKey, Set<string>>();
  const addMembership = (layerKey: string, entity: EntityKey): void => {
    if (!layerKeys.has(layerKey) || !entitySet.has(entity)) return;
    const members = directMembers.get(layerKey) ?? new Set<EntityKey>();
    members.add(entity);
    directMembers.set(layerKey, members);
    const layers = entityLayers.get(entity) ?? new Set<string>();
    layers.add(layerKey);
    entityLayers.set(entity, layers);
  };
  for (const layer of snapshot.layers ?? []) {
    for (const member of layer.members ?? []) addMembership(layer.key, member);
  }
  for (const record of [...snapshot.components, ...(snapshot.endpoints ?? [])]) {
    for (const layerKey of record.layers ?? []) addMembership(layerKey, record.key);
  }

  const children = new Map<string, string[]>();
  for (const layer of snapshot.layers ?? []) {
    const parent = layer.parent;
    if (!parent || parent === layer.key || !layerKeys.has(parent)) continue;
    const list = children.get(parent) ?? [];
    list.push(layer.key);
    children.set(parent, list);
  }
  for (const list of children.values()) list.sort();

  const subtreeMembers = (layerKey: string): Set<EntityKey> => {
    const result = new Set<EntityKey>();
    // A parent cycle in bad input would otherwise loop forever.
    const visited = new Set<string>();
    const stack = [layerKey];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      for (const member of directMembers.get(current) ?? []) result.add(member);
      stack.push(...(children.get(current) ?? []));
    }
    return result;
  };

  return {
    tagsOf: (key) => tags.get(key) ?? EMPTY,
    layersOf: (key) => entityLayers.get(key) ?? EMPTY,
    membersOf: (layerKey, includeDescendants = false) => {
      if (!layerKeys.has(layerKey)) return EMPTY;
      return includeDescendants ? subtreeMembers(layerKey) : directMembers.get(layerKey) ?? EMPTY;
    },
    groupsOf: (layerKey) => {
      if (!layerKeys.has(layerKey)) return [];
      const childKeys = children.get(layerKey) ?? [];
      if (childKeys.length === 0) {
        const members = directMembers.get(layerKey);
        return members && members.size > 0 ? [{ key: layerKey, members }] : [];
      }
      return childKeys.map((key) => ({ key, members: subtreeMembers(key) }));
    },
    childrenOf: (layerKey) => [...(children.get(layerKey) ?? [])],
    hasLayer: (key) => layerKeys.has(key),
    layerKeys: () => Array.from(layerKeys).sort(),
    entityKeys: (scope = 'components') => {
      if (scope === 'components') return [...componentKeys];
      if (scope === 'endpoints') return [...endpointKeys];
      return [...allKeys];
    },
    hasEntity: (key) => entitySet.has(key),
  };
}
