/**
 * @fileoverview Partition comparison for correspondence and refinement
 *
 * A layer's partition is its list of non-empty groups. Two groups are the
 * same when their member sets are equal, so matching is done on a canonical
 * signature of the sorted members.
 */

import type { EntityKey } from '../graphs/model.js';
import type { LayerGroup } from '../tags/tag_store.js';

export interface GroupDuplicate {
  /** Group keys sharing one member set */
  groups: string[];
  members: EntityKey[];
}

export interface CorrespondenceMatch {
  pairs: Array<{ left: string; right: string }>;
  unmatchedLeft: string[];
  unmatchedRight: string[];
  holds: boolean;
}

export interface RefinementMatch {
  /** Each placed finer group and the one coarser group containing it */
  placements: Array<{ finer: string; coarser: string }>;
  /** Finer groups contained in no coarser group */
  unplaced: string[];
  /** Finer groups contained in more than one coarser group */
  overlapping: Array<{ finer: string; coarser: string[] }>;
  /** Coarser groups the placed finer groups do not add up to */
  incomplete: Array<{ coarser: string; missing: EntityKey[] }>;
  /** Members of a coarser group claimed by more than one finer group placed in it */
  sharedMembers: Array<{ coarser: string; member: EntityKey; finer: string[] }>;
  holds: boolean;
}

const SEPARATOR = '\u0000';

function signature(members: ReadonlySet<EntityKey>): string {
  return Array.from(members).sort().join(SEPARATOR);
}

/** Groups with at least one member, in the order given */
export function nonEmptyGroups(groups: readonly LayerGroup[]): LayerGroup[] {
  return groups.filter((group) => group.members.size > 0);
}

/** Sets of groups with identical members; empty when every group is distinct */
export function findDuplicateGroups(groups: readonly LayerGroup[]): GroupDuplicate[] {
  const bySignature = new Map<string, LayerGroup[]>();
  for (const group of nonEmptyGroups(groups)) {
    const key = signature(group.members);
    bySignature.set(key, [...(bySignature.get(key) ?? []), group]);
  }
  const duplicates: GroupDuplicate[] = [];
  for (const list of bySignature.values()) {
    const first = list[0];
    if (list.length < 2 || !first) continue;
    duplicates.push({ groups: list.map((group) => group.key), members: Array.from(first.members).sort() });
  }
  return duplicates;
}

/**
 * Pair groups with identical member sets. Holds when every group on each
 * side has exactly one partner. Callers check for duplicates first.
 */
export function matchCorrespondence(left: readonly LayerGroup[], right: readonly LayerGroup[]): CorrespondenceMatch {
  const rightBySignature = new Map<string, string>();
  for (const group of nonEmptyGroups(right)) rightBySignature.set(signature(group.members), group.key);

  const pairs: Array<{ left: string; right: string }> = [];
  const unmatchedLeft: string[] = [];
  const matchedRight = new Set<string>();
  for (const group of nonEmptyGroups(left)) {
    const partner = rightBySignature.get(signature(group.members));
    if (partner === undefined) {
      unmatchedLeft.push(group.key);
      continue;
    }
    pairs.push({ left: group.key, right: partner });
    matchedRight.add(partner);
  }
  const unmatchedRight = nonEmptyGroups(right)
    .map((group) => group.key)
    .filter((key) => !matchedRight.has(key));

  return {
    pairs,
    unmatchedLeft,
    unmatchedRight,
    holds: unmatchedLeft.length === 0 && unmatchedRight.length === 0,
  };
}

/**
 * Check that `finer` refines `coarser`: every finer group sits inside
 * exactly one coarser group, and the finer groups placed in a coarser group
 * partition it (disjoint, with the coarser group as their union).
 */
export function matchRefinement(finer: readonly LayerGroup[], coarser: readonly LayerGroup[]): RefinementMatch {
  const coarseGroups = nonEmptyGroups(coarser);
  const placements: Array<{ finer: string; coarser: string }> = [];
  const unplaced: string[] = [];
  const overlapping: Array<{ finer: string; coarser: string[] }> = [];
  // coarser key -> member -> finer groups claiming it
  const claims = new Map<string, Map<EntityKey, string[]>>();

  for (const group of nonEmptyGroups(finer)) {
    const containers = coarseGroups.filter((candidate) => isSubset(group.members, candidate.members));
    const [only] = containers;
    if (containers.length === 0 || !only) {
      unplaced.push(group.key);
    } else if (containers.length > 1) {
      overlapping.push({ finer: group.key, coarser: containers.map((candidate) => candidate.key) });
    } else {
      placements.push({ finer: group.key, coarser: only.key });
      const claimed = claims.get(only.key) ?? new Map<EntityKey, string[]>();
      for (const member of group.members) claimed.set(member, [...(claimed.get(member) ?? []), group.key]);
      claims.set(only.key, claimed);
    }
  }

  const incomplete: Array<{ coarser: string; missing: EntityKey[] }> = [];
  const sharedMembers: Array<{ coarser: string; member: EntityKey; finer: string[] }> = [];
  for (const group of coarseGroups) {
    const claimed = claims.get(group.key) ?? new Map<EntityKey, string[]>();
    const members = Array.from(group.members).sort();
    const missing = members.filter((member) => !claimed.has(member));
    if (missing.length > 0) incomplete.push({ coarser: group.key, missing });
    for (const member of members) {
      const finerGroups = claimed.get(member) ?? [];
      if (finerGroups.length > 1) sharedMembers.push({ coarser: group.key, member, finer: finerGroups });
    }
  }

  return {
    placements,
    unplaced,
    overlapping,
    incomplete,
    sharedMembers,
    holds: unplaced.length === 0 && overlapping.length === 0 && incomplete.length === 0 && sharedMembers.length === 0,
  };
}

function isSubset(subset: ReadonlySet<EntityKey>, superset: ReadonlySet<EntityKey>): boolean {
  for (const member of subset) {
    if (!superset.has(member)) return false;
  }
  return true;
}
