import type { FieldChange, Relationship } from '@/lib/relationships/types';

/** Fields compared between two snapshots, in the order changes are reported */
const TRACKED_FIELDS = [
  'sourceId',
  'sourceKind',
  'targetId',
  'targetKind',
  'term',
  'category',
  'directed',
  'score',
  'version',
  'deleted',
  'deletedAt',
  'updatedAt',
  'lastModifiedBy',
] as const satisfies ReadonlyArray<keyof Relationship>;

/**
 * Field-level diff between two states of one relationship. A null `before`
 * (creation) reports every tracked field with `previous: null`.
 */
export function diffRelationships(before: Relationship | null, after: Relationship): FieldChange[] {
  const changes: FieldChange[] = [];

  for (const field of TRACKED_FIELDS) {
    const previous = before ? before[field] : null;
    const next = after[field];
    if (before && previous === next) continue;
    changes.push({ field, previous, next });
  }

  return changes;
}

/** Changes excluding bookkeeping fields that move on every write */
export function meaningfulChanges(changes: FieldChange[]): FieldChange[] {
  return changes.filter(
    (change) => change.field !== 'version' && change.field !== 'updatedAt' && change.field !== 'lastModifiedBy'
  );
}
