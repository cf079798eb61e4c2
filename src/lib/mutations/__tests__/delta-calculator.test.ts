import { describe, it, expect } from 'vitest';
import type { Relationship } from '@/lib/relationships/types';
import { diffRelationships, meaningfulChanges } from '../delta-calculator';

const base: Relationship = {
  id: 'rel-1',
  sourceId: 'contact-1',
  sourceKind: 'contact',
  targetId: 'contact-2',
  targetKind: 'contact',
  term: 'friend',
  category: 'social',
  directed: false,
  score: 80,
  version: 1,
  createdAt: 1000,
  updatedAt: 1000,
  deleted: false,
  deletedAt: null,
  lastModifiedBy: 'Test User',
};

describe('diffRelationships', () => {
  it('should report every tracked field on create', () => {
    const changes = diffRelationships(null, base);

    expect(changes).toHaveLength(13);
    expect(changes[0]).toEqual({ field: 'sourceId', previous: null, next: 'contact-1' });
    expect(changes.find((change) => change.field === 'score')).toEqual({ field: 'score', previous: null, next: 80 });
  });

  it('should report only the fields that moved, in a fixed order', () => {
    const after: Relationship = { ...base, score: 40, version: 2, updatedAt: 2000 };

    expect(diffRelationships(base, after)).toEqual([
      { field: 'score', previous: 80, next: 40 },
      { field: 'version', previous: 1, next: 2 },
      { field: 'updatedAt', previous: 1000, next: 2000 },
    ]);
  });

  it('should capture soft deletion', () => {
    const after: Relationship = { ...base, deleted: true, deletedAt: 3000, version: 2, updatedAt: 3000 };

    expect(meaningfulChanges(diffRelationships(base, after))).toEqual([
      { field: 'deleted', previous: false, next: true },
      { field: 'deletedAt', previous: null, next: 3000 },
    ]);
  });

  it('should find no meaningful change in a bookkeeping-only write', () => {
    const after: Relationship = { ...base, version: 2, updatedAt: 2000, lastModifiedBy: 'Someone Else' };

    expect(diffRelationships(base, after)).toHaveLength(3);
    expect(meaningfulChanges(diffRelationships(base, after))).toEqual([]);
  });
});
