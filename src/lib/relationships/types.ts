/**
 * Relationship model - typed, scored edges between Accounts and Contacts,
 * and the audit log entries recorded for each of their transitions.
 */

import type { EntityKind } from '@/lib/entities/types';

export const RELATIONSHIP_TERMS = [
  'works_for',
  'invested_in',
  'competitor',
  'colleague',
  'friend',
  'enemy',
] as const;

export type RelationshipTerm = (typeof RELATIONSHIP_TERMS)[number];

export type RelationshipCategory = 'employment' | 'business' | 'social';

export interface Relationship {
  id: string;
  sourceId: string;
  sourceKind: EntityKind;
  targetId: string;
  targetKind: EntityKind;
  term: RelationshipTerm;
  category: RelationshipCategory;
  directed: boolean;
  /** -100..100 for scored terms, null for works_for */
  score: number | null;
  /** Incremented on every write; used for optimistic concurrency */
  version: number;
  createdAt: number;
  updatedAt: number;
  deleted: boolean;
  deletedAt: number | null;
  lastModifiedBy: string;
}

export type LogAction = 'create' | 'update' | 'delete' | 'restore';

export interface FieldChange {
  field: keyof Relationship;
  previous: unknown;
  next: unknown;
}

export interface RelationshipLogEntry {
  id: string;
  /** Insertion order across the whole log */
  sequence: number;
  relationshipId: string;
  action: LogAction;
  previousState: Relationship | null;
  newState: Relationship;
  changes: FieldChange[];
  changedAt: number;
  actor: string | null;
  note: string | null;
}

export type NewLogEntry = Omit<RelationshipLogEntry, 'sequence'>;

export interface HistoryPage {
  entries: RelationshipLogEntry[];
  /** Pass as `after` to read the next page; null when exhausted */
  nextCursor: number | null;
}

export interface DeletedRelationshipFilter {
  entityId?: string;
  term?: RelationshipTerm;
  deletedAfter?: number;
  deletedBefore?: number;
}
