/**
 * RelationshipHistory - read side of the relationship audit log.
 */

import { NotFoundError } from '@/lib/errors';
import {
  deletedFilterSchema,
  historyOptionsSchema,
  type DeletedFilterInput,
  type HistoryOptions,
} from '@/lib/relationships/schemas';
import type { HistoryPage, Relationship } from '@/lib/relationships/types';
import type { StorageService } from '@/lib/storage/interfaces';
import { parseInput } from '@/lib/validation';
import { z } from 'zod';

export const DEFAULT_HISTORY_LIMIT = 50;

const timestampSchema = z.number().int().nonnegative();

export interface RelationshipSnapshot {
  timestamp: number;
  /** Relationships active at `timestamp`, sorted by id */
  relationships: Relationship[];
  relationshipCount: number;
}

export class RelationshipHistory {
  constructor(private storage: StorageService) {}

  /**
   * Log entries oldest first. `nextCursor` is the sequence of the last entry
   * returned; pass it back as `after` to continue.
   */
  history(relationshipId: string, options: HistoryOptions = {}): HistoryPage {
    const { after = 0, limit = DEFAULT_HISTORY_LIMIT } = parseInput(historyOptionsSchema, options, 'history options');
    this.requireKnown(relationshipId);

    const rows = this.storage.auditLog.getPage(relationshipId, after, limit + 1);
    const hasMore = rows.length > limit;
    const entries = hasMore ? rows.slice(0, limit) : rows;
    const last = entries[entries.length - 1];

    return {
      entries,
      nextCursor: hasMore && last ? last.sequence : null,
    };
  }

  listDeleted(filter: DeletedFilterInput = {}): Relationship[] {
    return this.storage.relationships.queryDeleted(parseInput(deletedFilterSchema, filter, 'deleted filter'));
  }

  /** Snapshot as of `timestamp`, or null when the relationship did not exist yet */
  stateAt(relationshipId: string, timestamp: number): Relationship | null {
    const at = parseInput(timestampSchema, timestamp, 'timestamp');
    this.requireKnown(relationshipId);
    return this.storage.auditLog.getLatestAt(relationshipId, at)?.newState ?? null;
  }

  /** Rebuilds the active relationship set at `timestamp` from the log alone */
  reconstructAt(timestamp: number): RelationshipSnapshot {
    const at = parseInput(timestampSchema, timestamp, 'timestamp');
    const relationships = this.storage.auditLog
      .getLatestPerRelationshipAt(at)
      .map((entry) => entry.newState)
      .filter((rel) => !rel.deleted);

    return { timestamp: at, relationships, relationshipCount: relationships.length };
  }

  private requireKnown(relationshipId: string): void {
    if (!this.storage.relationships.getById(relationshipId)) {
      throw new NotFoundError(`Relationship ${relationshipId} not found`, { id: relationshipId });
    }
  }
}
