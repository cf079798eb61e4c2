/**
 * AuditLogStoreImpl - append-only relationship_log persistence.
 *
 * Snapshots are stored as JSON and validated on the way out, so a row that
 * no longer matches the Relationship shape fails loudly instead of leaking
 * into history views.
 */

import type { SQLiteDatabase } from '@/lib/db/init';
import { serializeJson, type RelationshipLogRow } from '@/lib/db/types';
import { fieldChangesSchema, relationshipRecordSchema } from '@/lib/relationships/schemas';
import type { LogAction, NewLogEntry, RelationshipLogEntry } from '@/lib/relationships/types';
import { z } from 'zod';
import type { IAuditLogStore } from '../interfaces';

const logActionSchema = z.enum(['create', 'update', 'delete', 'restore']);

type InsertLogParams = Omit<RelationshipLogRow, 'sequence'>;

export class AuditLogStoreImpl implements IAuditLogStore {
  constructor(private db: SQLiteDatabase) {}

  append(entry: NewLogEntry): RelationshipLogEntry {
    const result = this.db
      .prepare<InsertLogParams>(
        `INSERT INTO relationship_log (
           id, relationship_id, action, previous_state, new_state, changes, changed_at, actor, note
         ) VALUES (
           @id, @relationship_id, @action, @previous_state, @new_state, @changes, @changed_at, @actor, @note
         )`
      )
      .run({
        id: entry.id,
        relationship_id: entry.relationshipId,
        action: entry.action,
        previous_state: serializeJson(entry.previousState),
        new_state: JSON.stringify(entry.newState),
        changes: JSON.stringify(entry.changes),
        changed_at: entry.changedAt,
        actor: entry.actor,
        note: entry.note,
      });

    return { ...entry, sequence: Number(result.lastInsertRowid) };
  }

  getPage(relationshipId: string, afterSequence: number, limit: number): RelationshipLogEntry[] {
    return this.db
      .prepare<[string, number, number], RelationshipLogRow>(
        `SELECT * FROM relationship_log
         WHERE relationship_id = ? AND sequence > ?
         ORDER BY sequence
         LIMIT ?`
      )
      .all(relationshipId, afterSequence, limit)
      .map((row) => this.rowToEntry(row));
  }

  getLatestAt(relationshipId: string, timestamp: number): RelationshipLogEntry | null {
    const row = this.db
      .prepare<[string, number], RelationshipLogRow>(
        `SELECT * FROM relationship_log
         WHERE relationship_id = ? AND changed_at <= ?
         ORDER BY sequence DESC
         LIMIT 1`
      )
      .get(relationshipId, timestamp);
    return row ? this.rowToEntry(row) : null;
  }

  getLatestPerRelationshipAt(timestamp: number): RelationshipLogEntry[] {
    return this.db
      .prepare<[number], RelationshipLogRow>(
        `SELECT log.* FROM relationship_log AS log
         JOIN (
           SELECT relationship_id, MAX(sequence) AS last_sequence
           FROM relationship_log
           WHERE changed_at <= ?
           GROUP BY relationship_id
         ) AS latest ON latest.last_sequence = log.sequence
         ORDER BY log.relationship_id`
      )
      .all(timestamp)
      .map((row) => this.rowToEntry(row));
  }

  countFor(relationshipId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        'SELECT COUNT(*) AS count FROM relationship_log WHERE relationship_id = ?'
      )
      .get(relationshipId);
    return row?.count ?? 0;
  }

  private rowToEntry(row: RelationshipLogRow): RelationshipLogEntry {
    const action: LogAction = logActionSchema.parse(row.action);
    return {
      id: row.id,
      sequence: row.sequence,
      relationshipId: row.relationship_id,
      action,
      previousState:
        row.previous_state === null ? null : relationshipRecordSchema.parse(JSON.parse(row.previous_state)),
      newState: relationshipRecordSchema.parse(JSON.parse(row.new_state)),
      changes: fieldChangesSchema.parse(JSON.parse(row.changes)),
      changedAt: row.changed_at,
      actor: row.actor,
      note: row.note,
    };
  }
}
